import 'dotenv/config';
import { resolveConfig } from './config/json-config.js';
import { validateEnvironment } from './config/env-validator.js';
import { createRuntimeContext } from './core/runtime-context.js';
import { toErrorMessage } from './core/errors.js';
import { WsHub } from './api/websocket-hub.js';
import { RuntimeEventBridge } from './api/runtime-event-bridge.js';
import { startApiServer } from './api/router.js';
import { logThought } from './utils/logger.js';

async function main(): Promise<void> {
    const config = await resolveConfig();

    // ── Preflight ────────────────────────────────────────────────────────────────
    const validation = validateEnvironment(process.env, config);
    for (const issue of validation.issues.filter((entry) => entry.class !== 'missing_required')) {
        console.warn(`[Voxloop] ${issue.message} ${issue.remediation}`);
    }
    if (!validation.ok) {
        for (const issue of validation.fatalIssues) {
            console.error(`[Voxloop] Startup blocked: ${issue.message} ${issue.remediation}`);
        }
        process.exitCode = 1;
        return;
    }
    if (validation.activeFeatures.length > 0) {
        void logThought(`[Voxloop] Active features: ${validation.activeFeatures.join(', ')}.`);
    }

    // ── Runtime ──────────────────────────────────────────────────────────────────
    const context = createRuntimeContext(config);
    const registries = { transcription: context.transcription, synthesis: context.synthesis };

    const hub = new WsHub({ apiSecret: config.runtime.apiSecret, commands: context.queue });
    const bridge = new RuntimeEventBridge({ hub, queue: context.queue, registries });
    bridge.start();

    const api = await startApiServer(
        {
            apiSecret: config.runtime.apiSecret,
            queue: context.queue,
            history: context.history,
            registries,
            pipeline: context.pipeline,
            startedAt: context.startedAt,
            hub,
            maxAudioBytes: config.speech.maxAudioBytes,
        },
        config.runtime.apiPort,
    );

    // Backends prepare in the background; requests are accepted meanwhile.
    void context
        .initializeBackends()
        .then((summaries) => {
            for (const summary of summaries) {
                console.log(`[Voxloop] ${summary.family}: selected '${summary.selectedId ?? 'none'}'.`);
            }
        })
        .catch((error: unknown) => {
            console.error(`[Voxloop] Backend initialization failed: ${toErrorMessage(error)}`);
        });

    console.log('[Voxloop] Runtime initialized.');

    // ── Graceful Shutdown ────────────────────────────────────────────────────────
    let shuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
        if (shuttingDown) return;
        shuttingDown = true;
        console.log(`[Voxloop] Received ${signal}; shutting down.`);
        bridge.stop();
        await api.close();
        await context.shutdown();
    };
    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        process.once(signal, () => {
            shutdown(signal).catch((error: unknown) => {
                console.error(`[Voxloop] Shutdown failed: ${toErrorMessage(error)}`);
                process.exitCode = 1;
            });
        });
    }
}

main().catch((error: unknown) => {
    console.error(`[Voxloop] Fatal startup error: ${toErrorMessage(error)}`);
    process.exitCode = 1;
});
