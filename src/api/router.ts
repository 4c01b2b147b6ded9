import { createServer, type Server } from 'node:http';
import express, { type Express } from 'express';
import { handleHealth, handleLiveness, handleReadiness } from './handlers/health.js';
import {
    handleCancelRequest,
    handleGetRequest,
    handleListRequests,
    handleSubmitRequest,
    type RequestsDeps,
} from './handlers/requests.js';
import {
    handleListBackends,
    handleReinitializeBackend,
    handleSelectBackend,
    type BackendControlView,
} from './handlers/backends.js';
import { handleSpeech, type SpeechDeps } from './handlers/speech.js';
import { requestLogger, requireSignature, sendError, sendMappedError, sendOk, setRawRequestBody } from './shared.js';
import type { BackendFamily } from '../types/backends.js';
import type { WsHub } from './websocket-hub.js';
import { logThought } from '../utils/logger.js';

export interface ApiAppDeps extends RequestsDeps, SpeechDeps {
    apiSecret: string;
    registries: Record<BackendFamily, BackendControlView>;
    startedAt?: number;
    hub?: WsHub;
    /** Upper bound for raw audio uploads on POST /speech. @default 25mb */
    maxAudioBytes?: number;
}

/**
 * Build the HTTP API.
 *
 * Endpoints:
 *   GET  /health                               — Queue counters and backend readiness
 *   GET  /health/live                          — Liveness probe
 *   GET  /health/ready                         — 200 when both families can serve, else 503
 *   POST /requests                             — Enqueue a request (`wait: true` blocks until done)
 *   GET  /requests                             — Retained requests (`?status=`, `?source=history`)
 *   GET  /requests/:id                         — One request with its trace
 *   POST /requests/:id/cancel                  — Cancel a queued or running request
 *   GET  /backends/:family                     — Backend descriptors (`?refresh=true` probes)
 *   POST /backends/:family/select              — Switch the selected backend (signed)
 *   POST /backends/:family/:id/reinitialize    — Retry a failed backend (signed)
 *   POST /speech                               — Speech in, text and speech out
 *   GET  /ws/metrics                           — WebSocket hub metrics (signed)
 */
export function createApiApp(deps: ApiAppDeps): Express {
    const app = express();
    const signed = requireSignature(deps.apiSecret);
    const maxAudioBytes = deps.maxAudioBytes ?? 25 * 1024 * 1024;

    // ── Global Middleware ───────────────────────────────────────────────────────
    app.use(express.json({ limit: Math.ceil(maxAudioBytes * 1.4), verify: setRawRequestBody }));
    app.use(requestLogger);

    // ── Routes ──────────────────────────────────────────────────────────────────
    const hub = deps.hub;
    const healthDeps = {
        startedAt: deps.startedAt ?? Date.now(),
        queue: deps.queue,
        registries: deps.registries,
        ...(hub ? { wsMetrics: () => hub.getMetrics() } : {}),
    };
    app.get('/health', handleHealth(healthDeps));
    app.get('/health/live', handleLiveness());
    app.get('/health/ready', handleReadiness(healthDeps));

    app.post('/requests', handleSubmitRequest(deps));
    app.get('/requests', handleListRequests(deps));
    app.get('/requests/:id', handleGetRequest(deps));
    app.post('/requests/:id/cancel', handleCancelRequest(deps));

    app.get('/backends/:family', handleListBackends(deps));
    app.post('/backends/:family/select', signed, handleSelectBackend(deps));
    app.post('/backends/:family/:id/reinitialize', signed, handleReinitializeBackend(deps));

    app.post('/speech', express.raw({ type: 'audio/*', limit: maxAudioBytes }), handleSpeech(deps));

    app.get('/ws/metrics', signed, (_req, res) => {
        if (!hub) {
            sendError(res, 'WebSocket hub not initialized.', 503);
            return;
        }
        sendOk(res, hub.getMetrics());
    });

    // ── Catch-all 404 ──────────────────────────────────────────────────────────
    app.use((_req, res) => {
        sendError(res, 'Not found.', 404);
    });

    // Body parser failures (bad JSON, oversize payloads) arrive here.
    app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
        if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status < 500) {
            sendError(res, err.message, err.status);
            return;
        }
        sendMappedError(res, err);
    });

    return app;
}

export interface ApiServerHandle {
    server: Server;
    close(): Promise<void>;
}

/** Create the app, attach the hub when given, and listen on `port`. */
export function startApiServer(deps: ApiAppDeps, port: number): Promise<ApiServerHandle> {
    const app = createApiApp(deps);
    const server = createServer(app);
    deps.hub?.attach(server);

    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, () => {
            server.off('error', reject);
            console.log(`[API] Listening on http://localhost:${port}`);
            void logThought(`[API] HTTP server started on port ${port}.`);
            resolve({
                server,
                close: () => new Promise<void>((done, fail) => {
                    deps.hub?.stop();
                    server.close((err) => (err ? fail(err) : done()));
                }),
            });
        });
    });
}
