import type { Request, Response } from 'express';
import type { HealthData, ReadinessData } from '../../types/api.js';
import type { BackendDescriptor, BackendFamily, BackendReadinessState } from '../../types/backends.js';
import type { QueueStats } from '../../types/orchestration.js';
import { sendMappedError, sendOk } from '../shared.js';

/** The read side of a backend registry, whichever family it serves. */
export interface BackendRegistryView {
    selectedId(): string | null;
    state(id: string): BackendReadinessState;
    list(): BackendDescriptor[];
    health(options?: { refresh?: boolean }): Promise<BackendDescriptor[]>;
}

export interface HealthDeps {
    startedAt: number;
    queue: { stats(): QueueStats };
    registries: Record<BackendFamily, BackendRegistryView>;
    wsMetrics?: () => { activeClients: number };
}

const FAMILIES: readonly BackendFamily[] = ['transcription', 'synthesis'];

function isServing(state: BackendReadinessState): boolean {
    return state === 'ready' || state === 'degraded';
}

/** GET /health — queue counters and every backend's readiness, probing stale health. */
export function handleHealth(deps: HealthDeps) {
    return async (_req: Request, res: Response): Promise<void> => {
        try {
            const [transcription, synthesis] = await Promise.all([
                deps.registries.transcription.health(),
                deps.registries.synthesis.health(),
            ]);
            const backends: HealthData['backends'] = {
                transcription: {
                    selectedId: deps.registries.transcription.selectedId(),
                    backends: transcription,
                },
                synthesis: {
                    selectedId: deps.registries.synthesis.selectedId(),
                    backends: synthesis,
                },
            };
            const degraded = FAMILIES.some((family) => {
                const selected = backends[family].backends.find((backend) => backend.selected);
                return !selected || selected.state !== 'ready';
            });

            const data: HealthData = {
                status: degraded ? 'degraded' : 'ok',
                uptimeSec: Math.floor((Date.now() - deps.startedAt) / 1000),
                memoryUsageMb: Math.round(process.memoryUsage().rss / 1024 / 1024),
                queue: deps.queue.stats(),
                backends,
                ...(deps.wsMetrics ? { websocket: deps.wsMetrics() } : {}),
            };
            sendOk(res, data);
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** GET /health/live — the process answers. */
export function handleLiveness() {
    return (_req: Request, res: Response): void => {
        sendOk(res, { status: 'alive' });
    };
}

/**
 * GET /health/ready — 200 when every family has a selected backend that can serve,
 * 503 otherwise.
 */
export function handleReadiness(deps: Pick<HealthDeps, 'registries'>) {
    return (_req: Request, res: Response): void => {
        const describeFamily = (family: BackendFamily): ReadinessData['families'][BackendFamily] => {
            const registry = deps.registries[family];
            const selectedId = registry.selectedId();
            return { selectedId, state: selectedId ? registry.state(selectedId) : 'unregistered' };
        };
        const families: ReadinessData['families'] = {
            transcription: describeFamily('transcription'),
            synthesis: describeFamily('synthesis'),
        };
        const ready = FAMILIES.every((family) => isServing(families[family].state));
        const data: ReadinessData = { ready, families };
        sendOk(res, data, ready ? 200 : 503);
    };
}
