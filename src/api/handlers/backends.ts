import type { Request, Response } from 'express';
import type { BackendListData } from '../../types/api.js';
import type { BackendDescriptor, BackendFamily, BackendInitReport } from '../../types/backends.js';
import { logThought } from '../../utils/logger.js';
import { sendError, sendMappedError, sendOk } from '../shared.js';
import type { BackendRegistryView } from './health.js';

/** Registry operations the control routes need. */
export interface BackendControlView extends BackendRegistryView {
    select(id: string): Promise<BackendDescriptor>;
    reinitialize(id: string): Promise<BackendInitReport>;
}

export interface BackendsDeps {
    registries: Record<BackendFamily, BackendControlView>;
}

function parseFamily(value: unknown): BackendFamily | null {
    return value === 'transcription' || value === 'synthesis' ? value : null;
}

function resolveRegistry(deps: BackendsDeps, req: Request, res: Response): { family: BackendFamily; registry: BackendControlView } | null {
    const family = parseFamily(req.params.family);
    if (!family) {
        sendError(res, `Unknown backend family '${String(req.params.family)}'. Expected transcription or synthesis.`, 404);
        return null;
    }
    return { family, registry: deps.registries[family] };
}

/** GET /backends/:family — descriptors; `?refresh=true` forces a health probe. */
export function handleListBackends(deps: BackendsDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        const resolved = resolveRegistry(deps, req, res);
        if (!resolved) return;
        try {
            const backends = req.query.refresh === 'true'
                ? await resolved.registry.health({ refresh: true })
                : resolved.registry.list();
            const data: BackendListData = {
                family: resolved.family,
                selectedId: resolved.registry.selectedId(),
                backends,
            };
            sendOk(res, data);
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** POST /backends/:family/select — body `{ "id": "<backend id>" }`. Signed. */
export function handleSelectBackend(deps: BackendsDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        const resolved = resolveRegistry(deps, req, res);
        if (!resolved) return;
        const id: unknown = req.body?.id;
        if (typeof id !== 'string' || id.trim().length === 0) {
            sendError(res, "'id' must be a non-empty string.", 400);
            return;
        }
        try {
            const descriptor = await resolved.registry.select(id);
            void logThought(`[API] ${resolved.family} backend switched to '${id}'.`);
            sendOk(res, descriptor);
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** POST /backends/:family/:id/reinitialize — retry preparation of a failed backend. Signed. */
export function handleReinitializeBackend(deps: BackendsDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        const resolved = resolveRegistry(deps, req, res);
        if (!resolved) return;
        try {
            const report = await resolved.registry.reinitialize(String(req.params.id));
            sendOk(res, report);
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}
