import type { Request, Response } from 'express';
import type { RequestListData } from '../../types/api.js';
import type { RequestInput, RequestSnapshot, RequestStatus } from '../../types/orchestration.js';
import type { OrchestrationQueue } from '../../core/orchestration-queue.js';
import type { RequestHistoryStore } from '../../services/request-history.js';
import { RequestNotFoundError } from '../../core/errors.js';
import { sendError, sendMappedError, sendOk } from '../shared.js';

export interface RequestsDeps {
    queue: OrchestrationQueue;
    history?: RequestHistoryStore | null;
}

const STATUSES: readonly RequestStatus[] = ['queued', 'running', 'succeeded', 'failed', 'cancelled'];

function isStatus(value: unknown): value is RequestStatus {
    return typeof value === 'string' && STATUSES.some((status) => status === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseLimit(raw: unknown, fallback: number): number {
    const requested = Number(raw ?? fallback);
    return Number.isFinite(requested) && requested > 0 ? Math.min(500, Math.floor(requested)) : fallback;
}

/** Validate a submission body. Returns the input or an error message. */
export function parseRequestInput(body: unknown): RequestInput | string {
    if (!isRecord(body)) {
        return 'Request body must be a JSON object.';
    }
    if (typeof body.text !== 'string' || body.text.trim().length === 0) {
        return "'text' must be a non-empty string.";
    }
    if (body.metadata !== undefined && !isRecord(body.metadata)) {
        return "'metadata' must be an object when provided.";
    }
    return {
        text: body.text,
        ...(body.metadata ? { metadata: { ...body.metadata } } : {}),
    };
}

function paramOf(req: Request, name: string): string {
    const value: unknown = req.params[name];
    return typeof value === 'string' ? value : '';
}

/**
 * POST /requests — enqueue a request. Answers 202 with the queued snapshot, or with
 * `"wait": true` in the body, 200 with the terminal snapshot.
 */
export function handleSubmitRequest(deps: RequestsDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        const input = parseRequestInput(req.body);
        if (typeof input === 'string') {
            sendError(res, input, 400);
            return;
        }
        try {
            const snapshot = deps.queue.submit(input);
            const wait = isRecord(req.body) && req.body.wait === true;
            if (!wait) {
                sendOk(res, snapshot, 202);
                return;
            }
            sendOk(res, await deps.queue.waitFor(snapshot.id));
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** GET /requests — retained requests, optionally `?status=`; `?source=history` reads the store. */
export function handleListRequests(deps: RequestsDeps) {
    return (req: Request, res: Response): void => {
        const status = req.query.status;
        if (status !== undefined && !isStatus(status)) {
            sendError(res, `Invalid status. Expected one of: ${STATUSES.join(', ')}.`, 400);
            return;
        }
        const limit = parseLimit(req.query.limit, 100);

        let requests: RequestSnapshot[];
        if (req.query.source === 'history') {
            if (!deps.history) {
                sendError(res, 'Request history is disabled.', 503);
                return;
            }
            requests = deps.history.listRecent(limit).filter((entry) => !status || entry.status === status);
        } else {
            requests = deps.queue.list(status ? { status } : {}).slice(-limit);
        }

        const data: RequestListData = { requests, stats: deps.queue.stats() };
        sendOk(res, data);
    };
}

/** GET /requests/:id — live record first, then persisted history. */
export function handleGetRequest(deps: RequestsDeps) {
    return (req: Request, res: Response): void => {
        const id = paramOf(req, 'id');
        const snapshot = deps.queue.get(id) ?? deps.history?.getRequest(id);
        if (!snapshot) {
            sendMappedError(res, new RequestNotFoundError(id));
            return;
        }
        sendOk(res, snapshot);
    };
}

/** POST /requests/:id/cancel — `cancelled` is false when the request had already finished. */
export function handleCancelRequest(deps: RequestsDeps) {
    return (req: Request, res: Response): void => {
        const id = paramOf(req, 'id');
        const reason = isRecord(req.body) && typeof req.body.reason === 'string' && req.body.reason.trim()
            ? req.body.reason.trim()
            : undefined;
        try {
            const cancelled = deps.queue.cancel(id, reason);
            sendOk(res, { cancelled, request: deps.queue.get(id) ?? null });
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}
