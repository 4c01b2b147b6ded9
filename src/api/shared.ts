import type { Request, Response, NextFunction } from 'express';
import type { IncomingMessage } from 'node:http';
import { createHmac, timingSafeEqual, randomUUID } from 'node:crypto';
import type { ApiEnvelope, ApiErrorDetail } from '../types/api.js';
import {
    BackendNotReadyError,
    BackendOperationError,
    DuplicateBackendError,
    DuplicateDelegateError,
    PipelineStageError,
    QueueFullError,
    RequestNotFoundError,
    TimeoutError,
    UnknownBackendError,
    VoxloopError,
    toErrorMessage,
} from '../core/errors.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';

const rawBodies = new WeakMap<IncomingMessage, string>();

function stableStringify(value: unknown): string {
    if (value === null || typeof value !== 'object') {
        const serialized = JSON.stringify(value);
        return serialized ?? 'null';
    }
    if (Array.isArray(value)) {
        return `[${value.map((item) => stableStringify(item)).join(',')}]`;
    }
    const entries = Object.entries(value)
        .sort(([left], [right]) => left.localeCompare(right))
        .map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`);
    return `{${entries.join(',')}}`;
}

function getSignaturePayloadCandidates(req: Request): string[] {
    const payloads = new Set<string>();
    const rawBody = rawBodies.get(req);
    if (typeof rawBody === 'string') {
        payloads.add(rawBody);
    }
    if (req.body === undefined) {
        payloads.add('');
        return [...payloads];
    }
    payloads.add(JSON.stringify(req.body) ?? '');
    payloads.add(stableStringify(req.body));
    return [...payloads];
}

/** `verify` hook for `express.json` so signatures are checked against the exact bytes sent. */
export function setRawRequestBody(req: IncomingMessage, _res: unknown, buffer: Buffer): void {
    rawBodies.set(req, buffer.toString('utf8'));
}

/** Hex HMAC-SHA256 of `payload`, as expected after `sha256=` in `X-Signature`. */
export function signPayload(payload: string, secret: string): string {
    return createHmac('sha256', secret).update(payload).digest('hex');
}

function correlationIdOf(res: Response): string | undefined {
    const value: unknown = res.locals.correlationId;
    return typeof value === 'string' ? value : undefined;
}

function codeForStatus(status: number): string {
    switch (status) {
        case 401: return 'unauthorized';
        case 403: return 'forbidden';
        case 404: return 'not_found';
        case 409: return 'conflict';
        case 503: return 'unavailable';
        default: return status >= 500 ? 'internal_error' : 'invalid_request';
    }
}

// ── Response Helpers ────────────────────────────────────────────────────────

/** Send a successful JSON response using the standard envelope. */
export function sendOk<T>(res: Response, data: T, status = 200): void {
    const body: ApiEnvelope<T> = {
        ok: true,
        data,
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

/** Send an error JSON response using the standard envelope. */
export function sendError(res: Response, error: string | ApiErrorDetail, status = 400): void {
    const detail: ApiErrorDetail = typeof error === 'string'
        ? { code: codeForStatus(status), message: error }
        : error;
    const body: ApiEnvelope = {
        ok: false,
        error: { ...detail, message: scrubSensitiveText(detail.message) },
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

/** Map and send a caught error. */
export function sendMappedError(res: Response, err: unknown): void {
    const { status, error } = mapError(err);
    sendError(res, error, status);
}

// ── Auth Middleware ──────────────────────────────────────────────────────────

/**
 * Validate the `X-Signature` header on mutating requests.
 *
 * Expected format: `sha256=<hex digest of HMAC-SHA256(body, API_SECRET)>`
 *
 * With no secret configured every signed request is rejected.
 */
export function requireSignature(apiSecret: string) {
    return (req: Request, res: Response, next: NextFunction): void => {
        if (!apiSecret) {
            void logThought('[API] Signed request rejected: API_SECRET not configured.');
            sendError(res, 'Signed API endpoints are unavailable (missing API_SECRET).', 503);
            return;
        }

        const signatureHeader = req.headers['x-signature'];
        if (typeof signatureHeader !== 'string' || !signatureHeader.startsWith('sha256=')) {
            void logThought('[API] Signed request rejected: missing or malformed X-Signature header.');
            sendError(res, 'Missing or malformed X-Signature header.', 401);
            return;
        }

        const providedHex = signatureHeader.slice('sha256='.length);
        if (!/^[a-f0-9]{64}$/i.test(providedHex)) {
            void logThought('[API] Signed request rejected: malformed signature digest.');
            sendError(res, 'Malformed signature digest.', 401);
            return;
        }
        const provided = Buffer.from(providedHex, 'hex');
        const signatureMatches = getSignaturePayloadCandidates(req).some((payload) => {
            const expected = Buffer.from(signPayload(payload, apiSecret), 'hex');
            return provided.length === expected.length && timingSafeEqual(provided, expected);
        });

        if (!signatureMatches) {
            void logThought('[API] Signed request rejected: signature mismatch.');
            sendError(res, 'Invalid signature.', 403);
            return;
        }

        next();
    };
}

// ── Error Mapping ───────────────────────────────────────────────────────────

const VALIDATION_CODES = new Set(['invalid_request', 'audio_required', 'text_required', 'empty_transcript']);

function statusForCode(code: string): number {
    if (VALIDATION_CODES.has(code)) return 400;
    switch (code) {
        case 'audio_too_large': return 413;
        case 'backend_not_ready':
        case 'queue_stopped':
        case 'backend_not_configured': return 503;
        case 'timeout':
        case 'reasoning_timeout': return 504;
        default: return 502;
    }
}

/** Map a caught error to a status code and an error payload. */
export function mapError(err: unknown): { status: number; error: ApiErrorDetail } {
    if (err instanceof PipelineStageError) {
        return {
            status: statusForCode(err.causeCode),
            error: { code: err.causeCode, message: err.message, stage: err.stage, partial: { ...err.partial } },
        };
    }
    if (err instanceof BackendOperationError) {
        return { status: err.statusCode, error: err.toPayload() };
    }
    if (err instanceof UnknownBackendError || err instanceof RequestNotFoundError) {
        return { status: 404, error: { code: err.code, message: err.message } };
    }
    if (err instanceof QueueFullError) {
        return { status: 429, error: { code: err.code, message: err.message } };
    }
    if (err instanceof BackendNotReadyError) {
        return { status: 503, error: { code: err.code, message: err.message } };
    }
    if (err instanceof DuplicateBackendError || err instanceof DuplicateDelegateError) {
        return { status: 409, error: { code: err.code, message: err.message } };
    }
    if (err instanceof TimeoutError) {
        return { status: 504, error: { code: err.code, message: err.message } };
    }
    if (err instanceof VoxloopError) {
        const status = VALIDATION_CODES.has(err.code) || err.code === 'queue_stopped' ? statusForCode(err.code) : 500;
        return { status, error: { code: err.code, message: err.message } };
    }
    return { status: 500, error: { code: 'internal_error', message: toErrorMessage(err) } };
}

// ── Logging Middleware ───────────────────────────────────────────────────────

/** Log every incoming request and inject a correlation ID. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const correlationId = randomUUID();
    res.locals.correlationId = correlationId;
    void logThought(`[API] [${correlationId}] ${req.method} ${req.path}`);
    next();
}
