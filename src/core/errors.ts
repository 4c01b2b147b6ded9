import type { BackendFamily } from '../types/backends.js';
import type { PipelineStage } from '../types/speech.js';

/** Base class for every structured failure raised by the runtime. */
export class VoxloopError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Normalize an unknown thrown value into a readable message. */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

// ── Timeouts ─────────────────────────────────────────────────────────────────

export class TimeoutError extends VoxloopError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super('timeout', `${label} timed out after ${timeoutMs}ms.`);
    this.timeoutMs = timeoutMs;
  }
}

// ── Delegates & reasoning loop ───────────────────────────────────────────────

export class DelegateNotFoundError extends VoxloopError {
  readonly delegateName: string;

  constructor(delegateName: string, available: string[]) {
    const listed = available.length > 0 ? available.join(', ') : 'none';
    super('delegate_not_found', `Delegate '${delegateName}' not found. Available: ${listed}.`);
    this.delegateName = delegateName;
  }
}

export class DelegateTimeoutError extends VoxloopError {
  constructor(delegateName: string, timeoutMs: number) {
    super('delegate_timeout', `Delegate '${delegateName}' timed out after ${timeoutMs}ms.`);
  }
}

export class DelegateFailureError extends VoxloopError {
  constructor(delegateName: string, message: string, code = 'delegate_failure') {
    super(code, `Delegate '${delegateName}' failed: ${message}`);
  }
}

export class DuplicateDelegateError extends VoxloopError {
  constructor(delegateName: string) {
    super('duplicate_delegate', `Delegate '${delegateName}' is already registered.`);
  }
}

export class MalformedTurnError extends VoxloopError {
  constructor(detail: string) {
    super('malformed_turn', `Reasoning backend produced a malformed turn: ${detail}`);
  }
}

export class ReasoningFailureError extends VoxloopError {
  constructor(message: string, code: 'reasoning_failure' | 'reasoning_timeout' = 'reasoning_failure') {
    super(code, message);
  }
}

export class BudgetExceededError extends VoxloopError {
  readonly limit: 'iterations' | 'wall_clock';

  constructor(limit: 'iterations' | 'wall_clock', message: string) {
    super('budget_exceeded', message);
    this.limit = limit;
  }
}

// ── Orchestration queue ──────────────────────────────────────────────────────

export class QueueFullError extends VoxloopError {
  readonly capacity: number;

  constructor(capacity: number) {
    super('queue_full', `Orchestration queue is full (capacity ${capacity}); request rejected.`);
    this.capacity = capacity;
  }
}

export class RequestNotFoundError extends VoxloopError {
  constructor(requestId: string) {
    super('request_not_found', `Request '${requestId}' is unknown or no longer retained.`);
  }
}

// ── Backend registry ─────────────────────────────────────────────────────────

export class DuplicateBackendError extends VoxloopError {
  constructor(family: BackendFamily, backendId: string) {
    super('duplicate_backend', `A ${family} backend with id '${backendId}' is already registered.`);
  }
}

export class UnknownBackendError extends VoxloopError {
  constructor(family: BackendFamily, backendId: string, known: string[]) {
    const listed = known.length > 0 ? known.join(', ') : 'none';
    super('unknown_backend', `Unknown ${family} backend '${backendId}'. Registered: ${listed}.`);
  }
}

export class BackendNotReadyError extends VoxloopError {
  readonly backendId: string;

  constructor(family: BackendFamily, backendId: string, reason: string) {
    super('backend_not_ready', `${family} backend '${backendId}' is not ready: ${reason}`);
    this.backendId = backendId;
  }
}

/** Provider-level failure carrying operator remediation, mirrored in API error payloads. */
export class BackendOperationError extends VoxloopError {
  readonly backendId: string;
  readonly remediation: string;
  readonly statusCode: number;

  constructor(options: {
    code: string;
    message: string;
    backendId: string;
    remediation?: string;
    statusCode?: number;
    cause?: unknown;
  }) {
    super(options.code, options.message, { cause: options.cause });
    this.backendId = options.backendId;
    this.remediation = options.remediation ?? '';
    this.statusCode = options.statusCode ?? 503;
  }

  toPayload(): { code: string; message: string; backendId: string; remediation: string } {
    return {
      code: this.code,
      message: this.message,
      backendId: this.backendId,
      remediation: this.remediation,
    };
  }
}

// ── Speech pipeline ──────────────────────────────────────────────────────────

export interface PipelinePartialResult {
  transcript?: string;
  response?: string;
  requestId?: string;
}

export class PipelineStageError extends VoxloopError {
  readonly stage: PipelineStage;
  readonly terminal: boolean;
  readonly causeCode: string;
  readonly partial: PipelinePartialResult;

  constructor(options: {
    stage: PipelineStage;
    cause: unknown;
    terminal: boolean;
    partial?: PipelinePartialResult;
  }) {
    const causeMessage = toErrorMessage(options.cause);
    super('pipeline_stage_failure', `Speech pipeline failed at ${options.stage}: ${causeMessage}`, {
      cause: options.cause,
    });
    this.stage = options.stage;
    this.terminal = options.terminal;
    this.causeCode = options.cause instanceof VoxloopError ? options.cause.code : 'unexpected_error';
    this.partial = options.partial ?? {};
  }
}
