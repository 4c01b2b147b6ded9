import { randomUUID } from 'node:crypto';
import type {
  LoopOutcome,
  LoopRunResult,
  ProgressEvent,
  ProgressListener,
  QueueStats,
  RequestError,
  RequestInput,
  RequestSnapshot,
  RequestStatus,
  Turn,
} from '../types/orchestration.js';
import { logThought } from '../utils/logger.js';
import type { LoopRunOptions, ReasoningLoopOptions } from './reasoning-loop.js';
import { QueueFullError, RequestNotFoundError, VoxloopError, toErrorMessage } from './errors.js';

const DEFAULT_RETENTION = 200;

const ALLOWED_TRANSITIONS: Record<RequestStatus, RequestStatus[]> = {
  queued: ['running', 'cancelled'],
  running: ['succeeded', 'failed', 'cancelled'],
  succeeded: [],
  failed: [],
  cancelled: [],
};

/** Anything that can drive one request to an outcome; {@link ReasoningLoop} is the usual one. */
export interface RequestRunner {
  run(input: RequestInput, options: LoopRunOptions): Promise<LoopRunResult>;
}

export interface OrchestrationQueueOptions {
  /** Reject submissions once this many requests are waiting. Unbounded when unset. */
  maxQueueDepth?: number;
  /** Terminal records kept for lookup, evicted oldest first. @default 200 */
  retention?: number;
  /** Budgets forwarded to every run. */
  runOptions?: ReasoningLoopOptions;
}

export interface SubscribeOptions {
  /** Only deliver events for this request. */
  requestId?: string;
}

type RuntimeRecord = RequestSnapshot & {
  controller: AbortController;
  seq: number;
  waiters: Array<(snapshot: RequestSnapshot) => void>;
};

interface Subscription {
  listener: ProgressListener;
  requestId?: string;
}

function isTerminal(status: RequestStatus): boolean {
  return ALLOWED_TRANSITIONS[status].length === 0;
}

/**
 * FIFO of requests served by a single worker.
 *
 * `submit` never waits for the worker; the request starts once every earlier one has reached a
 * terminal state. Each transition and each completed turn is published synchronously to
 * subscribers with a per-request `seq`.
 */
export class OrchestrationQueue {
  readonly #runner: RequestRunner;
  readonly #maxQueueDepth: number | null;
  readonly #retention: number;
  readonly #runOptions: ReasoningLoopOptions;
  readonly #records: Map<string, RuntimeRecord> = new Map();
  readonly #subscriptions: Set<Subscription> = new Set();
  #pending: string[] = [];
  #terminalOrder: string[] = [];
  #running: RuntimeRecord | null = null;
  #worker: Promise<void> | null = null;
  #stopped = false;

  constructor(runner: RequestRunner, options: OrchestrationQueueOptions = {}) {
    this.#runner = runner;
    this.#maxQueueDepth =
      options.maxQueueDepth !== undefined && options.maxQueueDepth > 0
        ? Math.floor(options.maxQueueDepth)
        : null;
    this.#retention = Math.max(1, Math.floor(options.retention ?? DEFAULT_RETENTION));
    this.#runOptions = options.runOptions ?? {};
  }

  submit(input: RequestInput): RequestSnapshot {
    if (this.#stopped) {
      throw new VoxloopError('queue_stopped', 'Orchestration queue is stopped; request rejected.');
    }
    if (typeof input.text !== 'string' || !input.text.trim()) {
      throw new VoxloopError('invalid_request', 'Request text must be a non-empty string.');
    }
    if (this.#maxQueueDepth !== null && this.#pending.length >= this.#maxQueueDepth) {
      throw new QueueFullError(this.#maxQueueDepth);
    }

    const record: RuntimeRecord = {
      id: randomUUID(),
      input,
      status: 'queued',
      trace: [],
      createdAt: new Date().toISOString(),
      controller: new AbortController(),
      seq: 0,
      waiters: [],
    };
    this.#records.set(record.id, record);
    this.#pending.push(record.id);
    this.#publishStatus(record, `Queued behind ${this.#pending.length - 1} request(s).`);
    this.#ensureWorker();
    return this.#snapshot(record);
  }

  /**
   * Cancel a request. Queued requests are cancelled immediately and never start; a running
   * request stops at its next turn boundary. Returns false for requests already terminal.
   */
  cancel(requestId: string, reason = 'Cancelled by caller.'): boolean {
    const record = this.#records.get(requestId);
    if (!record) {
      throw new RequestNotFoundError(requestId);
    }
    if (isTerminal(record.status)) {
      return false;
    }

    if (record.status === 'queued') {
      this.#pending = this.#pending.filter((id) => id !== requestId);
      record.controller.abort(reason);
      this.#finalize(record, 'cancelled', reason, { error: { code: 'cancelled', reason } });
      return true;
    }

    record.controller.abort(reason);
    void logThought(`[OrchestrationQueue] Cancellation requested for running request ${requestId}.`);
    return true;
  }

  get(requestId: string): RequestSnapshot | undefined {
    const record = this.#records.get(requestId);
    return record ? this.#snapshot(record) : undefined;
  }

  /** Retained requests in submission order. */
  list(filter: { status?: RequestStatus } = {}): RequestSnapshot[] {
    const snapshots: RequestSnapshot[] = [];
    for (const record of this.#records.values()) {
      if (filter.status && record.status !== filter.status) {
        continue;
      }
      snapshots.push(this.#snapshot(record));
    }
    return snapshots;
  }

  stats(): QueueStats {
    const stats: QueueStats = {
      queued: 0,
      running: 0,
      succeeded: 0,
      failed: 0,
      cancelled: 0,
      retained: this.#records.size,
      capacity: this.#maxQueueDepth,
      currentRequestId: this.#running?.id ?? null,
    };
    for (const record of this.#records.values()) {
      stats[record.status] += 1;
    }
    return stats;
  }

  subscribe(listener: ProgressListener, options: SubscribeOptions = {}): () => void {
    const subscription: Subscription = { listener, requestId: options.requestId };
    this.#subscriptions.add(subscription);
    return () => {
      this.#subscriptions.delete(subscription);
    };
  }

  /** Resolve with the request's terminal snapshot. */
  waitFor(requestId: string): Promise<RequestSnapshot> {
    const record = this.#records.get(requestId);
    if (!record) {
      return Promise.reject(new RequestNotFoundError(requestId));
    }
    if (isTerminal(record.status)) {
      return Promise.resolve(this.#snapshot(record));
    }
    return new Promise((resolve) => {
      record.waiters.push(resolve);
    });
  }

  /** Resolve once nothing is queued or running. */
  async idle(): Promise<void> {
    while (this.#worker) {
      await this.#worker;
    }
  }

  /** Reject new work, cancel everything queued, signal the running request and wait for it. */
  async stop(reason = 'Orchestration queue stopped.'): Promise<void> {
    this.#stopped = true;
    for (const requestId of [...this.#pending]) {
      this.cancel(requestId, reason);
    }
    if (this.#running) {
      this.#running.controller.abort(reason);
    }
    await this.idle();
  }

  #ensureWorker(): void {
    if (this.#worker || this.#pending.length === 0) {
      return;
    }
    this.#worker = this.#drain().finally(() => {
      this.#worker = null;
      if (!this.#stopped) {
        this.#ensureWorker();
      }
    });
  }

  async #drain(): Promise<void> {
    // Let the submitting caller observe the queued state before the worker claims it.
    await Promise.resolve();

    while (!this.#stopped) {
      const requestId = this.#pending.shift();
      if (requestId === undefined) {
        return;
      }
      const record = this.#records.get(requestId);
      if (!record || record.status !== 'queued') {
        continue;
      }
      await this.#execute(record);
    }
  }

  async #execute(record: RuntimeRecord): Promise<void> {
    this.#running = record;
    this.#transition(record, 'running');
    record.startedAt = new Date().toISOString();
    this.#publishStatus(record, 'Started.');

    let outcome: LoopOutcome;
    try {
      const result = await this.#runner.run(record.input, {
        ...this.#runOptions,
        requestId: record.id,
        signal: record.controller.signal,
        onTurn: (turn) => this.#recordTurn(record, turn),
      });
      outcome = result.outcome;
      // Runners that do not stream turns still hand back their trace.
      for (const turn of result.trace.slice(record.trace.length)) {
        this.#recordTurn(record, turn);
      }
    } catch (error) {
      outcome = { status: 'error', code: 'reasoning_failure', reason: toErrorMessage(error) };
    } finally {
      this.#running = null;
    }

    switch (outcome.status) {
      case 'final':
        this.#finalize(record, 'succeeded', 'Completed with a final answer.', { result: outcome.text });
        break;
      case 'cancelled':
        this.#finalize(record, 'cancelled', outcome.reason, {
          error: { code: 'cancelled', reason: outcome.reason },
        });
        break;
      case 'budget_exceeded':
        this.#finalize(record, 'failed', outcome.reason, {
          error: { code: 'budget_exceeded', reason: outcome.reason },
        });
        break;
      case 'error':
        this.#finalize(record, 'failed', outcome.reason, {
          error: { code: outcome.code, reason: outcome.reason },
        });
        break;
    }
  }

  #recordTurn(record: RuntimeRecord, turn: Turn): void {
    if (record.trace.some((existing) => existing.index === turn.index)) {
      return;
    }
    record.trace.push(turn);
    record.seq += 1;
    this.#publish({
      type: 'request.turn',
      requestId: record.id,
      seq: record.seq,
      turn,
      at: new Date().toISOString(),
    });
  }

  #finalize(
    record: RuntimeRecord,
    status: Extract<RequestStatus, 'succeeded' | 'failed' | 'cancelled'>,
    detail: string,
    fields: { result?: string; error?: RequestError },
  ): void {
    this.#transition(record, status);
    record.finishedAt = new Date().toISOString();
    if (fields.result !== undefined) {
      record.result = fields.result;
    }
    if (fields.error) {
      record.error = fields.error;
    }
    this.#publishStatus(record, detail);
    void logThought(`[OrchestrationQueue] Request ${record.id} ${status}: ${detail}`);

    const snapshot = this.#snapshot(record);
    for (const resolve of record.waiters.splice(0)) {
      resolve(snapshot);
    }

    this.#terminalOrder.push(record.id);
    while (this.#terminalOrder.length > this.#retention) {
      const evicted = this.#terminalOrder.shift();
      if (evicted !== undefined) {
        this.#records.delete(evicted);
      }
    }
  }

  #transition(record: RuntimeRecord, next: RequestStatus): void {
    if (!ALLOWED_TRANSITIONS[record.status].includes(next)) {
      throw new VoxloopError(
        'invalid_transition',
        `Request ${record.id} cannot move from '${record.status}' to '${next}'.`,
      );
    }
    record.status = next;
  }

  #publishStatus(record: RuntimeRecord, detail: string): void {
    record.seq += 1;
    this.#publish({
      type: 'request.status',
      requestId: record.id,
      seq: record.seq,
      status: record.status,
      detail,
      at: new Date().toISOString(),
      ...(record.result !== undefined ? { result: record.result } : {}),
      ...(record.error ? { error: record.error } : {}),
    });
  }

  #publish(event: ProgressEvent): void {
    for (const subscription of [...this.#subscriptions]) {
      if (subscription.requestId && subscription.requestId !== event.requestId) {
        continue;
      }
      try {
        subscription.listener(event);
      } catch (error) {
        console.error(`[OrchestrationQueue] Progress listener failed: ${toErrorMessage(error)}`);
      }
    }
  }

  #snapshot(record: RuntimeRecord): RequestSnapshot {
    return {
      id: record.id,
      input: record.input,
      status: record.status,
      trace: [...record.trace],
      createdAt: record.createdAt,
      ...(record.startedAt ? { startedAt: record.startedAt } : {}),
      ...(record.finishedAt ? { finishedAt: record.finishedAt } : {}),
      ...(record.result !== undefined ? { result: record.result } : {}),
      ...(record.error ? { error: { ...record.error } } : {}),
    };
  }
}
