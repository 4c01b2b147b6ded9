import { randomUUID } from 'node:crypto';
import type { Delegate, DelegateDescriptor, DelegateInput, DelegateResult } from '../delegates/types.js';
import type {
  AnswerTurn,
  DelegateCall,
  LoopOutcome,
  LoopRunResult,
  RequestInput,
  ToolTurn,
  Turn,
  TurnCandidate,
} from '../types/orchestration.js';
import { logDelegateCall, logThought } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import type { DelegateTable } from './delegate-table.js';
import {
  BudgetExceededError,
  DelegateFailureError,
  DelegateNotFoundError,
  DelegateTimeoutError,
  MalformedTurnError,
  ReasoningFailureError,
  VoxloopError,
  toErrorMessage,
} from './errors.js';
import { parseTurn } from './turn-parser.js';

const DEFAULT_MAX_ITERATIONS = 8;
const DEFAULT_TURN_TIMEOUT_MS = 30_000;
const DEFAULT_AGENT_NAME = 'orchestrator';
const DEFAULT_INSTRUCTIONS =
  'You coordinate specialised delegates to answer the request. Call one delegate at a time and answer once you know enough.';

/** Everything the reasoning backend sees when asked for the next turn. */
export interface ReasoningContext {
  agent: { name: string; instructions: string };
  requestId: string;
  input: RequestInput;
  /** Text the next turn should react to. */
  observation: string;
  trace: readonly Turn[];
  delegates: DelegateDescriptor[];
  /** 1-based index of the turn being requested. */
  iteration: number;
  maxIterations: number;
}

/**
 * Produces one turn candidate per call. The value is untrusted and validated by
 * {@link parseTurn}; a throw is a reasoning failure.
 */
export interface ReasoningBackend {
  complete(context: ReasoningContext, signal: AbortSignal): Promise<unknown>;
}

export interface AgentProfile {
  /** Name the backend addresses the agent by. @default 'orchestrator' */
  agentName?: string;
  /** Role instructions rendered ahead of the delegate catalog. */
  instructions?: string;
}

export interface ReasoningLoopOptions {
  /** Hard cap on completed turns. @default 8 */
  maxIterations?: number;
  /** Deadline for one delegate call. @default 30000 */
  turnTimeoutMs?: number;
  /** Deadline for one reasoning-backend call; unset or 0 disables it. */
  reasoningTimeoutMs?: number;
  /** Wall-clock budget for a whole run, checked between turns. */
  maxDurationMs?: number;
}

export interface LoopRunOptions extends ReasoningLoopOptions {
  requestId?: string;
  /** Cooperative cancellation, observed at turn boundaries only. */
  signal?: AbortSignal;
  onTurn?: (turn: Turn) => void;
}

/**
 * Observe → plan → act state machine over a {@link DelegateTable}.
 *
 * Each iteration asks the backend for a candidate, validates it, then either returns the
 * final answer or invokes exactly one delegate and feeds its result (or failure) back as the
 * next observation. Delegate failures never end a run; everything else that goes wrong does.
 */
export class ReasoningLoop {
  readonly #backend: ReasoningBackend;
  readonly #delegates: DelegateTable;
  readonly #agent: { name: string; instructions: string };
  readonly #defaults: Required<Omit<ReasoningLoopOptions, 'reasoningTimeoutMs' | 'maxDurationMs'>> &
    Pick<ReasoningLoopOptions, 'reasoningTimeoutMs' | 'maxDurationMs'>;

  constructor(
    backend: ReasoningBackend,
    delegates: DelegateTable,
    options: ReasoningLoopOptions & AgentProfile = {},
  ) {
    this.#backend = backend;
    this.#delegates = delegates;
    this.#agent = {
      name: options.agentName?.trim() || DEFAULT_AGENT_NAME,
      instructions: options.instructions?.trim() || DEFAULT_INSTRUCTIONS,
    };
    this.#defaults = {
      maxIterations: Math.max(1, Math.floor(options.maxIterations ?? DEFAULT_MAX_ITERATIONS)),
      turnTimeoutMs: Math.max(1, options.turnTimeoutMs ?? DEFAULT_TURN_TIMEOUT_MS),
      reasoningTimeoutMs: options.reasoningTimeoutMs,
      maxDurationMs: options.maxDurationMs,
    };
  }

  get delegates(): DelegateTable {
    return this.#delegates;
  }

  get agentName(): string {
    return this.#agent.name;
  }

  async run(input: RequestInput, options: LoopRunOptions = {}): Promise<LoopRunResult> {
    const requestId = options.requestId ?? randomUUID();
    const maxIterations = Math.max(1, Math.floor(options.maxIterations ?? this.#defaults.maxIterations));
    const turnTimeoutMs = options.turnTimeoutMs ?? this.#defaults.turnTimeoutMs;
    const reasoningTimeoutMs = options.reasoningTimeoutMs ?? this.#defaults.reasoningTimeoutMs ?? 0;
    const maxDurationMs = options.maxDurationMs ?? this.#defaults.maxDurationMs ?? 0;
    const startedAt = Date.now();

    const trace: Turn[] = [];
    let observation = input.text;

    const finish = (outcome: LoopOutcome): LoopRunResult => {
      void logThought(
        `[ReasoningLoop] Request ${requestId} ended '${outcome.status}' after ${trace.length} turn(s).`,
      );
      return { outcome, trace: [...trace] };
    };

    while (true) {
      if (options.signal?.aborted) {
        return finish({ status: 'cancelled', reason: cancellationReason(options.signal) });
      }
      const exceeded = checkBudget(trace.length, maxIterations, Date.now() - startedAt, maxDurationMs);
      if (exceeded) {
        return finish({ status: 'budget_exceeded', limit: exceeded.limit, reason: exceeded.message });
      }

      const index = trace.length + 1;
      let candidate: TurnCandidate;
      try {
        const raw = await this.#requestTurn(
          {
            agent: this.#agent,
            requestId,
            input,
            observation,
            trace: [...trace],
            delegates: this.#delegates.describe(),
            iteration: index,
            maxIterations,
          },
          reasoningTimeoutMs,
          options.signal,
        );
        candidate = parseTurn(raw);
      } catch (error) {
        if (options.signal?.aborted) {
          return finish({ status: 'cancelled', reason: cancellationReason(options.signal) });
        }
        if (error instanceof MalformedTurnError) {
          return finish({ status: 'error', code: 'malformed_turn', reason: error.message });
        }
        if (error instanceof ReasoningFailureError && error.code === 'reasoning_timeout') {
          return finish({ status: 'error', code: 'reasoning_timeout', reason: error.message });
        }
        return finish({
          status: 'error',
          code: 'reasoning_failure',
          reason: `Reasoning backend failed: ${toErrorMessage(error)}`,
        });
      }

      if (candidate.action === 'answer') {
        const turn: AnswerTurn = {
          index,
          observation,
          plan: candidate.plan,
          ...(candidate.thought ? { thought: candidate.thought } : {}),
          action: 'answer',
          response: candidate.response,
          producedAt: new Date().toISOString(),
        };
        this.#append(trace, turn, options.onTurn);
        return finish({ status: 'final', text: candidate.response });
      }

      const call: DelegateCall = candidate.response;
      const delegate = this.#delegates.get(call.delegate);
      if (!delegate) {
        const notFound = new DelegateNotFoundError(call.delegate, this.#delegates.names());
        return finish({ status: 'error', code: 'delegate_not_found', reason: notFound.message });
      }

      const callStartedAt = Date.now();
      const result = await this.#invokeDelegate(delegate, call.args, requestId, index, turnTimeoutMs);
      const turn: ToolTurn = {
        index,
        observation,
        plan: candidate.plan,
        ...(candidate.thought ? { thought: candidate.thought } : {}),
        action: 'tool',
        response: call,
        result,
        durationMs: Date.now() - callStartedAt,
        producedAt: new Date().toISOString(),
      };
      this.#append(trace, turn, options.onTurn);
      observation = describeResult(call.delegate, result);
    }
  }

  async #requestTurn(
    context: ReasoningContext,
    reasoningTimeoutMs: number,
    parentSignal: AbortSignal | undefined,
  ): Promise<unknown> {
    const controller = new AbortController();
    const release = linkAbort(parentSignal, controller);
    try {
      return await withTimeout(
        this.#backend.complete(context, controller.signal),
        reasoningTimeoutMs,
        'Reasoning backend',
        {
          controller,
          onTimeout: () =>
            new ReasoningFailureError(
              `Reasoning backend did not produce a turn within ${reasoningTimeoutMs}ms.`,
              'reasoning_timeout',
            ),
        },
      );
    } finally {
      release();
    }
  }

  async #invokeDelegate(
    delegate: Delegate,
    args: DelegateInput,
    requestId: string,
    turnIndex: number,
    timeoutMs: number,
  ): Promise<DelegateResult> {
    // Only the turn timeout aborts a call in flight; request cancellation waits for the turn boundary.
    const controller = new AbortController();
    let result: DelegateResult;
    try {
      result = await withTimeout(
        Promise.resolve().then(() =>
          delegate.invoke(args, { requestId, turnIndex, signal: controller.signal }),
        ),
        timeoutMs,
        `Delegate '${delegate.name}'`,
        { controller, onTimeout: () => new DelegateTimeoutError(delegate.name, timeoutMs) },
      );
    } catch (error) {
      if (error instanceof VoxloopError) {
        result = { ok: false, code: error.code, message: error.message };
      } else {
        const failure = new DelegateFailureError(delegate.name, toErrorMessage(error));
        result = { ok: false, code: failure.code, message: failure.message };
      }
    }

    void logDelegateCall(delegate.name, args, result.ok ? result.output : `${result.code}: ${result.message}`);
    return result;
  }

  #append(trace: Turn[], turn: Turn, onTurn?: (turn: Turn) => void): void {
    trace.push(Object.freeze(turn));
    onTurn?.(turn);
  }
}

/** Text fed back to the backend after a delegate call. */
export function describeResult(delegateName: string, result: DelegateResult): string {
  if (result.ok) {
    return result.output;
  }
  return `Delegate '${delegateName}' returned ${result.code}: ${result.message}`;
}

/** Abort `controller` when `parent` aborts. Returns the detach function. */
function linkAbort(parent: AbortSignal | undefined, controller: AbortController): () => void {
  if (!parent) {
    return () => undefined;
  }
  if (parent.aborted) {
    controller.abort(parent.reason);
    return () => undefined;
  }
  const onAbort = (): void => controller.abort(parent.reason);
  parent.addEventListener('abort', onAbort, { once: true });
  return () => parent.removeEventListener('abort', onAbort);
}

function checkBudget(
  turns: number,
  maxIterations: number,
  elapsedMs: number,
  maxDurationMs: number,
): BudgetExceededError | null {
  if (turns >= maxIterations) {
    return new BudgetExceededError(
      'iterations',
      `Iteration budget of ${maxIterations} turn(s) exhausted without a final answer.`,
    );
  }
  if (maxDurationMs > 0 && elapsedMs >= maxDurationMs) {
    return new BudgetExceededError(
      'wall_clock',
      `Wall-clock budget of ${maxDurationMs}ms exhausted without a final answer.`,
    );
  }
  return null;
}

function cancellationReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (typeof reason === 'string' && reason.trim()) {
    return reason;
  }
  if (reason instanceof Error && reason.name !== 'AbortError' && reason.message) {
    return reason.message;
  }
  return 'Cancelled before the next turn.';
}
