import type { DelegateInput, DelegateResult } from '../delegates/types.js';

export type RequestStatus = 'queued' | 'running' | 'succeeded' | 'failed' | 'cancelled';

export type TurnAction = 'tool' | 'answer';

/** Delegate invocation requested by the reasoning backend. */
export interface DelegateCall {
  delegate: string;
  args: DelegateInput;
}

interface TurnBase {
  /** 1-based position in the trace. */
  index: number;
  /** Initial request text, or the previous delegate result/failure text. */
  observation: string;
  /** Advisory steps; never executed directly. */
  plan: string[];
  /** Optional free-form note the backend attached to this turn. */
  thought?: string;
  producedAt: string;
}

export interface ToolTurn extends TurnBase {
  action: 'tool';
  response: DelegateCall;
  result: DelegateResult;
  durationMs: number;
}

export interface AnswerTurn extends TurnBase {
  action: 'answer';
  response: string;
}

export type Turn = ToolTurn | AnswerTurn;

interface CandidateBase {
  plan: string[];
  thought?: string;
}

/** What the reasoning backend is asked to fill in each iteration. */
export type TurnCandidate =
  | (CandidateBase & { action: 'tool'; response: DelegateCall })
  | (CandidateBase & { action: 'answer'; response: string });

export interface MediaReference {
  kind: 'audio' | 'image' | 'file';
  uri: string;
  mimeType?: string;
}

export interface RequestInput {
  text: string;
  media?: MediaReference[];
  metadata?: Record<string, unknown>;
}

export type LoopErrorCode =
  | 'delegate_not_found'
  | 'malformed_turn'
  | 'reasoning_failure'
  | 'reasoning_timeout';

export type LoopOutcome =
  | { status: 'final'; text: string }
  | { status: 'error'; code: LoopErrorCode; reason: string }
  | { status: 'budget_exceeded'; limit: 'iterations' | 'wall_clock'; reason: string }
  | { status: 'cancelled'; reason: string };

export interface LoopRunResult {
  outcome: LoopOutcome;
  trace: Turn[];
}

export interface RequestError {
  code: string;
  reason: string;
}

/** Immutable view of a request as exposed to callers and subscribers. */
export interface RequestSnapshot {
  id: string;
  input: RequestInput;
  status: RequestStatus;
  trace: Turn[];
  createdAt: string;
  startedAt?: string;
  finishedAt?: string;
  result?: string;
  error?: RequestError;
}

export type ProgressEvent =
  | {
      type: 'request.status';
      requestId: string;
      seq: number;
      status: RequestStatus;
      detail: string;
      at: string;
      result?: string;
      error?: RequestError;
    }
  | {
      type: 'request.turn';
      requestId: string;
      seq: number;
      turn: Turn;
      at: string;
    };

export type ProgressListener = (event: ProgressEvent) => void;

export interface QueueStats {
  queued: number;
  running: number;
  succeeded: number;
  failed: number;
  cancelled: number;
  retained: number;
  capacity: number | null;
  currentRequestId: string | null;
}
