/** Structured argument payload accepted by every delegate. */
export type DelegateInput = Record<string, unknown>;

export type DelegateResult =
  | { ok: true; output: string }
  | { ok: false; code: string; message: string };

/** Per-call context handed to a delegate by the reasoning loop. */
export interface DelegateInvocationContext {
  requestId: string;
  turnIndex: number;
  /** Fires when the per-turn timeout elapses; delegates should stop work when it does. */
  signal: AbortSignal;
}

/** Loose JSON-schema hint rendered to the reasoning backend. */
export interface DelegateParameters {
  type: 'object';
  properties: Record<string, { type: string; description?: string }>;
  required?: string[];
}

/**
 * A named capability with a single entry point, used uniformly for tools and
 * sub-agents.
 */
export interface Delegate {
  readonly name: string;
  readonly description: string;
  readonly kind?: 'tool' | 'agent';
  readonly parameters?: DelegateParameters;
  invoke(input: DelegateInput, context: DelegateInvocationContext): Promise<DelegateResult>;
}

/** Catalog entry rendered into prompts and API listings. */
export interface DelegateDescriptor {
  name: string;
  description: string;
  kind: 'tool' | 'agent';
  parameters?: DelegateParameters;
}
