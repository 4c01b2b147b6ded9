import type { ReasoningLoop } from '../core/reasoning-loop.js';
import type { Delegate, DelegateInput, DelegateInvocationContext, DelegateResult } from './types.js';

export interface AgentDelegateOptions {
  name: string;
  description: string;
  loop: ReasoningLoop;
  /** Iteration cap for the nested run; the nested loop's own default applies otherwise. */
  maxIterations?: number;
}

/**
 * Wrap a nested {@link ReasoningLoop} as a delegate taking `{ query }`.
 *
 * The nested run inherits the caller's turn signal as its cancellation signal, so when the
 * parent's turn timeout fires the sub-agent stops at its next turn boundary.
 */
export function createAgentDelegate(options: AgentDelegateOptions): Delegate {
  const { name, description, loop, maxIterations } = options;

  return {
    name,
    description,
    kind: 'agent',
    parameters: {
      type: 'object',
      properties: {
        query: { type: 'string', description: `Task for the ${name} agent, in plain language.` },
      },
      required: ['query'],
    },
    async invoke(input: DelegateInput, context: DelegateInvocationContext): Promise<DelegateResult> {
      const query = typeof input.query === 'string' ? input.query.trim() : '';
      if (!query) {
        return { ok: false, code: 'invalid_input', message: "'query' must be a non-empty string." };
      }

      const { outcome, trace } = await loop.run(
        { text: query, metadata: { parentRequestId: context.requestId, parentTurn: context.turnIndex } },
        {
          requestId: `${context.requestId}:${name}:${context.turnIndex}`,
          signal: context.signal,
          ...(maxIterations !== undefined ? { maxIterations } : {}),
        },
      );

      switch (outcome.status) {
        case 'final':
          return { ok: true, output: outcome.text };
        case 'error':
          return { ok: false, code: outcome.code, message: outcome.reason };
        case 'budget_exceeded':
          return {
            ok: false,
            code: 'budget_exceeded',
            message: `${outcome.reason} (${trace.length} turn(s) used by '${name}').`,
          };
        case 'cancelled':
          return { ok: false, code: 'cancelled', message: outcome.reason };
      }
    },
  };
}
