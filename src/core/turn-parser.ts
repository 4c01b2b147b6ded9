import type { DelegateInput } from '../delegates/types.js';
import type { DelegateCall, TurnCandidate } from '../types/orchestration.js';
import { MalformedTurnError } from './errors.js';

const CALL_EXPRESSION = /^\s*([A-Za-z_][\w.-]*)\s*\(([\s\S]*)\)\s*$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse the `name({...})` call form some models emit instead of a structured object.
 * An empty argument list yields `{}`.
 */
export function parseCallExpression(expression: string): DelegateCall {
  const match = CALL_EXPRESSION.exec(expression);
  if (!match) {
    throw new MalformedTurnError(`unparsable delegate call '${expression.trim().slice(0, 120)}'.`);
  }

  const [, delegate, rawArgs] = match;
  const trimmedArgs = rawArgs.trim();
  if (!trimmedArgs) {
    return { delegate, args: {} };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmedArgs);
  } catch {
    throw new MalformedTurnError(`arguments of '${delegate}' are not valid JSON.`);
  }
  if (!isRecord(parsed)) {
    throw new MalformedTurnError(`arguments of '${delegate}' must be a JSON object.`);
  }
  return { delegate, args: parsed };
}

function parsePlan(value: unknown): string[] {
  if (value === undefined) {
    throw new MalformedTurnError("missing 'plan'.");
  }
  if (typeof value === 'string') {
    return value.trim() ? [value.trim()] : [];
  }
  if (!Array.isArray(value) || value.some((step) => typeof step !== 'string')) {
    throw new MalformedTurnError("'plan' must be a list of strings.");
  }
  return value.map((step: string) => step.trim()).filter(Boolean);
}

function parseToolResponse(value: unknown): DelegateCall {
  if (typeof value === 'string') {
    return parseCallExpression(value);
  }
  if (!isRecord(value)) {
    throw new MalformedTurnError("a 'tool' turn must name a delegate call.");
  }

  const delegate = value.delegate;
  if (typeof delegate !== 'string' || !delegate.trim()) {
    throw new MalformedTurnError("delegate call is missing 'delegate'.");
  }

  const args: unknown = value.args ?? {};
  if (!isRecord(args)) {
    throw new MalformedTurnError(`arguments of '${delegate.trim()}' must be an object.`);
  }
  const input: DelegateInput = { ...args };
  return { delegate: delegate.trim(), args: input };
}

/**
 * Validate a reasoning-backend candidate. Anything that is not a well-formed turn raises
 * {@link MalformedTurnError}; the loop treats that as terminal.
 */
export function parseTurn(candidate: unknown): TurnCandidate {
  if (!isRecord(candidate)) {
    throw new MalformedTurnError('expected an object.');
  }

  const plan = parsePlan(candidate.plan);
  const thought = typeof candidate.thought === 'string' && candidate.thought.trim()
    ? candidate.thought.trim()
    : undefined;

  if (!('response' in candidate)) {
    throw new MalformedTurnError("missing 'response'.");
  }

  switch (candidate.action) {
    case 'tool':
      return { plan, thought, action: 'tool', response: parseToolResponse(candidate.response) };
    case 'answer': {
      if (typeof candidate.response !== 'string') {
        throw new MalformedTurnError("an 'answer' turn must carry the final text.");
      }
      return { plan, thought, action: 'answer', response: candidate.response };
    }
    case undefined:
      throw new MalformedTurnError("missing 'action'.");
    default:
      throw new MalformedTurnError(`unknown action '${String(candidate.action)}'.`);
  }
}
