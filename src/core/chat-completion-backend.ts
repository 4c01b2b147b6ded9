import type { DelegateDescriptor } from '../delegates/types.js';
import type { FetchLike } from '../types/backends.js';
import type { Turn } from '../types/orchestration.js';
import { scrubSensitiveText } from '../utils/logger.js';
import { ReasoningFailureError } from './errors.js';
import type { ReasoningBackend, ReasoningContext } from './reasoning-loop.js';

type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatCompletionBackendOptions {
  /** Base URL of an OpenAI-compatible API, e.g. `http://127.0.0.1:1234/v1`. */
  baseUrl: string;
  model: string;
  apiKey?: string;
  temperature?: number;
  fetchImpl?: FetchLike;
}

const RESPONSE_FORMAT = [
  '## RESPONSE FORMAT',
  '',
  'Respond with a single JSON object containing these fields:',
  '- "thought" (string): one short sentence about the current situation.',
  '- "plan" (list of strings): 0-3 short, concrete next steps. Use [] when obvious.',
  '- "action" (string): exactly "tool" to call a delegate, or exactly "answer" to reply.',
  '- "response": for "tool", an object {"delegate": "<name>", "args": {...}}; for "answer", the final reply text.',
  '',
  'Output ONLY the JSON object, no markdown fences.',
].join('\n');

function renderDelegate(delegate: DelegateDescriptor): string {
  const params = delegate.parameters
    ? Object.entries(delegate.parameters.properties)
        .map(([key, spec]) => `${key}: ${spec.type}${spec.description ? ` (${spec.description})` : ''}`)
        .join('; ')
    : 'none';
  return `- ${delegate.name} [${delegate.kind}]: ${delegate.description} Args: ${params}`;
}

export function renderSystemPrompt(context: ReasoningContext): string {
  const catalog =
    context.delegates.length > 0
      ? context.delegates.map(renderDelegate).join('\n')
      : '- (none; answer directly)';
  return [
    `You are ${context.agent.name}. ${context.agent.instructions}`,
    '',
    '## DELEGATES',
    catalog,
    '',
    `Turn ${context.iteration} of at most ${context.maxIterations}.`,
    '',
    RESPONSE_FORMAT,
  ].join('\n');
}

function renderTurn(turn: Turn): string {
  return JSON.stringify({
    ...(turn.thought ? { thought: turn.thought } : {}),
    plan: turn.plan,
    action: turn.action,
    response: turn.response,
  });
}

/** Prompt as a chat transcript: each past turn is an observation/turn pair. */
export function buildMessages(context: ReasoningContext): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: 'system', content: renderSystemPrompt(context) }];
  for (const turn of context.trace) {
    messages.push({ role: 'user', content: turn.observation });
    messages.push({ role: 'assistant', content: renderTurn(turn) });
  }
  messages.push({ role: 'user', content: context.observation });
  return messages;
}

/** First balanced `{...}` in `text`, or null when there is none. */
export function extractJsonObject(text: string): string | null {
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }
    if (char === '"' && depth > 0) {
      inString = true;
    } else if (char === '{') {
      if (depth === 0) {
        start = index;
      }
      depth += 1;
    } else if (char === '}' && depth > 0) {
      depth -= 1;
      if (depth === 0) {
        return text.slice(start, index + 1);
      }
    }
  }
  return null;
}

/**
 * Decode model output into a turn candidate. Text without a JSON object is handed back as-is
 * and rejected downstream as a malformed turn.
 */
export function decodeCompletion(content: string): unknown {
  const json = extractJsonObject(content);
  if (json === null) {
    return content;
  }
  try {
    const parsed: unknown = JSON.parse(json);
    return parsed;
  } catch {
    return content;
  }
}

function readContent(payload: unknown): string | null {
  if (typeof payload !== 'object' || payload === null || !('choices' in payload)) {
    return null;
  }
  const { choices } = payload;
  if (!Array.isArray(choices) || choices.length === 0) {
    return null;
  }
  const first: unknown = choices[0];
  if (typeof first !== 'object' || first === null || !('message' in first)) {
    return null;
  }
  const { message } = first;
  if (typeof message !== 'object' || message === null || !('content' in message)) {
    return null;
  }
  return typeof message.content === 'string' ? message.content : null;
}

/** Reasoning backend for any OpenAI-compatible `/chat/completions` endpoint. */
export class ChatCompletionReasoningBackend implements ReasoningBackend {
  readonly #endpoint: string;
  readonly #model: string;
  readonly #apiKey: string;
  readonly #temperature: number;
  readonly #fetch: FetchLike;

  constructor(options: ChatCompletionBackendOptions) {
    this.#endpoint = `${options.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    this.#model = options.model;
    this.#apiKey = options.apiKey?.trim() || 'local';
    this.#temperature = options.temperature ?? 0.2;
    this.#fetch = options.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  async complete(context: ReasoningContext, signal: AbortSignal): Promise<unknown> {
    const response = await this.#fetch(this.#endpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.#apiKey}`,
      },
      body: JSON.stringify({
        model: this.#model,
        messages: buildMessages(context),
        temperature: this.#temperature,
      }),
      signal,
    });

    if (!response.ok) {
      const errText = scrubSensitiveText(await response.text());
      throw new ReasoningFailureError(`HTTP ${response.status}: ${errText.slice(0, 500)}`);
    }

    const payload: unknown = await response.json();
    const content = readContent(payload);
    if (content === null) {
      throw new ReasoningFailureError(`Model ${this.#model} returned an empty choices payload.`);
    }
    return decodeCompletion(content);
  }
}
