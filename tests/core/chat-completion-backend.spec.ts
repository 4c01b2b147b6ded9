import { describe, expect, it, vi } from 'vitest';
import {
  ChatCompletionReasoningBackend,
  buildMessages,
  decodeCompletion,
  extractJsonObject,
  renderSystemPrompt,
} from '../../src/core/chat-completion-backend.js';
import type { ReasoningContext } from '../../src/core/reasoning-loop.js';
import { ReasoningFailureError } from '../../src/core/errors.js';
import type { FetchLike } from '../../src/types/backends.js';

function makeContext(overrides: Partial<ReasoningContext> = {}): ReasoningContext {
  return {
    agent: { name: 'orchestrator', instructions: 'Answer carefully.' },
    requestId: 'req-1',
    input: { text: 'What time is it?' },
    observation: 'What time is it?',
    trace: [],
    delegates: [
      {
        name: 'clock',
        description: 'Reads the clock.',
        kind: 'tool',
        parameters: { type: 'object', properties: { zone: { type: 'string', description: 'IANA zone' } } },
      },
    ],
    iteration: 1,
    maxIterations: 4,
    ...overrides,
  };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('renderSystemPrompt', () => {
  it('lists delegates with their arguments and the turn budget', () => {
    const prompt = renderSystemPrompt(makeContext());

    expect(prompt.startsWith('You are orchestrator. Answer carefully.')).toBe(true);
    expect(prompt).toContain('- clock [tool]: Reads the clock. Args: zone: string (IANA zone)');
    expect(prompt).toContain('Turn 1 of at most 4.');
  });

  it('says so when no delegates exist', () => {
    expect(renderSystemPrompt(makeContext({ delegates: [] }))).toContain('- (none; answer directly)');
  });
});

describe('buildMessages', () => {
  it('replays the trace as observation and turn pairs', () => {
    const messages = buildMessages(
      makeContext({
        observation: '12:00',
        trace: [
          {
            index: 1,
            observation: 'What time is it?',
            plan: ['read clock'],
            action: 'tool',
            response: { delegate: 'clock', args: {} },
            result: { ok: true, output: '12:00' },
            durationMs: 3,
            producedAt: '2026-01-01T00:00:00.000Z',
          },
        ],
      }),
    );

    expect(messages.map((message) => message.role)).toEqual(['system', 'user', 'assistant', 'user']);
    expect(messages[1].content).toBe('What time is it?');
    expect(messages[2].content).toBe(
      '{"plan":["read clock"],"action":"tool","response":{"delegate":"clock","args":{}}}',
    );
    expect(messages[3].content).toBe('12:00');
  });
});

describe('extractJsonObject / decodeCompletion', () => {
  it('finds the first balanced object and ignores braces inside strings', () => {
    expect(extractJsonObject('Sure! {"a": "x}y", "b": {"c": 1}} trailing')).toBe('{"a": "x}y", "b": {"c": 1}}');
    expect(extractJsonObject('no json here')).toBeNull();
  });

  it('decodes fenced JSON and returns other text unchanged', () => {
    expect(decodeCompletion('```json\n{"plan": [], "action": "answer", "response": "hi"}\n```')).toEqual({
      plan: [],
      action: 'answer',
      response: 'hi',
    });
    expect(decodeCompletion('just prose')).toBe('just prose');
    expect(decodeCompletion('{not: valid}')).toBe('{not: valid}');
  });
});

describe('ChatCompletionReasoningBackend', () => {
  it('posts the transcript and decodes the first choice', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () =>
      jsonResponse({ choices: [{ message: { content: '{"plan":[],"action":"answer","response":"noon"}' } }] }),
    );
    const backend = new ChatCompletionReasoningBackend({
      baseUrl: 'http://127.0.0.1:1234/v1/',
      model: 'local-model',
      apiKey: 'test-secret',
      fetchImpl,
    });

    const candidate = await backend.complete(makeContext(), new AbortController().signal);

    expect(candidate).toEqual({ plan: [], action: 'answer', response: 'noon' });
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://127.0.0.1:1234/v1/chat/completions');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toMatchObject({ model: 'local-model', temperature: 0.2 });
  });

  it('raises a reasoning failure for non-2xx responses', async () => {
    const backend = new ChatCompletionReasoningBackend({
      baseUrl: 'http://127.0.0.1:1234/v1',
      model: 'local-model',
      fetchImpl: async () => new Response('overloaded', { status: 503 }),
    });

    const attempt = backend.complete(makeContext(), new AbortController().signal);

    await expect(attempt).rejects.toBeInstanceOf(ReasoningFailureError);
    await expect(attempt).rejects.toThrow('HTTP 503: overloaded');
  });

  it('raises a reasoning failure when there are no choices', async () => {
    const backend = new ChatCompletionReasoningBackend({
      baseUrl: 'http://127.0.0.1:1234/v1',
      model: 'local-model',
      fetchImpl: async () => jsonResponse({ choices: [] }),
    });

    await expect(backend.complete(makeContext(), new AbortController().signal)).rejects.toThrow(
      'Model local-model returned an empty choices payload.',
    );
  });
});
