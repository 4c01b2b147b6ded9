import { describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
  logDelegateCall: vi.fn().mockResolvedValue(undefined),
  logSystemCommand: vi.fn().mockResolvedValue(undefined),
  scrubSensitiveText: (text: string) => text,
}));

import { createAgentDelegate } from '../../src/delegates/agent-delegate.js';
import { DEFAULT_DELEGATE_MANIFEST, buildDelegateTable } from '../../src/delegates/manifest.js';
import { DelegateTable } from '../../src/core/delegate-table.js';
import { ReasoningLoop, type ReasoningBackend, type ReasoningContext } from '../../src/core/reasoning-loop.js';

function context(signal = new AbortController().signal) {
  return { requestId: 'parent', turnIndex: 2, signal };
}

function answering(text: string): ReasoningBackend & { contexts: ReasoningContext[] } {
  const contexts: ReasoningContext[] = [];
  return {
    contexts,
    complete: async (ctx) => {
      contexts.push(ctx);
      return { plan: [], action: 'answer', response: text };
    },
  };
}

describe('createAgentDelegate', () => {
  it('runs a nested loop and returns its final answer', async () => {
    const backend = answering('disk is 40% full');
    const agent = createAgentDelegate({
      name: 'sysinfo',
      description: 'Answers questions about the machine.',
      loop: new ReasoningLoop(backend, new DelegateTable()),
    });

    const result = await agent.invoke({ query: 'How full is the disk?' }, context());

    expect(agent.kind).toBe('agent');
    expect(result).toEqual({ ok: true, output: 'disk is 40% full' });
    expect(backend.contexts[0].requestId).toBe('parent:sysinfo:2');
    expect(backend.contexts[0].input).toEqual({
      text: 'How full is the disk?',
      metadata: { parentRequestId: 'parent', parentTurn: 2 },
    });
  });

  it('rejects a missing query', async () => {
    const agent = createAgentDelegate({
      name: 'sysinfo',
      description: 'd',
      loop: new ReasoningLoop(answering('x'), new DelegateTable()),
    });

    expect(await agent.invoke({}, context())).toEqual({
      ok: false,
      code: 'invalid_input',
      message: "'query' must be a non-empty string.",
    });
  });

  it('reports a nested budget overrun as a delegate failure', async () => {
    const table = new DelegateTable();
    table.register({ name: 'noop', description: 'Does nothing.', invoke: async () => ({ ok: true, output: '' }) });
    const looping: ReasoningBackend = {
      complete: async () => ({ plan: [], action: 'tool', response: { delegate: 'noop', args: {} } }),
    };
    const agent = createAgentDelegate({
      name: 'looper',
      description: 'Never finishes.',
      loop: new ReasoningLoop(looping, table),
      maxIterations: 2,
    });

    const result = await agent.invoke({ query: 'spin' }, context());

    expect(result).toEqual({
      ok: false,
      code: 'budget_exceeded',
      message: "Iteration budget of 2 turn(s) exhausted without a final answer. (2 turn(s) used by 'looper').",
    });
  });

  it('stops when the parent turn signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort('turn timed out');
    const agent = createAgentDelegate({
      name: 'sysinfo',
      description: 'd',
      loop: new ReasoningLoop(answering('x'), new DelegateTable()),
    });

    expect(await agent.invoke({ query: 'hi' }, context(controller.signal))).toEqual({
      ok: false,
      code: 'cancelled',
      message: 'turn timed out',
    });
  });
});

describe('buildDelegateTable', () => {
  it('exposes the command-line agent and hides the raw shell in the default manifest', () => {
    const table = buildDelegateTable(DEFAULT_DELEGATE_MANIFEST, { backend: answering('x') });

    expect(table.names()).toEqual(['command_line']);
    expect(table.resolve('command_line').kind).toBe('agent');
  });

  it('rejects agents that reference undeclared delegates', () => {
    expect(() =>
      buildDelegateTable(
        { delegates: [{ type: 'agent', name: 'lost', description: 'd', delegates: ['shell'] }] },
        { backend: answering('x') },
      ),
    ).toThrow("Agent 'lost' references 'shell', which is not declared before it.");
  });

  it('rejects duplicate names', () => {
    expect(() =>
      buildDelegateTable({ delegates: [{ type: 'shell' }, { type: 'shell' }] }, { backend: answering('x') }),
    ).toThrow("Manifest declares 'shell' more than once.");
  });

  it('lets an exposed agent call the delegates it lists', async () => {
    const replies: unknown[] = [
      { plan: [], action: 'tool', response: { delegate: 'shell', args: { command: 'sudo reboot' } } },
      { plan: [], action: 'answer', response: 'blocked as expected' },
    ];
    let call = 0;
    const backend: ReasoningBackend = {
      complete: async () => {
        const reply = replies[call];
        call += 1;
        return reply;
      },
    };
    const table = buildDelegateTable(DEFAULT_DELEGATE_MANIFEST, { backend });

    const result = await table.resolve('command_line').invoke({ query: 'Restart please.' }, context());

    expect(result).toEqual({ ok: true, output: 'blocked as expected' });
  });
});
