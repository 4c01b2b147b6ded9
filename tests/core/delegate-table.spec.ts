import { describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
  logDelegateCall: vi.fn().mockResolvedValue(undefined),
  scrubSensitiveText: (text: string) => text,
}));

import { DelegateTable } from '../../src/core/delegate-table.js';
import { DelegateNotFoundError, DuplicateDelegateError } from '../../src/core/errors.js';
import type { Delegate } from '../../src/delegates/types.js';

function makeDelegate(name: string, output = `${name}-output`): Delegate {
  return {
    name,
    description: `The ${name} delegate.`,
    invoke: async () => ({ ok: true, output }),
  };
}

describe('DelegateTable', () => {
  it('registers delegates and describes them in registration order', () => {
    const table = new DelegateTable();
    table.register(makeDelegate('search'));
    table.register({ ...makeDelegate('planner'), kind: 'agent' });

    expect(table.names()).toEqual(['search', 'planner']);
    expect(table.size).toBe(2);
    expect(table.describe()).toEqual([
      { name: 'search', description: 'The search delegate.', kind: 'tool' },
      { name: 'planner', description: 'The planner delegate.', kind: 'agent' },
    ]);
  });

  it('rejects a second delegate with the same name', () => {
    const table = new DelegateTable();
    table.register(makeDelegate('search'));

    expect(() => table.register(makeDelegate('search'))).toThrow(DuplicateDelegateError);
    expect(() => table.register(makeDelegate('search'))).toThrow("Delegate 'search' is already registered.");
    expect(table.size).toBe(1);
  });

  it('rejects blank names', () => {
    const table = new DelegateTable();
    expect(() => table.register(makeDelegate('   '))).toThrow('Delegate name must be a non-empty string.');
  });

  it('resolves known names and lists alternatives for unknown ones', () => {
    const table = new DelegateTable();
    table.registerMany([makeDelegate('search'), makeDelegate('clock')]);

    expect(table.resolve('clock').name).toBe('clock');
    expect(table.get('missing')).toBeUndefined();
    expect(() => table.resolve('missing')).toThrow(DelegateNotFoundError);
    expect(() => table.resolve('missing')).toThrow("Delegate 'missing' not found. Available: search, clock.");
  });

  it('keeps class-based delegates callable after registration', async () => {
    class Echo implements Delegate {
      readonly name = 'echo';
      readonly description = 'Echo the text argument.';
      readonly #prefix = 'echo:';

      async invoke(input: Record<string, unknown>) {
        return { ok: true as const, output: `${this.#prefix}${String(input.text)}` };
      }
    }

    const table = new DelegateTable();
    table.register(new Echo());
    const controller = new AbortController();

    const result = await table.resolve('echo').invoke(
      { text: 'hi' },
      { requestId: 'r1', turnIndex: 1, signal: controller.signal },
    );
    expect(result).toEqual({ ok: true, output: 'echo:hi' });
  });

  it('freezes registered entries', () => {
    const table = new DelegateTable();
    table.register(makeDelegate('search'));
    expect(Object.isFrozen(table.resolve('search'))).toBe(true);
  });
});
