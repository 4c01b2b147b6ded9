import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
  logDelegateCall: vi.fn().mockResolvedValue(undefined),
  scrubSensitiveText: (text: string) => text,
}));

import { RequestHistoryStore } from '../../src/services/request-history.js';
import { OrchestrationQueue } from '../../src/core/orchestration-queue.js';
import type { ProgressEvent } from '../../src/types/orchestration.js';

const stores: RequestHistoryStore[] = [];
const tempDirs: string[] = [];

function openStore(location?: string): RequestHistoryStore {
  const store = new RequestHistoryStore(location);
  stores.push(store);
  return store;
}

afterEach(() => {
  for (const store of stores.splice(0)) {
    store.close();
  }
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function statusEvent(
  seq: number,
  status: 'queued' | 'running' | 'succeeded' | 'failed',
  result?: string,
): ProgressEvent {
  return {
    type: 'request.status',
    requestId: 'req-1',
    seq,
    status,
    detail: status,
    at: `2026-01-01T00:00:0${seq}.000Z`,
    ...(result !== undefined ? { result } : {}),
  };
}

describe('RequestHistoryStore', () => {
  it('persists requests and their traces from queue events', async () => {
    const store = openStore();
    const queue = new OrchestrationQueue({
      run: async (input, options) => {
        const turn = {
          index: 1,
          observation: input.text,
          plan: ['look it up'],
          thought: 'need data',
          action: 'tool' as const,
          response: { delegate: 'search', args: { query: input.text } },
          result: { ok: true as const, output: 'found it' },
          durationMs: 5,
          producedAt: '2026-01-01T00:00:00.000Z',
        };
        options.onTurn?.(turn);
        return { outcome: { status: 'final', text: 'done' }, trace: [turn] };
      },
    });
    store.attach(queue);

    const { id } = queue.submit({ text: 'find it', metadata: { channel: 'test' } });
    await queue.waitFor(id);

    const stored = store.getRequest(id);
    expect(stored).toMatchObject({
      id,
      input: { text: 'find it', metadata: { channel: 'test' } },
      status: 'succeeded',
      result: 'done',
    });
    expect(stored?.startedAt).toBeDefined();
    expect(stored?.finishedAt).toBeDefined();
    expect(stored?.trace).toEqual([
      {
        index: 1,
        observation: 'find it',
        plan: ['look it up'],
        thought: 'need data',
        action: 'tool',
        response: { delegate: 'search', args: { query: 'find it' } },
        result: { ok: true, output: 'found it' },
        durationMs: 5,
        producedAt: '2026-01-01T00:00:00.000Z',
      },
    ]);
  });

  it('records failures with their error code', async () => {
    const store = openStore();
    const queue = new OrchestrationQueue({
      run: async () => ({
        outcome: { status: 'error', code: 'malformed_turn', reason: 'Bad turn.' },
        trace: [],
      }),
    });
    store.attach(queue);

    const { id } = queue.submit({ text: 'oops' });
    await queue.waitFor(id);

    expect(store.getRequest(id)).toMatchObject({
      status: 'failed',
      error: { code: 'malformed_turn', reason: 'Bad turn.' },
    });
  });

  it('ignores status events older than the last stored one', () => {
    const store = openStore();

    store.record(statusEvent(1, 'queued'));
    store.record(statusEvent(3, 'succeeded', 'final text'));
    store.record(statusEvent(2, 'running'));

    const stored = store.getRequest('req-1');
    expect(stored?.status).toBe('succeeded');
    expect(stored?.result).toBe('final text');
    expect(stored?.startedAt).toBeUndefined();
    expect(stored?.finishedAt).toBe('2026-01-01T00:00:03.000Z');
  });

  it('treats a redelivered turn as an upsert', () => {
    const store = openStore();
    const turn: ProgressEvent = {
      type: 'request.turn',
      requestId: 'req-1',
      seq: 2,
      turn: {
        index: 1,
        observation: 'hi',
        plan: [],
        action: 'answer',
        response: 'hello',
        producedAt: '2026-01-01T00:00:00.000Z',
      },
      at: '2026-01-01T00:00:00.000Z',
    };

    store.record(turn);
    store.record(turn);

    expect(store.getRequest('req-1')?.trace).toHaveLength(1);
    expect(store.getRequest('req-1')?.trace[0].response).toBe('hello');
  });

  it('lists the most recent requests first', () => {
    const store = openStore();
    for (const [id, createdAt] of [
      ['old', '2026-01-01T00:00:00.000Z'],
      ['new', '2026-01-02T00:00:00.000Z'],
    ]) {
      store.record(
        { type: 'request.status', requestId: id, seq: 1, status: 'queued', detail: 'queued', at: createdAt },
        { id, input: { text: id }, status: 'queued', trace: [], createdAt },
      );
    }

    expect(store.listRecent().map((request) => request.id)).toEqual(['new', 'old']);
    expect(store.listRecent(1).map((request) => request.id)).toEqual(['new']);
    expect(store.getRequest('missing')).toBeUndefined();
  });

  it('creates the database directory for file-backed stores', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'voxloop-history-'));
    tempDirs.push(dir);
    const location = path.join(dir, 'nested', 'history.db');

    const store = openStore(location);
    store.record(statusEvent(1, 'queued'));

    expect(fs.existsSync(location)).toBe(true);
    expect(store.getRequest('req-1')?.status).toBe('queued');
  });
});
