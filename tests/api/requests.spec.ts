import { describe, expect, it, vi } from 'vitest';
import request from 'supertest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
  logDelegateCall: vi.fn().mockResolvedValue(undefined),
  scrubSensitiveText: (text: string) => text,
}));

import { createApiHarness } from '../harness/api-app.js';
import { GatedRunner, waitUntil } from '../harness/fakes.js';

describe('POST /requests', () => {
  it('accepts a request and answers 202 with the queued snapshot', async () => {
    const { app, queue } = await createApiHarness({ runner: new GatedRunner() });

    const res = await request(app).post('/requests').send({ text: 'What is the weather?' });

    expect(res.status).toBe(202);
    expect(res.body.ok).toBe(true);
    expect(res.body.data.status).toBe('queued');
    expect(res.body.data.input).toEqual({ text: 'What is the weather?' });
    expect(typeof res.body.correlationId).toBe('string');
    await queue.stop();
  });

  it('waits for the terminal snapshot when asked to', async () => {
    const { app } = await createApiHarness();

    const res = await request(app).post('/requests').send({ text: 'ping', wait: true, metadata: { user: 'u1' } });

    expect(res.status).toBe(200);
    expect(res.body.data).toMatchObject({
      status: 'succeeded',
      result: 'echo: ping',
      input: { text: 'ping', metadata: { user: 'u1' } },
    });
  });

  it.each([
    [{ text: '' }, "'text' must be a non-empty string."],
    [{ text: 'x', metadata: 'nope' }, "'metadata' must be an object when provided."],
  ])('rejects %j', async (body, message) => {
    const { app } = await createApiHarness();

    const res = await request(app).post('/requests').send(body);

    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({ code: 'invalid_request', message });
  });

  it('rejects malformed JSON through the body parser', async () => {
    const { app } = await createApiHarness();

    const res = await request(app).post('/requests').set('Content-Type', 'application/json').send('{"text":');

    expect(res.status).toBe(400);
    expect(res.body.ok).toBe(false);
    expect(res.body.error.code).toBe('invalid_request');
  });
});

describe('GET /requests', () => {
  it('lists retained requests with queue stats and filters by status', async () => {
    const { app, queue } = await createApiHarness();
    const { id } = queue.submit({ text: 'one' });
    await queue.waitFor(id);

    const all = await request(app).get('/requests');
    const none = await request(app).get('/requests?status=failed');

    expect(all.body.data.requests.map((entry: { id: string }) => entry.id)).toEqual([id]);
    expect(all.body.data.stats).toMatchObject({ succeeded: 1, retained: 1 });
    expect(none.body.data.requests).toEqual([]);
  });

  it('rejects unknown status filters', async () => {
    const { app } = await createApiHarness();

    const res = await request(app).get('/requests?status=paused');

    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe(
      'Invalid status. Expected one of: queued, running, succeeded, failed, cancelled.',
    );
  });

  it('reads persisted history when asked', async () => {
    const { app, queue } = await createApiHarness({ withHistory: true });
    await queue.waitFor(queue.submit({ text: 'remember me' }).id);

    const res = await request(app).get('/requests?source=history');

    expect(res.status).toBe(200);
    expect(res.body.data.requests).toHaveLength(1);
    expect(res.body.data.requests[0]).toMatchObject({ status: 'succeeded', result: 'echo: remember me' });
  });

  it('answers 503 for history when no store is configured', async () => {
    const { app } = await createApiHarness();

    const res = await request(app).get('/requests?source=history');

    expect(res.status).toBe(503);
    expect(res.body.error).toEqual({ code: 'unavailable', message: 'Request history is disabled.' });
  });
});

describe('GET /requests/:id and cancellation', () => {
  it('returns 404 for unknown requests', async () => {
    const { app } = await createApiHarness();

    const res = await request(app).get('/requests/missing');

    expect(res.status).toBe(404);
    expect(res.body.error).toEqual({
      code: 'request_not_found',
      message: "Request 'missing' is unknown or no longer retained.",
    });
  });

  it('cancels a queued request', async () => {
    const runner = new GatedRunner();
    const { app, queue } = await createApiHarness({ runner });
    queue.submit({ text: 'blocking' });
    const waiting = queue.submit({ text: 'waiting' });
    await waitUntil(() => runner.open === 1);

    const res = await request(app).post(`/requests/${waiting.id}/cancel`).send({ reason: 'Changed my mind.' });

    expect(res.status).toBe(200);
    expect(res.body.data.cancelled).toBe(true);
    expect(res.body.data.request).toMatchObject({
      status: 'cancelled',
      error: { code: 'cancelled', reason: 'Changed my mind.' },
    });

    const lookup = await request(app).get(`/requests/${waiting.id}`);
    expect(lookup.body.data.status).toBe('cancelled');
    await queue.stop();
  });
});

describe('unknown routes', () => {
  it('answers 404 in the standard envelope', async () => {
    const { app } = await createApiHarness();

    const res = await request(app).get('/nowhere');

    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({ ok: false, error: { code: 'not_found', message: 'Not found.' } });
  });
});
