import { afterEach, describe, expect, it, vi } from 'vitest';
import request from 'supertest';

process.env.PORT = process.env.PORT ?? '4000';

vi.mock('../src/firebase.js', () => {
  return {
    getFirestore: vi.fn(() => ({
      doc: () => ({ get: async () => ({ exists: false }) })
    }))
  };
});

import { createApp } from '../src/app.js';
import { getFirestore } from '../src/firebase.js';
import { makeHarness, ok } from './helpers.js';

function setup() {
  const harness = makeHarness();
  const app = createApp({ coordinator: harness.coordinator, outbox: harness.outbox });
  return { ...harness, app };
}

let current: ReturnType<typeof setup> | undefined;

function fresh() {
  current = setup();
  return current;
}

afterEach(() => {
  current?.coordinator.stop();
  current = undefined;
});

describe('health', () => {
  it('GET /health reports ok', async () => {
    const { app } = fresh();
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true, sessions: 0 });
  });

  it('GET /health/firestore returns 500 when Firestore is unavailable', async () => {
    const { app } = fresh();
    vi.mocked(getFirestore).mockImplementationOnce(() => {
      throw new Error('no credentials');
    });

    const res = await request(app).get('/health/firestore');
    expect(res.status).toBe(500);
    expect(res.body).toEqual({ ok: false, error: 'FIRESTORE_UNAVAILABLE', message: 'no credentials' });
  });
});

describe('POST /v1/sessions', () => {
  it('returns 400 on invalid body', async () => {
    const { app } = fresh();
    const res = await request(app).post('/v1/sessions').send({ text: '   ' });
    expect(res.status).toBe(400);
    expect(res.body?.error).toBe('VALIDATION_ERROR');
  });

  it('rejects unknown enrichment kinds', async () => {
    const { app } = fresh();
    const res = await request(app).post('/v1/sessions').send({ text: 'Austin', enrichments: ['weather'] });
    expect(res.status).toBe(400);
  });

  it('creates a session and asks scoping', async () => {
    const { app, directory } = fresh();
    const res = await request(app).post('/v1/sessions').send({ text: '3 bed house in Austin', enrichments: ['prober'] });

    expect(res.status).toBe(202);
    expect(res.body).toEqual({ sessionId: expect.any(String), status: 'accepted', phase: 'COLLECTING_REQUIREMENTS' });
    expect(directory.last('scoping')).toMatchObject({
      sessionId: res.body.sessionId,
      payload: { userMessage: '3 bed house in Austin', requirements: {} }
    });
  });
});

describe('POST /v1/sessions/:sessionId/messages', () => {
  it('queues a message while scoping is outstanding', async () => {
    const { app, coordinator } = fresh();
    await coordinator.submitUserMessage('s1', { text: 'Austin' });

    const res = await request(app).post('/v1/sessions/s1/messages').send({ text: 'with a yard' });

    expect(res.status).toBe(202);
    expect(res.body).toEqual({ sessionId: 's1', status: 'queued', phase: 'COLLECTING_REQUIREMENTS' });
  });

  it('validates refine indices', async () => {
    const { app } = fresh();
    const res = await request(app)
      .post('/v1/sessions/s1/messages')
      .send({ text: 'more', refine: { indices: [-1] } });
    expect(res.status).toBe(400);
    expect(res.body?.error).toBe('VALIDATION_ERROR');
  });

  it('returns 500 when the coordinator fails', async () => {
    const { app, coordinator } = fresh();
    vi.spyOn(coordinator, 'submitUserMessage').mockRejectedValueOnce(new Error('boom'));

    const res = await request(app).post('/v1/sessions/s1/messages').send({ text: 'hello' });
    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: 'MESSAGE_FAILED', message: 'boom' });
  });
});

describe('GET /v1/sessions/:sessionId', () => {
  it('returns 404 for an unknown session', async () => {
    const { app } = fresh();
    const res = await request(app).get('/v1/sessions/nope');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'SESSION_NOT_FOUND', message: 'Session nope not found' });
  });

  it('returns the session snapshot', async () => {
    const { app, coordinator, directory } = fresh();
    await coordinator.submitUserMessage('s1', { text: 'Austin' });
    await coordinator.submitWorkerReply(
      ok(directory.last('scoping'), { isComplete: false, requirements: { location: 'Austin, TX' } })
    );

    const res = await request(app).get('/v1/sessions/s1');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      id: 's1',
      phase: 'COLLECTING_REQUIREMENTS',
      turn: 1,
      requirements: { location: 'Austin, TX' },
      properties: [],
      outstanding: 0,
      queued: 0,
      lastResponse: null
    });
  });
});

describe('GET /v1/sessions/:sessionId/messages', () => {
  it('pages through the outbox', async () => {
    const { app, coordinator, directory } = fresh();
    await coordinator.submitUserMessage('s1', { text: 'Austin' });
    await coordinator.submitWorkerReply(ok(directory.last('scoping'), { isComplete: false }));

    const all = await request(app).get('/v1/sessions/s1/messages');
    expect(all.status).toBe(200);
    expect(all.body.messages.map((m: { type: string }) => m.type)).toEqual(['status', 'clarification']);

    const rest = await request(app).get('/v1/sessions/s1/messages?after=1');
    expect(rest.body.messages).toHaveLength(1);
    expect(rest.body.messages[0]).toMatchObject({
      type: 'clarification',
      text: 'Could you tell me your budget, the area you want to live in, how many bedrooms you need and how many bathrooms you need?'
    });
  });

  it('returns 400 for a bad offset', async () => {
    const { app, coordinator } = fresh();
    await coordinator.submitUserMessage('s1', { text: 'Austin' });
    const res = await request(app).get('/v1/sessions/s1/messages?after=-2');
    expect(res.status).toBe(400);
  });
});

describe('DELETE /v1/sessions/:sessionId', () => {
  it('evicts the session', async () => {
    const { app, coordinator } = fresh();
    await coordinator.submitUserMessage('s1', { text: 'Austin' });

    const res = await request(app).delete('/v1/sessions/s1');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
    expect(coordinator.getSnapshot('s1')).toBeNull();

    const again = await request(app).delete('/v1/sessions/s1');
    expect(again.status).toBe(404);
  });
});
