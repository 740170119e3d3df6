import { FastifyInstance } from 'fastify';
import { AppContext } from '../../src/app';
import { InMemoryCallLedger } from '../../src/ledger/call-ledger';
import { FakeConnection, makeCall, tokenFor } from '../helpers/fakes';
import { buildTestApp, waitFor } from '../helpers/app';

const agent = { authorization: `Bearer ${tokenFor('ana', 'agent')}` };
const manager = { authorization: `Bearer ${tokenFor('ben', 'manager')}` };
const admin = { authorization: `Bearer ${tokenFor('cy', 'admin')}` };

describe('HTTP routes', () => {
  let ctx: AppContext;
  let app: FastifyInstance;

  beforeAll(async () => {
    ctx = await buildTestApp();
    app = ctx.app;
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  describe('health', () => {
    it('GET /health should report ok', async () => {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);
      expect(JSON.parse(res.body).status).toBe('ok');
    });

    it('GET /ready should be ready without Redis or a scorer', async () => {
      const res = await app.inject({ method: 'GET', url: '/ready' });
      const body = JSON.parse(res.body);

      expect(res.statusCode).toBe(200);
      expect(body.status).toBe('ready');
      expect(body.checks).toEqual({ redis: { status: 'skipped' }, scorer: { status: 'skipped' } });
      expect(body.degraded).toBe(false);
    });
  });

  describe('GET /api/v1/calls/:callId/recommendations', () => {
    it('should require a token', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/calls/call-001/recommendations' });

      expect(res.statusCode).toBe(401);
      expect(JSON.parse(res.body)).toEqual({
        error: { code: 'Unauthorized', message: 'Missing authentication token' },
      });
    });

    it('should reject a token with an unknown role', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/api/v1/calls/call-001/recommendations',
        headers: { authorization: `Bearer ${tokenFor('eve', 'root')}` },
      });

      expect(res.statusCode).toBe(401);
      expect(JSON.parse(res.body).error.message).toBe('Token has no recognised role');
    });

    it('should rank similar calls and add coaching nudges', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/api/v1/calls/call-001/recommendations?k=3',
        headers: agent,
      });
      const body = JSON.parse(res.body);

      expect(res.statusCode).toBe(200);
      expect(body.call_id).toBe('call-001');
      expect(body.similar_calls.map((c: { call_id: string }) => c.call_id)).toEqual(['call-004', 'call-002', 'call-005']);
      expect(body.similar_calls[0]).toMatchObject({
        agent_id: 'agent-cy',
        customer_sentiment_score: 0.72,
        start_time: expect.any(String),
        snippet: expect.any(String),
      });
      expect(body.coaching_nudges).toHaveLength(3);
      expect(body.coaching_nudges.slice(0, 2).map((n: { title: string }) => n.title)).toEqual([
        'Customer Satisfaction',
        'Follow-up',
      ]);
    });

    it('should default k and clamp it to the candidates available', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/calls/call-001/recommendations', headers: agent });

      expect(res.statusCode).toBe(200);
      expect(JSON.parse(res.body).similar_calls).toHaveLength(4);
    });

    it('should reject a non-positive k', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/api/v1/calls/call-001/recommendations?k=0',
        headers: agent,
      });

      expect(res.statusCode).toBe(400);
      expect(JSON.parse(res.body).error.code).toBe('ValidationError');
    });

    it('should return NotFound for an unknown call', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/calls/unknown-call/recommendations', headers: agent });

      expect(res.statusCode).toBe(404);
      expect(JSON.parse(res.body)).toEqual({ error: { code: 'NotFound', message: 'Call unknown-call not found' } });
    });

    it('should return NotFound for a call without an embedding', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/calls/call-006/recommendations', headers: agent });

      expect(res.statusCode).toBe(404);
      expect(JSON.parse(res.body).error.message).toBe('Call call-006 has no stored embedding');
    });

    it('should return NoCorpus when there is nothing to compare against', async () => {
      const lonely = await buildTestApp({ ledger: new InMemoryCallLedger([makeCall('call-001', [0.5, 0.5])]) });
      try {
        const res = await lonely.app.inject({
          method: 'GET',
          url: '/api/v1/calls/call-001/recommendations?k=5',
          headers: agent,
        });

        expect(res.statusCode).toBe(409);
        expect(JSON.parse(res.body).error.code).toBe('NoCorpus');
      } finally {
        await lonely.app.close();
      }
    });
  });

  describe('POST /api/v1/recommendations/corpus/refresh', () => {
    it('should be admin only', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/v1/recommendations/corpus/refresh', headers: manager });

      expect(res.statusCode).toBe(403);
      expect(JSON.parse(res.body)).toEqual({ error: { code: 'Forbidden', message: 'Not enough permissions' } });
    });

    it('should reload the corpus', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/v1/recommendations/corpus/refresh', headers: admin });
      const body = JSON.parse(res.body);

      expect(res.statusCode).toBe(200);
      expect(body.status).toBe('ok');
      expect(body.corpus.size).toBe(5);
    });
  });

  describe('streams', () => {
    it('should return an empty history for a call that is not streaming', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/calls/call-002/sentiment/history', headers: agent });

      expect(res.statusCode).toBe(200);
      expect(JSON.parse(res.body)).toEqual({ call_id: 'call-002', streaming: false, data: [] });
    });

    it('should return NotFound history for an unknown call', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/calls/nope/sentiment/history', headers: agent });
      expect(res.statusCode).toBe(404);
    });

    it('should list streams for managers only', async () => {
      const denied = await app.inject({ method: 'GET', url: '/api/v1/streams', headers: agent });
      expect(denied.statusCode).toBe(403);

      const res = await app.inject({ method: 'GET', url: '/api/v1/streams', headers: manager });
      expect(res.statusCode).toBe(200);
      expect(JSON.parse(res.body)).toEqual({ streams: [], sessions: { sessions: 0, calls: 0, perCall: {} } });
    });

    it('should expose live history and let an operator stop the stream', async () => {
      const conn = new FakeConnection();
      await ctx.streams.registry.admit('call-003', { subject: 'ana', role: 'agent' }, conn);
      await waitFor(() => (conn.ofType('sentiment_update').length > 0 ? true : undefined));

      const history = await app.inject({ method: 'GET', url: '/api/v1/calls/call-003/sentiment/history', headers: agent });
      const historyBody = JSON.parse(history.body);
      expect(historyBody.streaming).toBe(true);
      expect(historyBody.data.length).toBeGreaterThan(0);
      expect(historyBody.data[0]).toMatchObject({ call_id: 'call-003', sequence: 1, synthetic: true, confidence: 0.5 });

      const list = await app.inject({ method: 'GET', url: '/api/v1/streams', headers: manager });
      expect(JSON.parse(list.body).streams.map((s: { callId: string }) => s.callId)).toEqual(['call-003']);

      const stop = await app.inject({ method: 'POST', url: '/api/v1/streams/call-003/stop', headers: manager });
      expect(stop.statusCode).toBe(200);
      expect(JSON.parse(stop.body)).toEqual({ call_id: 'call-003', stopped: true });
      expect(conn.ofType('stream_stopped').map((m) => m.reason)).toEqual(['stopped_by_operator']);
      expect(conn.closed?.code).toBe(1000);

      const again = await app.inject({ method: 'POST', url: '/api/v1/streams/call-003/stop', headers: manager });
      expect(JSON.parse(again.body)).toEqual({ call_id: 'call-003', stopped: false });
    });
  });

  it('should answer unknown routes with a NotFound error', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/nothing-here' });

    expect(res.statusCode).toBe(404);
    expect(JSON.parse(res.body)).toEqual({
      error: { code: 'NotFound', message: 'Route GET /api/v1/nothing-here not found' },
    });
  });
});
