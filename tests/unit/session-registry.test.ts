import { SessionRegistry, CallLifecycleListener } from '../../src/streaming/session-registry';
import { CallStateStore } from '../../src/streaming/call-state-store';
import { InMemoryCallLedger } from '../../src/ledger/call-ledger';
import { Identity } from '../../src/auth/types';
import { SentimentSample, ServerMessage } from '../../src/streaming/types';
import { FakeConnection, makeCall } from '../helpers/fakes';

const ana: Identity = { subject: 'ana', role: 'agent' };
const ben: Identity = { subject: 'ben', role: 'manager' };
const cy: Identity = { subject: 'cy', role: 'admin' };

const PONG: ServerMessage = { type: 'pong', timestamp: '2026-01-01T00:00:00.000Z' };
const SAMPLE: SentimentSample = {
  call_id: 'call-001',
  timestamp: '2026-01-01T00:00:01.000Z',
  sequence: 1,
  sentiment_score: 0.2,
  confidence: 0.5,
  emotion: 'neutral',
  intensity: 0.2,
  synthetic: true,
};

describe('SessionRegistry', () => {
  let store: CallStateStore;
  let registry: SessionRegistry;
  let listener: jest.Mocked<CallLifecycleListener>;

  beforeEach(() => {
    store = new CallStateStore(10);
    const ledger = new InMemoryCallLedger([makeCall('call-001'), makeCall('call-002')]);
    registry = new SessionRegistry(store, ledger, { maxSessionsPerCall: 2, maxSessionsPerIdentity: 2 });
    listener = { onCallOccupied: jest.fn(), onCallVacated: jest.fn() };
    registry.setLifecycleListener(listener);
  });

  describe('admit', () => {
    it('should create the call state on first admission and signal occupancy once', async () => {
      const s1 = await registry.admit('call-001', ana, new FakeConnection());
      await registry.admit('call-001', ben, new FakeConnection());

      expect(s1.callId).toBe('call-001');
      expect(s1.identity).toEqual(ana);
      expect(store.get('call-001')?.sessionIds.size).toBe(2);
      expect(listener.onCallOccupied).toHaveBeenCalledTimes(1);
    });

    it('should never create state for a missing identity', async () => {
      await expect(registry.admit('call-001', null, new FakeConnection())).rejects.toMatchObject({ code: 'Unauthorized' });
      await expect(registry.admit('call-001', undefined, new FakeConnection())).rejects.toMatchObject({ code: 'Unauthorized' });
      await expect(
        registry.admit('call-001', { subject: '', role: 'agent' }, new FakeConnection()),
      ).rejects.toMatchObject({ code: 'Unauthorized' });

      expect(registry.countFor('call-001')).toBe(0);
      expect(store.size).toBe(0);
      expect(registry.size).toBe(0);
    });

    it('should reject an unknown call without creating state', async () => {
      await expect(registry.admit('call-404', ana, new FakeConnection())).rejects.toMatchObject({
        code: 'NotFound',
        message: 'Call call-404 not found',
      });
      expect(store.size).toBe(0);
    });

    it('should enforce the per-call cap', async () => {
      await registry.admit('call-001', ana, new FakeConnection());
      await registry.admit('call-001', ben, new FakeConnection());

      await expect(registry.admit('call-001', cy, new FakeConnection())).rejects.toMatchObject({
        code: 'TooManySessions',
      });
      expect(registry.countFor('call-001')).toBe(2);
    });

    it('should enforce the per-identity cap across calls', async () => {
      await registry.admit('call-001', ana, new FakeConnection());
      await registry.admit('call-002', ana, new FakeConnection());

      await expect(registry.admit('call-002', ana, new FakeConnection())).rejects.toMatchObject({
        code: 'TooManySessions',
        message: 'Session limit of 2 reached for ana',
      });
    });

    it('should deliver the greeting before anything else', async () => {
      const conn = new FakeConnection();
      const session = await registry.admit('call-001', ana, conn, (s, history) => [
        { type: 'connection_established', call_id: s.callId, session_id: s.id, message: `hello (${history.length})` },
      ]);

      expect(conn.sent).toEqual([
        { type: 'connection_established', call_id: 'call-001', session_id: session.id, message: 'hello (0)' },
      ]);
    });

    it('should hand the current history to the welcome of a late joiner only', async () => {
      const first = new FakeConnection();
      await registry.admit('call-001', ana, first);
      store.get('call-001')?.history.append(SAMPLE);

      const late = new FakeConnection();
      await registry.admit('call-001', ben, late, (s, history) =>
        history.length > 0 ? [{ type: 'history', call_id: s.callId, data: history }] : [],
      );

      expect(late.sent).toEqual([{ type: 'history', call_id: 'call-001', data: [SAMPLE] }]);
      expect(first.sent).toEqual([]);
    });

    it('should drop a session whose welcome cannot be delivered', async () => {
      const conn = new FakeConnection();
      conn.failSends = true;
      const session = await registry.admit('call-001', ana, conn, () => [PONG]);

      expect(registry.get(session.id)).toBeUndefined();
      expect(registry.countFor('call-001')).toBe(0);
      expect(listener.onCallOccupied).not.toHaveBeenCalled();
    });
  });

  describe('checkAdmission', () => {
    it('should apply the same checks without creating anything', async () => {
      await expect(registry.checkAdmission('call-001', ana)).resolves.toBeUndefined();
      await expect(registry.checkAdmission('call-404', ana)).rejects.toMatchObject({ code: 'NotFound' });
      await expect(registry.checkAdmission('call-001', null)).rejects.toMatchObject({ code: 'Unauthorized' });
      expect(store.size).toBe(0);
    });
  });

  describe('remove', () => {
    it('should signal vacancy only when the last session leaves', async () => {
      const s1 = await registry.admit('call-001', ana, new FakeConnection());
      const s2 = await registry.admit('call-001', ben, new FakeConnection());

      await registry.remove(s1.id);
      expect(listener.onCallVacated).not.toHaveBeenCalled();

      await registry.remove(s2.id);
      expect(listener.onCallVacated).toHaveBeenCalledTimes(1);
      expect(registry.size).toBe(0);
    });

    it('should be idempotent', async () => {
      const s1 = await registry.admit('call-001', ana, new FakeConnection());

      await registry.remove(s1.id);
      await registry.remove(s1.id);
      await registry.remove('never-existed');

      expect(listener.onCallVacated).toHaveBeenCalledTimes(1);
    });
  });

  describe('broadcast', () => {
    it('should deliver to every open session of the call only', async () => {
      const a = new FakeConnection();
      const b = new FakeConnection();
      const other = new FakeConnection();
      await registry.admit('call-001', ana, a);
      await registry.admit('call-001', ben, b);
      await registry.admit('call-002', cy, other);

      const delivered = await registry.broadcast('call-001', PONG);

      expect(delivered).toBe(2);
      expect(a.sent).toEqual([PONG]);
      expect(b.sent).toEqual([PONG]);
      expect(other.sent).toEqual([]);
    });

    it('should drop a failing session and keep delivering to the others', async () => {
      const broken = new FakeConnection();
      const healthy = new FakeConnection();
      await registry.admit('call-001', ana, broken);
      await registry.admit('call-001', ben, healthy);
      broken.failSends = true;

      const delivered = await registry.broadcast('call-001', PONG);

      expect(delivered).toBe(1);
      expect(healthy.sent).toEqual([PONG]);
      expect(registry.countFor('call-001')).toBe(1);
    });

    it('should drop sessions whose connection already closed', async () => {
      const gone = new FakeConnection();
      await registry.admit('call-001', ana, gone);
      gone.close(1006, 'lost');

      expect(await registry.broadcast('call-001', PONG)).toBe(0);
      expect(listener.onCallVacated).toHaveBeenCalledTimes(1);
    });

    it('should return 0 for a call with no state', async () => {
      expect(await registry.broadcast('call-002', PONG)).toBe(0);
    });
  });

  describe('sendTo', () => {
    it('should reply to one session and remove it when the send fails', async () => {
      const a = new FakeConnection();
      const b = new FakeConnection();
      const sa = await registry.admit('call-001', ana, a);
      await registry.admit('call-001', ben, b);

      expect(await registry.sendTo(sa.id, PONG)).toBe(true);
      expect(a.sent).toEqual([PONG]);
      expect(b.sent).toEqual([]);

      a.failSends = true;
      expect(await registry.sendTo(sa.id, PONG)).toBe(false);
      expect(registry.get(sa.id)).toBeUndefined();
    });
  });

  describe('touch and stats', () => {
    it('should update last activity', async () => {
      let clock = 100;
      const timed = new SessionRegistry(
        store,
        new InMemoryCallLedger([makeCall('call-001')]),
        { maxSessionsPerCall: 5, maxSessionsPerIdentity: 5 },
        () => clock,
      );
      const session = await timed.admit('call-001', ana, new FakeConnection());
      clock = 250;
      timed.touch(session.id);

      expect(session.subscribedAt).toBe(100);
      expect(session.lastActivityAt).toBe(250);
    });

    it('should summarise sessions per call', async () => {
      await registry.admit('call-001', ana, new FakeConnection());
      await registry.admit('call-001', ben, new FakeConnection());
      await registry.admit('call-002', cy, new FakeConnection());

      expect(registry.stats()).toEqual({ sessions: 3, calls: 2, perCall: { 'call-001': 2, 'call-002': 1 } });
    });
  });
});
