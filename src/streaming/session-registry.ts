/**
 * Session Registry: admission control and fan-out for live subscribers.
 *
 * Sessions are grouped per call in the shared CallStateStore. The registry
 * reports a call becoming occupied or vacated to its lifecycle listener
 * (the Stream Controller), always from inside the call's lock.
 */

import { v4 as uuid } from 'uuid';
import { CallStateStore } from './call-state-store';
import { CallStreamState, SentimentSample, ServerMessage, Session, SessionConnection } from './types';
import { Identity, isRole } from '../auth/types';
import { CallLedger } from '../ledger/types';
import { callNotFound, tooManySessions, unauthorized } from '../errors/app-error';
import { logger } from '../observability/logger';

export interface CallLifecycleListener {
  onCallOccupied(state: CallStreamState): void;
  onCallVacated(state: CallStreamState): void;
}

export interface RegistryOptions {
  maxSessionsPerCall: number;
  maxSessionsPerIdentity: number;
}

export interface RegistryStats {
  sessions: number;
  calls: number;
  perCall: Record<string, number>;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();
  private listener?: CallLifecycleListener;
  private readonly log = logger.child({ component: 'session-registry' });

  constructor(
    private readonly store: CallStateStore,
    private readonly ledger: CallLedger,
    private readonly options: RegistryOptions,
    private readonly now: () => number = Date.now,
  ) {}

  setLifecycleListener(listener: CallLifecycleListener): void {
    this.listener = listener;
  }

  /**
   * Pre-flight for the transport: same checks as `admit`, without creating
   * anything. Lets the gateway refuse a WebSocket upgrade up front.
   */
  async checkAdmission(callId: string, identity: Identity | null | undefined): Promise<void> {
    this.assertIdentity(identity);
    if (!(await this.ledger.exists(callId))) throw callNotFound(callId);
    this.assertCapacity(callId, identity);
  }

  /**
   * Register a subscriber. `welcome`, when given, builds the messages
   * delivered to the new session before any broadcast can reach it; it
   * receives the call's current history so a late joiner can catch up.
   */
  async admit(
    callId: string,
    identity: Identity | null | undefined,
    connection: SessionConnection,
    welcome?: (session: Session, history: SentimentSample[]) => ServerMessage[],
  ): Promise<Session> {
    this.assertIdentity(identity);
    if (!(await this.ledger.exists(callId))) throw callNotFound(callId);

    return this.store.lock.runExclusive(callId, () => {
      this.assertCapacity(callId, identity);

      const timestamp = this.now();
      const session: Session = {
        id: uuid(),
        identity,
        callId,
        connection,
        subscribedAt: timestamp,
        lastActivityAt: timestamp,
      };

      const { state } = this.store.getOrCreate(callId);
      this.sessions.set(session.id, session);
      state.sessionIds.add(session.id);

      this.log.info(
        { callId, sessionId: session.id, subject: identity.subject, role: identity.role, subscribers: state.sessionIds.size },
        'Session admitted',
      );

      const messages = welcome ? welcome(session, state.history.toArray()) : [];
      if (!messages.every((message) => this.deliver(session, message))) {
        this.removeLocked(session.id);
        return session;
      }
      if (state.sessionIds.size === 1) {
        this.listener?.onCallOccupied(state);
      }
      return session;
    });
  }

  /** Idempotent. Resolves once the session is gone */
  async remove(sessionId: string): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) return;
    await this.store.lock.runExclusive(session.callId, () => this.removeLocked(sessionId));
  }

  /** Best-effort delivery to every session of a call. Returns the number delivered */
  broadcast(callId: string, message: ServerMessage): Promise<number> {
    return this.store.lock.runExclusive(callId, () => {
      const state = this.store.get(callId);
      return state ? this.broadcastLocked(state, message) : 0;
    });
  }

  /**
   * Fan-out for callers already holding the call's lock. A session whose
   * connection is closed or whose send throws is removed; delivery to the
   * others continues.
   */
  broadcastLocked(state: CallStreamState, message: ServerMessage): number {
    const failed: string[] = [];
    let delivered = 0;

    for (const sessionId of [...state.sessionIds]) {
      const session = this.sessions.get(sessionId);
      if (!session || !this.deliver(session, message)) {
        failed.push(sessionId);
        continue;
      }
      delivered++;
    }

    for (const sessionId of failed) {
      this.removeLocked(sessionId);
    }
    return delivered;
  }

  /** Reply to a single session. A failed send removes it */
  async sendTo(sessionId: string, message: ServerMessage): Promise<boolean> {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    if (this.deliver(session, message)) return true;
    await this.remove(sessionId);
    return false;
  }

  /**
   * Drop every session of a call and close its connection. Used by the
   * controller when a stream ends; does not report the call as vacated.
   */
  closeAllLocked(state: CallStreamState, code: number, reason: string): number {
    let closed = 0;
    for (const sessionId of [...state.sessionIds]) {
      const session = this.sessions.get(sessionId);
      this.sessions.delete(sessionId);
      state.sessionIds.delete(sessionId);
      if (!session) continue;
      closed++;
      try {
        session.connection.close(code, reason);
      } catch (err) {
        this.log.warn({ err, sessionId, callId: state.callId }, 'Failed to close connection');
      }
    }
    return closed;
  }

  touch(sessionId: string): void {
    const session = this.sessions.get(sessionId);
    if (session) session.lastActivityAt = this.now();
  }

  get(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  countFor(callId: string): number {
    return this.store.get(callId)?.sessionIds.size ?? 0;
  }

  countForSubject(subject: string): number {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (session.identity.subject === subject) count++;
    }
    return count;
  }

  get size(): number {
    return this.sessions.size;
  }

  stats(): RegistryStats {
    const perCall: Record<string, number> = {};
    for (const state of this.store.values()) {
      perCall[state.callId] = state.sessionIds.size;
    }
    return { sessions: this.sessions.size, calls: this.store.size, perCall };
  }

  // ───── Internals ─────

  private assertIdentity(identity: Identity | null | undefined): asserts identity is Identity {
    if (!identity || !identity.subject || !isRole(identity.role)) {
      throw unauthorized('A verified identity is required to subscribe');
    }
  }

  private assertCapacity(callId: string, identity: Identity): void {
    if (this.countFor(callId) >= this.options.maxSessionsPerCall) {
      throw tooManySessions(`Call ${callId} already has ${this.options.maxSessionsPerCall} subscribers`);
    }
    if (this.countForSubject(identity.subject) >= this.options.maxSessionsPerIdentity) {
      throw tooManySessions(`Session limit of ${this.options.maxSessionsPerIdentity} reached for ${identity.subject}`);
    }
  }

  private deliver(session: Session, message: ServerMessage): boolean {
    if (!session.connection.isOpen) return false;
    try {
      session.connection.send(message);
      return true;
    } catch (err) {
      this.log.warn({ err, sessionId: session.id, callId: session.callId }, 'Delivery failed; dropping session');
      return false;
    }
  }

  private removeLocked(sessionId: string): void {
    const session = this.sessions.get(sessionId);
    if (!session) return;
    this.sessions.delete(sessionId);

    const state = this.store.get(session.callId);
    if (!state) return;
    state.sessionIds.delete(sessionId);

    this.log.info(
      { callId: session.callId, sessionId, subject: session.identity.subject, subscribers: state.sessionIds.size },
      'Session removed',
    );

    if (state.sessionIds.size === 0 && state.phase === 'active') {
      this.listener?.onCallVacated(state);
    }
  }
}
