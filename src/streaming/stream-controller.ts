/**
 * Stream Controller: drives the per-call sampling loop.
 *
 * Lifecycle of a call stream:
 *   Idle      no CallStreamState in the store
 *   Active    subscribers present, loop ticking every `tickIntervalMs`
 *             (paused while the subscriber set is empty during grace)
 *   Stopping  stop accepted; no further samples, sessions being closed
 *
 * Sampling waits happen outside the call's lock. Append + broadcast run
 * inside it and re-check the generation, so a tick that was in flight when
 * the stream paused or stopped is discarded.
 */

import { CallStateStore } from './call-state-store';
import { CallLifecycleListener, SessionRegistry } from './session-registry';
import { SentimentReading, SentimentSampler } from './sentiment-sampler';
import { parseCommand } from './command-protocol';
import {
  ActiveStreamSummary,
  CallStreamState,
  SentimentSample,
  ServerMessage,
  Session,
  StopReason,
  StreamOptions,
} from './types';
import { AppError } from '../errors/app-error';
import { logger } from '../observability/logger';

type TickOutcome =
  | { ok: true; reading: SentimentReading }
  | { ok: false; error: unknown };

const STOP_MESSAGES: Record<StopReason, string> = {
  stopped_by_client: 'Sentiment streaming stopped',
  stopped_by_operator: 'Sentiment streaming stopped by an operator',
  stream_failure: 'Sentiment streaming failed and was stopped',
  shutdown: 'Server shutting down',
};

const CLOSE_CODES: Record<StopReason, number> = {
  stopped_by_client: 1000,
  stopped_by_operator: 1000,
  stream_failure: 1011,
  shutdown: 1001,
};

export type StreamControllerOptions = Pick<
  StreamOptions,
  'tickIntervalMs' | 'stopGraceMs' | 'maxConsecutiveFailures' | 'emitDegradedMarkers'
>;

export class StreamController implements CallLifecycleListener {
  private readonly log = logger.child({ component: 'stream-controller' });
  private shuttingDown = false;

  constructor(
    private readonly store: CallStateStore,
    private readonly registry: SessionRegistry,
    private readonly sampler: SentimentSampler,
    private readonly options: StreamControllerOptions,
    private readonly now: () => number = Date.now,
  ) {
    registry.setLifecycleListener(this);
  }

  // ───── Lifecycle signals (called under the call's lock) ─────

  onCallOccupied(state: CallStreamState): void {
    if (state.graceTimer) {
      clearTimeout(state.graceTimer);
      state.graceTimer = undefined;
      this.log.info({ callId: state.callId }, 'Subscriber returned during grace; resuming stream');
    }
    if (state.loopActive || state.phase !== 'active') return;

    state.generation++;
    state.loopActive = true;
    this.scheduleTick(state);
    this.log.info({ callId: state.callId, intervalMs: this.options.tickIntervalMs }, 'Sentiment stream started');
  }

  onCallVacated(state: CallStreamState): void {
    this.haltLoop(state);
    if (state.graceTimer) clearTimeout(state.graceTimer);

    if (this.options.stopGraceMs <= 0) {
      this.destroy(state, 'no subscribers');
      return;
    }

    state.graceTimer = setTimeout(() => {
      this.store.lock
        .runExclusive(state.callId, () => {
          state.graceTimer = undefined;
          if (this.store.get(state.callId) === state && state.sessionIds.size === 0) {
            this.destroy(state, 'grace period elapsed');
          }
        })
        .catch((err: unknown) => this.log.error({ err, callId: state.callId }, 'Grace expiry failed'));
    }, this.options.stopGraceMs);
  }

  // ───── Commands ─────

  /** Handle one inbound frame from a subscriber. Replies go to the sender only */
  async handleCommand(session: Session, raw: string): Promise<void> {
    // Frames can still arrive from a socket whose session was already dropped
    if (!this.isRegistered(session)) return;
    this.registry.touch(session.id);

    const parsed = parseCommand(raw);
    if (!parsed.ok) {
      await this.registry.sendTo(session.id, { type: 'error', ...parsed.error.toPayload() });
      return;
    }

    switch (parsed.command.type) {
      case 'ping':
        await this.registry.sendTo(session.id, { type: 'pong', timestamp: new Date(this.now()).toISOString() });
        return;

      case 'get_history': {
        const data = (await this.historyFor(session.callId)) ?? [];
        await this.registry.sendTo(session.id, { type: 'history', call_id: session.callId, data });
        return;
      }

      case 'stop_streaming': {
        const stopped = await this.store.lock.runExclusive(session.callId, () => {
          const state = this.store.get(session.callId);
          if (!this.isRegistered(session) || !state || state.phase !== 'active') return false;
          this.stopLocked(state, 'stopped_by_client');
          return true;
        });
        this.log.info({ callId: session.callId, sessionId: session.id, stopped }, 'Stop requested by subscriber');
        return;
      }
    }
  }

  private isRegistered(session: Session): boolean {
    return this.registry.get(session.id) === session;
  }

  /** Call-scoped stop. Returns false when the call has no live stream */
  stopCall(callId: string, reason: StopReason): Promise<boolean> {
    return this.store.lock.runExclusive(callId, () => {
      const state = this.store.get(callId);
      if (!state || state.phase !== 'active') return false;
      this.stopLocked(state, reason);
      return true;
    });
  }

  /** Copy of the bounded history, or null when the call is not streaming */
  historyFor(callId: string): Promise<SentimentSample[] | null> {
    return this.store.lock.runExclusive(callId, () => this.store.get(callId)?.history.toArray() ?? null);
  }

  snapshot(): ActiveStreamSummary[] {
    return this.store.values().map((state) => ({
      callId: state.callId,
      phase: state.phase,
      loopActive: state.loopActive,
      subscribers: state.sessionIds.size,
      historyLength: state.history.length,
      lastSequence: state.lastSequence,
      createdAt: new Date(state.createdAt).toISOString(),
    }));
  }

  get isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  /** Force-stop every stream and notify every session */
  async shutdown(): Promise<void> {
    this.shuttingDown = true;
    const callIds = this.store.callIds();
    await Promise.all(callIds.map((callId) => this.stopCall(callId, 'shutdown')));
    this.log.info({ streams: callIds.length }, 'All sentiment streams stopped');
  }

  // ───── Loop ─────

  private scheduleTick(state: CallStreamState): void {
    const generation = state.generation;
    state.tickTimer = setTimeout(() => {
      this.runTick(state, generation).catch((err: unknown) =>
        this.log.error({ err, callId: state.callId }, 'Tick crashed'),
      );
    }, this.options.tickIntervalMs);
  }

  private isCurrent(state: CallStreamState, generation: number): boolean {
    return (
      this.store.get(state.callId) === state &&
      state.phase === 'active' &&
      state.loopActive &&
      state.generation === generation
    );
  }

  private async runTick(state: CallStreamState, generation: number): Promise<void> {
    state.tickTimer = undefined;
    if (!this.isCurrent(state, generation)) return;

    const tick = ++state.tick;
    let outcome: TickOutcome;
    try {
      outcome = { ok: true, reading: await this.sampler.sample(state.callId, tick) };
    } catch (error) {
      outcome = { ok: false, error };
    }

    await this.store.lock.runExclusive(state.callId, () => {
      if (!this.isCurrent(state, generation)) {
        this.log.debug({ callId: state.callId, tick }, 'Discarding stale tick');
        return;
      }

      if (outcome.ok) {
        this.publish(state, outcome.reading);
      } else {
        this.recordFailure(state, tick, outcome.error);
      }

      if (this.isCurrent(state, generation)) {
        this.scheduleTick(state);
      }
    });
  }

  private publish(state: CallStreamState, reading: SentimentReading): void {
    state.consecutiveFailures = 0;

    const timestampMs = Math.max(this.now(), state.lastTimestampMs + 1);
    state.lastTimestampMs = timestampMs;

    const sample: SentimentSample = {
      call_id: state.callId,
      timestamp: new Date(timestampMs).toISOString(),
      sequence: ++state.lastSequence,
      ...reading,
    };

    if (!state.history.append(sample)) return;
    this.registry.broadcastLocked(state, { type: 'sentiment_update', data: sample });
  }

  private recordFailure(state: CallStreamState, tick: number, error: unknown): void {
    state.consecutiveFailures++;
    const failures = state.consecutiveFailures;
    this.log.warn({ err: error, callId: state.callId, tick, failures }, 'Sentiment tick failed');

    if (failures >= this.options.maxConsecutiveFailures) {
      const failure = new AppError('StreamFailure', `Sentiment scoring failed ${failures} times in a row`, {
        cause: error,
      });
      this.registry.broadcastLocked(state, { type: 'error', ...failure.toPayload() });
      this.stopLocked(state, 'stream_failure');
      return;
    }

    if (this.options.emitDegradedMarkers) {
      const marker: ServerMessage = {
        type: 'error',
        code: 'StreamDegraded',
        message: `Sentiment sample for tick ${tick} was skipped`,
      };
      this.registry.broadcastLocked(state, marker);
    }
  }

  // ───── Teardown (called under the call's lock) ─────

  private haltLoop(state: CallStreamState): void {
    state.generation++;
    state.loopActive = false;
    if (state.tickTimer) {
      clearTimeout(state.tickTimer);
      state.tickTimer = undefined;
    }
  }

  private stopLocked(state: CallStreamState, reason: StopReason): void {
    state.phase = 'stopping';
    this.haltLoop(state);
    if (state.graceTimer) {
      clearTimeout(state.graceTimer);
      state.graceTimer = undefined;
    }

    const message = STOP_MESSAGES[reason];
    this.registry.broadcastLocked(state, { type: 'stream_stopped', call_id: state.callId, reason, message });
    state.history.close();
    const closed = this.registry.closeAllLocked(state, CLOSE_CODES[reason], message);

    this.store.delete(state.callId);
    this.log.info({ callId: state.callId, reason, closedSessions: closed, samples: state.lastSequence }, 'Sentiment stream stopped');
  }

  private destroy(state: CallStreamState, why: string): void {
    state.history.close();
    this.store.delete(state.callId);
    this.log.info({ callId: state.callId, why, samples: state.lastSequence }, 'Sentiment stream released');
  }
}
