import { CallStreamState } from './types';
import { BoundedHistory } from './bounded-history';
import { CallLock } from './call-lock';

/**
 * Process-wide table of live call streams.
 *
 * Constructed explicitly and shared by the Session Registry and the Stream
 * Controller. Every mutation of a call's entry happens inside
 * `lock.runExclusive(callId, …)`.
 */
export class CallStateStore {
  readonly lock = new CallLock();
  private readonly states = new Map<string, CallStreamState>();

  constructor(
    private readonly historySize: number,
    private readonly now: () => number = Date.now,
  ) {}

  get(callId: string): CallStreamState | undefined {
    return this.states.get(callId);
  }

  /** Lazily create the state for a call; `created` is true on first use */
  getOrCreate(callId: string): { state: CallStreamState; created: boolean } {
    const existing = this.states.get(callId);
    if (existing) return { state: existing, created: false };

    const state: CallStreamState = {
      callId,
      history: new BoundedHistory(this.historySize),
      sessionIds: new Set(),
      phase: 'active',
      loopActive: false,
      generation: 0,
      tick: 0,
      lastSequence: 0,
      consecutiveFailures: 0,
      lastTimestampMs: 0,
      createdAt: this.now(),
    };
    this.states.set(callId, state);
    return { state, created: true };
  }

  delete(callId: string): void {
    this.states.delete(callId);
  }

  callIds(): string[] {
    return [...this.states.keys()];
  }

  values(): CallStreamState[] {
    return [...this.states.values()];
  }

  get size(): number {
    return this.states.size;
  }
}
