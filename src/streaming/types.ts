import { Identity } from '../auth/types';
import { ErrorCode } from '../errors/app-error';
import { BoundedHistory } from './bounded-history';

export type EmotionLabel = 'very_positive' | 'positive' | 'neutral' | 'negative' | 'very_negative';

export interface SentimentSample {
  call_id: string;
  /** ISO-8601, strictly increasing within one call stream */
  timestamp: string;
  /** 1-based tick number within the stream; gap-free */
  sequence: number;
  /** [-1, 1] */
  sentiment_score: number;
  /** [0, 1] */
  confidence: number;
  emotion: EmotionLabel;
  /** [0, 1]; |sentiment_score| unless the scorer reports its own */
  intensity: number;
  /** True when produced by the fallback generator rather than the AI scorer */
  synthetic: boolean;
}

// ───── Wire protocol ─────

export type ClientCommand =
  | { type: 'ping' }
  | { type: 'get_history' }
  | { type: 'stop_streaming' };

export type StopReason = 'stopped_by_client' | 'stopped_by_operator' | 'stream_failure' | 'shutdown';

export type ServerMessage =
  | { type: 'connection_established'; call_id: string; session_id: string; message: string }
  | { type: 'sentiment_update'; data: SentimentSample }
  | { type: 'pong'; timestamp: string }
  | { type: 'history'; call_id: string; data: SentimentSample[] }
  | { type: 'error'; code: ErrorCode; message: string }
  | { type: 'stream_stopped'; call_id: string; reason: StopReason; message: string };

// ───── Sessions ─────

/**
 * Transport handle for one subscriber. Only used to push messages and to
 * close the connection; the transport reports its own closure to the registry.
 */
export interface SessionConnection {
  readonly isOpen: boolean;
  send(message: ServerMessage): void;
  close(code: number, reason: string): void;
}

export interface Session {
  readonly id: string;
  readonly identity: Identity;
  readonly callId: string;
  readonly connection: SessionConnection;
  readonly subscribedAt: number;
  lastActivityAt: number;
}

// ───── Per-call state ─────

/** Idle has no CallStreamState at all */
export type StreamPhase = 'active' | 'stopping';

export interface CallStreamState {
  readonly callId: string;
  readonly history: BoundedHistory<SentimentSample>;
  readonly sessionIds: Set<string>;
  phase: StreamPhase;
  /** True while ticks are scheduled */
  loopActive: boolean;
  /** Bumped whenever the loop is started or halted; stale ticks compare against it */
  generation: number;
  /** Last tick number handed to the sampler, failed ticks included */
  tick: number;
  /** Sequence of the last sample appended to history */
  lastSequence: number;
  consecutiveFailures: number;
  lastTimestampMs: number;
  tickTimer?: NodeJS.Timeout;
  graceTimer?: NodeJS.Timeout;
  readonly createdAt: number;
}

export interface StreamOptions {
  tickIntervalMs: number;
  historySize: number;
  maxSessionsPerCall: number;
  maxSessionsPerIdentity: number;
  stopGraceMs: number;
  maxConsecutiveFailures: number;
  emitDegradedMarkers: boolean;
}

export interface ActiveStreamSummary {
  callId: string;
  phase: StreamPhase;
  loopActive: boolean;
  subscribers: number;
  historyLength: number;
  lastSequence: number;
  createdAt: string;
}
