import { EmotionLabel } from '../streaming/types';
import { AppError } from '../errors/app-error';

/** One reading from the external AI scorer */
export interface ScoreResult {
  /** [-1, 1] */
  sentiment_score: number;
  /** [0, 1] */
  confidence: number;
  emotion?: EmotionLabel;
  /** [0, 1]; derived from the score when absent */
  intensity?: number;
}

export interface SentimentScorer {
  readonly name: string;
  /** Rejects with ScorerUnavailableError when the model cannot be reached or answers badly */
  score(callId: string, tick: number): Promise<ScoreResult>;
  healthCheck(): Promise<boolean>;
}

export class ScorerUnavailableError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('ScorerUnavailable', message, { cause });
    this.name = 'ScorerUnavailableError';
  }
}
