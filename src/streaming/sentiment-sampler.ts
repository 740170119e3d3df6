/**
 * Sentiment Sampler: one reading per tick for a live call.
 *
 * Asks the AI scorer first. When the scorer is missing or unavailable it
 * falls back to a deterministic oscillator so the stream stays observable;
 * fallback readings are flagged `synthetic` and their confidence is capped.
 *
 * The sampler never touches stream state: the controller stamps sequence
 * and timestamp and is the only writer of history.
 */

import { EmotionLabel } from './types';
import { clamp, emotionFor, round3 } from './emotion';
import { SentimentScorer, ScorerUnavailableError } from '../scoring/types';
import { logger } from '../observability/logger';

export interface SentimentReading {
  sentiment_score: number;
  confidence: number;
  emotion: EmotionLabel;
  intensity: number;
  synthetic: boolean;
}

export interface SamplerOptions {
  syntheticFallback: boolean;
  /** Upper bound for the confidence of synthetic readings */
  syntheticConfidenceCeiling: number;
}

/** Ticks per full oscillation of the synthetic signal */
const SYNTHETIC_PERIOD_TICKS = 24;
const SYNTHETIC_AMPLITUDE = 0.8;

/** FNV-1a, used to give every call its own phase */
export function hashCallId(callId: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < callId.length; i++) {
    hash ^= callId.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function syntheticReading(callId: string, tick: number, confidenceCeiling: number): SentimentReading {
  const phase = ((hashCallId(callId) % 360) * Math.PI) / 180;
  const angle = (2 * Math.PI * tick) / SYNTHETIC_PERIOD_TICKS + phase;
  const score = round3(clamp(SYNTHETIC_AMPLITUDE * Math.sin(angle), -1, 1));

  return {
    sentiment_score: score,
    confidence: round3(clamp(confidenceCeiling, 0, 1)),
    emotion: emotionFor(score),
    intensity: round3(Math.abs(score)),
    synthetic: true,
  };
}

export class SentimentSampler {
  private readonly log = logger.child({ component: 'sentiment-sampler' });

  constructor(
    private readonly scorer: SentimentScorer | null,
    private readonly options: SamplerOptions,
  ) {}

  get mode(): 'scorer' | 'synthetic' {
    return this.scorer ? 'scorer' : 'synthetic';
  }

  /**
   * Produce the reading for `tick` (1-based).
   * Rejects when the scorer fails and synthetic fallback is disabled.
   */
  async sample(callId: string, tick: number): Promise<SentimentReading> {
    if (!this.scorer) {
      return this.fallback(callId, tick, new ScorerUnavailableError('No AI scorer configured'));
    }

    try {
      const result = await this.scorer.score(callId, tick);
      const score = round3(clamp(result.sentiment_score, -1, 1));
      return {
        sentiment_score: score,
        confidence: round3(clamp(result.confidence, 0, 1)),
        emotion: result.emotion ?? emotionFor(score),
        intensity: round3(clamp(result.intensity ?? Math.abs(score), 0, 1)),
        synthetic: false,
      };
    } catch (err) {
      if (err instanceof ScorerUnavailableError) {
        return this.fallback(callId, tick, err);
      }
      throw err;
    }
  }

  private fallback(callId: string, tick: number, cause: ScorerUnavailableError): SentimentReading {
    if (!this.options.syntheticFallback) throw cause;
    this.log.debug({ callId, tick, reason: cause.message }, 'Using synthetic sentiment reading');
    return syntheticReading(callId, tick, this.options.syntheticConfidenceCeiling);
  }
}
