import { SentimentSampler, hashCallId, syntheticReading } from '../../src/streaming/sentiment-sampler';
import { emotionFor } from '../../src/streaming/emotion';
import { ScorerUnavailableError } from '../../src/scoring/types';
import { ScriptedScorer } from '../helpers/fakes';

const OPTIONS = { syntheticFallback: true, syntheticConfidenceCeiling: 0.5 };

describe('emotionFor', () => {
  it.each([
    [1, 'very_positive'],
    [0.6, 'very_positive'],
    [0.59, 'positive'],
    [0.2, 'positive'],
    [0, 'neutral'],
    [-0.2, 'neutral'],
    [-0.21, 'negative'],
    [-0.6, 'negative'],
    [-0.61, 'very_negative'],
  ])('should label %p as %s', (score, label) => {
    expect(emotionFor(score)).toBe(label);
  });
});

describe('syntheticReading', () => {
  it('should be deterministic per call and tick', () => {
    expect(syntheticReading('call-001', 7, 0.5)).toEqual(syntheticReading('call-001', 7, 0.5));
  });

  it('should stay within bounds and flag itself synthetic', () => {
    for (let tick = 1; tick <= 48; tick++) {
      const reading = syntheticReading('call-001', tick, 0.5);
      expect(reading.sentiment_score).toBeGreaterThanOrEqual(-1);
      expect(reading.sentiment_score).toBeLessThanOrEqual(1);
      expect(reading.intensity).toBe(Math.abs(reading.sentiment_score));
      expect(reading.emotion).toBe(emotionFor(reading.sentiment_score));
      expect(reading.confidence).toBe(0.5);
      expect(reading.synthetic).toBe(true);
    }
  });

  it('should repeat with a period of 24 ticks', () => {
    expect(syntheticReading('call-002', 3, 0.5).sentiment_score).toBeCloseTo(
      syntheticReading('call-002', 27, 0.5).sentiment_score,
      2,
    );
  });

  it('should hash call ids to unsigned 32-bit values', () => {
    const hash = hashCallId('call-001');
    expect(Number.isInteger(hash)).toBe(true);
    expect(hash).toBeGreaterThanOrEqual(0);
    expect(hash).toBeLessThan(2 ** 32);
    expect(hashCallId('')).toBe(0x811c9dc5);
  });
});

describe('SentimentSampler', () => {
  it('should pass scorer readings through, deriving emotion and intensity', async () => {
    const scorer = new ScriptedScorer();
    scorer.score.mockResolvedValue({ sentiment_score: -0.45, confidence: 0.9 });
    const sampler = new SentimentSampler(scorer, OPTIONS);

    const reading = await sampler.sample('call-001', 1);

    expect(scorer.score).toHaveBeenCalledWith('call-001', 1);
    expect(reading).toEqual({
      sentiment_score: -0.45,
      confidence: 0.9,
      emotion: 'negative',
      intensity: 0.45,
      synthetic: false,
    });
    expect(sampler.mode).toBe('scorer');
  });

  it('should keep the emotion and intensity a scorer supplies', async () => {
    const scorer = new ScriptedScorer();
    scorer.score.mockResolvedValue({ sentiment_score: 0.1, confidence: 0.7, emotion: 'positive', intensity: 0.8 });
    const sampler = new SentimentSampler(scorer, OPTIONS);

    const reading = await sampler.sample('call-001', 2);
    expect(reading.emotion).toBe('positive');
    expect(reading.intensity).toBe(0.8);
  });

  it('should clamp out-of-range scorer values', async () => {
    const scorer = new ScriptedScorer();
    scorer.score.mockResolvedValue({ sentiment_score: 1.7, confidence: -0.2 });
    const sampler = new SentimentSampler(scorer, OPTIONS);

    const reading = await sampler.sample('call-001', 1);
    expect(reading.sentiment_score).toBe(1);
    expect(reading.confidence).toBe(0);
  });

  it('should fall back to the synthetic oscillator when the scorer is unavailable', async () => {
    const scorer = new ScriptedScorer();
    scorer.score.mockRejectedValue(new ScorerUnavailableError('timeout'));
    const sampler = new SentimentSampler(scorer, OPTIONS);

    const reading = await sampler.sample('call-001', 4);
    expect(reading).toEqual(syntheticReading('call-001', 4, 0.5));
  });

  it('should use synthetic readings when no scorer is configured', async () => {
    const sampler = new SentimentSampler(null, { ...OPTIONS, syntheticConfidenceCeiling: 0.3 });

    expect(sampler.mode).toBe('synthetic');
    const reading = await sampler.sample('call-009', 1);
    expect(reading.synthetic).toBe(true);
    expect(reading.confidence).toBe(0.3);
  });

  it('should propagate unavailability when fallback is disabled', async () => {
    const scorer = new ScriptedScorer();
    scorer.score.mockRejectedValue(new ScorerUnavailableError('timeout'));
    const sampler = new SentimentSampler(scorer, { ...OPTIONS, syntheticFallback: false });

    await expect(sampler.sample('call-001', 1)).rejects.toBeInstanceOf(ScorerUnavailableError);
  });

  it('should rethrow unexpected scorer errors', async () => {
    const scorer = new ScriptedScorer();
    scorer.score.mockRejectedValue(new TypeError('bug'));
    const sampler = new SentimentSampler(scorer, OPTIONS);

    await expect(sampler.sample('call-001', 1)).rejects.toThrow('bug');
  });
});
