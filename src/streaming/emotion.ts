import { EmotionLabel } from './types';

export const EMOTION_LABELS: readonly EmotionLabel[] = [
  'very_positive', 'positive', 'neutral', 'negative', 'very_negative',
];

export function emotionFor(score: number): EmotionLabel {
  if (score >= 0.6) return 'very_positive';
  if (score >= 0.2) return 'positive';
  if (score >= -0.2) return 'neutral';
  if (score >= -0.6) return 'negative';
  return 'very_negative';
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}
