import { AppError } from '../errors/app-error';
import { EmbeddingVector } from '../ledger/types';

/**
 * Cosine similarity of two embeddings of the same dimension.
 * A zero-norm vector has similarity 0 with everything.
 */
export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  if (a.length !== b.length) {
    throw new AppError('DimensionMismatch', `Cannot compare vectors of dimension ${a.length} and ${b.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) return 0;

  // Rounding can push |x| a hair past 1 for (anti)parallel vectors
  return Math.max(-1, Math.min(1, dotProduct / denominator));
}
