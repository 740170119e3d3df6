/**
 * Call Recommendation Types
 */

import { CorpusEntry } from '../ledger/types';

export interface SimilarCall {
  call_id: string;
  similarity_score: number;   // cosine, [-1, 1]
  snippet: string;            // supporting excerpt from the candidate's transcript
  agent_id?: string;
  customer_sentiment_score?: number;
  start_time?: string;
}

export interface CoachingNudge {
  title: string;
  suggestion: string;         // ≤ 100 characters
}

export interface RecommendationResult {
  call_id: string;
  similar_calls: SimilarCall[];
  coaching_nudges: CoachingNudge[];
}

export interface RecommendationOptions {
  defaultK: number;
  maxK: number;
  /** Candidates scoring below this are dropped */
  relevanceFloor: number;
  /** Age after which the corpus snapshot is reloaded on the next query */
  corpusTtlMs: number;
}

/** Immutable view of the comparison corpus, swapped whole on refresh */
export interface CorpusSnapshot {
  readonly entries: readonly CorpusEntry[];
  readonly loadedAt: number;
}

export interface CorpusStatus {
  size: number;
  loadedAt: string | null;
}
