/**
 * Similar-Call Recommendation Engine
 *
 * Brute-force cosine search over the embeddings of stored calls. The corpus
 * is loaded from the Call Ledger into an immutable snapshot; queries read
 * whichever snapshot is current and a refresh swaps in a new one whole.
 */

import { logger } from '../observability/logger';
import { AppError, callNotFound } from '../errors/app-error';
import { CallLedger, CorpusEntry } from '../ledger/types';
import { cosineSimilarity } from './cosine';
import { coachingNudges } from './coaching-nudges';
import {
  CorpusSnapshot,
  CorpusStatus,
  RecommendationOptions,
  RecommendationResult,
  SimilarCall,
} from './types';

const log = logger.child({ component: 'recommendation-engine' });

interface ScoredCandidate {
  entry: CorpusEntry;
  score: number;
}

function toSimilarCall({ entry, score }: ScoredCandidate): SimilarCall {
  return {
    call_id: entry.callId,
    similarity_score: score,
    snippet: entry.snippet,
    ...(entry.agentId !== undefined ? { agent_id: entry.agentId } : {}),
    ...(entry.customerSentimentScore !== undefined ? { customer_sentiment_score: entry.customerSentimentScore } : {}),
    ...(entry.startTime !== undefined ? { start_time: entry.startTime } : {}),
  };
}

export class RecommendationEngine {
  private snapshot: CorpusSnapshot | null = null;
  private inflight: Promise<CorpusSnapshot> | null = null;

  constructor(
    private readonly ledger: CallLedger,
    private readonly options: RecommendationOptions,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Top-k calls most similar to `callId`, highest similarity first.
   * Ties keep corpus order. The query call never recommends itself.
   */
  async recommend(callId: string, k: number = this.options.defaultK): Promise<SimilarCall[]> {
    const query = await this.ledger.getEmbedding(callId);
    if (!query) {
      if (await this.ledger.exists(callId)) {
        throw new AppError('NotFound', `Call ${callId} has no stored embedding`);
      }
      throw callNotFound(callId);
    }

    const { entries } = await this.currentCorpus();
    const candidates = entries.filter((entry) => entry.callId !== callId);
    if (candidates.length === 0) {
      throw new AppError('NoCorpus', 'No other calls with embeddings to compare against');
    }

    const limit = Math.min(Math.max(0, Math.floor(k)), candidates.length);
    let skipped = 0;

    const scored: ScoredCandidate[] = [];
    for (const entry of candidates) {
      if (entry.embedding.length !== query.length) {
        skipped++;
        continue;
      }
      const score = cosineSimilarity(query, entry.embedding);
      if (score >= this.options.relevanceFloor) scored.push({ entry, score });
    }

    if (skipped > 0) {
      log.debug({ callId, skipped, dimension: query.length }, 'Skipped candidates of a different dimension');
    }

    // Array.prototype.sort is stable, so equal scores keep corpus order
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, limit).map(toSimilarCall);
  }

  /** Similar calls plus coaching nudges for the call's agent */
  async recommendationsFor(callId: string, k?: number): Promise<RecommendationResult> {
    const similar = await this.recommend(callId, k);
    const call = await this.ledger.getCall(callId);

    return {
      call_id: callId,
      similar_calls: similar,
      coaching_nudges: call ? coachingNudges(call) : [],
    };
  }

  /**
   * Reload the corpus from the ledger. Concurrent callers share the load in
   * flight; the previous snapshot keeps serving until the new one is ready.
   */
  refreshCorpus(): Promise<CorpusSnapshot> {
    if (this.inflight) return this.inflight;

    const started = this.now();
    this.inflight = this.ledger
      .getCorpus()
      .then((entries) => {
        const snapshot: CorpusSnapshot = Object.freeze({
          entries: Object.freeze([...entries]),
          loadedAt: this.now(),
        });
        this.snapshot = snapshot;
        log.info({ size: entries.length, durationMs: this.now() - started }, 'Recommendation corpus loaded');
        return snapshot;
      })
      .finally(() => {
        this.inflight = null;
      });

    return this.inflight;
  }

  status(): CorpusStatus {
    return {
      size: this.snapshot?.entries.length ?? 0,
      loadedAt: this.snapshot ? new Date(this.snapshot.loadedAt).toISOString() : null,
    };
  }

  private async currentCorpus(): Promise<CorpusSnapshot> {
    const snapshot = this.snapshot;
    if (snapshot && this.now() - snapshot.loadedAt < this.options.corpusTtlMs) {
      return snapshot;
    }
    return this.refreshCorpus();
  }
}
