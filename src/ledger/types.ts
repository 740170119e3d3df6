/**
 * Call Ledger: read-only view of stored call records.
 *
 * Ingestion, migrations and durable storage live elsewhere; this service
 * only reads call metadata, transcripts and precomputed embeddings.
 */

export type EmbeddingVector = readonly number[];

export interface CallRecord {
  callId: string;
  agentId: string;
  customerId: string;
  language: string;
  /** ISO-8601 */
  startTime: string;
  durationSeconds: number;
  /** "Speaker: text" lines separated by newlines */
  transcript: string;
  agentTalkRatio?: number;
  customerSentimentScore?: number;
  embeddings?: number[];
}

export interface CorpusEntry {
  callId: string;
  embedding: EmbeddingVector;
  snippet: string;
  agentId?: string;
  customerSentimentScore?: number;
  startTime?: string;
}

export interface CallLedger {
  exists(callId: string): Promise<boolean>;
  getCall(callId: string): Promise<CallRecord | null>;
  /** Null when the call is unknown or has no stored embedding */
  getEmbedding(callId: string): Promise<EmbeddingVector | null>;
  /** Every call that has an embedding, in insertion order */
  getCorpus(): Promise<CorpusEntry[]>;
}
