import fs from 'fs';
import path from 'path';
import Redis from 'ioredis';
import { CallLedger, CallRecord, CorpusEntry, EmbeddingVector } from './types';
import { extractSnippet } from './transcript';
import { env } from '../config/env';
import { logger } from '../observability/logger';

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'number' && Number.isFinite(v));
}

function optionalNumber(value: unknown): boolean {
  return value === undefined || typeof value === 'number';
}

export function isCallRecord(value: unknown): value is CallRecord {
  if (typeof value !== 'object' || value === null) return false;
  const obj: object = value;
  const field = (key: keyof CallRecord): unknown => Reflect.get(obj, key);
  return (
    typeof field('callId') === 'string' &&
    typeof field('agentId') === 'string' &&
    typeof field('customerId') === 'string' &&
    typeof field('language') === 'string' &&
    typeof field('startTime') === 'string' &&
    typeof field('durationSeconds') === 'number' &&
    typeof field('transcript') === 'string' &&
    optionalNumber(field('agentTalkRatio')) &&
    optionalNumber(field('customerSentimentScore')) &&
    (field('embeddings') === undefined || isNumberArray(field('embeddings')))
  );
}

function toCorpusEntry(record: CallRecord): CorpusEntry | null {
  if (!record.embeddings || record.embeddings.length === 0) return null;
  return {
    callId: record.callId,
    embedding: Object.freeze([...record.embeddings]),
    snippet: extractSnippet(record.transcript),
    agentId: record.agentId,
    customerSentimentScore: record.customerSentimentScore,
    startTime: record.startTime,
  };
}

// ───── In-Memory Implementation ─────────────────────────────────

/**
 * In-memory ledger (dev/test). Keeps insertion order, which is also the
 * corpus order the recommendation engine breaks ties by.
 */
export class InMemoryCallLedger implements CallLedger {
  private readonly calls = new Map<string, CallRecord>();

  constructor(records: CallRecord[] = []) {
    for (const record of records) this.upsert(record);
  }

  upsert(record: CallRecord): void {
    this.calls.set(record.callId, record);
  }

  delete(callId: string): void {
    this.calls.delete(callId);
  }

  get size(): number {
    return this.calls.size;
  }

  async exists(callId: string): Promise<boolean> {
    return this.calls.has(callId);
  }

  async getCall(callId: string): Promise<CallRecord | null> {
    return this.calls.get(callId) ?? null;
  }

  async getEmbedding(callId: string): Promise<EmbeddingVector | null> {
    const embeddings = this.calls.get(callId)?.embeddings;
    return embeddings && embeddings.length > 0 ? embeddings : null;
  }

  async getCorpus(): Promise<CorpusEntry[]> {
    const corpus: CorpusEntry[] = [];
    for (const record of this.calls.values()) {
      const entry = toCorpusEntry(record);
      if (entry) corpus.push(entry);
    }
    return corpus;
  }
}

// ───── Redis Implementation ─────────────────────────────────────

/**
 * Redis-backed ledger. Records are JSON strings under `<prefix>call:<id>`;
 * the sorted set `<prefix>calls` indexes ids by insertion time.
 */
export class RedisCallLedger implements CallLedger {
  private readonly log = logger.child({ component: 'call-ledger-redis' });

  constructor(
    private readonly redis: Redis,
    private readonly prefix: string = env.redis.keyPrefix,
  ) {}

  private callKey(callId: string): string {
    return `${this.prefix}call:${callId}`;
  }

  private indexKey(): string {
    return `${this.prefix}calls`;
  }

  async exists(callId: string): Promise<boolean> {
    return (await this.redis.exists(this.callKey(callId))) === 1;
  }

  async getCall(callId: string): Promise<CallRecord | null> {
    const raw = await this.redis.get(this.callKey(callId));
    return raw ? this.parse(raw, callId) : null;
  }

  async getEmbedding(callId: string): Promise<EmbeddingVector | null> {
    const record = await this.getCall(callId);
    const embeddings = record?.embeddings;
    return embeddings && embeddings.length > 0 ? embeddings : null;
  }

  async getCorpus(): Promise<CorpusEntry[]> {
    const ids = await this.redis.zrange(this.indexKey(), 0, -1);
    if (ids.length === 0) return [];

    const pipe = this.redis.pipeline();
    for (const id of ids) pipe.get(this.callKey(id));
    const results = (await pipe.exec()) ?? [];

    const corpus: CorpusEntry[] = [];
    results.forEach(([err, raw], i) => {
      if (err || typeof raw !== 'string') return;
      const record = this.parse(raw, ids[i]);
      const entry = record ? toCorpusEntry(record) : null;
      if (entry) corpus.push(entry);
    });
    return corpus;
  }

  private parse(raw: string, callId: string): CallRecord | null {
    try {
      const value: unknown = JSON.parse(raw);
      if (isCallRecord(value)) return value;
      this.log.warn({ callId }, 'Skipping malformed call record');
    } catch (err) {
      this.log.warn({ err, callId }, 'Skipping unparseable call record');
    }
    return null;
  }
}

// ───── Seed + Factory ───────────────────────────────────────────

export function loadSeedCalls(file: string = env.ledger.seedFile): CallRecord[] {
  const resolved = path.isAbsolute(file) ? file : path.join(env.projectRoot, file);
  if (!fs.existsSync(resolved)) {
    logger.warn({ file: resolved }, 'Ledger seed file not found; starting with an empty ledger');
    return [];
  }

  const parsed: unknown = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  if (!Array.isArray(parsed)) {
    throw new Error(`Ledger seed file must contain an array: ${resolved}`);
  }

  const records = parsed.filter(isCallRecord);
  if (records.length !== parsed.length) {
    logger.warn({ file: resolved, skipped: parsed.length - records.length }, 'Skipped malformed seed records');
  }
  return records;
}

export function createCallLedger(redis?: Redis): CallLedger {
  if (redis) {
    logger.info('Using Redis call ledger');
    return new RedisCallLedger(redis);
  }
  const records = loadSeedCalls();
  logger.info({ calls: records.length }, 'Using in-memory call ledger');
  return new InMemoryCallLedger(records);
}
