import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optionalFloat(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseFloat(val);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

function optionalList(key: string, fallback: string[]): string[] {
  const val = process.env[key];
  if (!val) return fallback;
  return val.split(',').map((s) => s.trim()).filter(Boolean);
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 8000),
  logLevel: optional('LOG_LEVEL', 'info'),
  projectRoot,

  // ───── Identity ─────
  auth: {
    jwtSecret: optional('AUTH_JWT_SECRET', 'dev-secret-change-in-prod'),
    issuer: optional('AUTH_JWT_ISSUER', ''),
    algorithms: optionalList('AUTH_JWT_ALGORITHMS', ['HS256']),
  },

  // ───── Live Sentiment Streaming ─────
  stream: {
    tickIntervalMs: optionalInt('STREAM_TICK_INTERVAL_MS', 2000),
    historySize: optionalInt('STREAM_HISTORY_SIZE', 100),
    maxSessionsPerCall: optionalInt('STREAM_MAX_SESSIONS_PER_CALL', 50),
    maxSessionsPerIdentity: optionalInt('STREAM_MAX_SESSIONS_PER_IDENTITY', 5),
    stopGraceMs: optionalInt('STREAM_STOP_GRACE_MS', 5000),
    maxConsecutiveFailures: optionalInt('STREAM_MAX_CONSECUTIVE_FAILURES', 3),
    emitDegradedMarkers: optionalBool('STREAM_EMIT_DEGRADED_MARKERS', false),
    syntheticFallback: optionalBool('STREAM_SYNTHETIC_FALLBACK', true),
    syntheticConfidenceCeiling: optionalFloat('STREAM_SYNTHETIC_CONFIDENCE_CEILING', 0.5),
    heartbeatMs: optionalInt('STREAM_HEARTBEAT_MS', 30000),
  },

  // ───── Recommendations ─────
  recommendations: {
    defaultK: optionalInt('RECOMMEND_DEFAULT_K', 5),
    maxK: optionalInt('RECOMMEND_MAX_K', 50),
    relevanceFloor: optionalFloat('RECOMMEND_RELEVANCE_FLOOR', -1),
    corpusTtlMs: optionalInt('RECOMMEND_CORPUS_TTL_MS', 5 * 60 * 1000),
  },

  // ───── AI Scorer ─────
  openai: {
    apiKey: optional('OPENAI_API_KEY', ''),
    model: optional('OPENAI_MODEL', 'gpt-4o-mini'),
    timeoutMs: optionalInt('OPENAI_TIMEOUT_MS', 10000),
  },

  // ───── Call Ledger ─────
  redis: {
    enabled: optionalBool('REDIS_ENABLED', false),
    url: optional('REDIS_URL', 'redis://localhost:6379'),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'callpulse:'),
  },

  ledger: {
    seedFile: optional('LEDGER_SEED_FILE', path.join('data', 'sample-calls.json')),
  },
} as const;

export type Env = typeof env;
