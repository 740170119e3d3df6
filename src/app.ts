import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import Redis from 'ioredis';
import { env } from './config/env';
import { logger } from './observability/logger';
import { isAppError, toErrorPayload } from './errors/app-error';
import { IdentityVerifier } from './auth/types';
import { JwtIdentityVerifier } from './auth/identity-verifier';
import { CallLedger } from './ledger/types';
import { createCallLedger } from './ledger/call-ledger';
import { SentimentScorer } from './scoring/types';
import { OpenAISentimentScorer } from './scoring/openai-scorer';
import { CallStateStore } from './streaming/call-state-store';
import { SessionRegistry } from './streaming/session-registry';
import { SentimentSampler } from './streaming/sentiment-sampler';
import { StreamController } from './streaming/stream-controller';
import { SentimentGateway } from './streaming/ws-gateway';
import { registerStreamRoutes } from './streaming/stream-routes';
import { RecommendationEngine } from './recommendations/recommendation-engine';
import { registerRecommendationRoutes } from './recommendations/recommendation-routes';
import { RecommendationOptions } from './recommendations/types';
import { registerHealthRoutes } from './health/health-routes';

export type StreamSettings = (typeof env)['stream'];

export interface BuildAppOptions {
  ledger?: CallLedger;
  /** `null` runs on synthetic sentiment only */
  scorer?: SentimentScorer | null;
  verifier?: IdentityVerifier;
  /** `null` skips Redis even when it is enabled in the environment */
  redis?: Redis | null;
  stream?: Partial<StreamSettings>;
  recommendations?: Partial<RecommendationOptions>;
  now?: () => number;
}

export interface StreamingContext {
  store: CallStateStore;
  registry: SessionRegistry;
  controller: StreamController;
  gateway: SentimentGateway;
}

export interface AppContext {
  app: FastifyInstance;
  streams: StreamingContext;
  recommendations: RecommendationEngine;
  ledger: CallLedger;
  redis?: Redis;
}

async function connectRedis(): Promise<Redis | undefined> {
  try {
    const redisInstance = new Redis(env.redis.url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 5) return null; // stop retrying
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach error handler BEFORE connect to prevent unhandled error events
    redisInstance.on('error', (err) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory call ledger');
    return undefined;
  }
}

export async function buildApp(options: BuildAppOptions = {}): Promise<AppContext> {
  const now = options.now ?? Date.now;
  const streamSettings: StreamSettings = { ...env.stream, ...options.stream };

  // Initialize Fastify
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST'],
  });

  app.addHook('onResponse', (req, reply, done) => {
    logger.debug(
      {
        method: req.method,
        route: req.routeOptions?.url ?? req.url,
        statusCode: reply.statusCode,
        durationMs: Math.round(reply.elapsedTime),
      },
      'Request completed',
    );
    done();
  });

  app.setErrorHandler((err, req, reply) => {
    if (isAppError(err)) {
      if (err.status >= 500) logger.error({ err, url: req.url }, 'Request failed');
      return reply.status(err.status).send({ error: err.toPayload() });
    }
    if (err.validation) {
      return reply.status(400).send({ error: { code: 'ValidationError', message: err.message } });
    }
    if (err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: { code: 'ValidationError', message: err.message } });
    }
    logger.error({ err, url: req.url }, 'Unhandled request error');
    return reply.status(500).send({ error: toErrorPayload(err) });
  });

  app.setNotFoundHandler((req, reply) => {
    return reply.status(404).send({ error: { code: 'NotFound', message: `Route ${req.method} ${req.url} not found` } });
  });

  // ───── Call Ledger ─────
  let redis: Redis | undefined;
  if (options.redis !== undefined) {
    redis = options.redis ?? undefined;
  } else if (env.redis.enabled) {
    redis = await connectRedis();
  }
  const ledger = options.ledger ?? createCallLedger(redis);

  // ───── Identity ─────
  const verifier = options.verifier ?? new JwtIdentityVerifier({
    secret: env.auth.jwtSecret,
    issuer: env.auth.issuer || undefined,
    algorithms: env.auth.algorithms,
  });

  // ───── Live Sentiment Streaming ─────
  const scorer = options.scorer !== undefined
    ? options.scorer
    : env.openai.apiKey
      ? new OpenAISentimentScorer(env.openai, ledger)
      : null;

  const sampler = new SentimentSampler(scorer, {
    syntheticFallback: streamSettings.syntheticFallback,
    syntheticConfidenceCeiling: streamSettings.syntheticConfidenceCeiling,
  });
  const store = new CallStateStore(streamSettings.historySize, now);
  const registry = new SessionRegistry(store, ledger, streamSettings, now);
  const controller = new StreamController(store, registry, sampler, streamSettings, now);
  const gateway = new SentimentGateway(registry, controller, verifier, {
    heartbeatMs: streamSettings.heartbeatMs,
  });
  gateway.attach(app.server);

  logger.info(
    {
      sampler: sampler.mode,
      scorer: scorer?.name ?? null,
      tickIntervalMs: streamSettings.tickIntervalMs,
      historySize: streamSettings.historySize,
    },
    'Sentiment streaming initialized',
  );

  // ───── Recommendations ─────
  const recommendationOptions: RecommendationOptions = { ...env.recommendations, ...options.recommendations };
  const recommendations = new RecommendationEngine(ledger, recommendationOptions, now);

  // ───── Routes ─────
  registerHealthRoutes(app, { controller, redis, scorer });
  registerStreamRoutes(app, { controller, registry, ledger, verifier });
  registerRecommendationRoutes(app, {
    engine: recommendations,
    verifier,
    maxK: recommendationOptions.maxK,
  });

  // Streams are stopped before the HTTP server stops accepting connections
  app.addHook('preClose', async () => {
    await controller.shutdown();
    await gateway.close();
  });

  return {
    app,
    streams: { store, registry, controller, gateway },
    recommendations,
    ledger,
    redis,
  };
}
