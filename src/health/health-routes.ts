import { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { SentimentScorer } from '../scoring/types';
import { StreamController } from '../streaming/stream-controller';

interface HealthDeps {
  controller: StreamController;
  redis?: Redis;
  scorer?: SentimentScorer | null;
}

type CheckStatus = 'ok' | 'error' | 'skipped';

export function registerHealthRoutes(app: FastifyInstance, deps: HealthDeps): void {
  /** Liveness probe; always returns 200 if the process is running */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /** Readiness probe: checks Redis and the AI scorer */
  app.get('/ready', async (_req, reply) => {
    const checks: Record<string, { status: CheckStatus; latencyMs?: number }> = {};

    if (deps.redis) {
      const start = Date.now();
      try {
        await deps.redis.ping();
        checks.redis = { status: 'ok', latencyMs: Date.now() - start };
      } catch {
        checks.redis = { status: 'error', latencyMs: Date.now() - start };
      }
    } else {
      checks.redis = { status: 'skipped' };
    }

    // Synthetic fallback keeps streams alive without a scorer, so it is reported but not required
    let scorer: CheckStatus = 'skipped';
    if (deps.scorer) {
      const start = Date.now();
      scorer = (await deps.scorer.healthCheck()) ? 'ok' : 'error';
      checks[`scorer_${deps.scorer.name}`] = { status: scorer, latencyMs: Date.now() - start };
    } else {
      checks.scorer = { status: 'skipped' };
    }

    const ready = checks.redis.status !== 'error' && !deps.controller.isShuttingDown;

    return reply.status(ready ? 200 : 503).send({
      status: ready ? 'ready' : 'not_ready',
      checks,
      degraded: scorer === 'error',
      activeStreams: deps.controller.snapshot().length,
      timestamp: new Date().toISOString(),
    });
  });
}
