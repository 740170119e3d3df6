import { FastifyInstance } from 'fastify';
import { RecommendationEngine } from './recommendation-engine';
import { IdentityVerifier } from '../auth/types';
import { authenticate } from '../auth/identity-verifier';
import { logger } from '../observability/logger';

interface RecommendationRouteDeps {
  engine: RecommendationEngine;
  verifier: IdentityVerifier;
  maxK: number;
}

export function registerRecommendationRoutes(app: FastifyInstance, deps: RecommendationRouteDeps): void {
  const { engine, verifier } = deps;

  app.get<{ Params: { callId: string }; Querystring: { k?: number } }>(
    '/api/v1/calls/:callId/recommendations',
    {
      schema: {
        params: {
          type: 'object',
          properties: { callId: { type: 'string', minLength: 1, maxLength: 128 } },
          required: ['callId'],
        },
        querystring: {
          type: 'object',
          properties: { k: { type: 'integer', minimum: 1, maximum: deps.maxK } },
        },
      },
    },
    async (req, reply) => {
      authenticate(verifier, req);
      const result = await engine.recommendationsFor(req.params.callId, req.query.k);
      return reply.send(result);
    },
  );

  /** Reload the comparison corpus from the call ledger */
  app.post('/api/v1/recommendations/corpus/refresh', async (req, reply) => {
    const identity = authenticate(verifier, req, 'admin');
    const snapshot = await engine.refreshCorpus();
    logger.info({ admin: identity.subject, size: snapshot.entries.length }, 'Corpus refresh requested');
    return reply.send({ status: 'ok', corpus: engine.status() });
  });
}
