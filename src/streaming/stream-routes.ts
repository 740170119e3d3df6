import { FastifyInstance } from 'fastify';
import { StreamController } from './stream-controller';
import { SessionRegistry } from './session-registry';
import { IdentityVerifier } from '../auth/types';
import { authenticate } from '../auth/identity-verifier';
import { CallLedger } from '../ledger/types';
import { callNotFound } from '../errors/app-error';
import { logger } from '../observability/logger';

interface StreamRouteDeps {
  controller: StreamController;
  registry: SessionRegistry;
  ledger: CallLedger;
  verifier: IdentityVerifier;
}

interface CallParams {
  callId: string;
}

const CALL_PARAMS_SCHEMA = {
  type: 'object',
  properties: { callId: { type: 'string', minLength: 1, maxLength: 128 } },
  required: ['callId'],
} as const;

export function registerStreamRoutes(app: FastifyInstance, deps: StreamRouteDeps): void {
  const { controller, registry, ledger, verifier } = deps;

  /** Bounded live history; empty when the call is not streaming */
  app.get<{ Params: CallParams }>(
    '/api/v1/calls/:callId/sentiment/history',
    { schema: { params: CALL_PARAMS_SCHEMA } },
    async (req, reply) => {
      authenticate(verifier, req);
      const { callId } = req.params;
      if (!(await ledger.exists(callId))) throw callNotFound(callId);

      const history = (await controller.historyFor(callId)) ?? [];
      return reply.send({ call_id: callId, streaming: registry.countFor(callId) > 0, data: history });
    },
  );

  app.get('/api/v1/streams', async (req, reply) => {
    authenticate(verifier, req, 'manager');
    return reply.send({ streams: controller.snapshot(), sessions: registry.stats() });
  });

  /** Operator stop; call-scoped, closes every subscriber */
  app.post<{ Params: CallParams }>(
    '/api/v1/streams/:callId/stop',
    { schema: { params: CALL_PARAMS_SCHEMA } },
    async (req, reply) => {
      const identity = authenticate(verifier, req, 'manager');
      const { callId } = req.params;
      if (!(await ledger.exists(callId))) throw callNotFound(callId);

      const stopped = await controller.stopCall(callId, 'stopped_by_operator');
      logger.info({ callId, operator: identity.subject, stopped }, 'Operator stop requested');
      return reply.send({ call_id: callId, stopped });
    },
  );
}
