import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { BalanceProvider } from '../../domain/index.js';
import { PipelineError, parseIdentity, toProviderError } from '../../domain/index.js';
import { withTimeout } from '../../application/index.js';
import { requireBearerToken } from './auth.js';
import { sendError } from './reply-error.js';

const E8S_PER_BTC = 100_000_000;

type PrincipalParams = { Params: { principal: string } };
type CreatorParams = { Params: { principal: string; canister_id: string } };

function notConfigured(what: string): PipelineError {
  return new PipelineError('ProviderError', `${what} is not configured`);
}

/**
 * Direct fact lookups, outside the ingestion pipeline.
 *
 * GET /api/btc_balance/:principal                     -> { balance } in BTC
 * GET /api/sats_balance/:principal                    -> { balance }
 * GET /api/is_canister_creator/:principal/:canister_id -> true | false
 */
async function balanceRoutes(fastify: FastifyInstance): Promise<void> {
  const auth = requireBearerToken(fastify.ctx.config.SERVER_ACCESS_TOKEN);

  function balanceProvider(name: string): BalanceProvider | undefined {
    return fastify.ctx.providers.balances.find((provider) => provider.name === name);
  }

  /** Validates the identity, then runs `query` under the provider deadline. */
  async function answer<T>(
    reply: FastifyReply,
    label: string,
    rawIdentity: string,
    query: (identity: string, signal: AbortSignal) => Promise<T>,
    render: (value: T) => unknown,
  ): Promise<FastifyReply> {
    try {
      const identity = parseIdentity(rawIdentity);
      const value = await withTimeout(label, fastify.ctx.providerTimeoutMs, (signal) => query(identity, signal));
      return reply.status(200).send(render(value));
    } catch (err: unknown) {
      const error = toProviderError(label, err);
      if (error.code !== 'InvalidIdentity') {
        fastify.log.warn({ err: error }, 'Fact lookup failed');
      }
      return sendError(reply, error);
    }
  }

  fastify.get<PrincipalParams>(
    '/api/btc_balance/:principal',
    { preHandler: auth },
    async (request: FastifyRequest<PrincipalParams>, reply: FastifyReply) => {
      const provider = balanceProvider('btc');
      if (provider === undefined) {
        return sendError(reply, notConfigured('BTC balance provider'), 404);
      }
      return answer(
        reply,
        'btc balance lookup',
        request.params.principal,
        (identity, signal) => provider.lookup(identity, signal),
        (e8s) => ({ balance: e8s / E8S_PER_BTC }),
      );
    },
  );

  fastify.get<PrincipalParams>(
    '/api/sats_balance/:principal',
    { preHandler: auth },
    async (request: FastifyRequest<PrincipalParams>, reply: FastifyReply) => {
      const provider = balanceProvider('sats');
      if (provider === undefined) {
        return sendError(reply, notConfigured('SATS balance provider'), 404);
      }
      return answer(
        reply,
        'sats balance lookup',
        request.params.principal,
        (identity, signal) => provider.lookup(identity, signal),
        (balance) => ({ balance }),
      );
    },
  );

  fastify.get<CreatorParams>(
    '/api/is_canister_creator/:principal/:canister_id',
    { preHandler: auth },
    async (request: FastifyRequest<CreatorParams>, reply: FastifyReply) => {
      const provider = fastify.ctx.providers.creatorStatus;
      if (provider === null) {
        return sendError(reply, notConfigured('Creator status provider'), 404);
      }

      let scope: string;
      try {
        scope = parseIdentity(request.params.canister_id);
      } catch (err: unknown) {
        if (err instanceof PipelineError) {
          return sendError(reply, err);
        }
        throw err;
      }

      return answer(
        reply,
        'creator status lookup',
        request.params.principal,
        (identity, signal) => provider.lookup(identity, scope, signal),
        (isCreator) => isCreator,
      );
    },
  );
}

export default fp(balanceRoutes, {
  name: 'balance-routes',
  dependencies: ['app-context'],
  fastify: '5.x',
});
