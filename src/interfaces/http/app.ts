import Fastify from 'fastify';
import type { FastifyBaseLogger, FastifyError, FastifyInstance } from 'fastify';
import { PipelineError } from '../../domain/index.js';
import type { AppContext } from '../../infrastructure/index.js';
import contextPlugin from './context-plugin.js';
import eventRoutes from './event-routes.js';
import ipRoutes from './ip-routes.js';
import balanceRoutes from './balance-routes.js';
import healthRoutes from './health-routes.js';
import webhookRoutes from './webhook-routes.js';
import { sendError } from './reply-error.js';

export interface BuildAppOptions {
  /** Trust `x-forwarded-*` headers from a fronting proxy. */
  trustProxy?: boolean;
}

/**
 * Assembles the HTTP server around an application context.
 *
 * Does not listen; the caller decides between `listen()` and `inject()`.
 */
export async function buildApp(context: AppContext, options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const loggerInstance: FastifyBaseLogger = context.log;

  const fastify = Fastify({
    loggerInstance,
    trustProxy: options.trustProxy ?? false,
  });

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof PipelineError) {
      return sendError(reply, error);
    }

    const status = error.statusCode ?? 500;
    if (status < 500) {
      request.log.debug({ err: error }, 'Request rejected');
      return reply.status(status).send({ error: error.code ?? 'BadRequest', message: error.message });
    }

    request.log.error({ err: error }, 'Unhandled request error');
    return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
  });

  await fastify.register(contextPlugin, { context });

  await fastify.register(healthRoutes);
  await fastify.register(eventRoutes);
  await fastify.register(ipRoutes);
  await fastify.register(balanceRoutes);
  await fastify.register(webhookRoutes);

  return fastify;
}
