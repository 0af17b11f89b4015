import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { processPayload, processWarehousePayload } from '../../application/index.js';
import { requireBearerToken } from './auth.js';
import { sendError } from './reply-error.js';
import { clientIpOf } from './request-ip.js';

/**
 * Registers the event ingestion routes.
 *
 * POST /api/send_event     -> full path: enrichment, then every sink
 * POST /api/send_bigquery  -> geo enrichment, then the warehouse only
 */
async function eventRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * Accepts a bulk, array or single-event payload.
   *
   * Answers 200 with an empty body once every record was delivered to the
   * tracking sink; otherwise the first failing record decides the status.
   */
  fastify.post(
    '/api/send_event',
    { preHandler: requireBearerToken(fastify.ctx.config.SERVER_ACCESS_TOKEN) },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const result = await processPayload(request.body, clientIpOf(request), fastify.ctx);

      if (!result.ok) {
        return sendError(reply, result.error);
      }
      return reply.status(200).send();
    },
  );

  fastify.post(
    '/api/send_bigquery',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const result = await processWarehousePayload(request.body, clientIpOf(request), fastify.ctx);

      if (!result.ok) {
        return sendError(reply, result.error);
      }
      return reply.status(200).send();
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['app-context'],
  fastify: '5.x',
});
