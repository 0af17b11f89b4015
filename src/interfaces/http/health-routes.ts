import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/** Liveness only: answers as long as the process serves HTTP. */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  const ok = async (_request: FastifyRequest, reply: FastifyReply) =>
    reply.status(200).type('text/plain').send('OK');

  fastify.get('/health', ok);
  fastify.get('/healthz', ok);
}

export default fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
