import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { Location } from '../../domain/index.js';
import { PipelineError } from '../../domain/index.js';
import { requireBearerToken } from './auth.js';
import { sendError } from './reply-error.js';
import { clientIpOf } from './request-ip.js';

type IpParams = { Params: { ip: string } };

function notFound(ip: string): PipelineError {
  return new PipelineError('IpConfigError', `No location found for ${ip}`);
}

/**
 * Location lookup and caller-IP routes.
 *
 * GET /api/ip/:ip        -> { country, region, city }
 * GET /api/ip_v2/:ip     -> { country, region, city, timezone }
 * GET /api/my_ip         -> caller IP as a JSON string
 * GET /api/my_timezone   -> caller timezone as a JSON string
 */
async function ipRoutes(fastify: FastifyInstance): Promise<void> {
  const auth = requireBearerToken(fastify.ctx.config.SERVER_ACCESS_TOKEN);

  /** Throws `IpConfigError` when no resolver is configured or the IP is malformed. */
  async function lookup(ip: string): Promise<Location | null> {
    const resolver = fastify.ctx.providers.location;
    if (resolver === null) {
      throw new PipelineError('IpConfigError', 'Location resolver is not configured');
    }
    return resolver.lookup(ip);
  }

  async function withLocation(
    ip: string,
    reply: FastifyReply,
    render: (location: Location) => unknown,
  ): Promise<FastifyReply> {
    try {
      const location = await lookup(ip);
      if (location === null) {
        return sendError(reply, notFound(ip), 404);
      }
      return reply.status(200).send(render(location));
    } catch (err: unknown) {
      if (err instanceof PipelineError) {
        return sendError(reply, err);
      }
      throw err;
    }
  }

  fastify.get<IpParams>(
    '/api/ip/:ip',
    { preHandler: auth },
    async (request: FastifyRequest<IpParams>, reply: FastifyReply) =>
      withLocation(request.params.ip, reply, ({ country, region, city }) => ({ country, region, city })),
  );

  fastify.get<IpParams>(
    '/api/ip_v2/:ip',
    { preHandler: auth },
    async (request: FastifyRequest<IpParams>, reply: FastifyReply) =>
      withLocation(request.params.ip, reply, ({ country, region, city, timezone }) => ({
        country,
        region,
        city,
        timezone: timezone ?? null,
      })),
  );

  fastify.get(
    '/api/my_ip',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const ip = clientIpOf(request);
      if (ip === undefined) {
        return sendError(reply, new PipelineError('IpConfigError', 'Could not determine client IP'));
      }
      return reply.status(200).type('application/json').send(JSON.stringify(ip));
    },
  );

  fastify.get(
    '/api/my_timezone',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const ip = clientIpOf(request);
      if (ip === undefined) {
        return sendError(reply, new PipelineError('IpConfigError', 'Could not determine client IP'));
      }

      try {
        const timezone = (await lookup(ip))?.timezone;
        if (timezone === undefined) {
          return sendError(reply, new PipelineError('IpConfigError', `No timezone found for ${ip}`), 404);
        }
        return reply.status(200).type('application/json').send(JSON.stringify(timezone));
      } catch (err: unknown) {
        if (err instanceof PipelineError) {
          return sendError(reply, err);
        }
        throw err;
      }
    },
  );
}

export default fp(ipRoutes, {
  name: 'ip-routes',
  dependencies: ['app-context'],
  fastify: '5.x',
});
