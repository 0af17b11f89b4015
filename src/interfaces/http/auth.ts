import type { FastifyReply, FastifyRequest } from 'fastify';
import { PipelineError } from '../../domain/index.js';
import { sendError } from './reply-error.js';

const BEARER_PREFIX = 'Bearer ';

/**
 * preHandler that admits requests whose `Authorization` header is
 * exactly `Bearer <token>`.
 */
export function requireBearerToken(token: string) {
  const expected = `${BEARER_PREFIX}${token}`;

  return async (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> => {
    const header = request.headers.authorization;
    if (header === undefined || !header.startsWith(BEARER_PREFIX)) {
      request.log.debug({ url: request.url }, 'Missing bearer token');
      return sendError(reply, new PipelineError('Unauthorized', 'Missing bearer token'));
    }
    if (header !== expected) {
      request.log.info({ url: request.url }, 'Rejected bearer token');
      return sendError(reply, new PipelineError('Unauthorized', 'Invalid bearer token'));
    }
    return undefined;
  };
}
