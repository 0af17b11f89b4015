import type { FastifyReply } from 'fastify';
import type { PipelineError } from '../../domain/index.js';
import { errorBody, httpStatusFor } from '../../domain/index.js';

/** Answers a failed request with the status and body its error code maps to. */
export function sendError(reply: FastifyReply, error: PipelineError, status = httpStatusFor(error)): FastifyReply {
  return reply.status(status).send(errorBody(error));
}
