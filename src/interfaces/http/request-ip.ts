import type { FastifyRequest } from 'fastify';
import { resolveClientIp } from '../../application/index.js';

/** Caller IP as the ingestion endpoints see it. */
export function clientIpOf(request: FastifyRequest): string | undefined {
  return resolveClientIp(request.headers['x-forwarded-for'], request.ip);
}
