import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { alertWebhookSchema, relayAlert } from '../../application/index.js';
import { PipelineError } from '../../domain/index.js';
import { verifySignature } from '../../infrastructure/index.js';
import { sendError } from './reply-error.js';

export const SIGNATURE_HEADER = 'sentry-hook-signature';

function parseJson(raw: Buffer): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(raw.toString('utf8')) };
  } catch {
    return { ok: false };
  }
}

/**
 * Alert webhook relay.
 *
 * POST /api/sentry verifies the HMAC-SHA256 signature over the raw body,
 * then forwards a summary of `data.event` to the chat notifier.
 *
 * Registered without fastify-plugin: the raw-body JSON parser below must
 * stay scoped to this route.
 */
export default async function webhookRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.removeContentTypeParser('application/json');
  fastify.addContentTypeParser('application/json', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  fastify.post(
    '/api/sentry',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { config, notifier, log } = fastify.ctx;

      const secret = config.SENTRY_CLIENT_SECRET;
      if (secret === undefined) {
        log.error('SENTRY_CLIENT_SECRET not set, rejecting webhook');
        return reply.status(500).send({ error: 'ConfigError', message: 'Webhook secret is not configured' });
      }

      const raw = Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0);
      const header = request.headers[SIGNATURE_HEADER];
      const signature = Array.isArray(header) ? header[0] : header;

      if (!verifySignature(secret, raw, signature)) {
        log.warn({ hasSignature: signature !== undefined }, 'Webhook signature rejected');
        return sendError(reply, new PipelineError('Unauthorized', 'Invalid webhook signature'));
      }

      const json = parseJson(raw);
      if (!json.ok) {
        return reply.status(400).send({ error: 'Validation failed', message: 'Body is not valid JSON' });
      }

      const parsed = alertWebhookSchema.safeParse(json.value);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const event = parsed.data.data?.event;
      if (event === undefined || event === null) {
        log.debug('Webhook carried no event, nothing relayed');
        return reply.status(200).send();
      }

      try {
        await relayAlert(event, notifier, log);
      } catch (err: unknown) {
        log.error({ err }, 'Alert relay failed');
        return reply.status(500).send({ error: 'RelayFailed', message: 'Failed to relay alert' });
      }
      return reply.status(200).send();
    },
  );
}
