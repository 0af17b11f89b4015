import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { AppContext } from '../../infrastructure/index.js';

export interface ContextPluginOptions {
  context: AppContext;
}

/**
 * Exposes the application context to every route as `fastify.ctx`
 * and releases its connections when the server closes.
 */
async function contextPlugin(fastify: FastifyInstance, options: ContextPluginOptions): Promise<void> {
  fastify.decorate('ctx', options.context);

  fastify.addHook('onClose', async () => {
    await options.context.close();
  });
}

export default fp(contextPlugin, {
  name: 'app-context',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.ctx` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    ctx: AppContext;
  }
}
