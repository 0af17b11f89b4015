import 'dotenv/config';
import pino from 'pino';
import { createAppContext, loadConfig } from './infrastructure/index.js';
import { buildApp } from './interfaces/http/index.js';

/**
 * Bootstrap the ingestion server.
 *
 * Order:
 * 1) Configuration (aborts on invalid env)
 * 2) Application context: sinks, providers, notifier
 * 3) HTTP routes
 * 4) Shutdown hooks
 * 5) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = pino({ level: config.LOG_LEVEL });

  const context = await createAppContext(config, log);
  const fastify = await buildApp(context, { trustProxy: true });

  let closing = false;

  // Graceful shutdown on SIGINT / SIGTERM: stop accepting requests, let
  // in-flight ones finish, then the context plugin closes Redis and Postgres.
  function shutdown(signal: NodeJS.Signals): void {
    if (closing) return;
    closing = true;
    log.info({ signal }, 'Shutting down server...');

    fastify.close().then(
      () => {
        log.info('Server closed');
        process.exit(0);
      },
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  }

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await fastify.listen({
    host: config.HOST,
    port: config.PORT,
  });
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
