import pino from 'pino';
import { createOutboxRuntime, loadConfig } from './infrastructure/index.js';
import { buildApp } from './interfaces/http/index.js';

/**
 * Bootstrap the outbox HTTP server.
 *
 * Order:
 * 1) Configuration
 * 2) Store + broker adapters (schema bootstrap when enabled)
 * 3) Fastify app with routes
 * 4) Shutdown hooks
 * 5) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = pino({ level: config.logLevel });

  const runtime = await createOutboxRuntime(config, log);

  const fastify = await buildApp(runtime.deps, {
    logger: { level: config.logLevel },
    adminToken: config.adminToken,
    metricsRegistry: runtime.metricsRegistry,
  });

  if (config.adminToken.length === 0) {
    log.warn('ADMIN_TOKEN is empty: admin routes will answer 503');
  }

  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Shutting down server...');
    fastify.close()
      .then(() => runtime.shutdown())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await fastify.listen({ host: config.host, port: config.port });
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
