import Fastify from 'fastify';
import pino from 'pino';

import { redisPlugin, routingPlugin, loadNotifierConfig } from './infrastructure/index.js';
import { exchangeRoutes, notifierRoutes } from './interfaces/http/index.js';

/**
 * Bootstrap Fastify server.
 *
 * Order:
 * 1) Config (fails fast on invalid env)
 * 2) Redis, then routing context + audit notifier
 * 3) HTTP routes
 * 4) listen()
 */
async function main(): Promise<void> {
  const config = loadNotifierConfig();

  const fastify = Fastify({
    loggerInstance: pino({ level: config.logLevel }),
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(redisPlugin, { redisUrl: config.redisUrl });
  await fastify.register(routingPlugin, { config, log: fastify.log });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(exchangeRoutes);
  await fastify.register(notifierRoutes);

  const shutdown = (): void => {
    fastify.log.info('Shutting down...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await fastify.listen({
    host: config.host,
    port: config.port,
  });
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
