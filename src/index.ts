import Fastify from 'fastify';

import {
  redisPlugin,
  converterPlugin,
  loadServiceConfig,
  setupEvents,
} from './infrastructure/index.js';

import { notificationRoutes } from './interfaces/http/index.js';

/**
 * Bootstrap Fastify server.
 *
 * Order:
 * 1) Configuration + event definitions (invalid definitions abort here)
 * 2) Infrastructure plugins
 * 3) HTTP routes
 * 4) listen()
 */
async function main(): Promise<void> {
  const config = loadServiceConfig();

  const fastify = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  // --------------------------------------------------
  // Conversion rules
  // --------------------------------------------------

  const engine = setupEvents(config, fastify.log);

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(redisPlugin, { url: config.redisUrl });
  await fastify.register(converterPlugin, { engine });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(notificationRoutes, { streamKey: config.streams.notifications });

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  await fastify.listen({
    host: config.host,
    port: config.port,
  });
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
