import { Redis } from 'ioredis';
import pino from 'pino';
import { NotificationCollector } from './application/index.js';
import {
  RedisEventPublisher,
  loadServiceConfig,
  setupEvents,
  startConsumer,
} from './infrastructure/index.js';

/**
 * Standalone worker process that consumes notifications from Redis Streams,
 * converts them to events and republishes the events.
 *
 * Runs independently of the Fastify HTTP server and can be scaled
 * horizontally by launching multiple instances with different WORKER_ID values.
 *
 * The event definitions are loaded once at startup; a malformed definition
 * stops the worker before it reads a single notification.
 */
const config = loadServiceConfig();
const log = pino({ level: config.logLevel });

const redis = new Redis(config.redisUrl, {
  maxRetriesPerRequest: null,
  enableReadyCheck: true,
  lazyConnect: true,
  connectionName: `eventsmith-${config.workerId}`,
});

// Abort controller for graceful shutdown
const ac = new AbortController();

async function main(): Promise<void> {
  const engine = setupEvents(config, log);

  await redis.connect();
  log.info('Redis connected');

  const collector = new NotificationCollector(
    engine,
    new RedisEventPublisher(redis, config.streams.events),
    log,
    { storeEvents: config.storeEvents },
  );

  await startConsumer(
    {
      redis,
      log,
      collector,
      streams: config.streams,
      consumerName: config.workerId,
    },
    ac.signal,
  );
}

// Graceful shutdown on SIGINT / SIGTERM
function shutdown(): void {
  log.info('Shutting down worker...');
  ac.abort();

  // Give in-flight operations a moment, then force exit
  setTimeout(() => {
    redis.quit()
      .catch((err: unknown) => log.warn({ err }, 'Redis quit failed'))
      .finally(() => process.exit(0));
  }, 3000);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().catch((err: unknown) => {
  log.fatal({ err }, 'Worker crashed');
  process.exit(1);
});
