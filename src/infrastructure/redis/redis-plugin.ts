import fp from 'fastify-plugin';
import { Redis } from 'ioredis';
import type { FastifyInstance } from 'fastify';

export interface RedisPluginOptions {
  url: string;
  /** Reported by CLIENT LIST, so ingestion connections can be told apart from workers. */
  connectionName?: string | undefined;
}

/**
 * Owns the ioredis connection used by the HTTP routes.
 *
 * Connects during registration so a bad REDIS_URL fails startup, and
 * quits when the server closes. Routes reach it as `fastify.redis`.
 */
async function redisPlugin(fastify: FastifyInstance, opts: RedisPluginOptions): Promise<void> {
  const redis = new Redis(opts.url, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
    connectionName: opts.connectionName ?? 'eventsmith-http',
  });

  await redis.connect();
  fastify.log.info({ host: redis.options.host, port: redis.options.port }, 'Redis connected');

  fastify.decorate('redis', redis);

  fastify.addHook('onClose', async () => {
    await redis.quit();
    fastify.log.info('Redis disconnected');
  });
}

export default fp(redisPlugin, {
  name: 'redis',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    redis: Redis;
  }
}
