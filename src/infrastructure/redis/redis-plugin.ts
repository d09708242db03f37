import fp from 'fastify-plugin';
import { Redis } from 'ioredis';
import type { FastifyInstance } from 'fastify';

export interface RedisPluginOptions {
  redisUrl: string;
}

/**
 * Fastify plugin that manages the ioredis connection lifecycle.
 *
 * - Connects on registration, disconnects on close.
 * - Decorates `fastify.redis` for the Redis endpoint components.
 */
async function redisPlugin(fastify: FastifyInstance, options: RedisPluginOptions): Promise<void> {
  // Commands fail immediately while disconnected so an audit send
  // surfaces as an error instead of waiting in the offline queue.
  const redis = new Redis(options.redisUrl, {
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  await redis.connect();
  fastify.log.info('Redis connected');

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

/** Extend Fastify's type system so `fastify.redis` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    redis: Redis;
  }
}
