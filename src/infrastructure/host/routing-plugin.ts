import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import type { AuditEventNotifier } from '../../application/index.js';
import {
  createLogComponent,
  createRedisPubSubComponent,
  createRedisStreamComponent,
} from '../components/index.js';
import { createConfiguredNotifier } from '../config/notifier-config.js';
import type { NotifierConfig } from '../config/notifier-config.js';
import { RoutingContext } from './routing-context.js';

export interface RoutingPluginOptions {
  config: NotifierConfig;
  log: Logger;
}

/**
 * Fastify plugin that owns the routing context and its audit notifier.
 *
 * Order:
 * 1) components (log, redis-stream, redis-pubsub on `fastify.redis`)
 * 2) notifier from config
 * 3) context start, which starts the notifier
 *
 * A notifier that cannot start (unknown destination scheme, bad URI)
 * fails registration, and with it server startup.
 */
async function routingPlugin(fastify: FastifyInstance, options: RoutingPluginOptions): Promise<void> {
  const { config, log } = options;
  const context = new RoutingContext({ log: log.child({ component: 'routing' }) });

  context.addComponent('log', createLogComponent(log));
  context.addComponent('redis-stream', createRedisStreamComponent(fastify.redis));
  context.addComponent('redis-pubsub', createRedisPubSubComponent(fastify.redis));

  const notifier = createConfiguredNotifier(config, log);
  context.addEventNotifier(notifier);

  await context.start();

  fastify.decorate('routing', context);
  fastify.decorate('auditNotifier', notifier);

  fastify.addHook('onClose', async () => {
    await context.stop();
  });
}

export default fp(routingPlugin, {
  name: 'routing',
  dependencies: ['redis'],
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    routing: RoutingContext;
    auditNotifier: AuditEventNotifier;
  }
}
