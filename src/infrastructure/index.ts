export { redisPlugin } from './redis/index.js';
export type { RedisPluginOptions } from './redis/index.js';
export { RoutingContext, DefaultExchange, DefaultEndpoint, DefaultProducer, routingPlugin } from './host/index.js';
export type { Component, EndpointRequest, RoutingPluginOptions } from './host/index.js';
export {
  createLogComponent,
  createRedisStreamComponent,
  createRedisPubSubComponent,
} from './components/index.js';
export { loadNotifierConfig, createConfiguredNotifier } from './config/index.js';
export type { NotifierConfig } from './config/index.js';
