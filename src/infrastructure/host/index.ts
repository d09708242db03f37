export { DefaultExchange, randomUuidGenerator } from './default-exchange.js';
export { DefaultEndpoint, DefaultProducer, serializeBody } from './default-producer.js';
export type { Component, EndpointRequest } from './default-producer.js';
export { RoutingContext } from './routing-context.js';
export type { RoutingContextOptions } from './routing-context.js';
export { default as routingPlugin } from './routing-plugin.js';
export type { RoutingPluginOptions } from './routing-plugin.js';
