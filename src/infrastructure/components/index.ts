export { createLogComponent, LogProducer } from './log-component.js';
export { createRedisStreamComponent, RedisStreamProducer, STREAM_FIELD } from './redis-stream-component.js';
export type { StreamClient } from './redis-stream-component.js';
export { createRedisPubSubComponent, RedisPubSubProducer } from './redis-pubsub-component.js';
export type { PublishClient } from './redis-pubsub-component.js';
