import type { Redis } from 'ioredis';
import type { Exchange, UuidGenerator } from '../../domain/index.js';
import { DefaultEndpoint, DefaultProducer, serializeBody } from '../host/default-producer.js';
import type { Component } from '../host/default-producer.js';

export type PublishClient = Pick<Redis, 'publish'>;

/**
 * Publishes each exchange body to a Redis Pub/Sub channel.
 *
 * Publish errors propagate so the caller (the host, or a notifier)
 * sees the failed send.
 */
export class RedisPubSubProducer extends DefaultProducer {
  private readonly redis: PublishClient;
  private readonly channel: string;

  constructor(endpointUri: string, uuidGenerator: UuidGenerator, redis: PublishClient, channel: string) {
    super(endpointUri, uuidGenerator);
    this.redis = redis;
    this.channel = channel;
  }

  async process(exchange: Exchange): Promise<void> {
    const receivers = await this.redis.publish(this.channel, serializeBody(exchange.in.body));
    exchange.in.headers['RedisPubSubReceivers'] = receivers;
  }
}

/** `redis-pubsub:<channel>` */
export function createRedisPubSubComponent(redis: PublishClient): Component {
  return ({ uri, parts, uuidGenerator }) =>
    new DefaultEndpoint(uri, () => new RedisPubSubProducer(uri, uuidGenerator, redis, parts.path));
}
