import type { Redis } from 'ioredis';
import { ResolveEndpointError } from '../../domain/index.js';
import type { Exchange, UuidGenerator } from '../../domain/index.js';
import { DefaultEndpoint, DefaultProducer, serializeBody } from '../host/default-producer.js';
import type { Component } from '../host/default-producer.js';

/** The only Redis command a stream producer needs. */
export type StreamClient = Pick<Redis, 'xadd'>;

/** Field name of the serialized body in each stream entry. */
export const STREAM_FIELD = 'record';

/**
 * Appends each exchange body to a Redis Stream.
 *
 * Uses `XADD` with auto-generated IDs (`*`). With `maxlen` set the stream
 * is capped approximately (`MAXLEN ~ n`) so an audit trail cannot grow
 * without bound.
 */
export class RedisStreamProducer extends DefaultProducer {
  private readonly redis: StreamClient;
  private readonly streamKey: string;
  private readonly maxLen: number | null;

  constructor(
    endpointUri: string,
    uuidGenerator: UuidGenerator,
    redis: StreamClient,
    streamKey: string,
    maxLen: number | null,
  ) {
    super(endpointUri, uuidGenerator);
    this.redis = redis;
    this.streamKey = streamKey;
    this.maxLen = maxLen;
  }

  async process(exchange: Exchange): Promise<void> {
    const record = serializeBody(exchange.in.body);

    const entryId: string | null = this.maxLen === null
      ? await this.redis.xadd(this.streamKey, '*', STREAM_FIELD, record)
      : await this.redis.xadd(this.streamKey, 'MAXLEN', '~', String(this.maxLen), '*', STREAM_FIELD, record);

    exchange.in.headers['RedisStreamEntryId'] = entryId;
  }
}

/** `redis-stream:<key>[?maxlen=n]` */
export function createRedisStreamComponent(redis: StreamClient): Component {
  return ({ uri, parts, uuidGenerator }) => {
    const rawMaxLen = parts.params['maxlen'];
    let maxLen: number | null = null;

    if (rawMaxLen !== undefined) {
      maxLen = Number(rawMaxLen);
      if (!Number.isInteger(maxLen) || maxLen <= 0) {
        throw new ResolveEndpointError(uri, `maxlen must be a positive integer, got "${rawMaxLen}"`);
      }
    }

    const streamKey = parts.path;
    return new DefaultEndpoint(
      uri,
      () => new RedisStreamProducer(uri, uuidGenerator, redis, streamKey, maxLen),
    );
  };
}
