import type { Endpoint, Exchange, Producer, UuidGenerator } from '../../domain/index.js';
import type { EndpointUriParts } from '../../domain/index.js';
import { DefaultExchange } from './default-exchange.js';

/**
 * What a component receives when the context resolves one of its URIs.
 */
export interface EndpointRequest {
  readonly uri: string;
  readonly parts: EndpointUriParts;
  readonly uuidGenerator: UuidGenerator;
}

/** Builds endpoints for one URI scheme. */
export type Component = (request: EndpointRequest) => Endpoint;

/**
 * Base producer: carrier creation and no-op lifecycle.
 * Subclasses only implement `process()`, plus `start`/`stop` when they hold resources.
 */
export abstract class DefaultProducer implements Producer {
  readonly endpointUri: string;
  private readonly uuidGenerator: UuidGenerator;

  constructor(endpointUri: string, uuidGenerator: UuidGenerator) {
    this.endpointUri = endpointUri;
    this.uuidGenerator = uuidGenerator;
  }

  createExchange(): Exchange {
    return new DefaultExchange(this.uuidGenerator);
  }

  async start(): Promise<void> {}

  async stop(): Promise<void> {}

  abstract process(exchange: Exchange): Promise<void>;
}

export class DefaultEndpoint implements Endpoint {
  readonly uri: string;
  private readonly producerFactory: () => Producer;

  constructor(uri: string, producerFactory: () => Producer) {
    this.uri = uri;
    this.producerFactory = producerFactory;
  }

  createProducer(): Producer {
    return this.producerFactory();
  }
}

/**
 * String form of a message body for destinations that only take text.
 * Strings pass through; everything else is JSON-encoded.
 */
export function serializeBody(body: unknown): string {
  if (typeof body === 'string') return body;
  return JSON.stringify(body ?? null);
}
