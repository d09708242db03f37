import type { Exchange } from './exchange.js';
import type { NotifierEvent } from './events.js';

/**
 * Contracts the notifier consumes from the host.
 *
 * Implemented in-process by `infrastructure/host`, but any host that
 * satisfies them can drive an `AuditEventNotifier`.
 */

export interface Service {
  start(): Promise<void>;
  stop(): Promise<void>;
}

/** Delivers a carrier exchange to one destination. */
export interface Producer extends Service {
  readonly endpointUri: string;
  createExchange(): Exchange;
  process(exchange: Exchange): Promise<void>;
}

export interface Endpoint {
  readonly uri: string;
  createProducer(): Producer;
}

export interface EndpointResolver {
  isStarted(): boolean;
  getEndpoint(uri: string): Endpoint;
}

/**
 * Listener registered with the host. `bindContext` is called on
 * registration so a notifier configured without a context picks up
 * the one it is added to.
 */
export interface EventNotifier extends Service {
  notify(event: NotifierEvent): Promise<void>;
  bindContext?(context: EndpointResolver): void;
}
