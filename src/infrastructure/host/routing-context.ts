import type { Logger } from 'pino';
import {
  ExchangeProperty,
  IllegalStateError,
  ResolveEndpointError,
  parseEndpointUri,
  sanitizeUri,
  toError,
} from '../../domain/index.js';
import type {
  ContextEventKind,
  Endpoint,
  EndpointResolver,
  EventNotifier,
  Exchange,
  ExchangeEvent,
  ExchangeEventKind,
  HostEvent,
  MessageHeaders,
  Producer,
  UuidGenerator,
} from '../../domain/index.js';
import { isNotificationSuppressed } from '../../application/index.js';
import type { ServiceStatus } from '../../application/index.js';
import { DefaultExchange, randomUuidGenerator } from './default-exchange.js';
import type { Component } from './default-producer.js';

export interface RoutingContextOptions {
  log: Logger;
  uuidGenerator?: UuidGenerator;
}

/**
 * Minimal in-process routing host.
 *
 * Resolves endpoint URIs through registered components, sends exchanges
 * to them and raises lifecycle events to registered notifiers:
 *
 *   created → sending → sent
 *   created → sending → failed → failure_handled
 *
 * Events for exchanges carrying the `NotifyEvent` marker are not raised,
 * which keeps audit carriers from being audited themselves.
 */
export class RoutingContext implements EndpointResolver {
  readonly uuidGenerator: UuidGenerator;
  private readonly log: Logger;
  private readonly components: Map<string, Component> = new Map();
  private readonly endpoints: Map<string, Endpoint> = new Map();
  private readonly producers: Map<string, Promise<Producer>> = new Map();
  private readonly notifiers: EventNotifier[] = [];
  private state: ServiceStatus = 'stopped';

  constructor(options: RoutingContextOptions) {
    this.log = options.log;
    this.uuidGenerator = options.uuidGenerator ?? randomUuidGenerator;
  }

  get status(): ServiceStatus {
    return this.state;
  }

  isStarted(): boolean {
    return this.state === 'started';
  }

  addComponent(scheme: string, component: Component): void {
    this.components.set(scheme.toLowerCase(), component);
  }

  /** Resolves (and caches) the endpoint for `uri`. */
  getEndpoint(uri: string): Endpoint {
    const cached = this.endpoints.get(uri);
    if (cached) return cached;

    const parts = parseEndpointUri(uri);
    if (!parts) {
      throw new ResolveEndpointError(sanitizeUri(uri), 'malformed uri');
    }

    const component = this.components.get(parts.scheme);
    if (!component) {
      throw new ResolveEndpointError(sanitizeUri(uri), `no component for scheme "${parts.scheme}"`);
    }

    const endpoint = component({ uri, parts, uuidGenerator: this.uuidGenerator });
    this.endpoints.set(uri, endpoint);
    return endpoint;
  }

  addEventNotifier(notifier: EventNotifier): void {
    notifier.bindContext?.(this);
    this.notifiers.push(notifier);
  }

  createExchange(body: unknown = null, headers: MessageHeaders = {}): Exchange {
    return new DefaultExchange(this.uuidGenerator, body, headers);
  }

  async start(): Promise<void> {
    if (this.state === 'started') return;

    this.state = 'starting';
    await this.emitContextEvent('starting');

    try {
      for (const notifier of this.notifiers) {
        await notifier.start();
      }
    } catch (err: unknown) {
      this.log.error({ err }, 'Failed to start event notifier, aborting context start');
      await this.stopServices();
      this.state = 'stopped';
      throw err;
    }

    this.state = 'started';
    await this.emitContextEvent('started');
    this.log.info(
      { notifierCount: this.notifiers.length, components: [...this.components.keys()] },
      'Routing context started',
    );
  }

  async stop(): Promise<void> {
    if (this.state === 'stopped') return;

    this.state = 'stopping';
    await this.emitContextEvent('stopping');
    await this.stopServices();
    this.state = 'stopped';
    await this.emitContextEvent('stopped');
    this.log.info('Routing context stopped');
  }

  /**
   * Sends `body` to the endpoint at `uri` and returns the exchange.
   *
   * A failed send does not throw: the error is recorded on the exchange
   * under `ExceptionCaught` and reported through `failed` / `failure_handled`.
   */
  async send(uri: string, body: unknown, headers: MessageHeaders = {}): Promise<Exchange> {
    if (!this.isStarted()) {
      throw new IllegalStateError('Routing context is not started');
    }

    const endpoint = this.getEndpoint(uri);
    const exchange = this.createExchange(body, headers);

    await this.emit(exchangeEvent('created', exchange));
    await this.emit(exchangeEvent('sending', exchange, { endpointUri: endpoint.uri }));

    const startedAt = Date.now();
    try {
      const producer = await this.producerFor(endpoint);
      await producer.process(exchange);
    } catch (err: unknown) {
      const error = toError(err);
      exchange.setProperty(ExchangeProperty.EXCEPTION_CAUGHT, error);
      this.log.warn(
        { err: error, exchange_id: exchange.exchangeId, endpoint: sanitizeUri(endpoint.uri) },
        'Exchange failed',
      );

      await this.emit(exchangeEvent('failed', exchange, { endpointUri: endpoint.uri, error }));
      await this.emit(exchangeEvent('failure_handled', exchange, { endpointUri: endpoint.uri, error }));
      return exchange;
    }

    await this.emit(
      exchangeEvent('sent', exchange, { endpointUri: endpoint.uri, timeTakenMs: Date.now() - startedAt }),
    );
    return exchange;
  }

  /**
   * Hands `event` to every notifier in registration order.
   * A failing notifier is logged and does not stop the others.
   */
  async emit(event: HostEvent): Promise<void> {
    if (event.type === 'exchange' && isNotificationSuppressed(event.exchange)) return;

    for (const notifier of this.notifiers) {
      try {
        await notifier.notify(event);
      } catch (err: unknown) {
        this.log.warn(
          {
            err,
            eventType: event.type,
            kind: event.kind,
            exchange_id: event.type === 'exchange' ? event.exchange.exchangeId : undefined,
          },
          'Event notifier failed',
        );
      }
    }
  }

  private async emitContextEvent(kind: ContextEventKind): Promise<void> {
    await this.emit({ type: 'context', kind, timestamp: new Date().toISOString() });
  }

  /** Creates and starts one producer per endpoint, on first use. */
  private producerFor(endpoint: Endpoint): Promise<Producer> {
    const existing = this.producers.get(endpoint.uri);
    if (existing) return existing;

    const pending = (async () => {
      const producer = endpoint.createProducer();
      await producer.start();
      return producer;
    })();

    this.producers.set(endpoint.uri, pending);
    void pending.catch(() => {
      this.producers.delete(endpoint.uri);
    });
    return pending;
  }

  private async stopServices(): Promise<void> {
    for (const notifier of this.notifiers) {
      try {
        await notifier.stop();
      } catch (err: unknown) {
        this.log.warn({ err }, 'Failed to stop event notifier');
      }
    }

    const producers = [...this.producers.values()];
    this.producers.clear();
    for (const pending of producers) {
      try {
        const producer = await pending;
        await producer.stop();
      } catch (err: unknown) {
        this.log.warn({ err }, 'Failed to stop producer');
      }
    }
  }
}

function exchangeEvent(
  kind: ExchangeEventKind,
  exchange: Exchange,
  extra: Pick<ExchangeEvent, 'endpointUri' | 'timeTakenMs' | 'error'> = {},
): ExchangeEvent {
  return {
    type: 'exchange',
    kind,
    exchange,
    timestamp: new Date().toISOString(),
    ...extra,
  };
}
