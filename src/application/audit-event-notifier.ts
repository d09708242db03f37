import type { Logger } from 'pino';
import {
  ConfigurationError,
  ExchangeProperty,
  createAuditEvent,
  sanitizeUri,
  startsDispatch,
} from '../domain/index.js';
import type {
  AuditEvent,
  Endpoint,
  EndpointResolver,
  EventNotifier,
  ExchangeEvent,
  NotifierEvent,
  Producer,
} from '../domain/index.js';
import type { EventFilter } from './event-filters.js';
import { withSuppressedNotifications } from './suppression-guard.js';

export type ServiceStatus = 'stopped' | 'starting' | 'started' | 'stopping';

/**
 * Per-deployment behaviour of a notifier.
 *
 * Only `isEnabledFor` is required; the builders default to publishing
 * the audit event itself, built by the domain factory.
 */
export interface NotifierStrategies {
  isEnabledFor: EventFilter;
  createPayload?: (audit: AuditEvent) => unknown;
  createAuditEvent?: (event: ExchangeEvent) => AuditEvent;
}

export interface AuditEventNotifierOptions {
  log: Logger;
  strategies: NotifierStrategies;
  context?: EndpointResolver;
  /** Takes precedence over `endpointUri` when both are set. */
  endpoint?: Endpoint;
  endpointUri?: string;
}

/**
 * Publishes an audit record to a destination endpoint for every
 * exchange lifecycle event it is enabled for.
 *
 * `created` and `sending` exchange events also stamp a fresh dispatch id on the
 * exchange. The host does not tell apart repeated sends of one exchange
 * to the same endpoint; when they overlap, the dispatch id is what lets
 * a consumer match each `sent` back to its `sending`.
 */
export class AuditEventNotifier implements EventNotifier {
  private readonly log: Logger;
  private readonly isEnabledFor: EventFilter;
  private readonly buildPayload: (audit: AuditEvent) => unknown;
  private readonly buildAuditEvent: (event: ExchangeEvent) => AuditEvent;

  private context: EndpointResolver | undefined;
  private endpoint: Endpoint | undefined;
  private readonly endpointUri: string | undefined;
  private producer: Producer | null = null;
  private state: ServiceStatus = 'stopped';

  constructor(options: AuditEventNotifierOptions) {
    this.log = options.log;
    this.isEnabledFor = options.strategies.isEnabledFor;
    this.buildPayload = options.strategies.createPayload ?? ((audit) => audit);
    this.buildAuditEvent = options.strategies.createAuditEvent ?? createAuditEvent;
    this.context = options.context;
    this.endpoint = options.endpoint;
    this.endpointUri = options.endpointUri;
  }

  get status(): ServiceStatus {
    return this.state;
  }

  isStarted(): boolean {
    return this.state === 'started';
  }

  /** URI of the configured destination, credentials masked. */
  get destination(): string | null {
    const uri = this.endpoint?.uri ?? this.endpointUri;
    return uri ? sanitizeUri(uri) : null;
  }

  bindContext(context: EndpointResolver): void {
    this.context ??= context;
  }

  isEnabled(event: NotifierEvent): boolean {
    return this.isEnabledFor(event.type === 'audit' ? event.event : event);
  }

  async notify(event: NotifierEvent): Promise<void> {
    const resolved = this.resolve(event);
    if (!resolved) {
      this.log.debug(
        { eventType: event.type },
        'Ignoring event: neither an exchange event nor an audit event',
      );
      return;
    }

    const { exchangeEvent } = resolved;
    const { exchange } = exchangeEvent;

    if (!this.isEnabledFor(exchangeEvent)) {
      this.log.debug(
        { kind: exchangeEvent.kind, exchange_id: exchange.exchangeId },
        'Event filtered out',
      );
      return;
    }

    // Only events raised by the host start a dispatch; a pre-built audit event is forwarded as is.
    if (event.type === 'exchange' && startsDispatch(exchangeEvent.kind)) {
      exchange.setProperty(ExchangeProperty.DISPATCH_ID, exchange.uuidGenerator.generateUuid());
    }

    const producer = this.producer;
    if (!this.isStarted() || !producer) {
      this.log.debug(
        { kind: exchangeEvent.kind, exchange_id: exchange.exchangeId },
        'Cannot publish event as notifier is not started',
      );
      return;
    }

    if (!this.context?.isStarted()) {
      this.log.debug(
        { kind: exchangeEvent.kind, exchange_id: exchange.exchangeId },
        'Cannot publish event as context is not started',
      );
      return;
    }

    // Built lazily so the payload sees the dispatch id set above.
    const auditEvent = resolved.auditEvent ?? this.buildAuditEvent(exchangeEvent);

    const carrier = producer.createExchange();
    carrier.in.body = this.buildPayload(auditEvent);

    await withSuppressedNotifications(carrier, (c) => producer.process(c));

    this.log.debug(
      { kind: exchangeEvent.kind, exchange_id: exchange.exchangeId, destination: producer.endpointUri },
      'Audit event published',
    );
  }

  async start(): Promise<void> {
    if (this.state === 'started') return;

    const context = this.context;
    if (!context) {
      throw new ConfigurationError('context must be configured');
    }

    this.state = 'starting';
    try {
      const endpoint = this.resolveEndpoint(context);
      const producer = endpoint.createProducer();
      await producer.start();

      this.endpoint = endpoint;
      this.producer = producer;
      this.state = 'started';
    } catch (err: unknown) {
      this.state = 'stopped';
      throw err;
    }

    this.log.info({ destination: this.destination }, 'Audit event notifier started');
  }

  async stop(): Promise<void> {
    if (this.state === 'stopped') return;

    this.state = 'stopping';
    const producer = this.producer;
    this.producer = null;
    try {
      await producer?.stop();
    } finally {
      this.state = 'stopped';
    }

    this.log.info({ destination: this.destination }, 'Audit event notifier stopped');
  }

  describe(): string {
    return `AuditEventNotifier[${this.destination ?? ''}]`;
  }

  toString(): string {
    return this.describe();
  }

  private resolve(
    event: NotifierEvent,
  ): { exchangeEvent: ExchangeEvent; auditEvent: AuditEvent | null } | null {
    switch (event.type) {
      case 'audit':
        return { exchangeEvent: event.event, auditEvent: event };
      case 'exchange':
        return { exchangeEvent: event, auditEvent: null };
      default:
        return null;
    }
  }

  private resolveEndpoint(context: EndpointResolver): Endpoint {
    if (this.endpoint) return this.endpoint;
    if (this.endpointUri) return context.getEndpoint(this.endpointUri);
    throw new ConfigurationError('Either endpoint or endpointUri must be configured');
  }
}
