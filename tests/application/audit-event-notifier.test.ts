import { describe, it, expect, beforeEach } from 'vitest';
import { AuditEventNotifier } from '../../src/application/audit-event-notifier.js';
import type { NotifierStrategies } from '../../src/application/index.js';
import { allEvents, eventKinds } from '../../src/application/event-filters.js';
import { toAuditRecord } from '../../src/application/audit-record.js';
import {
  ConfigurationError,
  ExchangeProperty,
  ResolveEndpointError,
  createAuditEvent,
} from '../../src/domain/index.js';
import { DefaultExchange } from '../../src/infrastructure/host/default-exchange.js';
import {
  FIXED_TS,
  FakeContext,
  RecordingProducer,
  fakeLogger,
  makeExchangeEvent,
  recordingEndpoint,
  sequentialUuids,
} from '../helpers.js';

describe('AuditEventNotifier', () => {
  let log: ReturnType<typeof fakeLogger>;
  let context: FakeContext;
  let producer: RecordingProducer;
  let exchange: DefaultExchange;

  function createNotifier(strategies: NotifierStrategies = { isEnabledFor: allEvents() }) {
    return new AuditEventNotifier({ log, context, endpointUri: 'mock:audit', strategies });
  }

  beforeEach(() => {
    log = fakeLogger();
    context = new FakeContext();
    producer = new RecordingProducer('mock:audit');
    context.endpoints.set('mock:audit', recordingEndpoint(producer));
    exchange = new DefaultExchange(sequentialUuids('id'), { order: 42 });
  });

  describe('start', () => {
    it('resolves the endpoint uri through the context and starts the producer', async () => {
      const notifier = createNotifier();

      await notifier.start();

      expect(context.resolveCalls).toBe(1);
      expect(producer.started).toBe(true);
      expect(notifier.status).toBe('started');
    });

    it('uses a directly configured endpoint without resolving', async () => {
      context.endpoints.clear();
      const notifier = new AuditEventNotifier({
        log,
        context,
        endpoint: recordingEndpoint(producer),
        strategies: { isEnabledFor: allEvents() },
      });

      await notifier.start();

      expect(context.resolveCalls).toBe(0);
      expect(producer.started).toBe(true);
    });

    it('fails with a configuration error when no destination is configured', async () => {
      const notifier = new AuditEventNotifier({ log, context, strategies: { isEnabledFor: allEvents() } });

      await expect(notifier.start()).rejects.toThrow(ConfigurationError);
      await expect(notifier.start()).rejects.toThrow('Either endpoint or endpointUri must be configured');
      expect(notifier.status).toBe('stopped');
    });

    it('fails with a configuration error when no context is configured', async () => {
      const notifier = new AuditEventNotifier({
        log,
        endpointUri: 'mock:audit',
        strategies: { isEnabledFor: allEvents() },
      });

      await expect(notifier.start()).rejects.toThrow('context must be configured');
      expect(notifier.status).toBe('stopped');
    });

    it('propagates endpoint resolution failures and stays stopped', async () => {
      const notifier = new AuditEventNotifier({
        log,
        context,
        endpointUri: 'mock:missing',
        strategies: { isEnabledFor: allEvents() },
      });

      await expect(notifier.start()).rejects.toThrow(ResolveEndpointError);
      expect(notifier.status).toBe('stopped');
    });

    it('is a no-op when already started', async () => {
      const notifier = createNotifier();

      await notifier.start();
      await notifier.start();

      expect(producer.startCalls).toBe(1);
    });
  });

  describe('notify', () => {
    it('publishes exactly one audit event for a sending event and stamps a dispatch id', async () => {
      const notifier = createNotifier();
      await notifier.start();
      const event = makeExchangeEvent('sending', exchange, { endpointUri: 'mock:orders' });

      await notifier.notify(event);

      expect(producer.processed).toHaveLength(1);
      // id-1 is the exchange id, id-2 the dispatch id, id-3 the audit event id
      expect(producer.processed[0]?.in.body).toMatchObject({
        type: 'audit',
        eventId: 'id-3',
        event,
        exchange,
      });
      expect(exchange.getProperty(ExchangeProperty.DISPATCH_ID)).toBe('id-2');
    });

    it('generates a new dispatch id on every created or sending event', async () => {
      const notifier = createNotifier();
      await notifier.start();

      await notifier.notify(makeExchangeEvent('created', exchange));
      const first = exchange.getProperty(ExchangeProperty.DISPATCH_ID);
      await notifier.notify(makeExchangeEvent('sending', exchange, { endpointUri: 'mock:orders' }));
      const second = exchange.getProperty(ExchangeProperty.DISPATCH_ID);

      expect(first).toBe('id-2');
      expect(second).toBe('id-4');
    });

    it('does not touch the dispatch id for sent and failed events', async () => {
      const notifier = createNotifier();
      await notifier.start();

      await notifier.notify(makeExchangeEvent('sent', exchange, { endpointUri: 'mock:orders', timeTakenMs: 5 }));
      await notifier.notify(makeExchangeEvent('failed', exchange, { error: new Error('boom') }));

      expect(exchange.hasProperty(ExchangeProperty.DISPATCH_ID)).toBe(false);
      expect(producer.processed).toHaveLength(2);
    });

    it('drops events silently when the notifier is not started', async () => {
      const notifier = createNotifier();

      await expect(notifier.notify(makeExchangeEvent('sending', exchange))).resolves.toBeUndefined();

      expect(producer.processed).toHaveLength(0);
      expect(log.debug).toHaveBeenCalledWith(
        expect.objectContaining({ kind: 'sending', exchange_id: 'id-1' }),
        'Cannot publish event as notifier is not started',
      );
    });

    it('drops events silently when the context is not started', async () => {
      const notifier = createNotifier();
      await notifier.start();
      context.started = false;

      await expect(notifier.notify(makeExchangeEvent('sent', exchange))).resolves.toBeUndefined();

      expect(producer.processed).toHaveLength(0);
      expect(log.debug).toHaveBeenCalledWith(
        expect.objectContaining({ kind: 'sent' }),
        'Cannot publish event as context is not started',
      );
    });

    it('holds the suppression marker during the send and clears it afterwards', async () => {
      const notifier = createNotifier();
      await notifier.start();

      await notifier.notify(makeExchangeEvent('created', exchange));

      expect(producer.markerDuringSend).toEqual([true]);
      expect(producer.processed[0]?.hasProperty(ExchangeProperty.NOTIFY_EVENT)).toBe(false);
    });

    it('clears the suppression marker and propagates the error when the send fails', async () => {
      const notifier = createNotifier();
      await notifier.start();
      producer.failWith = new Error('destination down');

      await expect(notifier.notify(makeExchangeEvent('created', exchange))).rejects.toThrow('destination down');

      expect(producer.markerDuringSend).toEqual([true]);
      expect(producer.processed[0]?.hasProperty(ExchangeProperty.NOTIFY_EVENT)).toBe(false);
    });

    it('evaluates the filter before any side effect', async () => {
      const notifier = createNotifier({ isEnabledFor: () => false });
      await notifier.start();

      await notifier.notify(makeExchangeEvent('sending', exchange));

      expect(producer.processed).toHaveLength(0);
      expect(exchange.hasProperty(ExchangeProperty.DISPATCH_ID)).toBe(false);
    });

    it('ignores context events', async () => {
      const notifier = createNotifier();
      await notifier.start();

      await notifier.notify({ type: 'context', kind: 'started', timestamp: FIXED_TS });

      expect(producer.processed).toHaveLength(0);
      expect(log.debug).toHaveBeenCalledWith(
        { eventType: 'context' },
        'Ignoring event: neither an exchange event nor an audit event',
      );
    });

    it('publishes an already wrapped audit event as is', async () => {
      const notifier = createNotifier();
      await notifier.start();
      const audit = createAuditEvent(makeExchangeEvent('sending', exchange));

      await notifier.notify(audit);

      expect(producer.processed).toHaveLength(1);
      expect(producer.processed[0]?.in.body).toBe(audit);
    });

    it('does not stamp a dispatch id for an already wrapped sending event', async () => {
      const notifier = createNotifier();
      await notifier.start();

      await notifier.notify(createAuditEvent(makeExchangeEvent('sending', exchange)));
      await notifier.notify(createAuditEvent(makeExchangeEvent('created', exchange)));

      expect(exchange.hasProperty(ExchangeProperty.DISPATCH_ID)).toBe(false);
      expect(producer.processed).toHaveLength(2);
    });

    it('uses the payload strategy to build the carrier body', async () => {
      const notifier = createNotifier({ isEnabledFor: allEvents(), createPayload: toAuditRecord });
      await notifier.start();
      exchange.in.headers['tenant'] = 'acme';

      await notifier.notify(makeExchangeEvent('sending', exchange, { endpointUri: 'mock:orders' }));

      expect(producer.processed[0]?.in.body).toEqual({
        event_id: 'id-3',
        kind: 'sending',
        exchange_id: 'id-1',
        dispatch_id: 'id-2',
        endpoint_uri: 'mock:orders',
        timestamp: FIXED_TS,
        created_at: expect.any(String),
        time_taken_ms: null,
        error: null,
        headers: { tenant: 'acme' },
        body: { order: 42 },
      });
    });

    it('uses the audit event strategy when wrapping exchange events', async () => {
      const notifier = createNotifier({
        isEnabledFor: allEvents(),
        createAuditEvent: (event) => ({
          type: 'audit',
          eventId: 'custom',
          exchange: event.exchange,
          event,
          createdAt: FIXED_TS,
        }),
      });
      await notifier.start();

      await notifier.notify(makeExchangeEvent('sent', exchange));

      expect(producer.processed[0]?.in.body).toMatchObject({ eventId: 'custom', createdAt: FIXED_TS });
    });
  });

  describe('isEnabled', () => {
    it('unwraps audit events before asking the filter', () => {
      const notifier = createNotifier({ isEnabledFor: eventKinds(['sent']) });

      expect(notifier.isEnabled(createAuditEvent(makeExchangeEvent('sent', exchange)))).toBe(true);
      expect(notifier.isEnabled(makeExchangeEvent('sending', exchange))).toBe(false);
    });
  });

  describe('stop', () => {
    it('stops the producer and drops later events', async () => {
      const notifier = createNotifier();
      await notifier.start();

      await notifier.stop();
      await notifier.notify(makeExchangeEvent('created', exchange));

      expect(producer.stopCalls).toBe(1);
      expect(notifier.status).toBe('stopped');
      expect(producer.processed).toHaveLength(0);
    });

    it('is a no-op when never started', async () => {
      const notifier = createNotifier();

      await notifier.stop();

      expect(producer.stopCalls).toBe(0);
    });
  });

  describe('describe', () => {
    it('masks credentials in the destination uri', () => {
      const notifier = new AuditEventNotifier({
        log,
        context,
        endpointUri: 'redis-stream:audit?maxlen=10&password=test-secret',
        strategies: { isEnabledFor: allEvents() },
      });

      expect(notifier.describe()).toBe('AuditEventNotifier[redis-stream:audit?maxlen=10&password=xxxxxx]');
    });
  });

  describe('bindContext', () => {
    it('keeps an explicitly configured context', async () => {
      const notifier = createNotifier();
      const other = new FakeContext();

      notifier.bindContext(other);
      await notifier.start();

      expect(context.resolveCalls).toBe(1);
      expect(other.resolveCalls).toBe(0);
    });
  });
});
