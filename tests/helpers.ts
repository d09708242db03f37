import { vi } from 'vitest';
import type { Logger } from 'pino';
import { ExchangeProperty, ResolveEndpointError } from '../src/domain/index.js';
import type {
  Endpoint,
  EndpointResolver,
  Exchange,
  ExchangeEvent,
  ExchangeEventKind,
  Producer,
  UuidGenerator,
} from '../src/domain/index.js';
import { DefaultEndpoint } from '../src/infrastructure/host/default-producer.js';
import type { Component } from '../src/infrastructure/host/default-producer.js';
import { DefaultExchange } from '../src/infrastructure/host/default-exchange.js';

/** Fixed timestamp for hand-built events. */
export const FIXED_TS = '2026-01-01T00:00:00.000Z';

/** Minimal fake logger; `child()` returns the same fake. */
export function fakeLogger() {
  const log = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockImplementation(() => log);
  return log as unknown as Logger;
}

/** Deterministic ids: `<prefix>-1`, `<prefix>-2`, ... */
export function sequentialUuids(prefix = 'id'): UuidGenerator {
  let counter = 0;
  return {
    generateUuid: () => `${prefix}-${++counter}`,
  };
}

export function makeExchangeEvent(
  kind: ExchangeEventKind,
  exchange: Exchange,
  overrides: Partial<Omit<ExchangeEvent, 'type' | 'kind' | 'exchange'>> = {},
): ExchangeEvent {
  return {
    type: 'exchange',
    kind,
    exchange,
    timestamp: FIXED_TS,
    ...overrides,
  };
}

/**
 * Producer that records what it was asked to send, and the state of the
 * `NotifyEvent` marker at the moment of sending.
 */
export class RecordingProducer implements Producer {
  readonly endpointUri: string;
  readonly processed: Exchange[] = [];
  readonly markerDuringSend: unknown[] = [];
  failWith: Error | null = null;
  started = false;
  startCalls = 0;
  stopCalls = 0;
  private readonly uuids: UuidGenerator;

  constructor(endpointUri = 'mock:audit', uuids: UuidGenerator = sequentialUuids('carrier')) {
    this.endpointUri = endpointUri;
    this.uuids = uuids;
  }

  createExchange(): Exchange {
    return new DefaultExchange(this.uuids);
  }

  async start(): Promise<void> {
    this.started = true;
    this.startCalls++;
  }

  async stop(): Promise<void> {
    this.started = false;
    this.stopCalls++;
  }

  async process(exchange: Exchange): Promise<void> {
    this.markerDuringSend.push(exchange.getProperty(ExchangeProperty.NOTIFY_EVENT));
    this.processed.push(exchange);
    if (this.failWith) throw this.failWith;
  }
}

export function recordingEndpoint(producer: RecordingProducer): Endpoint {
  return new DefaultEndpoint(producer.endpointUri, () => producer);
}

/** Component serving `<scheme>:<name>` from a fixed set of recording producers. */
export function recordingComponent(producers: Record<string, RecordingProducer>): Component {
  return ({ uri, parts }) => {
    const producer = producers[parts.path];
    if (!producer) throw new ResolveEndpointError(uri, 'no such mock');
    return new DefaultEndpoint(uri, () => producer);
  };
}

/** Endpoint resolver with a switchable started flag. */
export class FakeContext implements EndpointResolver {
  started = true;
  readonly endpoints: Map<string, Endpoint> = new Map();
  resolveCalls = 0;

  isStarted(): boolean {
    return this.started;
  }

  getEndpoint(uri: string): Endpoint {
    this.resolveCalls++;
    const endpoint = this.endpoints.get(uri);
    if (!endpoint) throw new ResolveEndpointError(uri, 'unknown endpoint');
    return endpoint;
  }
}
