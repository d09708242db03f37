import type { Exchange } from './exchange.js';

/**
 * Host event model.
 *
 * The host decides the variant once, when it raises the event, so
 * listeners switch on `type` / `kind` instead of probing the object.
 */

export const EXCHANGE_EVENT_KINDS = [
  'created',
  'sending',
  'sent',
  'failed',
  'failure_handled',
] as const;

export type ExchangeEventKind = (typeof EXCHANGE_EVENT_KINDS)[number];

export interface ExchangeEvent {
  readonly type: 'exchange';
  readonly kind: ExchangeEventKind;
  readonly exchange: Exchange;
  /** Destination being sent to; absent for `created`. */
  readonly endpointUri?: string;
  readonly timestamp: string; // ISO-8601
  /** Only on `sent`. */
  readonly timeTakenMs?: number;
  /** Only on `failed` / `failure_handled`. */
  readonly error?: Error;
}

export type ContextEventKind = 'starting' | 'started' | 'stopping' | 'stopped';

export interface ContextEvent {
  readonly type: 'context';
  readonly kind: ContextEventKind;
  readonly timestamp: string;
}

/**
 * An exchange event wrapped for auditing.
 *
 * Frozen on creation. A fresh one is built for every notification.
 */
export interface AuditEvent {
  readonly type: 'audit';
  readonly eventId: string;
  readonly exchange: Exchange;
  readonly event: ExchangeEvent;
  readonly createdAt: string;
}

export type HostEvent = ExchangeEvent | ContextEvent;

/** Anything a notifier can be handed. */
export type NotifierEvent = HostEvent | AuditEvent;

/** `created` and `sending` start a new dispatch and get a fresh dispatch id. */
export function startsDispatch(kind: ExchangeEventKind): boolean {
  return kind === 'created' || kind === 'sending';
}

export function createAuditEvent(event: ExchangeEvent): AuditEvent {
  return Object.freeze({
    type: 'audit',
    eventId: event.exchange.uuidGenerator.generateUuid(),
    exchange: event.exchange,
    event,
    createdAt: new Date().toISOString(),
  });
}
