import { ExchangeProperty } from '../domain/index.js';
import type { AuditEvent, ExchangeEventKind, MessageHeaders } from '../domain/index.js';

/**
 * JSON-safe projection of an audit event.
 *
 * Audit events hold live exchange objects; destinations that serialize
 * (Redis, logs) get this flat record instead.
 */
export interface AuditRecord {
  event_id: string;
  kind: ExchangeEventKind;
  exchange_id: string;
  dispatch_id: string | null;
  endpoint_uri: string | null;
  timestamp: string;
  created_at: string;
  time_taken_ms: number | null;
  error: { name: string; message: string } | null;
  headers: MessageHeaders;
  body: unknown;
}

export function toAuditRecord(audit: AuditEvent): AuditRecord {
  const { event, exchange } = audit;
  const dispatchId = exchange.getProperty(ExchangeProperty.DISPATCH_ID);

  return {
    event_id: audit.eventId,
    kind: event.kind,
    exchange_id: exchange.exchangeId,
    dispatch_id: typeof dispatchId === 'string' ? dispatchId : null,
    endpoint_uri: event.endpointUri ?? null,
    timestamp: event.timestamp,
    created_at: audit.createdAt,
    time_taken_ms: event.timeTakenMs ?? null,
    error: event.error ? { name: event.error.name, message: event.error.message } : null,
    headers: { ...exchange.in.headers },
    body: exchange.in.body,
  };
}
