/**
 * Core exchange types for the routing host.
 *
 * An exchange is the unit of work flowing through the host: a message
 * plus a mutable property bag. These types carry no framework dependencies.
 */

/** Well-known exchange property keys. */
export const ExchangeProperty = {
  /** Per-send correlation token set on `created` / `sending`. */
  DISPATCH_ID: 'AuditDispatchId',
  /** Marks an exchange as an event carrier so the host does not audit it again. */
  NOTIFY_EVENT: 'NotifyEvent',
  /** Error recorded on an exchange whose send failed. */
  EXCEPTION_CAUGHT: 'ExceptionCaught',
} as const;

export type ExchangePropertyKey = (typeof ExchangeProperty)[keyof typeof ExchangeProperty];

export type MessageHeaders = Record<string, unknown>;

export interface Message {
  body: unknown;
  readonly headers: MessageHeaders;
}

export interface UuidGenerator {
  generateUuid(): string;
}

export interface Exchange {
  readonly exchangeId: string;
  readonly in: Message;
  readonly uuidGenerator: UuidGenerator;

  getProperty(key: string): unknown;
  setProperty(key: string, value: unknown): void;
  /** Removes the property and returns its previous value, if any. */
  removeProperty(key: string): unknown;
  hasProperty(key: string): boolean;
}
