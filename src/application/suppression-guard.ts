import { ExchangeProperty } from '../domain/index.js';
import type { Exchange } from '../domain/index.js';

/**
 * Scoped hold on the `NotifyEvent` marker of a carrier exchange.
 *
 * While held, the host skips lifecycle events for the carrier, so
 * publishing an audit record never produces further audit records.
 * `release()` puts back whatever was there before (or removes the
 * marker if nothing was) and is safe to call more than once.
 */
export interface SuppressionGuard {
  readonly exchange: Exchange;
  release(): void;
}

export function acquireSuppression(exchange: Exchange): SuppressionGuard {
  const hadPrior = exchange.hasProperty(ExchangeProperty.NOTIFY_EVENT);
  const prior = exchange.getProperty(ExchangeProperty.NOTIFY_EVENT);
  let released = false;

  exchange.setProperty(ExchangeProperty.NOTIFY_EVENT, true);

  return {
    exchange,
    release(): void {
      if (released) return;
      released = true;
      if (hadPrior) {
        exchange.setProperty(ExchangeProperty.NOTIFY_EVENT, prior);
      } else {
        exchange.removeProperty(ExchangeProperty.NOTIFY_EVENT);
      }
    },
  };
}

/**
 * Runs `fn` with notifications suppressed on `exchange`.
 * The guard is released on every exit path; errors from `fn` propagate.
 */
export async function withSuppressedNotifications<T>(
  exchange: Exchange,
  fn: (exchange: Exchange) => Promise<T>,
): Promise<T> {
  const guard = acquireSuppression(exchange);
  try {
    return await fn(exchange);
  } finally {
    guard.release();
  }
}

export function isNotificationSuppressed(exchange: Exchange): boolean {
  return exchange.getProperty(ExchangeProperty.NOTIFY_EVENT) === true;
}
