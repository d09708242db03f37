import type { ExchangeEventKind, HostEvent } from '../domain/index.js';

/**
 * Decides per event whether a notifier is interested.
 * Filters are pure and evaluated before the notifier touches the exchange.
 */
export type EventFilter = (event: HostEvent) => boolean;

export function allEvents(): EventFilter {
  return () => true;
}

export function eventKinds(kinds: Iterable<ExchangeEventKind>): EventFilter {
  const accepted = new Set(kinds);
  return (event) => event.type === 'exchange' && accepted.has(event.kind);
}

export interface EndpointPatternOptions {
  include?: readonly RegExp[];
  exclude?: readonly RegExp[];
}

/**
 * Filters exchange events on their endpoint URI.
 *
 * Exclusion wins over inclusion. An event without an endpoint URI
 * (`created`) passes only when no include patterns are set.
 */
export function endpointPatterns(options: EndpointPatternOptions): EventFilter {
  const include = options.include ?? [];
  const exclude = options.exclude ?? [];

  return (event) => {
    if (event.type !== 'exchange') return false;

    const uri = event.endpointUri;
    if (uri === undefined) return include.length === 0;

    if (exclude.some((pattern) => pattern.test(uri))) return false;
    if (include.length === 0) return true;
    return include.some((pattern) => pattern.test(uri));
  };
}

export function allOf(...filters: EventFilter[]): EventFilter {
  return (event) => filters.every((filter) => filter(event));
}
