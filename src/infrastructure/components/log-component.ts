import type { Logger } from 'pino';
import { ResolveEndpointError } from '../../domain/index.js';
import type { Exchange, UuidGenerator } from '../../domain/index.js';
import { DefaultEndpoint, DefaultProducer } from '../host/default-producer.js';
import type { Component } from '../host/default-producer.js';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;
type LogEndpointLevel = (typeof LOG_LEVELS)[number];

function isLogEndpointLevel(value: string): value is LogEndpointLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Writes each exchange body to a child logger named after the endpoint path. */
export class LogProducer extends DefaultProducer {
  private readonly log: Logger;
  private readonly level: LogEndpointLevel;

  constructor(endpointUri: string, uuidGenerator: UuidGenerator, log: Logger, level: LogEndpointLevel) {
    super(endpointUri, uuidGenerator);
    this.log = log;
    this.level = level;
  }

  async process(exchange: Exchange): Promise<void> {
    this.log[this.level](
      { exchange_id: exchange.exchangeId, headers: exchange.in.headers, body: exchange.in.body },
      'Exchange received',
    );
  }
}

/**
 * `log:<name>[?level=info]`
 *
 * Mostly useful as an audit destination during local development.
 */
export function createLogComponent(log: Logger): Component {
  return ({ uri, parts, uuidGenerator }) => {
    const level = parts.params['level'] ?? 'info';
    if (!isLogEndpointLevel(level)) {
      throw new ResolveEndpointError(uri, `unsupported log level "${level}"`);
    }

    const child = log.child({ endpoint: parts.path });
    return new DefaultEndpoint(uri, () => new LogProducer(uri, uuidGenerator, child, level));
  };
}
