import { randomUUID } from 'node:crypto';
import type { Exchange, Message, MessageHeaders, UuidGenerator } from '../../domain/index.js';

export const randomUuidGenerator: UuidGenerator = {
  generateUuid: () => randomUUID(),
};

/** Map-backed exchange used by the in-process host and its producers. */
export class DefaultExchange implements Exchange {
  readonly exchangeId: string;
  readonly in: Message;
  readonly uuidGenerator: UuidGenerator;
  private readonly properties: Map<string, unknown> = new Map();

  constructor(uuidGenerator: UuidGenerator, body: unknown = null, headers: MessageHeaders = {}) {
    this.uuidGenerator = uuidGenerator;
    this.exchangeId = uuidGenerator.generateUuid();
    this.in = { body, headers: { ...headers } };
  }

  getProperty(key: string): unknown {
    return this.properties.get(key);
  }

  setProperty(key: string, value: unknown): void {
    this.properties.set(key, value);
  }

  removeProperty(key: string): unknown {
    const previous = this.properties.get(key);
    this.properties.delete(key);
    return previous;
  }

  hasProperty(key: string): boolean {
    return this.properties.has(key);
  }
}
