import type { Logger } from 'pino';
import { ConfigurationError, EXCHANGE_EVENT_KINDS } from '../../domain/index.js';
import type { ExchangeEventKind } from '../../domain/index.js';
import {
  AuditEventNotifier,
  allOf,
  endpointPatterns,
  eventKinds,
  notifierEnvSchema,
  toAuditRecord,
} from '../../application/index.js';

export interface NotifierConfig {
  endpointUri: string;
  eventKinds: ExchangeEventKind[];
  includeEndpoints: RegExp[];
  excludeEndpoints: RegExp[];
  redisUrl: string;
  host: string;
  port: number;
  logLevel: string;
}

/**
 * Loads notifier configuration from environment variables.
 *
 * Unset variables take their schema defaults. Invalid values raise a
 * ConfigurationError carrying the zod issues, so startup aborts.
 */
export function loadNotifierConfig(env: NodeJS.ProcessEnv = process.env): NotifierConfig {
  const parsed = notifierEnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigurationError('Invalid notifier configuration', parsed.error.issues);
  }

  const data = parsed.data;
  return {
    endpointUri: data.AUDIT_ENDPOINT_URI,
    eventKinds: data.AUDIT_EVENT_KINDS.length > 0 ? data.AUDIT_EVENT_KINDS : [...EXCHANGE_EVENT_KINDS],
    includeEndpoints: data.AUDIT_INCLUDE_ENDPOINTS,
    excludeEndpoints: data.AUDIT_EXCLUDE_ENDPOINTS,
    redisUrl: data.REDIS_URL,
    host: data.HOST,
    port: data.PORT,
    logLevel: data.LOG_LEVEL,
  };
}

/**
 * Builds the notifier described by `config`: kind and endpoint filters,
 * flat audit records as payload. The context is bound when the notifier
 * is added to one.
 */
export function createConfiguredNotifier(config: NotifierConfig, log: Logger): AuditEventNotifier {
  return new AuditEventNotifier({
    log: log.child({ component: 'audit-notifier' }),
    endpointUri: config.endpointUri,
    strategies: {
      isEnabledFor: allOf(
        eventKinds(config.eventKinds),
        endpointPatterns({ include: config.includeEndpoints, exclude: config.excludeEndpoints }),
      ),
      createPayload: toAuditRecord,
    },
  });
}
