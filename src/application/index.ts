export { AuditEventNotifier } from './audit-event-notifier.js';
export type { NotifierStrategies, ServiceStatus } from './audit-event-notifier.js';
export {
  acquireSuppression,
  withSuppressedNotifications,
  isNotificationSuppressed,
} from './suppression-guard.js';
export { allEvents, eventKinds, endpointPatterns, allOf } from './event-filters.js';
export type { EventFilter } from './event-filters.js';
export { toAuditRecord } from './audit-record.js';
export { notifierEnvSchema } from './config-schema.js';
export { sendExchangeSchema } from './exchange-schema.js';
