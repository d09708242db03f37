export { ExchangeProperty } from './exchange.js';
export type {
  Exchange,
  ExchangePropertyKey,
  Message,
  MessageHeaders,
  UuidGenerator,
} from './exchange.js';
export {
  EXCHANGE_EVENT_KINDS,
  startsDispatch,
  createAuditEvent,
} from './events.js';
export type {
  ExchangeEvent,
  ExchangeEventKind,
  ContextEvent,
  ContextEventKind,
  AuditEvent,
  HostEvent,
  NotifierEvent,
} from './events.js';
export type { Service, Producer, Endpoint, EndpointResolver, EventNotifier } from './ports.js';
export {
  AppError,
  ConfigurationError,
  ResolveEndpointError,
  IllegalStateError,
  ErrorCodes,
  toError,
} from './errors.js';
export type { ErrorCode } from './errors.js';
export { parseEndpointUri, sanitizeUri } from './uri.js';
export type { EndpointUriParts } from './uri.js';
