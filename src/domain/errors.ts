/**
 * Error classes raised by the notifier and its host.
 *
 * Each carries a machine-readable `code` so callers (and HTTP routes)
 * can branch without matching on messages.
 */

export const ErrorCodes = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  RESOLVE_ENDPOINT_ERROR: 'RESOLVE_ENDPOINT_ERROR',
  ILLEGAL_STATE: 'ILLEGAL_STATE',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  constructor(
    message: string,
    code: ErrorCode,
    details?: unknown,
    options?: { cause?: unknown },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;
  }
}

/** Missing or invalid configuration. Fatal at startup. */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.CONFIGURATION_ERROR, details);
  }
}

export class ResolveEndpointError extends AppError {
  public readonly uri: string;

  constructor(uri: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to resolve endpoint: ${uri} (${reason})`, ErrorCodes.RESOLVE_ENDPOINT_ERROR, undefined, options);
    this.uri = uri;
  }
}

export class IllegalStateError extends AppError {
  constructor(message: string) {
    super(message, ErrorCodes.ILLEGAL_STATE);
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
