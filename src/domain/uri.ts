/**
 * Endpoint URI helpers.
 *
 * Endpoint URIs look like `scheme:path?key=value&...` with an optional
 * `//` after the colon (`log:audit`, `redis-stream://audit_events?maxlen=1000`).
 */

export interface EndpointUriParts {
  readonly scheme: string;
  readonly path: string;
  readonly params: Readonly<Record<string, string>>;
}

const URI_PATTERN = /^([a-z][a-z0-9+.-]*):(?:\/\/)?([^?]*)(?:\?(.*))?$/i;

const SENSITIVE_PARAM_PATTERNS: readonly RegExp[] = [
  /^pass(word|wd|phrase)?$/i,
  /^secret$/i,
  /^token$/i,
  /^access[_-]?token$/i,
  /^api[_-]?key$/i,
  /_(password|secret|token)$/i,
];

const MASK = 'xxxxxx';

/**
 * Splits an endpoint URI into scheme, path and query params.
 * Returns `null` when the URI has no scheme or no path.
 */
export function parseEndpointUri(uri: string): EndpointUriParts | null {
  const match = URI_PATTERN.exec(uri.trim());
  if (!match) return null;

  const scheme = (match[1] ?? '').toLowerCase();
  const path = match[2] ?? '';
  if (path === '') return null;

  const params: Record<string, string> = {};
  for (const [key, value] of new URLSearchParams(match[3] ?? '')) {
    params[key] = value;
  }

  return { scheme, path, params };
}

function isSensitiveParam(name: string): boolean {
  return SENSITIVE_PARAM_PATTERNS.some((pattern) => pattern.test(name));
}

/**
 * Masks credentials in a URI for logs and `describe()` output:
 * the password part of `user:password@` and any sensitive query param.
 */
export function sanitizeUri(uri: string): string {
  const withoutUserInfo = uri.replace(/(\/\/[^:/?#@]+):[^@/?#]*@/, `$1:${MASK}@`);

  return withoutUserInfo.replace(
    /([?&])([^=&#]+)=([^&#]*)/g,
    (whole: string, sep: string, key: string) =>
      isSensitiveParam(key) ? `${sep}${key}=${MASK}` : whole,
  );
}
