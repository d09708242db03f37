import { z } from 'zod';
import { EXCHANGE_EVENT_KINDS } from '../domain/index.js';

/** Comma-separated list; blanks are dropped, so an unset var is an empty list. */
const csv = z
  .string()
  .optional()
  .transform((raw) => (raw ?? '').split(',').map((item) => item.trim()).filter((item) => item.length > 0));

const patternList = csv.transform((patterns, ctx) => {
  const compiled: RegExp[] = [];
  for (const pattern of patterns) {
    try {
      compiled.push(new RegExp(pattern));
    } catch (err: unknown) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid pattern "${pattern}": ${err instanceof Error ? err.message : String(err)}`,
      });
      return z.NEVER;
    }
  }
  return compiled;
});

/**
 * Zod schema for the process environment.
 *
 * - `AUDIT_EVENT_KINDS` empty or unset means every lifecycle kind.
 * - Endpoint patterns are regular expressions matched against endpoint URIs.
 */
export const notifierEnvSchema = z.object({
  AUDIT_ENDPOINT_URI: z.string().min(1).default('redis-stream:audit_events'),
  AUDIT_EVENT_KINDS: csv.pipe(z.array(z.enum(EXCHANGE_EVENT_KINDS))),
  AUDIT_INCLUDE_ENDPOINTS: patternList,
  AUDIT_EXCLUDE_ENDPOINTS: patternList,
  REDIS_URL: z.string().url().default('redis://localhost:6379'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type NotifierEnv = z.infer<typeof notifierEnvSchema>;
