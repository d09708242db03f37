import { z } from 'zod';

/**
 * Zod schema for an exchange submitted over HTTP.
 *
 * `endpoint_uri` is resolved by the routing context; an unknown scheme
 * is reported separately from schema failures.
 */
export const sendExchangeSchema = z.object({
  endpoint_uri: z.string().min(1).max(2048),
  body: z.unknown(),
  headers: z.record(z.string(), z.unknown()).default({}),
});

export type SendExchangeInput = z.infer<typeof sendExchangeSchema>;
