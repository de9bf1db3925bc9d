import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export type Env = Record<string, string | undefined>;

/** "true"/"false" style flags. */
export const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

/**
 * Parse and validate environment variables against a zod schema.
 * Empty values count as unset. Throws ConfigurationError listing every invalid variable.
 */
export function parseEnv<S extends z.ZodTypeAny>(schema: S, env: Env): z.infer<S> {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );
  const result = schema.safeParse(present);
  if (result.success) {
    return result.data;
  }
  const messages = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).filter(Boolean);
  throw new ConfigurationError(`Invalid environment: ${messages.join('; ') || 'unknown error'}`);
}
