import { z } from 'zod';
import { InvalidConfigurationError } from '../utils/errors.js';

/**
 * Environment variable schema validation using Zod
 */
export const envSchema = z.object({
  // development switches log output to pino-pretty
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),

  // Config file location when --config is not given
  BYTEPROC_CONFIG: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

/**
 * Parse and validate environment variables
 * @param source - Defaults to process.env; results for process.env are cached
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  if (source === process.env && cachedEnv) {
    return cachedEnv;
  }

  const result = envSchema.safeParse(source);

  if (!result.success) {
    throw new InvalidConfigurationError('invalid environment', result.error.format());
  }

  if (source === process.env) {
    cachedEnv = result.data;
  }
  return result.data;
}

/**
 * Get validated environment
 */
export function getEnv(): Env {
  if (!cachedEnv) {
    return parseEnv();
  }
  return cachedEnv;
}
