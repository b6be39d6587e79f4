/**
 * Application configuration
 * Reads and validates environment variables once at start-up
 */

import { z } from 'zod';

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const configSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: logLevelSchema.default('info'),
  ALLOWED_ORIGINS: z.string().min(1).default('*'),
  REDIRECT_URL: z.string().url().optional(),
  CACHE_MAX_AGE: z.coerce.number().int().min(0).default(3600),
  MAX_BODY_SIZE: z.coerce.number().int().positive().default(1024 * 1024),
});

export type AppConfig = z.infer<typeof configSchema>;

/**
 * Parse configuration from environment variables
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = configSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  return result.data;
}
