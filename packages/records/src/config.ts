/**
 * Engine configuration from environment variables
 *
 * RECORDKIT_ENV        test | development | production (default: development)
 * RECORDKIT_LOG_LEVEL  debug | info | warn | error | fatal (default: per environment)
 */

import { LOG_LEVELS, type Environment, type LogLevel } from '@recordkit/logger';
import { z } from 'zod';
import { ConfigError } from './errors.js';

const envSchema = z.object({
  RECORDKIT_ENV: z.enum(['test', 'development', 'production']).default('development'),
  RECORDKIT_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export interface EngineConfig {
  environment: Environment;
  logLevel?: LogLevel;
}

export function loadEngineConfig(
  env: Record<string, string | undefined> = process.env,
): EngineConfig {
  const parsed = envSchema.safeParse({
    RECORDKIT_ENV: env.RECORDKIT_ENV || undefined,
    RECORDKIT_LOG_LEVEL: env.RECORDKIT_LOG_LEVEL || undefined,
  });

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  return {
    environment: parsed.data.RECORDKIT_ENV,
    logLevel: parsed.data.RECORDKIT_LOG_LEVEL,
  };
}
