/**
 * Logger configuration from process environment
 *
 * NODE_ENV selects the environment profile, TESSERA_LOG_LEVEL overrides
 * its minimum level.
 */

import { z } from 'zod';
import type { LoggerConfig } from './types';

const environmentSchema = z.enum(['test', 'development', 'production']);
const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);

const envSchema = z.object({
  NODE_ENV: environmentSchema.optional().catch(undefined),
  TESSERA_LOG_LEVEL: logLevelSchema.optional(),
});

/**
 * Build a LoggerConfig from environment variables.
 *
 * An unrecognised NODE_ENV falls back to 'development'; an unrecognised
 * TESSERA_LOG_LEVEL is rejected.
 */
export function loggerConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): LoggerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid logger environment: ${issue.path.join('.')} ${issue.message}`);
  }

  const config: LoggerConfig = {
    environment: parsed.data.NODE_ENV ?? 'development',
  };
  if (parsed.data.TESSERA_LOG_LEVEL) {
    config.minLevel = parsed.data.TESSERA_LOG_LEVEL;
  }
  return config;
}
