import { z } from 'zod';
import { ConfigError } from './errors.js';
import { LOG_LEVELS } from './internal/logger.js';
import type { LogLevel } from './internal/logger.js';

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

/** Settings read from the environment (and `.env`, when the CLI loads it). */
export interface AppConfig {
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse({
    LOG_LEVEL: env.LOG_LEVEL === '' ? undefined : env.LOG_LEVEL?.toLowerCase(),
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`invalid ${issue.path.join('.')}: ${issue.message}`);
  }
  return { logLevel: parsed.data.LOG_LEVEL };
}
