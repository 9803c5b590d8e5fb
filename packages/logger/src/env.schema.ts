import { z } from 'zod';

import { ConsoleSink } from './sinks/console.js';
import { initLogger, LOG_LEVELS, type LogLevel } from './logger.js';

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((val) => val === 'true');

export const loggerEnvSchema = z.object({
  ADVENT_LOG_COLOR: booleanFlag('false'),
  ADVENT_LOG_ENABLED: booleanFlag('false'),
  ADVENT_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .refine((val): val is LogLevel => LOG_LEVELS.some((level) => level === val), {
      message: `Invalid log level, expected one of: ${LOG_LEVELS.join(', ')}`,
    })
    .default('info'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

/**
 * Validates logger settings from the environment.
 * @throws Error listing every invalid variable
 */
export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const result = loggerEnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
    throw new Error(`Logger environment validation failed:\n${issues}`);
  }
  return result.data;
}

/**
 * Configures the global logger from the environment. Logging stays silent unless
 * `ADVENT_LOG_ENABLED=true`, in which case entries go to a {@link ConsoleSink}.
 */
export function initLoggerFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const config = validateLoggerEnv(env);
  initLogger({
    level: config.ADVENT_LOG_LEVEL,
    sinks: config.ADVENT_LOG_ENABLED ? [new ConsoleSink({ color: config.ADVENT_LOG_COLOR })] : [],
  });
  return config;
}
