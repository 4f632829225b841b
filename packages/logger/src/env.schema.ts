import { z } from 'zod';

import { initLogger, LOG_LEVELS, type LogLevel, type Sink } from './logger.js';
import { ConsoleSink } from './sinks/console.js';

const booleanFlag = z
  .enum(['true', 'false'], { message: 'Expected "true" or "false"' })
  .default('false')
  .transform((val) => val === 'true');

export const loggerEnvSchema = z.object({
  MINORUNIT_LOG_COLOR: booleanFlag,
  MINORUNIT_LOG_CONSOLE: booleanFlag,
  MINORUNIT_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .refine((val): val is LogLevel => (LOG_LEVELS as readonly string[]).includes(val), {
      message: `Invalid log level, expected one of: ${LOG_LEVELS.join(', ')}`,
    })
    .default('info'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

/**
 * Validates the logger environment variables.
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
 * Initialise the global logger from environment variables.
 * Returns the validated configuration that was applied.
 */
export function initLoggerFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const config = validateLoggerEnv(env);
  const sinks: Sink[] = config.MINORUNIT_LOG_CONSOLE ? [new ConsoleSink({ color: config.MINORUNIT_LOG_COLOR })] : [];

  initLogger({ level: config.MINORUNIT_LOG_LEVEL, sinks });
  return config;
}
