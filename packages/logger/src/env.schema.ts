import { z } from 'zod';

import { initLogger, isLogLevel, type LogLevel, type Sink } from './logger.js';
import { ConsoleSink } from './sinks/console.js';

const flag = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .transform((val: string) => val === 'true');

/** `HttpClient=debug, Other=warn` */
const categoryLevels = z
  .string()
  .default('')
  .transform((val: string, ctx): Record<string, LogLevel> => {
    const levels: Record<string, LogLevel> = {};

    for (const item of val.split(',').map((part) => part.trim())) {
      if (!item) continue;

      const [category, level] = item.split('=').map((part) => part.trim());
      const normalized = level?.toLowerCase();
      if (!category || normalized === undefined || !isLogLevel(normalized)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid category level: ${item}` });
        return z.NEVER;
      }
      levels[category] = normalized;
    }

    return levels;
  });

export const loggerEnvSchema = z.object({
  LOGGER_CATEGORY_LEVELS: categoryLevels,
  LOGGER_CONSOLE_COLOR: flag('false'),
  LOGGER_CONSOLE_ENABLED: flag('false'),
  LOGGER_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .refine(isLogLevel, { message: 'Invalid log level' })
    .default('info'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}

/**
 * Configure the global logger from environment variables.
 * Returns the parsed settings so callers can report them.
 */
export function initLoggerFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const config = validateLoggerEnv(env);
  const sinks: Sink[] = config.LOGGER_CONSOLE_ENABLED ? [new ConsoleSink({ color: config.LOGGER_CONSOLE_COLOR })] : [];

  initLogger({ level: config.LOGGER_LOG_LEVEL, categoryLevels: config.LOGGER_CATEGORY_LEVELS, sinks });
  return config;
}
