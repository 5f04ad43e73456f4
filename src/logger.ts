import { pino } from 'pino';
import type { LevelWithSilent, Logger } from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Read a log level from the environment. Unknown or missing values fall back
 * to `silent`: a library stays quiet unless asked.
 */
export function levelFromEnv(value: string | undefined): LevelWithSilent {
  const wanted = value?.trim().toLowerCase();
  return LEVELS.find(level => level === wanted) ?? 'silent';
}

/**
 * Create the default logger. Level comes from STRUCTEXT_LOG_LEVEL unless given.
 */
export function createLogger(level: LevelWithSilent = levelFromEnv(process.env.STRUCTEXT_LOG_LEVEL)): Logger {
  return pino({
    name: 'structext',
    level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/** Shared default; formatters without an injected logger take a child of it */
export const logger = createLogger();
