/**
 * Logger factory.
 *
 * Components take an optional `logger` dependency and fall back to the
 * module logger below.
 */

import { pino } from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export type { Logger };

/**
 * Logger options.
 */
export interface LoggerOptions {
  /** Logger name (appears as `name` on every line) */
  name?: string;

  /** Minimum level; defaults to LOG_LEVEL or 'info' */
  level?: LevelWithSilent;
}

/**
 * Create a pino logger.
 *
 * @param options - Name and level overrides
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'code-digest',
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
  });
}

/**
 * Default module logger.
 */
export const logger: Logger = createLogger();
