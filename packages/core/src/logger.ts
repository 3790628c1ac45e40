/**
 * @module logger
 * Shared pino logger. The level comes from `BRUSHTEX_LOG_LEVEL`, then
 * `LOG_LEVEL`, and defaults to `info`.
 */

import pino, { type Logger } from 'pino';

export type { Logger };

const rootLogger = pino({
  name: 'brushtex',
  level: process.env.BRUSHTEX_LOG_LEVEL ?? process.env.LOG_LEVEL ?? 'info',
  timestamp: pino.stdTimeFunctions.isoTime,
});

/** Create a child logger tagged with a module name. */
export function createLogger(module: string): Logger {
  return rootLogger.child({ module });
}
