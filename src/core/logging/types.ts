import type { Logger as PinoLogger } from 'pino';

/**
 * pino's Logger, used directly rather than wrapped.
 *
 * Data-first calls:
 *   logger.debug({ hash }, 'meta resolved');
 *   logger.warn({ err }, 'resolver failed');
 */
export type Logger = PinoLogger;

export interface ILoggerFactory {
  /** Child logger tagged with `component`. */
  create(component: string): Logger;

  readonly root: Logger;
}

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function parseLogLevel(raw: string | undefined): LogLevel {
  const level = raw?.toLowerCase();
  return LOG_LEVELS.find((l) => l === level) ?? 'silent';
}
