import pino from 'pino';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { parseLogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Root logger: JSON lines on stderr (fd 2), ISO timestamps, secrets redacted.
 * stdout stays free for callers that print meta or hex to it.
 */
export function createRootLogger(level: LogLevel): Logger {
  return pino(
    {
      level,
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Component logger factory. The container passes the configured level;
 * constructed bare, it reads RAINMETA_LOG_LEVEL (default silent).
 */
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(level: LogLevel = parseLogLevel(process.env['RAINMETA_LOG_LEVEL'])) {
    this._root = createRootLogger(level);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
