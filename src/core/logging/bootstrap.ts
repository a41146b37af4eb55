import type { Logger } from './types.js';
import { parseLogLevel } from './types.js';
import { createRootLogger } from './create-logger.js';

// Loggers for code that runs without the container (library callers building a MetaStore by hand).
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = createRootLogger(parseLogLevel(process.env['RAINMETA_LOG_LEVEL']));
  }
  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
