/**
 * Console-backed ILogger with a level threshold.
 */

import type { ILogger, LogLevel, LogLevelSetting } from '@statenav/contracts';

const LEVEL_ORDER: Record<LogLevelSetting, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const PREFIX = '[statenav]';

export function createConsoleLogger(level: LogLevelSetting = 'info'): ILogger {
  const threshold = LEVEL_ORDER[level];

  const write = (lvl: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[lvl] < threshold) {
      return;
    }
    const line = `${PREFIX} ${message}`;
    const args: unknown[] = meta ? [line, meta] : [line];
    switch (lvl) {
      case 'debug':
        console.debug(...args);
        break;
      case 'info':
        console.info(...args);
        break;
      case 'warn':
        console.warn(...args);
        break;
      case 'error':
        console.error(...args);
        break;
    }
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
  };
}

export const noopLogger: ILogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
