/**
 * Console Logger
 */

import type { Logger, LogLevel } from './types.js';

export interface ConsoleLoggerOptions {
  debug?: boolean;
}

/**
 * Logger writing `<timestamp> [prefix] LEVEL: message` lines.
 * Debug lines are dropped unless enabled.
 */
export function createConsoleLogger(prefix: string, options: ConsoleLoggerOptions = {}): Logger {
  const debugEnabled = options.debug ?? false;

  const log = (message: string, level: LogLevel): void => {
    const tag = `[${prefix}]`;
    const timestamp = new Date().toISOString();

    switch (level) {
      case 'error':
        console.error(`${timestamp} ${tag} ERROR: ${message}`);
        break;
      case 'warn':
        console.warn(`${timestamp} ${tag} WARN: ${message}`);
        break;
      case 'debug':
        if (debugEnabled) {
          console.log(`${timestamp} ${tag} DEBUG: ${message}`);
        }
        break;
      default:
        console.log(`${timestamp} ${tag} INFO: ${message}`);
    }
  };

  return {
    debug: (message) => log(message, 'debug'),
    info: (message) => log(message, 'info'),
    warn: (message) => log(message, 'warn'),
    error: (message) => log(message, 'error'),
  };
}
