/**
 * Logger
 *
 * Writes to stderr only; stdout carries the MCP protocol.
 */

import { sanitizeErrorMessage } from './sanitize.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export function createLogger(level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (lineLevel: LogLevel, message: string): void => {
    if (LEVEL_ORDER[lineLevel] < threshold) return;
    console.error(`[${lineLevel.toUpperCase()}] ${sanitizeErrorMessage(message, 2000)}`);
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message, error) => {
      // Only the message of `error` is logged, never the full object
      const suffix = error === undefined ? '' : `: ${sanitizeErrorMessage(error)}`;
      write('error', `${message}${suffix}`);
    },
  };
}

/** Logger that discards everything (tests, library use). */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
