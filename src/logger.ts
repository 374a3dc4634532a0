/**
 * Console-backed logging with a minimum level.
 *
 * Lines go to stderr so that stdout stays free for command output.
 */

import { format } from 'node:util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/** Where formatted lines are written. */
export type LogSink = (line: string) => void;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Create a named logger.
 *
 * Each line reads `{ISO time} - {name} - {LEVEL} - {message}`, with
 * `%s`-style placeholders in `message` filled from `args`.
 */
export function createLogger(
  name: string,
  level: LogLevel = 'warn',
  sink: LogSink = (line) => console.error(line),
  clock: () => Date = () => new Date(),
): Logger {
  const threshold = LEVEL_RANK[level];

  const emit =
    (lineLevel: LogLevel) =>
    (message: string, ...args: unknown[]): void => {
      if (LEVEL_RANK[lineLevel] < threshold) return;
      const text = format(message, ...args);
      sink(`${clock().toISOString()} - ${name} - ${lineLevel.toUpperCase()} - ${text}`);
    };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}

/** Logger that drops everything; the default for library classes. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
