import pino, { stdTimeFunctions } from 'pino';
import type { Logger, LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export const createLoggerOptions = (level: string): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

/** Writes synchronously to stderr; stdout is reserved for command output. */
export function createStderrLogger(level: string): Logger {
  return pino(createLoggerOptions(level), pino.destination({ dest: 2, sync: true }));
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
