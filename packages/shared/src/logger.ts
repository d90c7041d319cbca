import pino, { stdTimeFunctions, type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const createLoggerOptions = (level: LogLevel): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

// Command output owns stdout; diagnostics go to stderr unless a stream is supplied.
export function createLogger(level: LogLevel, destination?: DestinationStream): Logger {
  return pino(createLoggerOptions(level), destination ?? pino.destination(2));
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

export type { Logger };
