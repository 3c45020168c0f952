// src/logger.ts - pino logger for the command-line boundary
import pino, { DestinationStream, Logger } from 'pino';

export interface LoggerOptions {
  level?: string;
  destination?: DestinationStream;
}

/**
 * JSON lines on stderr, so stdout carries nothing but results.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const destination = options.destination ?? pino.destination({ dest: 2, sync: true });
  return pino(
    {
      name: 'exprcalc',
      base: undefined,
      level: options.level ?? process.env.LOG_LEVEL ?? 'warn',
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.epochTime,
    },
    destination
  );
}
