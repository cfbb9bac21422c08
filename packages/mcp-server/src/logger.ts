/**
 * pino logger writing JSON to stderr. stdout belongs to the stdio
 * transport, so nothing else may write there.
 */

import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export type { Logger };

function createPinoOptions(level: LogLevel): pino.LoggerOptions {
  return {
    name: 'dss-mcp',
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    messageKey: 'message',
    formatters: {
      level(label) {
        return { level: label };
      },
    },
  };
}

export interface LoggerOptions {
  level: LogLevel;
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions): Logger {
  if (options.pretty) {
    return pino(
      createPinoOptions(options.level),
      pino.transport({ target: 'pino-pretty', options: { colorize: true, destination: 2 } }),
    );
  }
  return pino(createPinoOptions(options.level), pino.destination(2));
}

/** Test helper: a logger writing to a custom destination */
export function createLoggerWithDestination(destination: DestinationStream, level: LogLevel = 'debug'): Logger {
  return pino(createPinoOptions(level), destination);
}
