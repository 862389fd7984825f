import pino from 'pino';
import { config } from '../config';

const rootLogger = pino({
  level: config.logLevel,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label: string) => ({ level: label.toUpperCase() })
  }
});

/**
 * Child logger with bound context, e.g. `{ sessionId }`, so every line of a
 * conversation turn can be traced back to its session.
 */
export function createLogger(context: Record<string, unknown>): pino.Logger {
  return rootLogger.child(context);
}

export type Logger = pino.Logger;

export const log = rootLogger;
