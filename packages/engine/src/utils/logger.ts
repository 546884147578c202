import { pino, type Logger } from 'pino';

/**
 * Named component logger; level follows LOG_LEVEL
 */
export function createLogger(name: string): Logger {
  return pino({ name, level: process.env.LOG_LEVEL || 'info' });
}
