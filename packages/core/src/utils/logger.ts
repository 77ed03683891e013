import { pino, type Logger } from 'pino';

export type { Logger } from 'pino';

/** Logger used when a component is constructed without one. */
export function createLogger(name: string): Logger {
  return pino({ name, level: process.env['LOG_LEVEL'] ?? 'info' });
}
