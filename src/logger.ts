import pino, { type Logger } from 'pino';

export const LOGGER_NAME = 'afix-constraint-codec';

export type { Logger };

export function createLogger(level: string = 'warn'): Logger {
  return pino({ name: LOGGER_NAME, level });
}
