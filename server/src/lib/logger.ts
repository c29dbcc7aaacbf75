import pino from 'pino';
import type { Logger } from 'pino';
import { config } from '../config.js';

export const logger = pino({
  level: config.logLevel,
  redact: ['password', '*.password', 'token', '*.token'],
  transport:
    config.nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export type { Logger };
