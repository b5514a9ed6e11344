/**
 * Logging with Pino
 */

import pino from 'pino';

export type { Logger } from 'pino';

const nodeEnv = process.env.NODE_ENV;

export const logger = pino({
  level: process.env.LOG_LEVEL || (nodeEnv === 'test' ? 'silent' : 'info'),
  transport:
    nodeEnv !== 'production' && nodeEnv !== 'test'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export function createChildLogger(name: string) {
  return logger.child({ module: name });
}
