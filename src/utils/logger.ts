/**
 * Application logger (pino)
 */

import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { env } from '../config/env.js';

function createLogger(): Logger {
  const options: LoggerOptions = {
    level: env.LOG_LEVEL,
    base: { service: 'newsroom-crawler' },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (env.LOG_FILE) {
    return pino(options, pino.destination({ dest: env.LOG_FILE, mkdir: true, sync: false }));
  }

  if (env.NODE_ENV === 'development') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
        },
      },
    });
  }

  return pino(options);
}

export const logger = createLogger();

/**
 * Create a child logger bound to extra context
 */
export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}

export type { Logger };
