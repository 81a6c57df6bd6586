// pino logger setup shared by the storage server and worker processes.

import { pino } from 'pino';
import type { Logger, LoggerOptions } from 'pino';

import type { Config } from './config/index.js';

export function buildLoggerOptions(logging: Config['logging']): LoggerOptions {
  return {
    level: logging.level,
    transport: logging.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  };
}

export function createLogger(logging: Config['logging']): Logger {
  return pino(buildLoggerOptions(logging));
}
