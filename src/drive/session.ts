// Build the per-process Drive session from configuration.

import type { BaseLogger } from 'pino';

import type { ExecutionContext } from './context.js';
import type { DriveSession } from './drive.js';
import type { Config } from '../config/index.js';
import { createLogger } from '../logger.js';
import { createStorageFactory } from '../storage/index.js';

export interface CreateDriveSessionOptions {
  context: ExecutionContext;
  /** Defaults to a pino logger built from `config.logging` */
  logger?: BaseLogger;
}

export function createDriveSession(config: Config, options: CreateDriveSessionOptions): DriveSession {
  return {
    storage: createStorageFactory(config.storage),
    context: options.context,
    logger: options.logger ?? createLogger(config.logging),
    pollIntervalMs: config.drive.pollIntervalMs,
  };
}
