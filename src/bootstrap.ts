// Storage server start-up order: error tracking first, then the Fastify app,
// so failures while plugins register are already reported.

import type { FastifyInstance } from 'fastify';

import type { Config } from './config/index.js';
import { initSentry } from './instrument.js';
import { createLogger } from './logger.js';
import { createServer } from './server.js';

export async function bootstrap(config: Config): Promise<FastifyInstance> {
  initSentry(config.sentry, createLogger(config.logging));
  return createServer({ config });
}
