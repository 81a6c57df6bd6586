import { randomUUID } from 'node:crypto';

import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { FastifyInstance } from 'fastify';
import fastify from 'fastify';
import {
  jsonSchemaTransform,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';

import type { Config } from './config/index.js';
import { buildLoggerOptions } from './logger.js';
import { errorHandlerPlugin } from './plugins/error-handler.js';
import { requestLoggerPlugin } from './plugins/request-logger.js';
import { drivesRoutesPlugin } from './routes/drives.js';
import { healthRoutesPlugin } from './routes/health.js';
import { FsStorage } from './storage/fs-backend.js';

// Import types to ensure augmentation is loaded
import './types/index.js';

export interface CreateServerOptions {
  config: Config;
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const { config } = options;
  const isDev = config.env === 'development';

  const server = fastify({
    logger: buildLoggerOptions(config.logging),
    // Request ID handling
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
    // Disable default request logging (we use custom plugin)
    disableRequestLogging: true,
    // JSON bodies are small; file bodies get their own limit in the drive routes
    bodyLimit: 51200,
  });

  // Zod type provider compilers (enables Zod schemas in route schema declarations)
  server.setValidatorCompiler(validatorCompiler);
  server.setSerializerCompiler(serializerCompiler);

  // Decorate server with config for access in routes
  server.decorate('config', config);

  // Security headers
  await server.register(helmet, {
    global: true,
    contentSecurityPolicy: isDev ? false : undefined,
  });

  // Rate limiting
  await server.register(rateLimit, {
    max: config.rateLimit.global,
    timeWindow: config.rateLimit.windowMs,
  });

  // Custom plugins
  await server.register(errorHandlerPlugin, { isDev });
  await server.register(requestLoggerPlugin, { isDev });

  // ---- OpenAPI documentation ----
  await server.register(swagger, {
    openapi: {
      openapi: '3.0.3',
      info: {
        title: 'Shared Drive storage server',
        description:
          'Namespaced file storage shared by worker processes through the Drive HTTP backend.',
        version: '1.0.0',
      },
      servers: [{ url: 'http://localhost:3000', description: 'Development' }],
      tags: [
        { name: 'Health', description: 'Server health' },
        { name: 'Drive', description: 'Drive namespaces, listings, downloads and uploads' },
      ],
    },
    transform: jsonSchemaTransform,
  });

  await server.register(swaggerUi, {
    routePrefix: '/docs',
  });

  // ---- Storage layer initialization ----
  const storage = new FsStorage(config.storage.fs.dataDir);
  await storage.clearUploads();
  server.decorate('storage', storage);
  server.log.info({ dataDir: config.storage.fs.dataDir }, 'Storage layer initialized');

  // Routes
  await server.register(healthRoutesPlugin);
  await server.register(drivesRoutesPlugin);

  return server;
}
