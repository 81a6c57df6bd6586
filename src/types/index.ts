// Storage server type augmentation

import type { Config } from '../config/index.js';
import type { FsStorage } from '../storage/fs-backend.js';

// Augment Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    storage: FsStorage;
  }
}
