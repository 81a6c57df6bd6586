// Storage module barrel export and factory function.

import { FsStorage } from './fs-backend.js';
import { HttpBackend } from './http-backend.js';
import type { StorageFactory } from './types.js';

export type { StorageBackend, StorageEntry, StorageFactory, EntryKind } from './types.js';
export { FsBackend, FsStorage } from './fs-backend.js';
export type { StorageTree } from './fs-backend.js';
export { HttpBackend } from './http-backend.js';
export type { HttpBackendOptions } from './http-backend.js';
export { StorageInvalidKeyError, StorageNotFoundError, StorageRateLimitedError, StorageRequestError } from './errors.js';
export { normalizeRelativePath, normalizeEntryPath, assertNamespace, ROOT_PATH } from './keys.js';

export interface StorageConfig {
  backend: 'fs' | 'http';
  fs?: { dataDir: string };
  http?: { baseUrl: string; timeoutMs?: number };
}

/**
 * Create the storage factory selected by configuration.
 * Defaults to a filesystem store under './data/drive' if nothing else is set.
 */
export function createStorageFactory(config: StorageConfig): StorageFactory {
  switch (config.backend) {
    case 'http': {
      const http = config.http ?? { baseUrl: 'http://localhost:3000' };
      return (identity) =>
        new HttpBackend({ baseUrl: http.baseUrl, identity, timeout: http.timeoutMs });
    }
    case 'fs':
    default: {
      const storage = new FsStorage(config.fs?.dataDir ?? './data/drive');
      return (identity) => storage.forDrive(identity);
    }
  }
}
