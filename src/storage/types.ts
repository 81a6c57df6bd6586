// Storage backend contract consumed by the Drive.
//
// A backend is scoped to one drive identity and partitions it into namespaces,
// one per writing component. Visibility is eventual: a path written by one
// process shows up for others once the backend makes it so, hence the polling
// get on the Drive side.

import type { DriveIdentity } from '../drive/identity.js';

export interface StorageEntry {
  /** Component namespace holding the entry */
  namespace: string;
  /** Path relative to the namespace root, POSIX separators */
  path: string;
}

export type EntryKind = 'file' | 'directory';

export interface StorageBackend {
  /** Copy a local file or directory tree into `namespace` at `relativePath`, replacing any previous copy */
  put(localPath: string, namespace: string, relativePath: string): Promise<void>;

  /** Copy `relativePath` from `namespace` to `localPath`; throws StorageNotFoundError when absent */
  get(namespace: string, relativePath: string, localPath: string): Promise<void>;

  /**
   * List entries under `prefix`: direct children for a directory, the entry
   * itself for a file, nothing when absent. `null` lists every namespace.
   */
  list(namespace: string | null, prefix: string): Promise<StorageEntry[]>;

  /** Remove a file or directory tree; throws StorageNotFoundError when absent */
  delete(namespace: string, relativePath: string): Promise<void>;

  exists(namespace: string, relativePath: string): Promise<boolean>;

  /** Namespaces currently present in the drive, sorted */
  namespaces(): Promise<string[]>;

  /** Health check -- returns true if the backend is operational */
  healthy(): Promise<boolean>;
}

/** Derives the backend of a drive. Called once per Drive handle. */
export type StorageFactory = (identity: DriveIdentity) => StorageBackend;
