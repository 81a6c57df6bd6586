// Namespace resolution: which component namespaces of a drive hold a path.

import type { StorageBackend } from '../storage/types.js';

export type Resolution =
  | { kind: 'resolved'; namespace: string }
  | { kind: 'missing' }
  | { kind: 'ambiguous'; namespaces: string[] };

export interface Conflict {
  path: string;
  owner: string;
}

export class NamespaceResolver {
  private readonly backend: StorageBackend;

  constructor(backend: StorageBackend) {
    this.backend = backend;
  }

  /** Namespaces currently holding `path`, in sorted order. */
  async owners(path: string): Promise<string[]> {
    const owners: string[] = [];
    for (const namespace of await this.backend.namespaces()) {
      if (await this.backend.exists(namespace, path)) {
        owners.push(namespace);
      }
    }
    return owners;
  }

  /**
   * First of `paths` already held by a namespace other than `namespace`.
   * Check-then-act: another writer may publish between this check and the put.
   */
  async findConflict(paths: string[], namespace: string): Promise<Conflict | null> {
    const others = (await this.backend.namespaces()).filter((ns) => ns !== namespace);
    for (const path of paths) {
      for (const owner of others) {
        if (await this.backend.exists(owner, path)) {
          return { path, owner };
        }
      }
    }
    return null;
  }

  /**
   * Pick the namespace to read `path` from. A pinned namespace is the only
   * candidate; otherwise every namespace holding the path is.
   */
  async resolve(path: string, pinned?: string): Promise<Resolution> {
    if (pinned !== undefined) {
      return (await this.backend.exists(pinned, path))
        ? { kind: 'resolved', namespace: pinned }
        : { kind: 'missing' };
    }

    const owners = await this.owners(path);
    const [first] = owners;
    if (first === undefined) return { kind: 'missing' };
    if (owners.length > 1) return { kind: 'ambiguous', namespaces: owners };
    return { kind: 'resolved', namespace: first };
  }
}
