// Filesystem storage backend.
//
// Layout: <dataDir>/<scheme>/<driveId>/<namespace>/<relativePath>.
// Writes are copied into <dataDir>/.staging first and renamed into place, so
// readers never see a half-copied file or tree. Works on any directory every
// worker can reach (local disk, NFS, a mounted bucket).

import { randomUUID } from 'node:crypto';
import { cp, mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';

import { StorageInvalidKeyError, StorageNotFoundError } from './errors.js';
import { assertNamespace, joinRelative, normalizeEntryPath, normalizeRelativePath } from './keys.js';
import { childNames, entryKind, listFilesRecursive } from './local-files.js';
import type { EntryKind, StorageBackend, StorageEntry } from './types.js';
import type { DriveIdentity } from '../drive/identity.js';
import { protocolScheme } from '../drive/identity.js';

export interface StorageTree {
  kind: EntryKind;
  /** Files below the requested path, relative to the namespace root */
  files: string[];
}

export class FsBackend implements StorageBackend {
  private readonly root: string;
  private readonly stagingDir: string;

  constructor(root: string, stagingDir: string) {
    this.root = resolve(root);
    this.stagingDir = resolve(stagingDir);
  }

  async put(localPath: string, namespace: string, relativePath: string): Promise<void> {
    const target = this.locate(namespace, normalizeEntryPath(relativePath));
    const staged = await this.stagingPath();
    try {
      await cp(localPath, staged, { recursive: true });
      await mkdir(dirname(target), { recursive: true });
      await this.replace(staged, target);
    } finally {
      await rm(staged, { recursive: true, force: true });
    }
  }

  async get(namespace: string, relativePath: string, localPath: string): Promise<void> {
    const source = this.locate(namespace, normalizeRelativePath(relativePath));
    if ((await entryKind(source)) === null) {
      throw new StorageNotFoundError(`${namespace}/${relativePath}`);
    }
    await mkdir(dirname(localPath), { recursive: true });
    await cp(source, localPath, { recursive: true });
  }

  async list(namespace: string | null, prefix: string): Promise<StorageEntry[]> {
    const normalized = normalizeRelativePath(prefix);
    const namespaces = namespace === null ? await this.namespaces() : [assertNamespace(namespace)];

    const entries: StorageEntry[] = [];
    for (const ns of namespaces) {
      const location = this.locate(ns, normalized);
      const kind = await entryKind(location);
      if (kind === 'file') {
        entries.push({ namespace: ns, path: normalized });
      } else if (kind === 'directory') {
        for (const name of await childNames(location)) {
          entries.push({ namespace: ns, path: joinRelative(normalized, name) });
        }
      }
    }
    return entries;
  }

  async delete(namespace: string, relativePath: string): Promise<void> {
    const target = this.locate(namespace, normalizeRelativePath(relativePath));
    if ((await entryKind(target)) === null) {
      throw new StorageNotFoundError(`${namespace}/${relativePath}`);
    }
    await rm(target, { recursive: true, force: true });
  }

  async exists(namespace: string, relativePath: string): Promise<boolean> {
    return (await this.kind(namespace, relativePath)) !== null;
  }

  async namespaces(): Promise<string[]> {
    return childNames(this.root, (kind) => kind === 'directory');
  }

  async healthy(): Promise<boolean> {
    try {
      await mkdir(this.root, { recursive: true });
      return true;
    } catch {
      return false;
    }
  }

  async kind(namespace: string, relativePath: string): Promise<EntryKind | null> {
    return entryKind(this.locate(namespace, normalizeRelativePath(relativePath)));
  }

  /** Kind and file list of `relativePath`, or null when absent. */
  async tree(namespace: string, relativePath: string): Promise<StorageTree | null> {
    const normalized = normalizeRelativePath(relativePath);
    const location = this.locate(namespace, normalized);
    const kind = await entryKind(location);
    if (kind === null) return null;
    const files = await listFilesRecursive(location);
    return {
      kind,
      files: files.map((file) => (file === '' ? normalized : joinRelative(normalized, file))),
    };
  }

  /**
   * Absolute location of a key inside the drive root.
   * Rejects keys that resolve outside of their namespace.
   */
  locate(namespace: string, relativePath: string): string {
    const namespaceRoot = join(this.root, assertNamespace(namespace));
    const location = resolve(namespaceRoot, relativePath);
    const offset = relative(namespaceRoot, location);
    if (offset === '..' || offset.startsWith(`..${sep}`) || isAbsolute(offset)) {
      throw new StorageInvalidKeyError(`path escapes the namespace (${relativePath})`);
    }
    return location;
  }

  private async stagingPath(): Promise<string> {
    await mkdir(this.stagingDir, { recursive: true });
    return join(this.stagingDir, randomUUID());
  }

  /**
   * Swap `staged` into `target`. A file replacing a file is renamed over it in
   * one step, so readers always find one of the two copies. Any other
   * replacement moves the previous copy aside first and leaves `target` absent
   * until the second rename; a failed swap puts the previous copy back.
   */
  private async replace(staged: string, target: string): Promise<void> {
    const [current, incoming] = await Promise.all([entryKind(target), entryKind(staged)]);
    if (current === null || (current === 'file' && incoming === 'file')) {
      await rename(staged, target);
      return;
    }
    const previous = await this.stagingPath();
    await rename(target, previous);
    try {
      await rename(staged, target);
    } catch (error) {
      await rename(previous, target);
      throw error;
    }
    await rm(previous, { recursive: true, force: true });
  }
}

/**
 * Filesystem store shared by every drive under one data directory.
 * Hands out drive-scoped FsBackend instances and keeps the upload staging
 * area used by the HTTP storage server.
 */
export class FsStorage {
  private readonly dataDir: string;

  constructor(dataDir: string) {
    this.dataDir = resolve(dataDir);
  }

  forDrive(identity: DriveIdentity): FsBackend {
    return new FsBackend(
      join(this.dataDir, protocolScheme(identity.protocol), identity.id),
      join(this.dataDir, '.staging')
    );
  }

  /** Write one file of a pending upload. */
  async writeUpload(uploadId: string, relativePath: string, data: Buffer): Promise<void> {
    const target = join(this.uploadDir(uploadId), normalizeEntryPath(relativePath));
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, data);
  }

  /**
   * Publish a pending upload: the staged file or tree at `relativePath` is put
   * into the drive in one step, then the upload is discarded.
   */
  async commitUpload(
    uploadId: string,
    identity: DriveIdentity,
    namespace: string,
    relativePath: string,
    kind: EntryKind
  ): Promise<void> {
    const normalized = normalizeEntryPath(relativePath);
    const source = join(this.uploadDir(uploadId), normalized);
    try {
      const staged = await entryKind(source);
      if (staged === null) {
        if (kind === 'file') {
          throw new StorageNotFoundError(`upload ${uploadId} has no file at ${normalized}`);
        }
        await mkdir(source, { recursive: true });
      }
      await this.forDrive(identity).put(source, namespace, normalized);
    } finally {
      await rm(this.uploadDir(uploadId), { recursive: true, force: true });
    }
  }

  /** Drop uploads abandoned by clients that failed before committing. */
  async clearUploads(): Promise<void> {
    await rm(join(this.dataDir, '.uploads'), { recursive: true, force: true });
  }

  async healthy(): Promise<boolean> {
    try {
      await mkdir(this.dataDir, { recursive: true });
      return true;
    } catch {
      return false;
    }
  }

  private uploadDir(uploadId: string): string {
    if (!/^[a-f0-9-]{36}$/.test(uploadId)) {
      throw new StorageInvalidKeyError(`invalid upload id \`${uploadId}\``);
    }
    return join(this.dataDir, '.uploads', uploadId);
  }
}
