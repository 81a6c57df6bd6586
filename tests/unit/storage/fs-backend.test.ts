import { randomUUID } from 'node:crypto';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { parseDriveIdentifier } from '@/drive/identity.js';
import { StorageInvalidKeyError, StorageNotFoundError } from '@/storage/errors.js';
import { FsBackend, FsStorage } from '@/storage/fs-backend.js';
import { pathExists } from '@/storage/local-files.js';

import { createWorkspace, readText, writeText } from '../../helpers/workspace.js';
import type { Workspace } from '../../helpers/workspace.js';

const SHARED = parseDriveIdentifier('lit://shared');

describe('FsBackend', () => {
  let workspace: Workspace;
  let storage: FsStorage;
  let backend: FsBackend;
  let local: string;

  beforeEach(async () => {
    workspace = await createWorkspace();
    storage = new FsStorage(workspace.dataDir);
    backend = storage.forDrive(SHARED);
    local = await workspace.root('local');
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  describe('put()', () => {
    it('should store files under <dataDir>/<scheme>/<id>/<namespace>/<path>', async () => {
      const source = await writeText(local, 'a.txt', 'hello');
      await backend.put(source, 'producer', 'a.txt');

      expect(await readText(join(workspace.dataDir, 'lit', 'shared', 'producer'), 'a.txt')).toBe('hello');
    });

    it('should store whole directory trees', async () => {
      await writeText(local, 'models/w.bin', 'weights');
      await writeText(local, 'models/sub/c.txt', 'config');
      await backend.put(join(local, 'models'), 'producer', 'models');

      expect(await backend.exists('producer', 'models/w.bin')).toBe(true);
      expect(await backend.exists('producer', 'models/sub/c.txt')).toBe(true);
    });

    it('should replace a previous copy and leave nothing in staging', async () => {
      const source = await writeText(local, 'a.txt', 'v1');
      await backend.put(source, 'producer', 'a.txt');
      await writeText(local, 'a.txt', 'v2');
      await backend.put(source, 'producer', 'a.txt');

      const out = await workspace.root('out');
      await backend.get('producer', 'a.txt', join(out, 'a.txt'));
      expect(await readText(out, 'a.txt')).toBe('v2');
      expect(await readdir(join(workspace.dataDir, '.staging'))).toEqual([]);
    });

    it('should keep a republished file visible while it is swapped', async () => {
      const source = await writeText(local, 'a.txt', 'v0');
      await backend.put(source, 'producer', 'a.txt');
      let publishing = true;
      const observed: boolean[] = [];
      const watcher = (async () => {
        while (publishing) {
          observed.push(await backend.exists('producer', 'a.txt'));
        }
      })();

      for (let version = 1; version <= 20; version++) {
        await writeText(local, 'a.txt', `v${version}`);
        await backend.put(source, 'producer', 'a.txt');
      }
      publishing = false;
      await watcher;

      expect(observed.length).toBeGreaterThan(0);
      expect(observed.every(Boolean)).toBe(true);
      expect(await backend.kind('producer', 'a.txt')).toBe('file');
    });

    it('should replace a file with a directory and back', async () => {
      const file = await writeText(local, 'file/a.txt', 'plain');
      await writeText(local, 'tree/a.txt/inner.txt', 'nested');
      await backend.put(file, 'producer', 'a.txt');

      await backend.put(join(local, 'tree', 'a.txt'), 'producer', 'a.txt');
      expect(await backend.kind('producer', 'a.txt')).toBe('directory');
      expect(await backend.exists('producer', 'a.txt/inner.txt')).toBe(true);

      await backend.put(file, 'producer', 'a.txt');
      expect(await backend.kind('producer', 'a.txt')).toBe('file');
      expect(await readdir(join(workspace.dataDir, '.staging'))).toEqual([]);
    });

    it('should reject the drive root as a target', async () => {
      const source = await writeText(local, 'a.txt', 'x');
      await expect(backend.put(source, 'producer', '.')).rejects.toThrow(StorageInvalidKeyError);
    });
  });

  describe('get()', () => {
    it('should copy a stored file to the local path', async () => {
      const source = await writeText(local, 'a.txt', 'retrieve me');
      await backend.put(source, 'producer', 'nested/a.txt');

      const out = await workspace.root('out');
      await backend.get('producer', 'nested/a.txt', join(out, 'deep', 'copy.txt'));
      expect(await readText(out, 'deep/copy.txt')).toBe('retrieve me');
    });

    it('should throw StorageNotFoundError for missing entries', async () => {
      const out = await workspace.root('out');
      await expect(backend.get('producer', 'missing.txt', join(out, 'x'))).rejects.toThrow(
        StorageNotFoundError
      );
    });
  });

  describe('list()', () => {
    it('should list direct children of a directory in name order', async () => {
      await writeText(local, 'models/w.bin', 'weights');
      await writeText(local, 'models/sub/c.txt', 'config');
      await backend.put(join(local, 'models'), 'producer', 'models');

      expect(await backend.list('producer', 'models')).toEqual([
        { namespace: 'producer', path: 'models/sub' },
        { namespace: 'producer', path: 'models/w.bin' },
      ]);
    });

    it('should list a file as itself', async () => {
      await backend.put(await writeText(local, 'a.txt', 'x'), 'producer', 'a.txt');

      expect(await backend.list('producer', 'a.txt')).toEqual([{ namespace: 'producer', path: 'a.txt' }]);
    });

    it('should aggregate every namespace in sorted order when none is given', async () => {
      const source = await writeText(local, 'a.txt', 'x');
      await backend.put(source, 'beta', 'a.txt');
      await backend.put(source, 'alpha', 'a.txt');

      expect(await backend.list(null, '.')).toEqual([
        { namespace: 'alpha', path: 'a.txt' },
        { namespace: 'beta', path: 'a.txt' },
      ]);
    });

    it('should return an empty list for missing paths', async () => {
      expect(await backend.list(null, 'missing')).toEqual([]);
      expect(await backend.list('producer', 'missing')).toEqual([]);
    });
  });

  describe('delete()', () => {
    it('should remove an entry from its namespace only', async () => {
      const source = await writeText(local, 'a.txt', 'x');
      await backend.put(source, 'alpha', 'a.txt');
      await backend.put(source, 'beta', 'a.txt');

      await backend.delete('alpha', 'a.txt');

      expect(await backend.exists('alpha', 'a.txt')).toBe(false);
      expect(await backend.exists('beta', 'a.txt')).toBe(true);
    });

    it('should throw StorageNotFoundError for missing entries', async () => {
      await expect(backend.delete('alpha', 'a.txt')).rejects.toThrow(StorageNotFoundError);
    });
  });

  describe('namespaces()', () => {
    it('should return an empty list for a fresh drive', async () => {
      expect(await backend.namespaces()).toEqual([]);
    });

    it('should keep drives isolated from each other', async () => {
      await backend.put(await writeText(local, 'a.txt', 'x'), 'producer', 'a.txt');

      expect(await backend.namespaces()).toEqual(['producer']);
      expect(await storage.forDrive(parseDriveIdentifier('lit://other')).namespaces()).toEqual([]);
    });
  });

  describe('tree()', () => {
    it('should return every file below a directory', async () => {
      await writeText(local, 'models/w.bin', 'weights');
      await writeText(local, 'models/sub/c.txt', 'config');
      await backend.put(join(local, 'models'), 'producer', 'models');

      expect(await backend.tree('producer', 'models')).toEqual({
        kind: 'directory',
        files: ['models/sub/c.txt', 'models/w.bin'],
      });
    });

    it('should return a file as its only entry', async () => {
      await backend.put(await writeText(local, 'a.txt', 'x'), 'producer', 'a.txt');

      expect(await backend.tree('producer', 'a.txt')).toEqual({ kind: 'file', files: ['a.txt'] });
    });

    it('should return null for missing paths', async () => {
      expect(await backend.tree('producer', 'missing')).toBeNull();
    });
  });

  describe('path traversal protection', () => {
    it('should reject keys escaping the namespace', async () => {
      await expect(backend.exists('producer', '../other/a.txt')).rejects.toThrow(StorageInvalidKeyError);
      expect(() => backend.locate('producer', '../other/a.txt')).toThrow(StorageInvalidKeyError);
    });

    it('should reject invalid namespaces', async () => {
      await expect(backend.list('..', '.')).rejects.toThrow(StorageInvalidKeyError);
      expect(() => backend.locate('a/b', 'x')).toThrow(StorageInvalidKeyError);
    });
  });

  describe('healthy()', () => {
    it('should report a writable root as healthy', async () => {
      expect(await backend.healthy()).toBe(true);
    });
  });
});

describe('FsStorage uploads', () => {
  let workspace: Workspace;
  let storage: FsStorage;

  beforeEach(async () => {
    workspace = await createWorkspace();
    storage = new FsStorage(workspace.dataDir);
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  it('should publish a staged directory and discard the upload', async () => {
    const uploadId = randomUUID();
    await storage.writeUpload(uploadId, 'models/w.bin', Buffer.from('weights'));
    await storage.writeUpload(uploadId, 'models/sub/c.txt', Buffer.from('config'));

    await storage.commitUpload(uploadId, SHARED, 'producer', 'models', 'directory');

    const backend = storage.forDrive(SHARED);
    expect(await backend.tree('producer', 'models')).toEqual({
      kind: 'directory',
      files: ['models/sub/c.txt', 'models/w.bin'],
    });
    expect(await pathExists(join(workspace.dataDir, '.uploads', uploadId))).toBe(false);
  });

  it('should publish an empty directory', async () => {
    await storage.commitUpload(randomUUID(), SHARED, 'producer', 'empty', 'directory');

    expect(await storage.forDrive(SHARED).kind('producer', 'empty')).toBe('directory');
  });

  it('should fail a file commit with nothing staged', async () => {
    await expect(
      storage.commitUpload(randomUUID(), SHARED, 'producer', 'a.txt', 'file')
    ).rejects.toThrow(StorageNotFoundError);
  });

  it('should reject malformed upload ids', async () => {
    await expect(storage.writeUpload('../escape', 'a.txt', Buffer.from('x'))).rejects.toThrow(
      StorageInvalidKeyError
    );
  });

  it('should drop abandoned uploads on clearUploads()', async () => {
    const uploadId = randomUUID();
    await storage.writeUpload(uploadId, 'a.txt', Buffer.from('x'));

    await storage.clearUploads();

    expect(await pathExists(join(workspace.dataDir, '.uploads'))).toBe(false);
  });
});
