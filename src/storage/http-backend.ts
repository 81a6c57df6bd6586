// HTTP storage backend.
//
// Talks to the drive storage server (see src/routes/drives.ts) so that workers
// without a shared filesystem can still share a drive. Uses native fetch
// (Node 20+) with AbortController timeout and Zod validation.
//
// Puts are staged file by file under a fresh upload id and published with a
// single commit call; nothing is visible to other workers before the commit.

import { randomUUID } from 'node:crypto';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join, posix } from 'node:path';

import type { z } from 'zod';

import { StorageNotFoundError, StorageRateLimitedError, StorageRequestError } from './errors.js';
import { assertNamespace, joinRelative, normalizeEntryPath, normalizeRelativePath } from './keys.js';
import { entryKind, listFilesRecursive } from './local-files.js';
import type { StorageBackend, StorageEntry } from './types.js';
import {
  EntriesResponseSchema,
  ExistsResponseSchema,
  NamespacesResponseSchema,
  TreeResponseSchema,
} from './wire.js';
import type { CommitRequest } from './wire.js';
import type { DriveIdentity } from '../drive/identity.js';
import { protocolScheme } from '../drive/identity.js';

export interface HttpBackendOptions {
  /** Base URL of the storage server (e.g. "http://localhost:3000") */
  baseUrl: string;
  identity: DriveIdentity;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Additional headers to send with every request */
  headers?: Record<string, string>;
}

interface RequestBody {
  json?: unknown;
  bytes?: Uint8Array;
}

function encodeKey(path: string): string {
  return path.split('/').map(encodeURIComponent).join('/');
}

export class HttpBackend implements StorageBackend {
  private readonly baseUrl: string;
  private readonly driveUrl: string;
  private readonly timeout: number;
  private readonly headers: Record<string, string>;

  constructor(options: HttpBackendOptions) {
    // Strip trailing slash for consistent URL building
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.driveUrl = `${this.baseUrl}/drives/${protocolScheme(options.identity.protocol)}/${encodeURIComponent(options.identity.id)}`;
    this.timeout = options.timeout ?? 30_000;
    this.headers = options.headers ?? {};
  }

  async put(localPath: string, namespace: string, relativePath: string): Promise<void> {
    const target = normalizeEntryPath(relativePath);
    assertNamespace(namespace);
    const kind = await entryKind(localPath);
    if (kind === null) {
      throw new StorageNotFoundError(localPath);
    }

    const uploadId = randomUUID();
    for (const file of await listFilesRecursive(localPath)) {
      const data = await readFile(file === '' ? localPath : join(localPath, file));
      const key = file === '' ? target : joinRelative(target, file);
      await this.call('PUT', `/uploads/${uploadId}/files/${encodeKey(key)}`, () => Promise.resolve(), {
        bytes: new Uint8Array(data),
      });
    }

    const commit: CommitRequest = { namespace, path: target, kind };
    await this.call('POST', `/uploads/${uploadId}/commit`, () => Promise.resolve(), { json: commit });
  }

  async get(namespace: string, relativePath: string, localPath: string): Promise<void> {
    const normalized = normalizeRelativePath(relativePath);
    const query = new URLSearchParams({ namespace: assertNamespace(namespace), path: normalized });
    const tree = await this.json('GET', `/tree?${query.toString()}`, TreeResponseSchema);

    if (tree.kind === 'file') {
      await this.download(namespace, normalized, localPath);
      return;
    }

    await mkdir(localPath, { recursive: true });
    for (const file of tree.files) {
      await this.download(namespace, file, join(localPath, posix.relative(normalized, file)));
    }
  }

  async list(namespace: string | null, prefix: string): Promise<StorageEntry[]> {
    const query = new URLSearchParams({ prefix: normalizeRelativePath(prefix) });
    if (namespace !== null) {
      query.set('namespace', assertNamespace(namespace));
    }
    const body = await this.json('GET', `/entries?${query.toString()}`, EntriesResponseSchema);
    return body.entries;
  }

  async delete(namespace: string, relativePath: string): Promise<void> {
    const key = encodeKey(normalizeRelativePath(relativePath));
    await this.call('DELETE', `/files/${encodeURIComponent(assertNamespace(namespace))}/${key}`, () =>
      Promise.resolve()
    );
  }

  async exists(namespace: string, relativePath: string): Promise<boolean> {
    const query = new URLSearchParams({
      namespace: assertNamespace(namespace),
      path: normalizeRelativePath(relativePath),
    });
    const body = await this.json('GET', `/exists?${query.toString()}`, ExistsResponseSchema);
    return body.exists;
  }

  async namespaces(): Promise<string[]> {
    const body = await this.json('GET', '/namespaces', NamespacesResponseSchema);
    return body.namespaces;
  }

  async healthy(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/health`, { method: 'GET' });
      return response.ok;
    } catch {
      return false;
    }
  }

  // ---- Private helpers ----

  private async download(namespace: string, relativePath: string, localPath: string): Promise<void> {
    const path = `/files/${encodeURIComponent(namespace)}/${encodeKey(relativePath)}`;
    const data = await this.call('GET', path, async (response) =>
      Buffer.from(await response.arrayBuffer())
    );
    await mkdir(dirname(localPath), { recursive: true });
    await writeFile(localPath, data);
  }

  private async json<T>(method: string, path: string, schema: z.ZodType<T>): Promise<T> {
    return this.call(method, path, async (response) => {
      const json: unknown = await response.json();
      const parsed = schema.safeParse(json);
      if (!parsed.success) {
        throw new StorageRequestError(`invalid response from ${path}: ${parsed.error.message}`);
      }
      return parsed.data;
    });
  }

  private async call<T>(
    method: string,
    path: string,
    read: (response: Response) => Promise<T>,
    body: RequestBody = {}
  ): Promise<T> {
    const url = `${this.driveUrl}${path}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    const headers: Record<string, string> = { ...this.headers };
    let payload: string | Uint8Array | undefined;
    if (body.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      payload = JSON.stringify(body.json);
    } else if (body.bytes !== undefined) {
      headers['Content-Type'] = 'application/octet-stream';
      payload = body.bytes;
    }

    try {
      const response = await fetch(url, {
        method,
        headers,
        body: payload,
        signal: controller.signal,
      });

      if (response.status === 404) {
        throw new StorageNotFoundError(`${method} ${path}`);
      }
      if (response.status === 429) {
        const retryAfter = response.headers.get('retry-after');
        throw new StorageRateLimitedError(
          retryAfter ? `${method} ${path} (retry after ${retryAfter}s)` : `${method} ${path}`
        );
      }
      if (!response.ok) {
        throw new StorageRequestError(
          `${method} ${path} returned ${response.status} ${response.statusText}`
        );
      }

      return await read(response);
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new StorageRequestError(`${method} ${path} timed out after ${this.timeout}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
