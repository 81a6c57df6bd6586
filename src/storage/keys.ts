// Storage key validation shared by the drive, the backends and the server routes.

import { posix } from 'node:path';

import { StorageInvalidKeyError } from './errors.js';

/** The drive root of a namespace. */
export const ROOT_PATH = '.';

/**
 * Normalize a drive-relative path to POSIX form without a trailing slash.
 * `''`, `'.'` and `'./'` all become `'.'`.
 *
 * @throws StorageInvalidKeyError for absolute paths and paths escaping the root
 */
export function normalizeRelativePath(path: string): string {
  const slashed = path.replace(/\\/g, '/');
  if (slashed.startsWith('/') || /^[a-zA-Z]:\//.test(slashed)) {
    throw new StorageInvalidKeyError(`absolute paths are not allowed (${path})`);
  }

  const normalized = posix.normalize(slashed === '' ? ROOT_PATH : slashed).replace(/\/+$/, '');
  if (normalized === '..' || normalized.startsWith('../')) {
    throw new StorageInvalidKeyError(`path escapes the drive root (${path})`);
  }
  return normalized === '' ? ROOT_PATH : normalized;
}

/** Like normalizeRelativePath, but the drive root itself is rejected. */
export function normalizeEntryPath(path: string): string {
  const normalized = normalizeRelativePath(path);
  if (normalized === ROOT_PATH) {
    throw new StorageInvalidKeyError(`a file or directory inside the drive is required (${path})`);
  }
  return normalized;
}

/** Namespaces are component names: one flat, non-empty path segment. */
export function assertNamespace(namespace: string): string {
  if (
    namespace.length === 0 ||
    namespace === '.' ||
    namespace === '..' ||
    namespace.includes('/') ||
    namespace.includes('\\')
  ) {
    throw new StorageInvalidKeyError(`invalid namespace \`${namespace}\``);
  }
  return namespace;
}

/** Join a normalized prefix and a child name, keeping root-level entries bare. */
export function joinRelative(prefix: string, child: string): string {
  return prefix === ROOT_PATH ? child : posix.join(prefix, child);
}
