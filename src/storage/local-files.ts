// Local filesystem helpers shared by the backends and the Drive.

import { readdir, stat } from 'node:fs/promises';
import { join, posix } from 'node:path';

import type { EntryKind } from './types.js';

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/** Kind of the entry at `path`, or null when nothing is there. */
export async function entryKind(path: string): Promise<EntryKind | null> {
  try {
    const info = await stat(path);
    return info.isDirectory() ? 'directory' : 'file';
  } catch (error) {
    if (isMissing(error)) return null;
    throw error;
  }
}

export async function pathExists(path: string): Promise<boolean> {
  return (await entryKind(path)) !== null;
}

/** Sorted names of the direct children of `dir`, empty when it does not exist. */
export async function childNames(
  dir: string,
  filter: (kind: EntryKind) => boolean = () => true
): Promise<string[]> {
  try {
    const dirents = await readdir(dir, { withFileTypes: true });
    return dirents
      .filter((d) => filter(d.isDirectory() ? 'directory' : 'file'))
      .map((d) => d.name)
      .sort();
  } catch (error) {
    if (isMissing(error)) return [];
    throw error;
  }
}

async function walkTree(root: string, includeDirectories: boolean): Promise<string[]> {
  const kind = await entryKind(root);
  if (kind === null) return [];
  if (kind === 'file') return [''];

  const paths: string[] = [];
  const walk = async (dir: string, prefix: string): Promise<void> => {
    const dirents = await readdir(dir, { withFileTypes: true });
    for (const dirent of dirents) {
      const relative = prefix ? posix.join(prefix, dirent.name) : dirent.name;
      if (dirent.isDirectory()) {
        if (includeDirectories) paths.push(relative);
        await walk(join(dir, dirent.name), relative);
      } else {
        paths.push(relative);
      }
    }
  };
  await walk(root, '');
  return paths.sort();
}

/**
 * Files below `root`, as sorted POSIX paths relative to it.
 * A file root yields `['']`; a missing root yields `[]`.
 */
export async function listFilesRecursive(root: string): Promise<string[]> {
  return walkTree(root, false);
}

/** Like listFilesRecursive, but sub-directories are listed too. */
export async function listTreeRecursive(root: string): Promise<string[]> {
  return walkTree(root, true);
}
