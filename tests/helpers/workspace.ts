import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

/** Temporary directory tree for one test: a data dir plus one root folder per worker. */
export interface Workspace {
  base: string;
  dataDir: string;
  root(name: string): Promise<string>;
  cleanup(): Promise<void>;
}

export async function createWorkspace(): Promise<Workspace> {
  const base = await mkdtemp(join(tmpdir(), 'shared-drive-test-'));
  const dataDir = join(base, 'data');
  await mkdir(dataDir, { recursive: true });

  return {
    base,
    dataDir,
    async root(name: string) {
      const dir = join(base, 'workers', name);
      await mkdir(dir, { recursive: true });
      return dir;
    },
    async cleanup() {
      await rm(base, { recursive: true, force: true });
    },
  };
}

export async function writeText(root: string, relativePath: string, content: string): Promise<string> {
  const target = join(root, relativePath);
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, content);
  return target;
}

export async function readText(root: string, relativePath: string): Promise<string> {
  return readFile(join(root, relativePath), 'utf-8');
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
