// Drive: a shared file-distribution handle.
//
// A Drive names a logical storage space (`lit://<id>`) shared by many worker
// processes. Each worker publishes under its own component namespace and may
// read from any namespace. The identity and duplicate policy never change;
// the component name and local root folder are session state of the handle.

import { randomUUID } from 'node:crypto';
import { statSync } from 'node:fs';
import { mkdir, rename, rm } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';

import { pino } from 'pino';
import type { BaseLogger } from 'pino';

import type { ExecutionContext } from './context.js';
import {
  DriveAlreadyExistsError,
  DriveAmbiguousSourceError,
  DriveContextError,
  DriveDuplicateFileError,
  DriveInvalidOptionError,
  DriveInvalidRootFolderError,
  DriveLocalPathMissingError,
  DriveMissingOwnerError,
  DriveNotFoundError,
} from './errors.js';
import type { DriveIdentity } from './identity.js';
import { formatDriveIdentifier, parseDriveIdentifier, sameIdentity } from './identity.js';
import { NamespaceResolver } from './namespace-resolver.js';
import type { Resolution } from './namespace-resolver.js';
import { DRIVE_RECORD_TYPE, isDriveRecord, parseDriveRecord } from './record.js';
import type { DriveRecord } from './record.js';
import { StorageNotFoundError, StorageRateLimitedError } from '../storage/errors.js';
import { assertNamespace, joinRelative, normalizeEntryPath, normalizeRelativePath } from '../storage/keys.js';
import { entryKind, listTreeRecursive, pathExists } from '../storage/local-files.js';
import type { StorageBackend, StorageFactory } from '../storage/types.js';

const DEFAULT_POLL_INTERVAL_MS = 1000;

// A throttled check counts as unresolved while a get still has time left.
type PollState = Resolution | { kind: 'throttled'; error: Error };

/** Collaborators a Drive needs in the process that holds it. */
export interface DriveSession {
  storage: StorageFactory;
  context: ExecutionContext;
  logger?: BaseLogger;
  /** Delay between backend checks while a get waits (default 1000) */
  pollIntervalMs?: number;
}

export interface DriveOptions extends DriveSession {
  allowDuplicates?: boolean;
  componentName?: string;
  /** Local working directory (default: process.cwd()) */
  rootFolder?: string;
}

export interface DriveGetOptions {
  /** Read only from this component's namespace */
  componentName?: string;
  /** Seconds to wait for the path to become resolvable (default 0: no waiting) */
  timeout?: number;
  /** Replace an existing local destination */
  overwrite?: boolean;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function assertRootFolder(path: string): string {
  const resolved = resolve(path);
  if (!statSync(resolved, { throwIfNoEntry: false })?.isDirectory()) {
    throw new DriveInvalidRootFolderError(path);
  }
  return resolved;
}

export class Drive {
  readonly identity: DriveIdentity;
  readonly allowDuplicates: boolean;

  private readonly session: DriveSession;
  private readonly backend: StorageBackend;
  private readonly resolver: NamespaceResolver;
  private readonly logger: BaseLogger;
  private readonly pollIntervalMs: number;
  private owner: string | undefined;
  private root: string;

  /**
   * @param id - `<protocol>://<id>`, e.g. `lit://checkpoints`
   * @throws DriveInvalidIdentifierError when `id` is malformed
   */
  constructor(id: string, options: DriveOptions) {
    this.identity = parseDriveIdentifier(id);
    this.allowDuplicates = options.allowDuplicates ?? false;
    this.session = {
      storage: options.storage,
      context: options.context,
      logger: options.logger,
      pollIntervalMs: options.pollIntervalMs,
    };
    this.backend = options.storage(this.identity);
    this.resolver = new NamespaceResolver(this.backend);
    this.logger = options.logger ?? pino({ level: 'silent' });
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    if (!(this.pollIntervalMs > 0)) {
      throw new DriveInvalidOptionError(`pollIntervalMs must be positive (got ${this.pollIntervalMs})`);
    }
    this.root = assertRootFolder(options.rootFolder ?? process.cwd());
    this.componentName = options.componentName;
  }

  get protocol(): DriveIdentity['protocol'] {
    return this.identity.protocol;
  }

  get id(): string {
    return this.identity.id;
  }

  /** Component owning this handle; required by put and delete. */
  get componentName(): string | undefined {
    return this.owner;
  }

  set componentName(value: string | undefined) {
    this.owner = value === undefined ? undefined : assertNamespace(value);
  }

  get rootFolder(): string {
    return this.root;
  }

  set rootFolder(value: string) {
    this.root = assertRootFolder(value);
  }

  /**
   * Publish a local file or directory (relative to the root folder) under this
   * handle's component namespace. Publishing the same path again from the same
   * component replaces the previous copy.
   */
  async put(path: string): Promise<void> {
    this.guard('put files into');
    const owner = this.requireOwner('put');
    const relativePath = normalizeEntryPath(path);
    const source = join(this.root, relativePath);

    const kind = await entryKind(source);
    if (kind === null) {
      throw new DriveLocalPathMissingError(path);
    }

    if (!this.allowDuplicates) {
      // The published path itself, then every directory and file below it
      const below = kind === 'file' ? [] : await listTreeRecursive(source);
      const candidates = [relativePath, ...below.map((entry) => joinRelative(relativePath, entry))];
      const conflict = await this.resolver.findConflict(candidates, owner);
      if (conflict) {
        this.logger.debug(
          { drive: this.toString(), componentName: owner, path: conflict.path, owner: conflict.owner },
          'Drive put rejected: path owned by another component'
        );
        throw new DriveDuplicateFileError(conflict.path);
      }
    }

    await this.backend.put(source, owner, relativePath);
    this.logger.debug({ drive: this.toString(), componentName: owner, path: relativePath, kind }, 'Drive put');
  }

  /**
   * List entries under `path` across every namespace, or only `componentName`'s.
   * Directories list their direct children; repeated paths appear once.
   */
  async list(path = '.', componentName?: string): Promise<string[]> {
    this.guard('list files from');
    const entries = await this.backend.list(componentName ?? null, normalizeRelativePath(path));
    return [...new Set(entries.map((entry) => entry.path))];
  }

  /** Remove `path` from this handle's own namespace; other namespaces are untouched. */
  async delete(path: string): Promise<void> {
    this.guard('delete files from');
    const owner = this.requireOwner('delete');
    const relativePath = normalizeEntryPath(path);

    if (!(await this.backend.exists(owner, relativePath))) {
      throw new DriveNotFoundError(`The file ${path} doesn't exist in the component_name space ${owner}.`);
    }
    await this.backend.delete(owner, relativePath);
    this.logger.debug({ drive: this.toString(), componentName: owner, path: relativePath }, 'Drive delete');
  }

  /**
   * Fetch `path` into the root folder.
   *
   * With a timeout the backend is polled until exactly one namespace holds the
   * path; several holders count as unresolved until the deadline. Without one,
   * a missing or ambiguous path fails immediately.
   */
  async get(path: string, options: DriveGetOptions = {}): Promise<void> {
    this.guard('get files from');
    const { componentName, overwrite = false } = options;
    const timeout = options.timeout ?? 0;
    if (!Number.isFinite(timeout) || timeout < 0) {
      throw new DriveInvalidOptionError(`timeout must be a non-negative number of seconds (got ${timeout})`);
    }
    if (componentName !== undefined) {
      assertNamespace(componentName);
    }

    const relativePath = normalizeEntryPath(path);
    const destination = join(this.root, relativePath);

    const namespace = await this.waitForSource(path, relativePath, componentName, timeout);
    await this.materialize(path, namespace, relativePath, destination, overwrite);
    this.logger.debug(
      { drive: this.toString(), componentName: this.owner, source: namespace, path: relativePath },
      'Drive get'
    );
  }

  /** Same drive, same policy and component, fresh session state. */
  clone(): Drive {
    return new Drive(formatDriveIdentifier(this.identity), {
      ...this.session,
      allowDuplicates: this.allowDuplicates,
      componentName: this.owner,
      rootFolder: this.root,
    });
  }

  /** Drives are equal when they name the same storage space. */
  equals(other: Drive): boolean {
    return sameIdentity(this.identity, other.identity);
  }

  toRecord(): DriveRecord {
    return {
      type: DRIVE_RECORD_TYPE,
      protocol: this.identity.protocol,
      id: this.identity.id,
      allowDuplicates: this.allowDuplicates,
      componentName: this.owner ?? null,
    };
  }

  toJSON(): DriveRecord {
    return this.toRecord();
  }

  toString(): string {
    return formatDriveIdentifier(this.identity);
  }

  /**
   * Rebuild a handle from its serialized record in the receiving process.
   * Only the identity is re-derived; root folder comes from `session`.
   *
   * @throws DriveRecordInvalidError when `record` is not a drive record
   */
  static fromRecord(record: unknown, session: DriveSession & { rootFolder?: string }): Drive {
    const parsed = parseDriveRecord(record);
    return new Drive(`${parsed.protocol}${parsed.id}`, {
      ...session,
      allowDuplicates: parsed.allowDuplicates,
      componentName: parsed.componentName ?? undefined,
    });
  }

  // ---- Private helpers ----

  private guard(action: string): void {
    if (this.session.context.currentContextIsCoordinator()) {
      throw new DriveContextError(action);
    }
  }

  private requireOwner(operation: 'put' | 'delete'): string {
    if (this.owner === undefined) {
      throw new DriveMissingOwnerError(operation);
    }
    return this.owner;
  }

  private async waitForSource(
    path: string,
    relativePath: string,
    componentName: string | undefined,
    timeout: number
  ): Promise<string> {
    const deadline = Date.now() + timeout * 1000;

    for (;;) {
      const resolution = await this.poll(relativePath, componentName);
      if (resolution.kind === 'resolved') {
        return resolution.namespace;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        if (resolution.kind === 'throttled') {
          throw resolution.error;
        }
        if (resolution.kind === 'ambiguous') {
          throw new DriveAmbiguousSourceError(path, resolution.namespaces.join(', '));
        }
        if (timeout > 0) {
          throw new DriveNotFoundError(`The following ${path} wasn't found in ${timeout} seconds.`);
        }
        throw new DriveNotFoundError(
          componentName === undefined
            ? `We didn't find any match for the associated ${path}.`
            : `The file ${path} doesn't exist in the component_name space ${componentName}.`
        );
      }

      this.logger.debug(
        { drive: this.toString(), path: relativePath, state: resolution.kind, remainingMs: remaining },
        'Drive get waiting for source'
      );
      await sleep(Math.min(this.pollIntervalMs, remaining));
    }
  }

  private async poll(relativePath: string, componentName: string | undefined): Promise<PollState> {
    try {
      return await this.resolver.resolve(relativePath, componentName);
    } catch (error) {
      if (error instanceof StorageRateLimitedError) {
        return { kind: 'throttled', error };
      }
      throw error;
    }
  }

  /** Fetch into a hidden sibling first so a failure never leaves a partial destination. */
  private async materialize(
    path: string,
    namespace: string,
    relativePath: string,
    destination: string,
    overwrite: boolean
  ): Promise<void> {
    await mkdir(dirname(destination), { recursive: true });
    const staging = join(dirname(destination), `.${basename(destination)}.${randomUUID()}.partial`);

    try {
      await this.backend.get(namespace, relativePath, staging);
      if (overwrite) {
        await rm(destination, { recursive: true, force: true });
      } else if (await pathExists(destination)) {
        throw new DriveAlreadyExistsError(path);
      }
      await rename(staging, destination);
    } catch (error) {
      await rm(staging, { recursive: true, force: true });
      if (error instanceof StorageNotFoundError) {
        throw new DriveNotFoundError(`The file ${path} doesn't exist in the component_name space ${namespace}.`);
      }
      throw error;
    }
  }
}

/**
 * Bind a value received from another process to `componentName`: drive records
 * and Drive handles become a Drive owned by that component, anything else is
 * returned as is.
 */
export function maybeCreateDrive<T>(
  componentName: string,
  state: T,
  session: DriveSession & { rootFolder?: string }
): Drive | T {
  if (state instanceof Drive) {
    const drive = state.clone();
    drive.componentName = componentName;
    return drive;
  }
  if (isDriveRecord(state)) {
    const drive = Drive.fromRecord(state, session);
    drive.componentName = componentName;
    return drive;
  }
  return state;
}
