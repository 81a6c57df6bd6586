// Drive barrel export -- public API for worker processes

export { Drive, maybeCreateDrive } from './drive.js';
export type { DriveGetOptions, DriveOptions, DriveSession } from './drive.js';
export { createDriveSession } from './session.js';
export type { CreateDriveSessionOptions } from './session.js';
export {
  SUPPORTED_PROTOCOLS,
  formatDriveIdentifier,
  isSupportedProtocol,
  parseDriveIdentifier,
  sameIdentity,
} from './identity.js';
export type { DriveIdentity, DriveProtocol } from './identity.js';
export { createExecutionContext, FLOW_CONTEXT, WORK_CONTEXT } from './context.js';
export type { ExecutionContext, ExecutionContextKind } from './context.js';
export { DRIVE_RECORD_TYPE, DriveRecordSchema, isDriveRecord, parseDriveRecord } from './record.js';
export type { DriveRecord } from './record.js';
export { NamespaceResolver } from './namespace-resolver.js';
export type { Conflict, Resolution } from './namespace-resolver.js';
export * from './errors.js';
export { loadConfig } from '../config/index.js';
export type { Config } from '../config/index.js';
