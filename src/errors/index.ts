import createError from '@fastify/error';

// Configuration errors (CONFIG_*)
export const ConfigInvalidError = createError<[string]>(
  'CONFIG_INVALID',
  'Invalid configuration: %s',
  500
);

export const ConfigMissingError = createError<[string]>(
  'CONFIG_MISSING',
  'Missing configuration file: %s',
  500
);

export const ConfigParseError = createError<[string]>(
  'CONFIG_PARSE_ERROR',
  'Failed to parse configuration: %s',
  500
);

// Server errors (SERVER_*)
export const ServerStartError = createError<[string]>(
  'SERVER_START_ERROR',
  'Failed to start server: %s',
  500
);

// Drive errors (DRIVE_*) - re-exported from drive domain
export {
  DriveInvalidIdentifierError,
  DriveMissingOwnerError,
  DriveContextError,
  DriveDuplicateFileError,
  DriveNotFoundError,
  DriveAmbiguousSourceError,
  DriveAlreadyExistsError,
  DriveLocalPathMissingError,
  DriveInvalidRootFolderError,
  DriveInvalidOptionError,
  DriveRecordInvalidError,
} from '../drive/errors.js';

// Storage errors (STORAGE_*) - re-exported from storage domain
export {
  StorageInvalidKeyError,
  StorageNotFoundError,
  StorageRateLimitedError,
  StorageRequestError,
} from '../storage/errors.js';
