import createError from '@fastify/error';

// Drive errors (DRIVE_*)

/** Identifier is not `<protocol>://<id>` with a supported protocol and a flat id (400) */
export const DriveInvalidIdentifierError = createError<[string]>(
  'DRIVE_INVALID_IDENTIFIER',
  '%s',
  400
);

/** put/delete called before a component name was bound to the handle (400) */
export const DriveMissingOwnerError = createError<[string]>(
  'DRIVE_MISSING_OWNER',
  'The component name needs to be known to %s a path to the Drive.',
  400
);

/** Operation attempted from the coordinating (flow) context (403) */
export const DriveContextError = createError<[string]>(
  'DRIVE_CONTEXT_ERROR',
  "The flow isn't allowed to %s a Drive.",
  403
);

/** Path already published by another component while duplicates are disallowed (409) */
export const DriveDuplicateFileError = createError<[string]>(
  'DRIVE_DUPLICATE_FILE',
  "The file %s can't be added as already found in the Drive.",
  409
);

/** Read target absent from the drive, with or without waiting (404) */
export const DriveNotFoundError = createError<[string]>('DRIVE_NOT_FOUND', '%s', 404);

/** Several component namespaces hold the requested path (409) */
export const DriveAmbiguousSourceError = createError<[string, string]>(
  'DRIVE_AMBIGUOUS_SOURCE',
  'We found several matching files for %s created by multiple components: %s. Pass a component name to choose one.',
  409
);

/** Local destination of a get already exists (409) */
export const DriveAlreadyExistsError = createError<[string]>(
  'DRIVE_ALREADY_EXISTS',
  'The path %s already exists locally. Pass `overwrite: true` to replace it.',
  409
);

/** Local source of a put does not exist (404) */
export const DriveLocalPathMissingError = createError<[string]>(
  'DRIVE_LOCAL_PATH_MISSING',
  "The provided path %s doesn't exist.",
  404
);

export const DriveInvalidRootFolderError = createError<[string]>(
  'DRIVE_INVALID_ROOT_FOLDER',
  "The provided root folder isn't a directory: %s",
  400
);

export const DriveInvalidOptionError = createError<[string]>(
  'DRIVE_INVALID_OPTION',
  'Invalid Drive option: %s',
  400
);

/** Serialized handle could not be reconstructed (400) */
export const DriveRecordInvalidError = createError<[string]>(
  'DRIVE_RECORD_INVALID',
  'Invalid Drive record: %s',
  400
);
