import createError from '@fastify/error';

// Storage errors (STORAGE_*)

/** Namespace or relative path is empty, absolute, or escapes the drive root (400) */
export const StorageInvalidKeyError = createError<[string]>(
  'STORAGE_INVALID_KEY',
  'Invalid storage key: %s',
  400
);

/** Object missing from the backend (404) */
export const StorageNotFoundError = createError<[string]>(
  'STORAGE_NOT_FOUND',
  'Storage object not found: %s',
  404
);

/** Remote storage server answered with an unexpected status or payload (502) */
export const StorageRequestError = createError<[string]>(
  'STORAGE_REQUEST_FAILED',
  'Storage request failed: %s',
  502
);

/** Remote storage server throttled the request; safe to retry later (429) */
export const StorageRateLimitedError = createError<[string]>(
  'STORAGE_RATE_LIMITED',
  'Storage request rate limited: %s',
  429
);
