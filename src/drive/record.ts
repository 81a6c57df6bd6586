// Serialized form of a Drive handle, used to pass a drive between processes.

import { z } from 'zod';

import { DriveRecordInvalidError } from './errors.js';
import { SUPPORTED_PROTOCOLS } from './identity.js';

export const DRIVE_RECORD_TYPE = '__drive__';

export const DriveRecordSchema = z.object({
  type: z.literal(DRIVE_RECORD_TYPE),
  protocol: z.enum(SUPPORTED_PROTOCOLS),
  id: z.string().min(1),
  allowDuplicates: z.boolean(),
  componentName: z.string().min(1).nullable(),
});

export type DriveRecord = z.infer<typeof DriveRecordSchema>;

export function isDriveRecord(value: unknown): value is DriveRecord {
  return DriveRecordSchema.safeParse(value).success;
}

/** @throws DriveRecordInvalidError listing every schema issue */
export function parseDriveRecord(value: unknown): DriveRecord {
  const result = DriveRecordSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join(', ');
    throw new DriveRecordInvalidError(issues);
  }
  return result.data;
}
