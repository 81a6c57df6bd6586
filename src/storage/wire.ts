// Request/response shapes of the storage server, shared by the routes and HttpBackend.

import { z } from 'zod';

export const StorageEntrySchema = z.object({
  namespace: z.string(),
  path: z.string(),
});

export const NamespacesResponseSchema = z.object({
  namespaces: z.array(z.string()),
});

export const EntriesResponseSchema = z.object({
  entries: z.array(StorageEntrySchema),
});

export const ExistsResponseSchema = z.object({
  exists: z.boolean(),
});

export const TreeResponseSchema = z.object({
  kind: z.enum(['file', 'directory']),
  files: z.array(z.string()),
});

export const CommitRequestSchema = z.object({
  namespace: z.string().min(1),
  path: z.string().min(1),
  kind: z.enum(['file', 'directory']),
});

export type NamespacesResponse = z.infer<typeof NamespacesResponseSchema>;
export type EntriesResponse = z.infer<typeof EntriesResponseSchema>;
export type ExistsResponse = z.infer<typeof ExistsResponseSchema>;
export type TreeResponse = z.infer<typeof TreeResponseSchema>;
export type CommitRequest = z.infer<typeof CommitRequestSchema>;
