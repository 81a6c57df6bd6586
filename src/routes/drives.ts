// Drive storage routes -- expose the server's filesystem store to remote workers.
//
// Workers reach these through HttpBackend. Reads are plain GETs; a put is a
// series of staged file uploads followed by one commit, so a half-finished
// upload is never visible in the drive.

import { createReadStream } from 'node:fs';

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

import type { DriveIdentity } from '../drive/identity.js';
import { parseDriveIdentifier } from '../drive/identity.js';
import { StorageInvalidKeyError, StorageNotFoundError } from '../storage/errors.js';
import { ROOT_PATH } from '../storage/keys.js';
import type {
  CommitRequest,
  EntriesResponse,
  ExistsResponse,
  NamespacesResponse,
  TreeResponse,
} from '../storage/wire.js';
import { CommitRequestSchema } from '../storage/wire.js';

interface DriveParams {
  scheme: string;
  id: string;
}

interface FileParams extends DriveParams {
  namespace: string;
  '*': string;
}

interface UploadParams extends DriveParams {
  uploadId: string;
}

interface UploadFileParams extends UploadParams {
  '*': string;
}

const driveParams = {
  scheme: z.string().describe('Drive protocol without "://", e.g. "lit"'),
  id: z.string().describe('Drive id'),
};

const DriveParamsSchema = z.object(driveParams);
const FileParamsSchema = z.object({
  ...driveParams,
  namespace: z.string().describe('Component namespace'),
  '*': z.string().describe('Path relative to the namespace root'),
});
const UploadParamsSchema = z.object({ ...driveParams, uploadId: z.string().uuid() });
const UploadFileParamsSchema = UploadParamsSchema.extend({ '*': z.string() });

const KeyQuerySchema = z.object({
  namespace: z.string(),
  path: z.string(),
});

const EntriesQuerySchema = z.object({
  namespace: z.string().optional(),
  prefix: z.string().default(ROOT_PATH),
});

function identityOf(params: DriveParams): DriveIdentity {
  return parseDriveIdentifier(`${params.scheme}://${params.id}`);
}

const drivesRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  const maxFileBytes = fastify.config.storage.maxFileBytes;

  fastify.addContentTypeParser(
    'application/octet-stream',
    { parseAs: 'buffer', bodyLimit: maxFileBytes },
    (_request, body, parsed) => {
      parsed(null, body);
    }
  );

  fastify.get<{ Params: DriveParams; Reply: NamespacesResponse }>(
    '/drives/:scheme/:id/namespaces',
    {
      schema: {
        description: 'Component namespaces present in a drive',
        tags: ['Drive'],
        params: DriveParamsSchema,
      },
    },
    async (request) => {
      const backend = fastify.storage.forDrive(identityOf(request.params));
      return { namespaces: await backend.namespaces() };
    }
  );

  fastify.get<{
    Params: DriveParams;
    Querystring: z.infer<typeof EntriesQuerySchema>;
    Reply: EntriesResponse;
  }>(
    '/drives/:scheme/:id/entries',
    {
      schema: {
        description: 'List entries under a prefix, in one namespace or all of them',
        tags: ['Drive'],
        params: DriveParamsSchema,
        querystring: EntriesQuerySchema,
      },
    },
    async (request) => {
      const backend = fastify.storage.forDrive(identityOf(request.params));
      const { namespace, prefix } = request.query;
      return { entries: await backend.list(namespace ?? null, prefix) };
    }
  );

  fastify.get<{ Params: DriveParams; Querystring: z.infer<typeof KeyQuerySchema>; Reply: ExistsResponse }>(
    '/drives/:scheme/:id/exists',
    {
      schema: {
        description: 'Whether a path exists in a namespace',
        tags: ['Drive'],
        params: DriveParamsSchema,
        querystring: KeyQuerySchema,
      },
    },
    async (request) => {
      const backend = fastify.storage.forDrive(identityOf(request.params));
      return { exists: await backend.exists(request.query.namespace, request.query.path) };
    }
  );

  fastify.get<{ Params: DriveParams; Querystring: z.infer<typeof KeyQuerySchema>; Reply: TreeResponse }>(
    '/drives/:scheme/:id/tree',
    {
      schema: {
        description: 'Kind of a path and every file below it, for recursive downloads',
        tags: ['Drive'],
        params: DriveParamsSchema,
        querystring: KeyQuerySchema,
      },
    },
    async (request) => {
      const backend = fastify.storage.forDrive(identityOf(request.params));
      const { namespace, path } = request.query;
      const tree = await backend.tree(namespace, path);
      if (!tree) {
        throw new StorageNotFoundError(`${namespace}/${path}`);
      }
      return tree;
    }
  );

  fastify.get<{ Params: FileParams }>(
    '/drives/:scheme/:id/files/:namespace/*',
    {
      schema: {
        description: 'Download one file',
        tags: ['Drive'],
        params: FileParamsSchema,
      },
    },
    async (request, reply) => {
      const backend = fastify.storage.forDrive(identityOf(request.params));
      const { namespace, '*': path } = request.params;

      const kind = await backend.kind(namespace, path);
      if (kind === null) {
        throw new StorageNotFoundError(`${namespace}/${path}`);
      }
      if (kind === 'directory') {
        throw new StorageInvalidKeyError(`${path} is a directory, fetch its tree instead`);
      }

      return reply
        .status(200)
        .header('Content-Type', 'application/octet-stream')
        .send(createReadStream(backend.locate(namespace, path)));
    }
  );

  fastify.delete<{ Params: FileParams }>(
    '/drives/:scheme/:id/files/:namespace/*',
    {
      schema: {
        description: 'Delete a file or directory from a namespace',
        tags: ['Drive'],
        params: FileParamsSchema,
      },
    },
    async (request, reply) => {
      const backend = fastify.storage.forDrive(identityOf(request.params));
      const { namespace, '*': path } = request.params;
      await backend.delete(namespace, path);
      request.log.info({ drive: request.params.id, namespace, path }, 'Drive entry deleted');
      return reply.status(204).send();
    }
  );

  fastify.put<{ Params: UploadFileParams; Body: Buffer }>(
    '/drives/:scheme/:id/uploads/:uploadId/files/*',
    {
      schema: {
        description: 'Stage one file of an upload (application/octet-stream body)',
        tags: ['Drive'],
        params: UploadFileParamsSchema,
      },
      bodyLimit: maxFileBytes,
    },
    async (request, reply) => {
      const identity = identityOf(request.params);
      await fastify.storage.writeUpload(request.params.uploadId, request.params['*'], request.body);
      request.log.debug(
        { drive: identity.id, uploadId: request.params.uploadId, bytes: request.body.length },
        'Upload file staged'
      );
      return reply.status(204).send();
    }
  );

  fastify.post<{ Params: UploadParams; Body: CommitRequest }>(
    '/drives/:scheme/:id/uploads/:uploadId/commit',
    {
      schema: {
        description: 'Publish a staged upload into a namespace in one step',
        tags: ['Drive'],
        params: UploadParamsSchema,
        body: CommitRequestSchema,
      },
    },
    async (request, reply) => {
      const identity = identityOf(request.params);
      const { namespace, path, kind } = request.body;
      await fastify.storage.commitUpload(request.params.uploadId, identity, namespace, path, kind);
      request.log.info({ drive: identity.id, namespace, path, kind }, 'Drive entry published');
      return reply.status(204).send();
    }
  );

  done();
};

export const drivesRoutesPlugin = fp(drivesRoutes, {
  name: 'drives-routes',
  fastify: '5.x',
});
