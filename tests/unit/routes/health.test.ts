import type { FastifyInstance } from 'fastify';
import fastify from 'fastify';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { healthRoutesPlugin } from '../../../src/routes/health.js';
import { FsStorage } from '../../../src/storage/fs-backend.js';
import { createWorkspace } from '../../helpers/workspace.js';
import type { Workspace } from '../../helpers/workspace.js';

/**
 * Helper to create a minimal Fastify server with health routes
 * over a filesystem store in a temporary directory.
 */
async function createHealthServer(storage: FsStorage): Promise<FastifyInstance> {
  const server = fastify({ logger: false });
  server.decorate('storage', storage);

  await server.register(healthRoutesPlugin);
  await server.ready();
  return server;
}

describe('Health Endpoint', () => {
  let server: FastifyInstance;
  let workspace: Workspace;
  let storage: FsStorage;

  beforeEach(async () => {
    workspace = await createWorkspace();
    storage = new FsStorage(workspace.dataDir);
  });

  afterEach(async () => {
    if (server) await server.close();
    await workspace.cleanup();
  });

  describe('Storage up (healthy)', () => {
    beforeEach(async () => {
      server = await createHealthServer(storage);
    });

    it('should return healthy status with HTTP 200', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json().status).toBe('healthy');
    });

    it('should report storage as up with latency', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      const body = response.json();
      expect(body.dependencies.storage.status).toBe('up');
      expect(body.dependencies.storage.latency).toBeGreaterThanOrEqual(0);
    });

    it('should include version, uptime and timestamp', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      const body = response.json();
      expect(body.version).toBe('1.0.0');
      expect(body.uptime).toBeGreaterThan(0);
      expect(new Date(body.timestamp).getTime()).not.toBeNaN();
    });
  });

  describe('Storage down (unhealthy)', () => {
    it('should return 503 when storage reports unhealthy', async () => {
      vi.spyOn(storage, 'healthy').mockResolvedValue(false);
      server = await createHealthServer(storage);

      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(503);
      const body = response.json();
      expect(body.status).toBe('unhealthy');
      expect(body.dependencies.storage.status).toBe('down');
    });

    it('should include the error message when the check throws', async () => {
      vi.spyOn(storage, 'healthy').mockRejectedValue(new Error('EACCES: permission denied'));
      server = await createHealthServer(storage);

      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(503);
      expect(response.json().dependencies.storage).toMatchObject({
        status: 'down',
        error: 'EACCES: permission denied',
      });
    });
  });
});
