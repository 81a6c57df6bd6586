import { z } from 'zod';

export const ConfigSchema = z.object({
  server: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: z.number().int().min(1).max(65535).default(3000),
    })
    .default(() => ({ host: '0.0.0.0', port: 3000 })),

  logging: z
    .object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
      pretty: z.boolean().default(false),
    })
    .default(() => ({ level: 'info' as const, pretty: false })),

  // Optional Sentry integration (storage server only)
  sentry: z
    .object({
      dsn: z.string().url(),
      environment: z.string().default('development'),
      tracesSampleRate: z.number().min(0).max(1).default(0.1),
    })
    .optional(),

  // Environment mode
  env: z.enum(['development', 'production', 'test']).default('development'),

  // Rate limiting for the storage server
  rateLimit: z
    .object({
      global: z.number().int().min(1).default(1000),
      windowMs: z.number().int().min(1000).default(60000),
    })
    .default(() => ({ global: 1000, windowMs: 60000 })),

  // Storage backend used by workers (the storage server always serves `fs`)
  storage: z
    .object({
      /** Storage backend type */
      backend: z.enum(['fs', 'http']).default('fs'),
      /** Filesystem backend options */
      fs: z
        .object({
          /** Root directory shared by every drive (default: ./data/drive) */
          dataDir: z.string().default('./data/drive'),
        })
        .default(() => ({ dataDir: './data/drive' })),
      /** HTTP backend options */
      http: z
        .object({
          /** Storage server URL (default: http://localhost:3000) */
          baseUrl: z.string().url().default('http://localhost:3000'),
          /** Per-request timeout in milliseconds */
          timeoutMs: z.number().int().min(100).default(30000),
        })
        .default(() => ({ baseUrl: 'http://localhost:3000', timeoutMs: 30000 })),
      /** Largest single file the storage server accepts (default 100MB) */
      maxFileBytes: z.number().int().min(1).default(100 * 1024 * 1024),
    })
    .default(() => ({
      backend: 'fs' as const,
      fs: { dataDir: './data/drive' },
      http: { baseUrl: 'http://localhost:3000', timeoutMs: 30000 },
      maxFileBytes: 100 * 1024 * 1024,
    })),

  drive: z
    .object({
      /** Delay between backend checks while a get waits for a file */
      pollIntervalMs: z.number().int().min(10).max(60000).default(1000),
    })
    .default(() => ({ pollIntervalMs: 1000 })),
});

export type Config = z.infer<typeof ConfigSchema>;
