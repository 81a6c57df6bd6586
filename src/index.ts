import { bootstrap } from './bootstrap.js';
import { loadConfig } from './config/index.js';
import { ServerStartError } from './errors/index.js';

async function main(): Promise<void> {
  // Load and validate config (fails fast if invalid)
  const config = loadConfig();

  // Sentry, then the server
  const server = await bootstrap(config);

  // Start listening
  try {
    const address = await server.listen({
      host: config.server.host,
      port: config.server.port,
    });
    server.log.info(`Drive storage server listening at ${address}`);
  } catch (err) {
    server.log.error(
      new ServerStartError(err instanceof Error ? err.message : String(err)),
      'Failed to start server'
    );
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    server.log.info(`Received ${signal}, shutting down...`);
    await server.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
