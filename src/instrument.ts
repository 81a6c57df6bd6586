import * as Sentry from '@sentry/node';
import type { BaseLogger } from 'pino';

// Only initialize if DSN is provided
// This allows running the storage server without Sentry in development
export function initSentry(
  config: { dsn: string; environment: string; tracesSampleRate: number } | undefined,
  logger: BaseLogger
): void {
  if (!config) {
    logger.info('Sentry DSN not configured, error tracking disabled');
    return;
  }

  Sentry.init({
    dsn: config.dsn,
    environment: config.environment,
    tracesSampleRate: config.tracesSampleRate,
    // Capture unhandled promise rejections
    integrations: [Sentry.onUnhandledRejectionIntegration()],
  });

  logger.info({ environment: config.environment }, 'Sentry initialized');
}

// Re-export Sentry for use in error handler
export { Sentry };
