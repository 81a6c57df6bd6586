import type { FastifyPluginCallback, FastifyError } from 'fastify';
import fp from 'fastify-plugin';

import { Sentry } from '../instrument.js';

interface ErrorHandlerOptions {
  isDev: boolean;
}

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    statusCode: number;
    stack?: string;
  };
  requestId: string;
  timestamp: string;
}

const errorHandler: FastifyPluginCallback<ErrorHandlerOptions> = (fastify, options, done) => {
  const { isDev } = options;

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    // Schema validation failures carry no status of their own
    const statusCode = error.validation ? 400 : (error.statusCode ?? 500);
    const code = error.validation ? 'VALIDATION_ERROR' : (error.code ?? 'INTERNAL_ERROR');

    const logData = { err: error, code, statusCode, params: request.params };
    if (statusCode >= 500) {
      request.log.error(logData, 'Request error');
      Sentry.captureException(error, {
        extra: {
          requestId: request.id,
          url: request.url,
          method: request.method,
        },
      });
    } else {
      // Drive and storage errors are expected outcomes (missing file, duplicate, ...)
      request.log.info(logData, 'Request rejected');
    }

    const response: ErrorResponse = {
      error: {
        code,
        message: isDev ? error.message : sanitizeMessage(error.message, code, statusCode),
        statusCode,
        // Only include stack in development
        ...(isDev && error.stack && { stack: error.stack }),
      },
      requestId: request.id,
      timestamp: new Date().toISOString(),
    };

    return reply.status(statusCode).send(response);
  });

  // Handle 404 not found with consistent format
  fastify.setNotFoundHandler((request, reply) => {
    const response: ErrorResponse = {
      error: {
        code: 'NOT_FOUND',
        message: `Route ${request.method}:${request.url} not found`,
        statusCode: 404,
      },
      requestId: request.id,
      timestamp: new Date().toISOString(),
    };

    request.log.warn({ method: request.method, url: request.url }, 'Route not found');

    return reply.status(404).send(response);
  });

  done();
};

function sanitizeMessage(message: string, code: string, statusCode: number): string {
  // Drive and storage messages name paths and namespaces the caller sent
  if (code.startsWith('DRIVE_') || code.startsWith('STORAGE_')) {
    return statusCode >= 500 ? 'Storage is unavailable' : message;
  }
  if (statusCode === 429 || code === 'VALIDATION_ERROR') {
    return message;
  }
  if (statusCode >= 500) {
    return 'An internal error occurred';
  }
  return message;
}

export const errorHandlerPlugin = fp(errorHandler, {
  name: 'error-handler',
  fastify: '5.x',
});
