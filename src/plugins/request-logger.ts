import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

interface RequestLoggerOptions {
  isDev: boolean;
}

const requestLogger: FastifyPluginCallback<RequestLoggerOptions> = (fastify, options, done) => {
  const { isDev } = options;

  // Request bodies are file contents: only their size is ever logged
  fastify.addHook('onRequest', async (request) => {
    const logData: Record<string, unknown> = {
      method: request.method,
      url: request.url,
      contentLength: request.headers['content-length'],
    };
    if (isDev) {
      logData.userAgent = request.headers['user-agent'];
    }

    request.log.debug(logData, 'Incoming request');
  });

  fastify.addHook('onResponse', async (request, reply) => {
    const logData: Record<string, unknown> = {
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      responseTime: reply.elapsedTime,
    };

    // Log at appropriate level based on status code
    if (reply.statusCode >= 500) {
      request.log.error(logData, 'Request completed with server error');
    } else if (reply.statusCode >= 400) {
      request.log.warn(logData, 'Request completed with client error');
    } else {
      request.log.info(logData, 'Request completed');
    }
  });

  done();
};

export const requestLoggerPlugin = fp(requestLogger, {
  name: 'request-logger',
  fastify: '5.x',
});
