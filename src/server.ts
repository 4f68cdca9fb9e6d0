// This module wires the optional HTTP transport: MCP routes, request logging hooks, and error mapping.

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import { PARSE_ERROR, failureResponse, toWireResponse } from './mcp/codec.js';
import { registerMcpRoutes } from './mcp/protocol.js';
import type { ProxyBaseClient } from './proxybase/client.js';
import { AppError, normalizeError } from './utils/errors.js';
import { errorForLog, sanitizeForLog } from './utils/logger.js';
import { MCP_SERVER_NAME, MCP_SERVER_VERSION } from './version.js';

export interface ServerOptions {
  client: ProxyBaseClient;
  logger: FastifyBaseLogger;
}

// This function builds and configures the HTTP application around the shared MCP dispatcher.
export function createServer(options: ServerOptions): FastifyInstance {
  const app = Fastify({
    logger: options.logger,
    bodyLimit: 1024 * 1024
  });

  // This hook logs response completion including status and duration for request tracing.
  app.addHook('onResponse', async (request, reply) => {
    request.log.info(
      {
        event: 'http_request_complete',
        requestId: request.id,
        statusCode: reply.statusCode,
        method: request.method,
        path: request.url,
        durationMs: reply.elapsedTime
      },
      'http_request_complete'
    );
  });

  // This endpoint exposes a lightweight liveness signal.
  app.get('/health', async () => {
    return {
      status: 'ok',
      name: MCP_SERVER_NAME,
      version: MCP_SERVER_VERSION
    };
  });

  registerMcpRoutes(app, { client: options.client, logger: app.log });

  app.setErrorHandler((error, request, reply) => {
    // Unparseable MCP bodies are answered in JSON-RPC terms, like malformed stdio lines.
    if (request.url.startsWith('/mcp') && error.statusCode === 400) {
      request.log.warn(
        {
          event: 'mcp_post_unparseable_body',
          requestId: request.id,
          error: errorForLog(error)
        },
        'mcp_post_unparseable_body'
      );
      return reply.status(400).send(toWireResponse(failureResponse(null, PARSE_ERROR, `Parse error: ${error.message}`)));
    }

    const normalized = normalizeError(error);
    request.log.error(
      {
        event: 'http_request_failed',
        requestId: request.id,
        code: normalized.code,
        details: sanitizeForLog(normalized.details),
        error: errorForLog(error)
      },
      'http_request_failed'
    );

    return reply.status(normalized.statusCode).send({
      ok: false,
      error: {
        code: normalized.code,
        message: normalized.message
      }
    });
  });

  app.setNotFoundHandler((request, reply) => {
    const error = new AppError(404, 'not_found', `Route not found: ${request.method} ${request.url}`);

    request.log.warn(
      {
        event: 'http_route_not_found',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_route_not_found'
    );

    return reply.status(404).send({
      ok: false,
      error: {
        code: error.code,
        message: error.message
      }
    });
  });

  return app;
}
