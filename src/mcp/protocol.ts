// This module routes JSON-RPC requests to MCP lifecycle, discovery, and tool execution handlers.

import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import type { ProxyBaseClient } from '../proxybase/client.js';
import type { JsonRpcRequest, JsonRpcResponse, JsonRpcWireResponse, JsonValue, ToolCallResult } from '../types/mcp.js';
import { normalizeError } from '../utils/errors.js';
import { isJsonObject, toPrettyJson } from '../utils/json.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from '../version.js';
import {
  INTERNAL_ERROR,
  INVALID_REQUEST,
  METHOD_NOT_FOUND,
  decodeRequest,
  failureResponse,
  parseRequestLine,
  successResponse,
  toWireResponse
} from './codec.js';
import { buildToolList } from './tool-schemas.js';
import { executeTool } from './tools.js';

export interface McpDeps {
  client: ProxyBaseClient;
  logger: FastifyBaseLogger;
}

// This type reports the computed response and whether the transport must keep it off the wire.
export interface LineOutcome {
  response: JsonRpcResponse;
  notification: boolean;
}

export const SUPPORTED_METHODS = [
  'initialize',
  'ping',
  'tools/list',
  'tools/call',
  'notifications/initialized',
  'notifications/cancelled'
] as const;

// This helper reads tools/call params, falling back to an empty name and empty arguments.
function readToolCallParams(params: JsonValue | undefined): { name: string; args: JsonValue } {
  if (!isJsonObject(params)) {
    return { name: '', args: {} };
  }

  const name = typeof params.name === 'string' ? params.name : '';
  const args = isJsonObject(params.arguments) ? params.arguments : {};
  return { name, args };
}

// This function runs one tool and folds both outcomes into a tools/call result; tool failures are data.
async function callTool(name: string, args: JsonValue, deps: McpDeps): Promise<ToolCallResult> {
  try {
    const value = await executeTool(name, args, deps);
    return {
      content: [{ type: 'text', text: toPrettyJson(value) }]
    };
  } catch (error) {
    return {
      content: [{ type: 'text', text: normalizeError(error).message }],
      isError: true
    };
  }
}

// This function handles one decoded JSON-RPC request and always computes a response envelope.
export async function handleRpcRequest(request: JsonRpcRequest, deps: McpDeps): Promise<JsonRpcResponse> {
  const requestId = request.id ?? null;
  const startedAt = Date.now();
  const rpcTraceId = randomUUID();
  const logger = deps.logger;

  logger.info(
    {
      event: 'mcp_rpc_request_received',
      rpcTraceId,
      rpcRequestId: requestId,
      method: request.method,
      notification: request.id === undefined
    },
    'mcp_rpc_request_received'
  );

  try {
    switch (request.method) {
      case 'initialize': {
        return successResponse(requestId, {
          protocolVersion: MCP_PROTOCOL_VERSION,
          capabilities: {
            tools: {}
          },
          serverInfo: {
            name: MCP_SERVER_NAME,
            version: MCP_SERVER_VERSION
          }
        });
      }

      case 'ping': {
        return successResponse(requestId, {});
      }

      case 'tools/list': {
        return successResponse(requestId, {
          tools: buildToolList()
        });
      }

      case 'tools/call': {
        const { name, args } = readToolCallParams(request.params);

        logger.info(
          {
            event: 'mcp_tool_call_requested',
            rpcTraceId,
            rpcRequestId: requestId,
            toolName: name,
            arguments: sanitizeForLog(args)
          },
          'mcp_tool_call_requested'
        );

        const result = await callTool(name, args, { ...deps, logger: logger.child({ rpcTraceId }) });
        return successResponse(requestId, result);
      }

      // Cancellation is acknowledged only; there is no way to abort an in-flight backend call.
      case 'notifications/initialized':
      case 'notifications/cancelled': {
        return successResponse(requestId, null);
      }

      default:
        logger.warn(
          {
            event: 'mcp_method_not_found',
            rpcTraceId,
            rpcRequestId: requestId,
            method: request.method
          },
          'mcp_method_not_found'
        );
        return failureResponse(requestId, METHOD_NOT_FOUND, `Method not found: ${request.method}`);
    }
  } catch (error) {
    logger.error(
      {
        event: 'mcp_rpc_request_failed',
        rpcTraceId,
        rpcRequestId: requestId,
        method: request.method,
        error: errorForLog(error),
        durationMs: Date.now() - startedAt
      },
      'mcp_rpc_request_failed'
    );

    return failureResponse(requestId, INTERNAL_ERROR, normalizeError(error).message);
  } finally {
    logger.info(
      {
        event: 'mcp_rpc_request_completed',
        rpcTraceId,
        rpcRequestId: requestId,
        method: request.method,
        durationMs: Date.now() - startedAt
      },
      'mcp_rpc_request_completed'
    );
  }
}

// This function runs the decode-dispatch pipeline for one protocol line.
export async function handleRpcLine(line: string, deps: McpDeps): Promise<LineOutcome> {
  const decoded = parseRequestLine(line);
  if (!decoded.ok) {
    deps.logger.warn(
      {
        event: 'mcp_rpc_parse_failed',
        error: decoded.response.kind === 'failure' ? decoded.response.error.message : undefined
      },
      'mcp_rpc_parse_failed'
    );
    return { response: decoded.response, notification: false };
  }

  const response = await handleRpcRequest(decoded.request, deps);
  return { response, notification: decoded.request.id === undefined };
}

// This function registers streamable HTTP MCP routes that share the stdio dispatcher.
export function registerMcpRoutes(fastify: FastifyInstance, deps: McpDeps): void {
  fastify.get('/mcp', async () => {
    return {
      name: MCP_SERVER_NAME,
      transport: 'streamable-http',
      endpoint: '/mcp',
      methods: SUPPORTED_METHODS
    };
  });

  fastify.post('/mcp', async (request, reply) => {
    const requestLogger = request.log.child({ component: 'mcp' });
    const requestDeps: McpDeps = { ...deps, logger: requestLogger };
    const payload: unknown = request.body;

    if (payload === undefined || payload === null) {
      requestLogger.warn({ event: 'mcp_post_missing_payload' }, 'mcp_post_missing_payload');
      return reply
        .code(400)
        .send(toWireResponse(failureResponse(null, INVALID_REQUEST, 'Missing JSON-RPC request payload.')));
    }

    if (Array.isArray(payload)) {
      requestLogger.info({ event: 'mcp_post_batch_received', batchSize: payload.length }, 'mcp_post_batch_received');

      const responses: JsonRpcWireResponse[] = [];
      for (const item of payload) {
        const decoded = decodeRequest(item, INVALID_REQUEST);
        if (!decoded.ok) {
          responses.push(toWireResponse(decoded.response));
          continue;
        }

        const response = await handleRpcRequest(decoded.request, requestDeps);
        if (decoded.request.id !== undefined) {
          responses.push(toWireResponse(response));
        }
      }

      if (responses.length === 0) {
        return reply.code(202).send();
      }

      return reply.send(responses);
    }

    const decoded = decodeRequest(payload, INVALID_REQUEST);
    if (!decoded.ok) {
      requestLogger.warn({ event: 'mcp_post_invalid_request_object' }, 'mcp_post_invalid_request_object');
      return reply.code(400).send(toWireResponse(decoded.response));
    }

    const response = await handleRpcRequest(decoded.request, requestDeps);
    if (decoded.request.id === undefined) {
      return reply.code(202).send();
    }

    return reply.send(toWireResponse(response));
  });
}
