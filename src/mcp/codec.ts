// This module decodes JSON-RPC request envelopes and collapses tagged responses into their wire shape.

import { z } from 'zod';
import type { JsonRpcError, JsonRpcId, JsonRpcRequest, JsonRpcResponse, JsonRpcWireResponse, JsonValue } from '../types/mcp.js';
import { normalizeError } from '../utils/errors.js';
import { parseJson } from '../utils/json.js';

export const PARSE_ERROR = -32700;
export const INVALID_REQUEST = -32600;
export const METHOD_NOT_FOUND = -32601;
export const INTERNAL_ERROR = -32603;

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.null(), z.boolean(), z.number(), z.string(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

const requestSchema = z.object({
  jsonrpc: z.string(),
  id: z.union([z.string(), z.number(), z.boolean(), z.null()]).optional(),
  method: z.string(),
  params: jsonValueSchema.optional()
});

export type DecodeResult = { ok: true; request: JsonRpcRequest } | { ok: false; response: JsonRpcResponse };

export function successResponse(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return { kind: 'success', id, result };
}

export function failureResponse(id: JsonRpcId, code: number, message: string, data?: JsonValue): JsonRpcResponse {
  const error: JsonRpcError = data === undefined ? { code, message } : { code, message, data };
  return { kind: 'failure', id, error };
}

// This helper names the first structural problem so parse errors stay actionable for the peer.
function describeIssues(error: z.ZodError): string {
  const [issue] = error.issues;
  if (!issue) {
    return 'invalid request';
  }

  const path = issue.path.length > 0 ? issue.path.join('.') : 'request';
  return `${path}: ${issue.message}`;
}

// This function validates an already-parsed payload as a JSON-RPC request object.
export function decodeRequest(payload: unknown, errorCode = PARSE_ERROR): DecodeResult {
  const prefix = errorCode === PARSE_ERROR ? 'Parse error' : 'Invalid Request';
  let parsed: ReturnType<typeof requestSchema.safeParse>;
  try {
    parsed = requestSchema.safeParse(payload);
  } catch (error) {
    // Nesting deep enough to exhaust the stack in the recursive value schema only fails this payload.
    return { ok: false, response: failureResponse(null, errorCode, `${prefix}: ${normalizeError(error).message}`) };
  }

  if (!parsed.success) {
    return { ok: false, response: failureResponse(null, errorCode, `${prefix}: ${describeIssues(parsed.error)}`) };
  }

  const { jsonrpc, id, method, params } = parsed.data;
  const request: JsonRpcRequest = { jsonrpc, method };
  // An absent id marks a notification, so the key is only copied when present.
  if (id !== undefined) {
    request.id = id;
  }
  if (params !== undefined) {
    request.params = params;
  }

  return { ok: true, request };
}

// This function decodes one protocol line; malformed JSON yields a parse-error response with a null id.
export function parseRequestLine(line: string): DecodeResult {
  let payload: JsonValue;
  try {
    payload = parseJson(line, 400, 'parse_error');
  } catch (error) {
    const appError = normalizeError(error);
    return { ok: false, response: failureResponse(null, PARSE_ERROR, appError.message) };
  }

  return decodeRequest(payload);
}

// This function converts a tagged response into the wire envelope with exactly one of result/error.
export function toWireResponse(response: JsonRpcResponse): JsonRpcWireResponse {
  if (response.kind === 'success') {
    return { jsonrpc: '2.0', id: response.id, result: response.result };
  }

  return { jsonrpc: '2.0', id: response.id, error: response.error };
}

// This function serializes a response as one line without embedded newlines.
export function encodeResponse(response: JsonRpcResponse): string {
  const wire = toWireResponse(response);
  // A success result of undefined would drop the member entirely, so it is pinned to null.
  if (response.kind === 'success' && response.result === undefined) {
    wire.result = null;
  }
  return JSON.stringify(wire);
}
