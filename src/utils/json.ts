// This utility module keeps JSON parse/stringify operations safe and explicit.

import type { JsonObject, JsonValue } from '../types/mcp.js';
import { AppError, describeError } from './errors.js';

// This helper parses untrusted JSON text and emits a controlled "Parse error" on malformed content.
export function parseJson(value: string, statusCode: number, code: string): JsonValue {
  try {
    const parsed: JsonValue = JSON.parse(value);
    return parsed;
  } catch (error) {
    throw new AppError(statusCode, code, `Parse error: ${describeError(error)}`);
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// This helper renders one JSON value the way tool results are shown to agents.
export function toPrettyJson(value: unknown): string {
  return JSON.stringify(value, null, 2) ?? 'null';
}
