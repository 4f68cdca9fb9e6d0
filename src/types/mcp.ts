// This file defines the JSON-RPC envelope and MCP payload types shared by both transports.

// This type models any JSON document the upstream API may return.
export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type JsonRpcId = string | number | boolean | null;

export interface JsonRpcRequest {
  jsonrpc: string;
  id?: JsonRpcId;
  method: string;
  params?: JsonValue;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: JsonValue;
}

// This union keeps result and error mutually exclusive until the envelope reaches the wire.
export type JsonRpcResponse =
  | { kind: 'success'; id: JsonRpcId; result: unknown }
  | { kind: 'failure'; id: JsonRpcId; error: JsonRpcError };

// This is the serialized response shape with optional result/error members.
export interface JsonRpcWireResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result?: unknown;
  error?: JsonRpcError;
}

export interface McpTool {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface ToolTextContent {
  type: 'text';
  text: string;
}

// This type captures the MCP tools/call result returned to the agent.
export interface ToolCallResult {
  content: ToolTextContent[];
  isError?: true;
}
