// This module centralizes server identity values so protocol metadata and tools stay in sync.

export const MCP_SERVER_NAME = 'proxybase-mcp';
export const MCP_SERVER_VERSION = '0.1.0';
export const MCP_PROTOCOL_VERSION = '2024-11-05';

// This value identifies the bridge to the upstream API in request headers.
export const USER_AGENT = `${MCP_SERVER_NAME}/${MCP_SERVER_VERSION}`;
