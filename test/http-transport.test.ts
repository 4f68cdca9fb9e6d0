// This test suite exercises the HTTP transport in-process through Fastify injection.

import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createServer } from '../src/server.js';
import { makeDeps, stubBackend } from './support/backend.js';

describe('http transport', () => {
  let app: FastifyInstance;

  beforeEach(() => {
    app = createServer(makeDeps());
  });

  afterEach(async () => {
    await app.close();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('reports liveness', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok', name: 'proxybase-mcp', version: '0.1.0' });
  });

  it('describes the MCP endpoint', async () => {
    const response = await app.inject({ method: 'GET', url: '/mcp' });

    expect(response.json()).toMatchObject({ name: 'proxybase-mcp', transport: 'streamable-http', endpoint: '/mcp' });
    expect(response.json().methods).toContain('tools/call');
  });

  it('answers a single request', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/mcp',
      payload: { jsonrpc: '2.0', id: 1, method: 'initialize' }
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      jsonrpc: '2.0',
      id: 1,
      result: { protocolVersion: '2024-11-05', serverInfo: { name: 'proxybase-mcp' } }
    });
  });

  it('accepts notifications without a body', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/mcp',
      payload: { jsonrpc: '2.0', method: 'notifications/initialized' }
    });

    expect(response.statusCode).toBe(202);
    expect(response.body).toBe('');
  });

  it('answers batches in order and skips notifications', async () => {
    stubBackend({ 'GET /v1/packages': { body: { packages: [] } } });

    const response = await app.inject({
      method: 'POST',
      url: '/mcp',
      payload: [
        { jsonrpc: '2.0', id: 'a', method: 'tools/call', params: { name: 'list_packages', arguments: { api_key: 'pk_test' } } },
        { jsonrpc: '2.0', method: 'notifications/initialized' },
        { jsonrpc: '2.0', id: 'b', method: 'resources/list' },
        { id: 'c' }
      ]
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body).toHaveLength(3);
    expect(body[0]).toEqual({
      jsonrpc: '2.0',
      id: 'a',
      result: { content: [{ type: 'text', text: JSON.stringify({ packages: [] }, null, 2) }] }
    });
    expect(body[1]).toEqual({ jsonrpc: '2.0', id: 'b', error: { code: -32601, message: 'Method not found: resources/list' } });
    expect(body[2]).toMatchObject({ id: null, error: { code: -32600 } });
  });

  it('rejects objects that are not requests', async () => {
    const response = await app.inject({ method: 'POST', url: '/mcp', payload: { hello: 'world' } });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ jsonrpc: '2.0', id: null, error: { code: -32600 } });
  });

  it('maps unparseable bodies to a JSON-RPC parse error', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/mcp',
      headers: { 'content-type': 'application/json' },
      payload: '{"jsonrpc":"2.0",'
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ jsonrpc: '2.0', id: null, error: { code: -32700 } });
  });

  it('returns a structured 404 for unknown routes', async () => {
    const response = await app.inject({ method: 'GET', url: '/nope' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      ok: false,
      error: { code: 'not_found', message: 'Route not found: GET /nope' }
    });
  });
});
