// This test suite drives the stdio transport with in-memory streams to verify framing and ordering.

import { PassThrough, Writable } from 'node:stream';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { runStdioTransport } from '../src/mcp/stdio.js';
import { captureLogger, makeDeps, stubBackend } from './support/backend.js';

// This helper collects everything written to the protocol stream.
function collectingOutput(): { output: Writable; chunks: string[] } {
  const chunks: string[] = [];
  const output = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    }
  });
  return { output, chunks };
}

describe('stdio transport', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('writes one line per answered request, in input order', async () => {
    const input = new PassThrough();
    const { output, chunks } = collectingOutput();
    const running = runStdioTransport({ input, output }, makeDeps());

    input.write('{"jsonrpc":"2.0","id":2,"method":"initialize"}\n');
    input.write('\n   \n');
    input.write('{"jsonrpc":"2.0","method":"notifications/initialized"}\n');
    input.write('not json at all\n');
    input.end('  {"jsonrpc":"2.0","id":3,"method":"bogus/method"}  \r\n');

    const summary = await running;

    expect(summary).toEqual({ linesRead: 4, responsesWritten: 3, notificationsSuppressed: 1 });
    expect(chunks).toHaveLength(3);
    for (const chunk of chunks) {
      expect(chunk.endsWith('\n')).toBe(true);
      expect(chunk.slice(0, -1).includes('\n')).toBe(false);
    }

    const [first, second, third] = chunks.map((chunk) => JSON.parse(chunk));
    expect(first.id).toBe(2);
    expect(first.result.serverInfo.name).toBe('proxybase-mcp');
    expect(second).toMatchObject({ jsonrpc: '2.0', id: null, error: { code: -32700 } });
    expect(third).toEqual({
      jsonrpc: '2.0',
      id: 3,
      error: { code: -32601, message: 'Method not found: bogus/method' }
    });
  });

  it('processes id-less tool calls without answering them', async () => {
    const fetchMock = stubBackend({ 'POST /v1/agents': { status: 201, body: { api_key: 'pk_test' } } });
    const { logger, records } = captureLogger();
    const input = new PassThrough();
    const { output, chunks } = collectingOutput();
    const running = runStdioTransport({ input, output }, makeDeps(logger));

    input.end('{"jsonrpc":"2.0","method":"tools/call","params":{"name":"register_agent","arguments":{}}}\n');
    const summary = await running;

    expect(chunks).toEqual([]);
    expect(summary.notificationsSuppressed).toBe(1);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(records.find((record) => record.event === 'mcp_rpc_request_received')).toMatchObject({
      method: 'tools/call',
      notification: true
    });
  });

  it('waits for each backend round-trip before reading the next line', async () => {
    stubBackend({
      'GET /v1/packages': { body: { packages: ['first'] } },
      'GET /v1/currencies': { body: { currencies: ['btc'] } }
    });
    const input = new PassThrough();
    const { output, chunks } = collectingOutput();
    const running = runStdioTransport({ input, output }, makeDeps());

    input.write(
      '{"jsonrpc":"2.0","id":"a","method":"tools/call","params":{"name":"list_packages","arguments":{"api_key":"pk_test"}}}\n'
    );
    input.write('{"jsonrpc":"2.0","id":"b","method":"ping"}\n');
    input.end(
      '{"jsonrpc":"2.0","id":"c","method":"tools/call","params":{"name":"list_currencies","arguments":{"api_key":"pk_test"}}}\n'
    );
    await running;

    expect(chunks.map((chunk) => JSON.parse(chunk).id)).toEqual(['a', 'b', 'c']);
  });

  it('keeps log output off the protocol stream', async () => {
    const { logger, records } = captureLogger();
    const input = new PassThrough();
    const { output, chunks } = collectingOutput();
    const running = runStdioTransport({ input, output }, makeDeps(logger));

    input.end('{"jsonrpc":"2.0","id":1,"method":"ping"}\n');
    await running;

    expect(chunks).toEqual(['{"jsonrpc":"2.0","id":1,"result":{}}\n']);
    expect(records.map((record) => record.event)).toContain('stdio_transport_stopped');
  });

  it('answers a line nested past the stack limit and keeps serving', async () => {
    const input = new PassThrough();
    const { output, chunks } = collectingOutput();
    const running = runStdioTransport({ input, output }, makeDeps());

    const depth = 20000;
    input.write(`{"jsonrpc":"2.0","id":1,"method":"ping","params":${'['.repeat(depth)}${']'.repeat(depth)}}\n`);
    input.end('{"jsonrpc":"2.0","id":2,"method":"ping"}\n');
    const summary = await running;

    expect(summary).toEqual({ linesRead: 2, responsesWritten: 2, notificationsSuppressed: 0 });
    expect(JSON.parse(chunks[0] ?? '')).toMatchObject({ jsonrpc: '2.0', id: null, error: { code: -32700 } });
    expect(chunks[1]).toBe('{"jsonrpc":"2.0","id":2,"result":{}}\n');
  });

  it('logs a read failure and stops the loop', async () => {
    const { logger, records } = captureLogger();
    const input = new PassThrough();
    const { output, chunks } = collectingOutput();
    const running = runStdioTransport({ input, output }, makeDeps(logger));

    input.destroy(new Error('EIO read'));
    const summary = await running;

    expect(summary.streamError?.message).toBe('EIO read');
    expect(summary.linesRead).toBe(0);
    expect(chunks).toEqual([]);
    expect(records.find((record) => record.event === 'stdio_transport_stream_failed')).toMatchObject({
      level: 50,
      error: { name: 'Error', message: 'EIO read' }
    });
  });
});
