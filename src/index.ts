#!/usr/bin/env node
// This is the process entrypoint that selects the transport and handles graceful shutdown.

import { loadConfig } from './config/env.js';
import { runStdioTransport } from './mcp/stdio.js';
import { ProxyBaseClient } from './proxybase/client.js';
import { createServer } from './server.js';
import { createLogger, errorForLog } from './utils/logger.js';
import { MCP_SERVER_NAME, MCP_SERVER_VERSION } from './version.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const client = new ProxyBaseClient(config.apiUrl, logger);

  logger.info(
    {
      event: 'server_starting',
      name: MCP_SERVER_NAME,
      version: MCP_SERVER_VERSION,
      backend: config.apiUrl,
      transport: config.transport
    },
    'server_starting'
  );

  if (config.transport === 'http') {
    const app = createServer({ client, logger });

    // This helper closes the listener before exiting so in-flight requests can finish.
    const shutdown = async (signal: string): Promise<void> => {
      app.log.info({ event: 'shutdown_started', signal }, 'shutdown_started');
      await app.close();
      app.log.info({ event: 'shutdown_completed', signal }, 'shutdown_completed');
      process.exit(0);
    };

    process.on('SIGTERM', () => {
      void shutdown('SIGTERM');
    });
    process.on('SIGINT', () => {
      void shutdown('SIGINT');
    });

    await app.listen({ host: config.host, port: config.port });
    app.log.info({ event: 'server_started', host: config.host, port: config.port }, 'server_started');
    return;
  }

  const summary = await runStdioTransport({ input: process.stdin, output: process.stdout }, { client, logger });
  logger.info({ event: 'server_shutting_down' }, 'server_shutting_down');
  process.exit(summary.streamError ? 1 : 0);
}

main().catch((error: unknown) => {
  // The logger may not exist yet when configuration fails, so this path writes to stderr directly.
  process.stderr.write(`${JSON.stringify({ event: 'server_start_failed', error: errorForLog(error) })}\n`);
  process.exit(1);
});
