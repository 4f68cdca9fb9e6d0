// This module implements the newline-delimited stdio transport: one request per input line, one response per output line.

import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { errorForLog } from '../utils/logger.js';
import { normalizeError } from '../utils/errors.js';
import { INTERNAL_ERROR, encodeResponse, failureResponse } from './codec.js';
import { handleRpcLine, type LineOutcome, type McpDeps } from './protocol.js';

export interface StdioTransportOptions {
  input: Readable;
  output: Writable;
}

export interface StdioTransportSummary {
  linesRead: number;
  responsesWritten: number;
  notificationsSuppressed: number;
  streamError?: Error;
}

// This helper writes one response line and resolves once the stream has accepted it.
function writeLine(output: Writable, line: string): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(`${line}\n`, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

// This helper confines a failure while handling one line to that line's response.
async function handleLineSafely(line: string, deps: McpDeps): Promise<LineOutcome> {
  try {
    return await handleRpcLine(line, deps);
  } catch (error) {
    deps.logger.error(
      {
        event: 'stdio_transport_line_failed',
        error: errorForLog(error)
      },
      'stdio_transport_line_failed'
    );
    return { response: failureResponse(null, INTERNAL_ERROR, normalizeError(error).message), notification: false };
  }
}

// This function processes input lines strictly in order until end of stream or a read failure.
export async function runStdioTransport(options: StdioTransportOptions, deps: McpDeps): Promise<StdioTransportSummary> {
  const summary: StdioTransportSummary = {
    linesRead: 0,
    responsesWritten: 0,
    notificationsSuppressed: 0
  };

  const lines = createInterface({
    input: options.input,
    crlfDelay: Infinity
  });

  deps.logger.info({ event: 'stdio_transport_started' }, 'stdio_transport_started');

  try {
    for await (const rawLine of lines) {
      const line = rawLine.trim();
      if (line.length === 0) {
        continue;
      }

      summary.linesRead += 1;
      const outcome = await handleLineSafely(line, deps);

      // Notifications are fully processed but never answered.
      if (outcome.notification) {
        summary.notificationsSuppressed += 1;
        continue;
      }

      await writeLine(options.output, encodeResponse(outcome.response));
      summary.responsesWritten += 1;
    }
  } catch (error) {
    summary.streamError = error instanceof Error ? error : new Error(String(error));
    deps.logger.error(
      {
        event: 'stdio_transport_stream_failed',
        error: errorForLog(error)
      },
      'stdio_transport_stream_failed'
    );
  } finally {
    lines.close();
  }

  deps.logger.info(
    {
      event: 'stdio_transport_stopped',
      linesRead: summary.linesRead,
      responsesWritten: summary.responsesWritten,
      notificationsSuppressed: summary.notificationsSuppressed
    },
    'stdio_transport_stopped'
  );

  return summary;
}
