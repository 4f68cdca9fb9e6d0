// This module implements the MCP tool handlers: argument validation, currency checks, and backend calls.

import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import type { ProxyBaseClient } from '../proxybase/client.js';
import type { JsonValue } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';
import { isJsonObject } from '../utils/json.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { isToolName, toolSchemas, type ToolName } from './tool-schemas.js';

export interface ToolRuntimeContext {
  client: ProxyBaseClient;
  logger: FastifyBaseLogger;
}

type ToolHandler = (args: unknown, context: ToolRuntimeContext) => Promise<JsonValue>;

// This helper validates tool arguments and reports the first absent or non-string required key.
function parseArguments<T extends z.ZodTypeAny>(schema: T, args: unknown): z.infer<T> {
  const parsed = schema.safeParse(args);
  if (parsed.success) {
    return parsed.data;
  }

  const [firstIssue] = parsed.error.issues;
  const key = firstIssue?.path[0];
  if (key === undefined) {
    throw new AppError(400, 'validation_error', 'Tool arguments must be an object.', parsed.error.flatten());
  }

  throw new AppError(400, 'validation_error', `Missing required argument: ${String(key)}`, parsed.error.flatten());
}

// This helper checks a requested pay currency against the live list served by the backend.
async function assertSupportedCurrency(
  client: ProxyBaseClient,
  apiKey: string,
  payCurrency: string,
  logger: FastifyBaseLogger
): Promise<void> {
  const response = await client.listCurrencies(apiKey);
  const currencies = isJsonObject(response) ? response.currencies : undefined;

  // Without a currencies array there is nothing to check against; the order call decides.
  if (!Array.isArray(currencies)) {
    logger.warn(
      {
        event: 'currency_validation_skipped',
        payCurrency
      },
      'currency_validation_skipped'
    );
    return;
  }

  const supported = currencies.filter((entry): entry is string => typeof entry === 'string');
  const requested = payCurrency.toLowerCase();
  if (!supported.some((entry) => entry.toLowerCase() === requested)) {
    throw new AppError(
      400,
      'validation_error',
      `Invalid pay_currency: '${payCurrency}'. Supported currencies: ${supported.join(', ')}`
    );
  }
}

async function handleRegisterAgent(args: unknown, context: ToolRuntimeContext): Promise<JsonValue> {
  parseArguments(toolSchemas.register_agent, args);
  return context.client.registerAgent();
}

async function handleListPackages(args: unknown, context: ToolRuntimeContext): Promise<JsonValue> {
  const input = parseArguments(toolSchemas.list_packages, args);
  return context.client.listPackages(input.api_key);
}

async function handleListCurrencies(args: unknown, context: ToolRuntimeContext): Promise<JsonValue> {
  const input = parseArguments(toolSchemas.list_currencies, args);
  return context.client.listCurrencies(input.api_key);
}

// This function handles create_order and validates pay_currency before the invoice is created.
async function handleCreateOrder(args: unknown, context: ToolRuntimeContext): Promise<JsonValue> {
  const input = parseArguments(toolSchemas.create_order, args);

  if (input.pay_currency !== undefined) {
    await assertSupportedCurrency(context.client, input.api_key, input.pay_currency, context.logger);
  }

  return context.client.createOrder(input.api_key, {
    packageId: input.package_id,
    payCurrency: input.pay_currency,
    callbackUrl: input.callback_url
  });
}

async function handleCheckOrderStatus(args: unknown, context: ToolRuntimeContext): Promise<JsonValue> {
  const input = parseArguments(toolSchemas.check_order_status, args);
  return context.client.checkOrderStatus(input.api_key, input.order_id);
}

// This function handles topup_order with the same currency check as create_order.
async function handleTopupOrder(args: unknown, context: ToolRuntimeContext): Promise<JsonValue> {
  const input = parseArguments(toolSchemas.topup_order, args);

  if (input.pay_currency !== undefined) {
    await assertSupportedCurrency(context.client, input.api_key, input.pay_currency, context.logger);
  }

  return context.client.topupOrder(input.api_key, input.order_id, {
    packageId: input.package_id,
    payCurrency: input.pay_currency
  });
}

async function handleRotateProxy(args: unknown, context: ToolRuntimeContext): Promise<JsonValue> {
  const input = parseArguments(toolSchemas.rotate_proxy, args);
  return context.client.rotateProxy(input.api_key, input.order_id);
}

const toolHandlers: Record<ToolName, ToolHandler> = {
  register_agent: handleRegisterAgent,
  list_packages: handleListPackages,
  list_currencies: handleListCurrencies,
  create_order: handleCreateOrder,
  check_order_status: handleCheckOrderStatus,
  topup_order: handleTopupOrder,
  rotate_proxy: handleRotateProxy
};

// This function dispatches one tool call and returns the raw backend value; failures are thrown as AppError.
export async function executeTool(toolName: string, args: unknown, context: ToolRuntimeContext): Promise<JsonValue> {
  const startedAt = Date.now();
  context.logger.info(
    {
      event: 'mcp_tool_execution_started',
      toolName,
      args: sanitizeForLog(args)
    },
    'mcp_tool_execution_started'
  );

  if (!isToolName(toolName)) {
    context.logger.warn(
      {
        event: 'mcp_tool_not_found',
        toolName
      },
      'mcp_tool_not_found'
    );
    throw new AppError(404, 'tool_not_found', `Unknown tool: ${toolName}`);
  }

  try {
    const result = await toolHandlers[toolName](args, context);

    context.logger.info(
      {
        event: 'mcp_tool_execution_completed',
        toolName,
        durationMs: Date.now() - startedAt
      },
      'mcp_tool_execution_completed'
    );

    return result;
  } catch (error) {
    context.logger.error(
      {
        event: 'mcp_tool_execution_failed',
        toolName,
        durationMs: Date.now() - startedAt,
        error: errorForLog(error)
      },
      'mcp_tool_execution_failed'
    );
    throw error;
  }
}
