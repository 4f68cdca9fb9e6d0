// This module defines the ProxyBase MCP tool contracts advertised through tools/list.

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { McpTool } from '../types/mcp.js';

const apiKeySchema = z.string().describe('Your ProxyBase API key (starts with pk_)');

// Optional arguments of the wrong type are treated as absent rather than rejected.
const payCurrencySchema = z
  .string()
  .optional()
  .catch(undefined)
  .describe("Cryptocurrency to pay with. Use list_currencies to get valid values. Defaults to 'usdttrc20'.");

export const registerAgentSchema = z.object({});

export const listPackagesSchema = z.object({
  api_key: apiKeySchema
});

export const listCurrenciesSchema = z.object({
  api_key: apiKeySchema
});

export const createOrderSchema = z.object({
  api_key: apiKeySchema,
  package_id: z.string().describe("The package ID to purchase (e.g., 'us_residential_1gb')"),
  pay_currency: payCurrencySchema,
  callback_url: z
    .string()
    .optional()
    .catch(undefined)
    .describe('Optional webhook URL to receive status notifications (payment confirmed, bandwidth 80%/95%, exhausted)')
});

export const checkOrderStatusSchema = z.object({
  api_key: apiKeySchema,
  order_id: z.string().describe('The order ID returned from create_order')
});

export const topupOrderSchema = z.object({
  api_key: apiKeySchema,
  order_id: z.string().describe('The order ID to top up'),
  package_id: z.string().describe("The bandwidth package to add (e.g., 'us_residential_1gb')"),
  pay_currency: payCurrencySchema
});

export const rotateProxySchema = z.object({
  api_key: apiKeySchema,
  order_id: z.string().describe('The order ID whose proxy should be rotated')
});

// This registry maps tool names to runtime schemas for MCP argument validation.
export const toolSchemas = {
  register_agent: registerAgentSchema,
  list_packages: listPackagesSchema,
  list_currencies: listCurrenciesSchema,
  create_order: createOrderSchema,
  check_order_status: checkOrderStatusSchema,
  topup_order: topupOrderSchema,
  rotate_proxy: rotateProxySchema
} as const;

export type ToolName = keyof typeof toolSchemas;

const toolDescriptions: Array<{ name: ToolName; description: string }> = [
  {
    name: 'register_agent',
    description:
      'Register a new AI agent with ProxyBase and receive an API key. This is the first step: you need an API key to use all other tools. The API key should be saved and reused for subsequent requests.'
  },
  {
    name: 'list_packages',
    description:
      'List all available proxy bandwidth packages with pricing. Each package includes a bandwidth allocation (in bytes), price (in USD), proxy type, and target country.'
  },
  {
    name: 'list_currencies',
    description:
      "List all available payment currencies (cryptocurrencies) that can be used for the pay_currency field when creating an order or topping up. These are the coins enabled on the payment provider's merchant account. You MUST call this before creating an order to know which pay_currency values are valid."
  },
  {
    name: 'create_order',
    description:
      'Create a new proxy order. This generates a cryptocurrency payment invoice. Once payment is confirmed via the blockchain, your SOCKS5 proxy credentials will be provisioned automatically. Poll check_order_status to monitor payment and get credentials.'
  },
  {
    name: 'check_order_status',
    description:
      'Check the current status of an order. Returns payment status, bandwidth usage, and SOCKS5 proxy credentials (host:port:username:password) once the proxy is active. Statuses: payment_pending → confirming → paid → proxy_active → bandwidth_exhausted.'
  },
  {
    name: 'topup_order',
    description:
      'Add more bandwidth to an existing order. Creates a new payment invoice for the additional bandwidth. The proxy credentials remain the same; only the bandwidth allowance increases. Can also reactivate an exhausted proxy.'
  },
  {
    name: 'rotate_proxy',
    description:
      "Rotate the proxy to get a fresh IP address. This calls the upstream partner's reset endpoint to invalidate the current session and assign a new IP. Only works on orders with proxy_active status. After rotation, your next SOCKS5 connection will use a new IP."
  }
];

// This helper converts one zod contract into a self-contained JSON Schema object.
function toInputSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  const jsonSchema: Record<string, unknown> = { required: [], ...zodToJsonSchema(schema, { $refStrategy: 'none' }) };
  delete jsonSchema.$schema;
  // Extra keys are ignored at call time, so the advertised contract does not forbid them.
  delete jsonSchema.additionalProperties;
  return jsonSchema;
}

// The catalog is built once at module load and never mutated afterwards.
const toolList: readonly McpTool[] = Object.freeze(
  toolDescriptions.map((entry) =>
    Object.freeze({
      name: entry.name,
      description: entry.description,
      inputSchema: toInputSchema(toolSchemas[entry.name])
    })
  )
);

// This helper exports MCP tool metadata so discovery always reflects the fixed tool surface.
export function buildToolList(): readonly McpTool[] {
  return toolList;
}

export function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(toolSchemas, name);
}
