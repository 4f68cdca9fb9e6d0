// This test suite verifies the advertised tool catalog and its JSON Schema contracts.

import { describe, expect, it } from 'vitest';
import { buildToolList, isToolName, toolSchemas } from '../src/mcp/tool-schemas.js';

const EXPECTED_TOOLS = [
  'register_agent',
  'list_packages',
  'list_currencies',
  'create_order',
  'check_order_status',
  'topup_order',
  'rotate_proxy'
];

function findTool(name: string) {
  const tool = buildToolList().find((entry) => entry.name === name);
  if (!tool) {
    throw new Error(`tool ${name} missing from catalog`);
  }
  return tool;
}

describe('tool catalog', () => {
  it('lists exactly the seven tools in a stable order', () => {
    expect(buildToolList().map((tool) => tool.name)).toEqual(EXPECTED_TOOLS);
  });

  it('gives every tool a description and an object input schema', () => {
    for (const tool of buildToolList()) {
      expect(tool.description.length).toBeGreaterThan(0);
      expect(tool.inputSchema.type).toBe('object');
      expect(tool.inputSchema).toHaveProperty('properties');
      expect(tool.inputSchema).not.toHaveProperty('$schema');
      expect(tool.inputSchema).not.toHaveProperty('additionalProperties');
    }
  });

  it('declares required string arguments per tool', () => {
    expect(findTool('register_agent').inputSchema.required).toEqual([]);
    expect(findTool('list_packages').inputSchema.required).toEqual(['api_key']);
    expect(findTool('list_currencies').inputSchema.required).toEqual(['api_key']);
    expect(findTool('create_order').inputSchema.required).toEqual(['api_key', 'package_id']);
    expect(findTool('check_order_status').inputSchema.required).toEqual(['api_key', 'order_id']);
    expect(findTool('topup_order').inputSchema.required).toEqual(['api_key', 'order_id', 'package_id']);
    expect(findTool('rotate_proxy').inputSchema.required).toEqual(['api_key', 'order_id']);
  });

  it('advertises optional payment fields as plain strings', () => {
    const properties = findTool('create_order').inputSchema.properties;
    const propertyNames = typeof properties === 'object' && properties !== null ? Object.keys(properties) : [];
    expect(propertyNames).toEqual(['api_key', 'package_id', 'pay_currency', 'callback_url']);
    expect(properties).toMatchObject({
      api_key: { type: 'string', description: 'Your ProxyBase API key (starts with pk_)' },
      pay_currency: { type: 'string' },
      callback_url: { type: 'string' }
    });
  });

  it('returns the same frozen catalog on every call', () => {
    const first = buildToolList();
    expect(buildToolList()).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first[0])).toBe(true);
  });

  it('keeps the runtime schema registry aligned with the catalog', () => {
    expect(Object.keys(toolSchemas)).toEqual(EXPECTED_TOOLS);
    expect(isToolName('create_order')).toBe(true);
    expect(isToolName('toString')).toBe(false);
  });

  it('treats optional arguments of the wrong type as absent', () => {
    const parsed = toolSchemas.create_order.parse({
      api_key: 'pk_test',
      package_id: 'us_residential_1gb',
      pay_currency: 42
    });

    expect(parsed).toEqual({ api_key: 'pk_test', package_id: 'us_residential_1gb', pay_currency: undefined });
  });
});
