// This module parses process environment settings into one validated runtime configuration.

import { z } from 'zod';
import { AppError } from '../utils/errors.js';

export const DEFAULT_API_URL = 'https://api.proxybase.xyz';

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const envSchema = z.object({
  PROXYBASE_API_URL: z
    .string()
    .trim()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), { message: 'must be an http(s) URL' })
    .default(DEFAULT_API_URL),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(logLevelSchema)
    .default('info'),
  MCP_TRANSPORT: z.enum(['stdio', 'http']).default('stdio'),
  HOST: z.string().trim().min(1).default('127.0.0.1'),
  PORT: z.coerce.number().int().min(1).max(65_535).default(8080)
});

export type TransportMode = z.infer<typeof envSchema>['MCP_TRANSPORT'];

export interface AppConfig {
  apiUrl: string;
  logLevel: z.infer<typeof logLevelSchema>;
  transport: TransportMode;
  host: string;
  port: number;
}

// This helper treats empty variables as unset so shell exports like FOO= fall back to defaults.
function withoutEmptyValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value;
    }
  }
  return result;
}

// This function loads configuration and fails fast with every invalid key listed.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(withoutEmptyValues(env));

  if (!parsed.success) {
    const invalidKeys = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))];
    throw new AppError(
      500,
      'config_invalid',
      `Invalid configuration: ${invalidKeys.join(', ')}`,
      parsed.error.flatten().fieldErrors
    );
  }

  return {
    apiUrl: parsed.data.PROXYBASE_API_URL,
    logLevel: parsed.data.LOG_LEVEL,
    transport: parsed.data.MCP_TRANSPORT,
    host: parsed.data.HOST,
    port: parsed.data.PORT
  };
}
