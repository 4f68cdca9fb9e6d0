// This module wraps ProxyBase API calls with one request per operation and uniform response classification.

import type { FastifyBaseLogger } from 'fastify';
import type { JsonValue } from '../types/mcp.js';
import { AppError, describeError } from '../utils/errors.js';
import { parseJson } from '../utils/json.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { USER_AGENT } from '../version.js';

export const API_KEY_HEADER = 'X-API-Key';

export interface CreateOrderInput {
  packageId: string;
  payCurrency?: string;
  callbackUrl?: string;
}

export interface TopupOrderInput {
  packageId: string;
  payCurrency?: string;
}

interface RequestOptions {
  apiKey?: string;
  body?: Record<string, string>;
}

// This helper drops unset optional fields so the upstream applies its own defaults.
function compactBody(fields: Record<string, string | undefined>): Record<string, string> {
  const body: Record<string, string> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      body[key] = value;
    }
  }
  return body;
}

// This class executes ProxyBase REST operations; business logic stays upstream.
export class ProxyBaseClient {
  private readonly baseUrl: string;
  private readonly logger?: FastifyBaseLogger;

  public constructor(baseUrl: string, logger?: FastifyBaseLogger) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.logger = logger?.child({
      component: 'proxybase_client'
    });
  }

  // This helper writes one structured client event only when a logger is available.
  private log(
    level: 'debug' | 'info' | 'warn' | 'error',
    event: string,
    details?: Record<string, unknown>
  ): void {
    this.logger?.[level](
      {
        event,
        ...details
      },
      event
    );
  }

  // This helper builds one order-scoped path with the identifier safely encoded.
  private orderPath(orderId: string, action: 'status' | 'topup' | 'rotate'): string {
    return `/v1/orders/${encodeURIComponent(orderId)}/${action}`;
  }

  // This helper executes one HTTP request and classifies transport, parse, and status failures.
  private async request(method: 'GET' | 'POST', path: string, options: RequestOptions = {}): Promise<JsonValue> {
    const startedAt = Date.now();
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': USER_AGENT
    };

    if (options.apiKey !== undefined) {
      headers[API_KEY_HEADER] = options.apiKey;
    }

    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    this.log('info', 'proxybase_request_started', {
      method,
      path,
      authenticated: options.apiKey !== undefined,
      body: sanitizeForLog(options.body)
    });

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined
      });
    } catch (error) {
      this.log('error', 'proxybase_request_failed_transport', {
        method,
        path,
        durationMs: Date.now() - startedAt,
        error: errorForLog(error)
      });
      throw new AppError(502, 'proxybase_unreachable', `HTTP error: ${describeError(error)}`);
    }

    // The body is decoded before the status check, so a non-JSON error page reports as a parse failure.
    let payload: JsonValue;
    try {
      payload = parseJson(await response.text(), 502, 'proxybase_invalid_response');
    } catch (error) {
      this.log('error', 'proxybase_request_invalid_body', {
        method,
        path,
        status: response.status,
        durationMs: Date.now() - startedAt,
        error: errorForLog(error)
      });

      if (error instanceof AppError) {
        throw error;
      }
      throw new AppError(502, 'proxybase_invalid_response', `Parse error: ${describeError(error)}`);
    }

    if (!response.ok) {
      const statusLabel = response.statusText ? `${response.status} ${response.statusText}` : String(response.status);
      this.log('error', 'proxybase_request_http_error', {
        method,
        path,
        status: response.status,
        durationMs: Date.now() - startedAt,
        bodyPreview: sanitizeForLog(payload)
      });
      throw new AppError(
        response.status,
        'proxybase_api_error',
        `API error (${statusLabel}): ${JSON.stringify(payload)}`,
        payload
      );
    }

    this.log('info', 'proxybase_request_completed', {
      method,
      path,
      status: response.status,
      durationMs: Date.now() - startedAt
    });
    return payload;
  }

  // This method registers a new agent and returns the issued API key payload.
  public async registerAgent(): Promise<JsonValue> {
    return this.request('POST', '/v1/agents');
  }

  public async listPackages(apiKey: string): Promise<JsonValue> {
    return this.request('GET', '/v1/packages', { apiKey });
  }

  public async listCurrencies(apiKey: string): Promise<JsonValue> {
    return this.request('GET', '/v1/currencies', { apiKey });
  }

  // This method creates an order; pay_currency and callback_url are sent only when supplied.
  public async createOrder(apiKey: string, input: CreateOrderInput): Promise<JsonValue> {
    return this.request('POST', '/v1/orders', {
      apiKey,
      body: compactBody({
        package_id: input.packageId,
        pay_currency: input.payCurrency,
        callback_url: input.callbackUrl
      })
    });
  }

  public async checkOrderStatus(apiKey: string, orderId: string): Promise<JsonValue> {
    return this.request('GET', this.orderPath(orderId, 'status'), { apiKey });
  }

  // This method buys extra bandwidth for an existing order.
  public async topupOrder(apiKey: string, orderId: string, input: TopupOrderInput): Promise<JsonValue> {
    return this.request('POST', this.orderPath(orderId, 'topup'), {
      apiKey,
      body: compactBody({
        package_id: input.packageId,
        pay_currency: input.payCurrency
      })
    });
  }

  public async rotateProxy(apiKey: string, orderId: string): Promise<JsonValue> {
    return this.request('POST', this.orderPath(orderId, 'rotate'), { apiKey });
  }
}
