/**
 * Transport client for the Bulk API 2.0 REST surface.
 *
 * Provides HTTP execution with authentication, retry of transient failures,
 * session refresh and request metrics.
 */

import { z } from 'zod';
import { BulkBridgeConfigBuilder, type BulkBridgeConfig } from '../config/index.js';
import {
  BulkError,
  BulkErrorCode,
  NetworkError,
  RequestTimeoutError,
  ServerError,
  parseBulkApiError,
  type BulkApiErrorResponse,
} from '../errors/index.js';
import { createAuthProvider, type AuthProvider, type FetchLike } from '../auth/index.js';
import { RetryExecutor } from '../resilience/retry.js';
import type { Sleep } from '../resilience/polling.js';
import {
  MetricNames,
  createNoopObservability,
  type Logger,
  type MetricsCollector,
  type Observability,
} from '../observability/index.js';

// ============================================================================
// HTTP Request/Response Types
// ============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface RequestOptions {
  method: HttpMethod;
  /** Request path relative to `/services/data/{apiVersion}` */
  path: string;
  query?: QueryParams;
  /** JSON body, serialized by the client */
  json?: unknown;
  /** Raw body (CSV uploads) */
  body?: string;
  /** Content type of a raw body. Default: text/csv */
  contentType?: string;
  /** Accept header. Default: application/json */
  accept?: string;
  headers?: Record<string, string>;
  /** Skip retry logic */
  skipRetry?: boolean;
  /** Job id, operation, ... attached to errors raised for this call */
  context?: Record<string, unknown>;
}

export interface ApiResponse {
  /** Response body as text */
  body: string;
  status: number;
  /** Lower-cased response headers */
  headers: Record<string, string>;
}

export interface BulkClientOptions {
  observability?: Observability;
  /** Overrides the provider built from `config.auth` */
  authProvider?: AuthProvider;
  fetch?: FetchLike;
  /** Delay used between retries */
  sleep?: Sleep;
}

function safeJsonParse(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    // Non-JSON body (HTML error page, CSV)
    return undefined;
  }
}

function isErrorBody(value: unknown): value is BulkApiErrorResponse {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toErrorBody(value: unknown): BulkApiErrorResponse | BulkApiErrorResponse[] | null {
  if (Array.isArray(value)) {
    return value.filter(isErrorBody);
  }
  return isErrorBody(value) ? value : null;
}

function isSessionExpired(error: unknown): boolean {
  return error instanceof BulkError && error.code === BulkErrorCode.SessionExpired;
}

// ============================================================================
// Bulk Client
// ============================================================================

/**
 * Bulk API client with retry and observability.
 */
export class BulkClient {
  private readonly config: BulkBridgeConfig;
  private readonly authProvider: AuthProvider;
  private readonly retry: RetryExecutor;
  private readonly observability: Observability;
  private readonly fetchImpl: FetchLike;

  constructor(config: BulkBridgeConfig, options: BulkClientOptions = {}) {
    this.config = config;
    this.observability = options.observability ?? createNoopObservability();
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.authProvider =
      options.authProvider ??
      createAuthProvider(config.auth, {
        fetch: options.fetch,
        logger: this.observability.logger,
        metrics: this.observability.metrics,
      });
    this.retry = new RetryExecutor(
      config.retryConfig,
      {
        onRetry: (attempt, error, delayMs) => {
          this.observability.metrics.increment(MetricNames.RETRIES_TOTAL);
          this.observability.logger.warn('Retrying request', {
            attempt,
            error: error.message,
            delayMs,
          });
        },
        onExhausted: (error, attempts) => {
          this.observability.logger.error('Retries exhausted', {
            error: error.message,
            attempts,
          });
        },
      },
      { sleep: options.sleep }
    );
  }

  get logger(): Logger {
    return this.observability.logger;
  }

  get metrics(): MetricsCollector {
    return this.observability.metrics;
  }

  get configuration(): BulkBridgeConfig {
    return this.config;
  }

  /**
   * Base URL for API requests, e.g. `https://org.my.salesforce.com/services/data/v60.0`.
   */
  get baseUrl(): string {
    const issued = this.config.instanceUrlFromToken ? this.authProvider.getInstanceUrl?.() : undefined;
    const instanceUrl = issued ? issued.replace(/\/+$/, '') : this.config.instanceUrl;
    return `${instanceUrl}/services/data/${this.config.apiVersion}`;
  }

  /**
   * Executes an HTTP request. An expired session is refreshed once and the call replayed.
   */
  async request(options: RequestOptions): Promise<ApiResponse> {
    const startTime = Date.now();
    const tags = { method: options.method };

    try {
      let response: ApiResponse;
      try {
        response = await this.execute(options);
      } catch (error) {
        if (!isSessionExpired(error) || !this.authProvider.refresh) {
          throw error;
        }
        this.logger.info('Session expired, refreshing token', { path: options.path });
        await this.authProvider.refresh();
        response = await this.execute(options);
      }

      this.metrics.increment(MetricNames.REQUESTS_TOTAL, 1, { ...tags, status: 'success' });
      this.metrics.timing(MetricNames.REQUEST_LATENCY, Date.now() - startTime, tags);
      return response;
    } catch (error) {
      this.metrics.increment(MetricNames.ERRORS_TOTAL, 1, {
        ...tags,
        error_type: error instanceof BulkError ? error.code : 'unknown',
      });
      throw error;
    }
  }

  private execute(options: RequestOptions): Promise<ApiResponse> {
    if (options.skipRetry) {
      return this.executeRequest(options);
    }
    return this.retry.execute(() => this.executeRequest(options));
  }

  private async executeRequest(options: RequestOptions): Promise<ApiResponse> {
    // Headers first: a token response may carry the instance URL
    const authHeaders = await this.authProvider.getAuthHeaders();
    const url = this.buildUrl(options.path, options.query);

    const headers: Record<string, string> = {
      Accept: options.accept ?? 'application/json',
      'User-Agent': this.config.userAgent,
      ...authHeaders,
      ...options.headers,
    };

    let body: string | undefined;
    if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    } else if (options.body !== undefined) {
      headers['Content-Type'] = options.contentType ?? 'text/csv';
      body = options.body;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);

    try {
      this.logger.debug('Sending request', { method: options.method, path: options.path });
      const response = await this.fetchImpl(url, {
        method: options.method,
        headers,
        body,
        signal: controller.signal,
      });

      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        responseHeaders[key.toLowerCase()] = value;
      });
      const text = await response.text();

      if (!response.ok) {
        throw parseBulkApiError(
          response.status,
          toErrorBody(safeJsonParse(text)),
          responseHeaders['retry-after'],
          { method: options.method, path: options.path, ...options.context }
        );
      }

      return {
        body: text,
        status: response.status,
        headers: responseHeaders,
      };
    } catch (error) {
      if (error instanceof BulkError) {
        throw error;
      }
      const context = { method: options.method, path: options.path, ...options.context };
      if (error instanceof Error && error.name === 'AbortError') {
        throw new RequestTimeoutError(this.config.requestTimeoutMs, context);
      }
      throw new NetworkError(error instanceof Error ? error.message : String(error), error, context);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private buildUrl(path: string, query?: QueryParams): string {
    const url = new URL(`${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`);

    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }

    return url.toString();
  }

  /**
   * Validates a JSON response body against a schema.
   */
  parseJson<S extends z.ZodTypeAny>(response: ApiResponse, schema: S): z.infer<S> {
    const result = schema.safeParse(safeJsonParse(response.body));
    if (!result.success) {
      throw new ServerError(response.status, 'Unexpected response shape from bulk service', {
        retryable: false,
        code: BulkErrorCode.InvalidResponse,
      });
    }
    return result.data;
  }

  // ============================================================================
  // Convenience Methods
  // ============================================================================

  async getJson<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    query?: QueryParams,
    context?: Record<string, unknown>
  ): Promise<z.infer<S>> {
    const response = await this.request({ method: 'GET', path, query, context });
    return this.parseJson(response, schema);
  }

  async sendJson<S extends z.ZodTypeAny>(
    method: 'POST' | 'PATCH',
    path: string,
    json: unknown,
    schema: S,
    options: { headers?: Record<string, string>; context?: Record<string, unknown> } = {}
  ): Promise<z.infer<S>> {
    const response = await this.request({ method, path, json, ...options });
    return this.parseJson(response, schema);
  }

  /**
   * GET returning the raw response (CSV result streams).
   */
  async getText(
    path: string,
    query?: QueryParams,
    options: { accept?: string; context?: Record<string, unknown> } = {}
  ): Promise<ApiResponse> {
    return this.request({
      method: 'GET',
      path,
      query,
      accept: options.accept ?? 'text/csv',
      context: options.context,
    });
  }

  async putCsv(path: string, csv: string, context?: Record<string, unknown>): Promise<void> {
    await this.request({ method: 'PUT', path, body: csv, contentType: 'text/csv', context });
  }

  async delete(path: string, context?: Record<string, unknown>): Promise<void> {
    await this.request({ method: 'DELETE', path, context });
  }
}

// ============================================================================
// Client Factory
// ============================================================================

export function createBulkClient(config: BulkBridgeConfig, options?: BulkClientOptions): BulkClient {
  return new BulkClient(config, options);
}

/**
 * Creates a client from environment variables.
 */
export function createBulkClientFromEnv(
  options?: BulkClientOptions,
  env: NodeJS.ProcessEnv = process.env
): BulkClient {
  const config = BulkBridgeConfigBuilder.fromEnv(env).build();
  return new BulkClient(config, options);
}
