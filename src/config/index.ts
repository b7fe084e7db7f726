/**
 * Bulk bridge configuration and builder.
 */

import { ConfigurationError } from '../errors/index.js';
import {
  DEFAULT_INGEST_POLL_POLICY,
  type PollIntervalPolicy,
} from '../resilience/polling.js';

// ============================================================================
// Retry Configuration
// ============================================================================

/**
 * Transport retry configuration.
 */
export interface RetryConfig {
  /** Maximum retry attempts. Default: 3 */
  maxRetries: number;
  /** Initial backoff delay (ms). Default: 1000 */
  initialBackoffMs: number;
  /** Maximum backoff delay (ms). Default: 30000 */
  maxBackoffMs: number;
  /** Backoff multiplier. Default: 2 */
  backoffMultiplier: number;
  /** Jitter factor (0-1). Default: 0.1 */
  jitterFactor: number;
}

// ============================================================================
// Authentication Types
// ============================================================================

/**
 * Pre-issued bearer token.
 */
export interface AccessTokenAuth {
  type: 'access_token';
  accessToken: SecretString;
}

/**
 * OAuth 2.0 client-credentials grant against a Connected App.
 */
export interface ClientCredentialsAuth {
  type: 'client_credentials';
  clientId: string;
  clientSecret: SecretString;
  /** Token endpoint, e.g. https://my-org.my.salesforce.com/services/oauth2/token */
  tokenUrl: string;
}

export type AuthMethod = AccessTokenAuth | ClientCredentialsAuth;

// ============================================================================
// Main Configuration Interface
// ============================================================================

export interface BulkBridgeConfig {
  /** Instance URL (e.g., "https://my-org.my.salesforce.com") */
  instanceUrl: string;
  /** Prefer the instance URL issued with the access token over `instanceUrl` */
  instanceUrlFromToken: boolean;
  /** API version (e.g., "v60.0"). Default: "v60.0" */
  apiVersion: string;
  auth: AuthMethod;
  retryConfig: RetryConfig;
  /** Default policy for waiting on jobs */
  pollPolicy: PollIntervalPolicy;
  /** Per-request timeout in milliseconds. Default: 30000 */
  requestTimeoutMs: number;
  userAgent: string;
  /** Worker pool size for chunked exports. Default: 4 */
  chunkConcurrency: number;
  /** `maxRecords` hint for query result pages. Default: 100000 */
  pageSize: number;
  /** Largest CSV body accepted by a single upload. Default: 100 MB */
  uploadLimitBytes: number;
}

// ============================================================================
// Default Configurations
// ============================================================================

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialBackoffMs: 1000,
  maxBackoffMs: 30000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
};

export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

export const DEFAULT_USER_AGENT = 'bulk-bridge/0.1.0';

export const DEFAULT_API_VERSION = 'v60.0';

export const DEFAULT_CHUNK_CONCURRENCY = 4;

export const DEFAULT_PAGE_SIZE = 100_000;

export const DEFAULT_UPLOAD_LIMIT_BYTES = 100 * 1024 * 1024;

// ============================================================================
// SecretString
// ============================================================================

/**
 * Keeps credentials out of logs and JSON dumps.
 * The value is only accessible via expose().
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  expose(): string {
    return this.value;
  }

  toString(): string {
    return '[REDACTED]';
  }

  toJSON(): string {
    return '[REDACTED]';
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Accepts "60.0", "v60.0" or "V60.0" and returns "v60.0".
 */
export function normalizeApiVersion(version: string): string {
  const trimmed = version.trim().replace(/^v/i, '');
  if (!/^\d+\.\d+$/.test(trimmed)) {
    throw new ConfigurationError('API version must be in format "vXX.X" (e.g., "v60.0")');
  }
  return `v${trimmed}`;
}

/**
 * Token endpoint for a My Domain host name.
 */
export function tokenUrlForDomain(domain: string): string {
  const host = domain.trim().replace(/^https?:\/\//, '').replace(/\/+$/, '');
  return `https://${host}/services/oauth2/token`;
}

function requireNonEmpty(value: string, message: string): string {
  if (!value || value.trim().length === 0) {
    throw new ConfigurationError(message);
  }
  return value.trim();
}

function parseNonNegativeInt(name: string, raw: string): number {
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer`, { value: raw });
  }
  return value;
}

// ============================================================================
// Configuration Builder
// ============================================================================

export class BulkBridgeConfigBuilder {
  private instanceUrl?: string;
  private instanceUrlFromToken = false;
  private apiVersion: string = DEFAULT_API_VERSION;
  private auth?: AuthMethod;
  private retryConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG };
  private pollPolicy: PollIntervalPolicy = { ...DEFAULT_INGEST_POLL_POLICY };
  private requestTimeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS;
  private userAgent: string = DEFAULT_USER_AGENT;
  private chunkConcurrency: number = DEFAULT_CHUNK_CONCURRENCY;
  private pageSize: number = DEFAULT_PAGE_SIZE;
  private uploadLimitBytes: number = DEFAULT_UPLOAD_LIMIT_BYTES;

  /**
   * Sets the instance URL.
   * @param url - The instance URL (e.g., "https://my-org.my.salesforce.com")
   */
  withInstanceUrl(url: string): this {
    requireNonEmpty(url, 'Instance URL cannot be empty');
    let parsed: URL;
    try {
      parsed = new URL(url.trim());
    } catch (error) {
      throw new ConfigurationError('Invalid instance URL format', { url, cause: String(error) });
    }
    if (!['https:', 'http:'].includes(parsed.protocol)) {
      throw new ConfigurationError('Instance URL must use HTTP or HTTPS protocol');
    }
    this.instanceUrl = url.trim().replace(/\/+$/, '');
    return this;
  }

  /**
   * Sends requests to the instance URL the token endpoint reports, once a token
   * has been issued. The configured instance URL is used until then.
   */
  withInstanceUrlFromToken(enabled: boolean = true): this {
    this.instanceUrlFromToken = enabled;
    return this;
  }

  withAccessToken(accessToken: string): this {
    this.auth = {
      type: 'access_token',
      accessToken: new SecretString(requireNonEmpty(accessToken, 'Access token cannot be empty')),
    };
    return this;
  }

  /**
   * Sets client-credentials authentication.
   *
   * @param tokenUrl - Full token endpoint URL
   */
  withClientCredentials(clientId: string, clientSecret: string, tokenUrl: string): this {
    const id = requireNonEmpty(clientId, 'Client ID cannot be empty');
    const secret = requireNonEmpty(clientSecret, 'Client secret cannot be empty');
    const url = requireNonEmpty(tokenUrl, 'Token URL cannot be empty');
    try {
      new URL(url);
    } catch (error) {
      throw new ConfigurationError('Invalid token URL format', { tokenUrl: url, cause: String(error) });
    }
    this.auth = {
      type: 'client_credentials',
      clientId: id,
      clientSecret: new SecretString(secret),
      tokenUrl: url,
    };
    return this;
  }

  withApiVersion(version: string): this {
    requireNonEmpty(version, 'API version cannot be empty');
    this.apiVersion = normalizeApiVersion(version);
    return this;
  }

  withRetryConfig(config: Partial<RetryConfig>): this {
    this.retryConfig = { ...this.retryConfig, ...config };
    if (this.retryConfig.maxRetries < 0) {
      throw new ConfigurationError('Max retries cannot be negative');
    }
    if (this.retryConfig.initialBackoffMs <= 0) {
      throw new ConfigurationError('Initial backoff must be positive');
    }
    if (this.retryConfig.maxBackoffMs <= 0) {
      throw new ConfigurationError('Max backoff must be positive');
    }
    if (this.retryConfig.backoffMultiplier <= 1) {
      throw new ConfigurationError('Backoff multiplier must be greater than 1');
    }
    if (this.retryConfig.jitterFactor < 0 || this.retryConfig.jitterFactor > 1) {
      throw new ConfigurationError('Jitter factor must be between 0 and 1');
    }
    return this;
  }

  withPollPolicy(policy: PollIntervalPolicy): this {
    if (policy.timeoutMs <= 0) {
      throw new ConfigurationError('Poll timeout must be positive');
    }
    if (policy.type === 'constant') {
      if (policy.intervalMs <= 0) {
        throw new ConfigurationError('Poll interval must be positive');
      }
    } else {
      if (policy.initialIntervalMs <= 0 || policy.maxIntervalMs < policy.initialIntervalMs) {
        throw new ConfigurationError('Poll intervals must be positive with max >= initial');
      }
      if (policy.multiplier < 1) {
        throw new ConfigurationError('Poll multiplier must be at least 1');
      }
    }
    this.pollPolicy = { ...policy };
    return this;
  }

  /**
   * @param timeoutMs - Timeout in milliseconds
   */
  withRequestTimeout(timeoutMs: number): this {
    if (timeoutMs <= 0) {
      throw new ConfigurationError('Request timeout must be positive');
    }
    this.requestTimeoutMs = timeoutMs;
    return this;
  }

  withUserAgent(userAgent: string): this {
    this.userAgent = requireNonEmpty(userAgent, 'User agent cannot be empty');
    return this;
  }

  withChunkConcurrency(concurrency: number): this {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigurationError('Chunk concurrency must be a positive integer');
    }
    this.chunkConcurrency = concurrency;
    return this;
  }

  withPageSize(pageSize: number): this {
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new ConfigurationError('Page size must be a positive integer');
    }
    this.pageSize = pageSize;
    return this;
  }

  withUploadLimitBytes(bytes: number): this {
    if (!Number.isInteger(bytes) || bytes < 1) {
      throw new ConfigurationError('Upload limit must be a positive integer');
    }
    this.uploadLimitBytes = bytes;
    return this;
  }

  /**
   * Creates a builder from environment variables.
   *
   * Environment variables:
   * - SF_INSTANCE_URL: Instance URL (falls back to the one issued with the token, then the token URL host)
   * - SF_API_VERSION: API version, with or without the leading "v" (default: v60.0)
   * - SF_ACCESS_TOKEN: Pre-issued bearer token
   * - SF_CLIENT_ID / SF_CLIENT_SECRET: Client-credentials grant
   * - SF_TOKEN_URL: Token endpoint (or SF_DOMAIN to derive it)
   * - SF_TIMEOUT_SECONDS: Request timeout in seconds
   * - SF_MAX_RETRIES: Maximum retry attempts
   * - SF_POLL_INTERVAL_MS / SF_POLL_TIMEOUT_MS: Job polling
   * - SF_CHUNK_CONCURRENCY: Worker pool size for chunked exports
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): BulkBridgeConfigBuilder {
    const builder = new BulkBridgeConfigBuilder();

    const apiVersion = env.SF_API_VERSION;
    if (apiVersion) {
      builder.withApiVersion(apiVersion);
    }

    const accessToken = env.SF_ACCESS_TOKEN;
    const clientId = env.SF_CLIENT_ID;
    const clientSecret = env.SF_CLIENT_SECRET;
    const tokenUrl = env.SF_TOKEN_URL || (env.SF_DOMAIN ? tokenUrlForDomain(env.SF_DOMAIN) : undefined);

    if (accessToken) {
      builder.withAccessToken(accessToken);
    } else if (clientId && clientSecret) {
      if (!tokenUrl) {
        throw new ConfigurationError('SF_TOKEN_URL or SF_DOMAIN is required for client credentials');
      }
      builder.withClientCredentials(clientId, clientSecret, tokenUrl);
    }

    const instanceUrl = env.SF_INSTANCE_URL;
    if (instanceUrl) {
      builder.withInstanceUrl(instanceUrl);
    } else if (tokenUrl) {
      builder.withInstanceUrl(new URL(tokenUrl).origin).withInstanceUrlFromToken();
    }

    const timeout = env.SF_TIMEOUT_SECONDS;
    if (timeout) {
      builder.withRequestTimeout(parseNonNegativeInt('SF_TIMEOUT_SECONDS', timeout) * 1000);
    }

    const maxRetries = env.SF_MAX_RETRIES;
    if (maxRetries) {
      builder.withRetryConfig({ maxRetries: parseNonNegativeInt('SF_MAX_RETRIES', maxRetries) });
    }

    const pollInterval = env.SF_POLL_INTERVAL_MS;
    const pollTimeout = env.SF_POLL_TIMEOUT_MS;
    if (pollInterval || pollTimeout) {
      builder.withPollPolicy({
        type: 'constant',
        intervalMs: pollInterval
          ? parseNonNegativeInt('SF_POLL_INTERVAL_MS', pollInterval)
          : DEFAULT_INGEST_POLL_POLICY.intervalMs,
        timeoutMs: pollTimeout
          ? parseNonNegativeInt('SF_POLL_TIMEOUT_MS', pollTimeout)
          : DEFAULT_INGEST_POLL_POLICY.timeoutMs,
      });
    }

    const concurrency = env.SF_CHUNK_CONCURRENCY;
    if (concurrency) {
      builder.withChunkConcurrency(parseNonNegativeInt('SF_CHUNK_CONCURRENCY', concurrency));
    }

    return builder;
  }

  /**
   * @throws ConfigurationError if required fields are missing or invalid
   */
  build(): BulkBridgeConfig {
    if (!this.instanceUrl) {
      throw new ConfigurationError('Instance URL is required');
    }
    if (!this.auth) {
      throw new ConfigurationError(
        'No authentication configured (set SF_ACCESS_TOKEN or SF_CLIENT_ID and SF_CLIENT_SECRET)'
      );
    }

    return {
      instanceUrl: this.instanceUrl,
      instanceUrlFromToken: this.instanceUrlFromToken,
      apiVersion: this.apiVersion,
      auth: this.auth,
      retryConfig: { ...this.retryConfig },
      pollPolicy: { ...this.pollPolicy },
      requestTimeoutMs: this.requestTimeoutMs,
      userAgent: this.userAgent,
      chunkConcurrency: this.chunkConcurrency,
      pageSize: this.pageSize,
      uploadLimitBytes: this.uploadLimitBytes,
    };
  }
}
