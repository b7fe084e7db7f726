/**
 * Authentication providers for the bulk service.
 *
 * Supports a pre-issued bearer token and the OAuth 2.0 client-credentials grant.
 */

import { z } from 'zod';
import type { AuthMethod } from '../config/index.js';
import { SecretString } from '../config/index.js';
import { AuthError, BulkErrorCode, NetworkError } from '../errors/index.js';
import { MetricNames, NoopLogger, NoopMetricsCollector, type Logger, type MetricsCollector } from '../observability/index.js';

// ============================================================================
// Auth Provider Interface
// ============================================================================

export type Headers = Record<string, string>;

/**
 * Minimal fetch signature; `globalThis.fetch` satisfies it and tests pass fakes.
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface AuthProvider {
  /** Get authentication headers for a request */
  getAuthHeaders(): Promise<Headers>;
  /** Refresh credentials if applicable */
  refresh?(): Promise<void>;
  /** Check if credentials are valid/not expired */
  isValid(): boolean;
  /** Instance URL issued with the credentials, when the grant reports one */
  getInstanceUrl?(): string | undefined;
}

// ============================================================================
// Access Token Auth Provider
// ============================================================================

/**
 * Static bearer token. It cannot be refreshed, so an expired session surfaces as AuthError.
 */
export class AccessTokenAuthProvider implements AuthProvider {
  private readonly accessToken: SecretString;

  constructor(accessToken: string | SecretString) {
    this.accessToken = typeof accessToken === 'string' ? new SecretString(accessToken) : accessToken;
  }

  async getAuthHeaders(): Promise<Headers> {
    return {
      Authorization: `Bearer ${this.accessToken.expose()}`,
    };
  }

  isValid(): boolean {
    return this.accessToken.expose().length > 0;
  }
}

// ============================================================================
// Client Credentials Auth Provider
// ============================================================================

interface OAuthTokenState {
  accessToken: SecretString;
  instanceUrl?: string;
  expiresAt: number;
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  instance_url: z.string().optional(),
  token_type: z.string().optional(),
  issued_at: z.string().optional(),
  expires_in: z.number().optional(),
});

// Session lifetime when the token response does not carry expires_in
const DEFAULT_TOKEN_LIFETIME_SECONDS = 7200;

/**
 * Client-credentials grant. The token is cached until shortly before expiry,
 * and concurrent refreshes share a single token request.
 */
export class ClientCredentialsAuthProvider implements AuthProvider {
  private readonly clientId: string;
  private readonly clientSecret: SecretString;
  private readonly tokenUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly now: () => number;
  private tokenState: OAuthTokenState | null = null;
  private refreshPromise: Promise<void> | null = null;

  constructor(options: {
    clientId: string;
    clientSecret: string | SecretString;
    tokenUrl: string;
    fetch?: FetchLike;
    logger?: Logger;
    metrics?: MetricsCollector;
    now?: () => number;
  }) {
    this.clientId = options.clientId;
    this.clientSecret =
      typeof options.clientSecret === 'string' ? new SecretString(options.clientSecret) : options.clientSecret;
    this.tokenUrl = options.tokenUrl;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? new NoopLogger();
    this.metrics = options.metrics ?? new NoopMetricsCollector();
    this.now = options.now ?? Date.now;
  }

  async getAuthHeaders(): Promise<Headers> {
    if (!this.isValid()) {
      await this.refresh();
    }

    if (!this.tokenState) {
      throw new AuthError('No valid OAuth token available');
    }

    return {
      Authorization: `Bearer ${this.tokenState.accessToken.expose()}`,
    };
  }

  isValid(): boolean {
    if (!this.tokenState) return false;
    // Treat tokens expiring within 60 seconds as already expired
    return this.tokenState.expiresAt > this.now() + 60000;
  }

  async refresh(): Promise<void> {
    if (this.refreshPromise) {
      return this.refreshPromise;
    }

    this.refreshPromise = this.doRefresh();
    try {
      await this.refreshPromise;
    } finally {
      this.refreshPromise = null;
    }
  }

  /**
   * Instance URL reported by the last token response.
   */
  getInstanceUrl(): string | undefined {
    return this.tokenState?.instanceUrl;
  }

  private async doRefresh(): Promise<void> {
    this.logger.debug('Requesting client-credentials token', { tokenUrl: this.tokenUrl });
    this.metrics.increment(MetricNames.TOKEN_REFRESH_TOTAL);

    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.clientId,
      client_secret: this.clientSecret.expose(),
    });

    let response: Response;
    try {
      response = await this.fetchImpl(this.tokenUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: body.toString(),
      });
    } catch (error) {
      throw new NetworkError(
        `Token request failed: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }

    if (!response.ok) {
      const errorText = await response.text();
      this.logger.error('Client-credentials token request failed', {
        status: response.status,
        error: errorText,
        clientIdPrefix: this.clientId.slice(0, 6),
      });
      throw new AuthError(`Token request failed: ${response.status}`, {
        statusCode: response.status,
        details: { tokenUrl: this.tokenUrl, body: errorText },
      });
    }

    const parsed = tokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new AuthError('Token response did not contain an access token', {
        code: BulkErrorCode.InvalidResponse,
        statusCode: response.status,
        details: { tokenUrl: this.tokenUrl, issues: parsed.error.issues.map((i) => i.message) },
      });
    }

    const lifetime = parsed.data.expires_in ?? DEFAULT_TOKEN_LIFETIME_SECONDS;
    this.tokenState = {
      accessToken: new SecretString(parsed.data.access_token),
      instanceUrl: parsed.data.instance_url,
      expiresAt: this.now() + lifetime * 1000,
    };

    this.logger.info('Client-credentials token obtained');
  }
}

// ============================================================================
// Factory Function
// ============================================================================

export function createAuthProvider(
  auth: AuthMethod,
  options: { fetch?: FetchLike; logger?: Logger; metrics?: MetricsCollector } = {}
): AuthProvider {
  switch (auth.type) {
    case 'access_token':
      return new AccessTokenAuthProvider(auth.accessToken);
    case 'client_credentials':
      return new ClientCredentialsAuthProvider({
        clientId: auth.clientId,
        clientSecret: auth.clientSecret,
        tokenUrl: auth.tokenUrl,
        fetch: options.fetch,
        logger: options.logger,
        metrics: options.metrics,
      });
  }
}
