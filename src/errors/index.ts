/**
 * Error types for the bulk bridge.
 *
 * Error hierarchy with proper categorization for retryable vs non-retryable errors.
 * Maps HTTP status codes and Bulk API error responses to appropriate error types.
 */

/**
 * Error codes for bulk bridge errors.
 */
export enum BulkErrorCode {
  // Configuration errors
  ConfigurationError = 'CONFIGURATION_ERROR',

  // Authentication errors
  AuthenticationError = 'AUTHENTICATION_ERROR',
  SessionExpired = 'SESSION_EXPIRED',
  PermissionDenied = 'PERMISSION_DENIED',

  // Request errors
  InvalidRequest = 'INVALID_REQUEST',
  InvalidQuery = 'INVALID_QUERY',
  NotFound = 'NOT_FOUND',
  InvalidResponse = 'INVALID_RESPONSE',

  // Rate limiting
  RateLimited = 'RATE_LIMITED',
  DailyLimitExceeded = 'DAILY_LIMIT_EXCEEDED',

  // Network/Server errors
  NetworkError = 'NETWORK_ERROR',
  RequestTimeout = 'REQUEST_TIMEOUT',
  ServerError = 'SERVER_ERROR',
  ServiceUnavailable = 'SERVICE_UNAVAILABLE',

  // Job lifecycle errors
  InvalidJobState = 'INVALID_JOB_STATE',
  PollTimeout = 'POLL_TIMEOUT',
  JobFailed = 'JOB_FAILED',
  PartialChunkFailure = 'PARTIAL_CHUNK_FAILURE',
  OutcomeMismatch = 'OUTCOME_MISMATCH',

  // Transformer errors
  EncodingError = 'ENCODING_ERROR',
  MappingError = 'MAPPING_ERROR',
}

/**
 * Bulk API error response structure.
 */
export interface BulkApiErrorResponse {
  errorCode?: string;
  message?: string;
  fields?: string[];
}

/**
 * Base error class.
 */
export class BulkError extends Error {
  readonly code: BulkErrorCode;
  /** HTTP status code (if applicable) */
  readonly statusCode?: number;
  readonly retryable: boolean;
  /** Retry-after duration in milliseconds */
  readonly retryAfterMs?: number;
  /** Context needed to reproduce the failing call (job id, operation, ...) */
  readonly details: Record<string, unknown>;

  constructor(options: {
    code: BulkErrorCode;
    message: string;
    statusCode?: number;
    retryable?: boolean;
    retryAfterMs?: number;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'BulkError';
    this.code = options.code;
    this.statusCode = options.statusCode;
    this.retryable = options.retryable ?? false;
    this.retryAfterMs = options.retryAfterMs;
    this.details = options.details ?? {};
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      retryable: this.retryable,
      retryAfterMs: this.retryAfterMs,
      details: this.details,
    };
  }
}

// ============================================================================
// Configuration Errors (Non-Retryable)
// ============================================================================

export class ConfigurationError extends BulkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: BulkErrorCode.ConfigurationError,
      message: `Configuration error: ${message}`,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Authentication Errors (Non-Retryable)
// ============================================================================

/**
 * Credentials or token rejected by the token endpoint or the bulk service.
 */
export class AuthError extends BulkError {
  constructor(
    message: string = 'Authentication failed',
    options: {
      code?: BulkErrorCode;
      statusCode?: number;
      details?: Record<string, unknown>;
      cause?: unknown;
    } = {}
  ) {
    super({
      code: options.code ?? BulkErrorCode.AuthenticationError,
      message,
      statusCode: options.statusCode ?? 401,
      retryable: false,
      details: options.details,
      cause: options.cause,
    });
    this.name = 'AuthError';
  }
}

// ============================================================================
// Request Errors (Non-Retryable)
// ============================================================================

/**
 * Malformed request, query or response.
 */
export class RequestError extends BulkError {
  constructor(
    message: string,
    options: {
      code?: BulkErrorCode;
      statusCode?: number;
      details?: Record<string, unknown>;
      cause?: unknown;
    } = {}
  ) {
    super({
      code: options.code ?? BulkErrorCode.InvalidRequest,
      message,
      statusCode: options.statusCode,
      retryable: false,
      details: options.details,
      cause: options.cause,
    });
    this.name = 'RequestError';
  }
}

// ============================================================================
// Rate Limiting Errors
// ============================================================================

/**
 * Service throttling. Retryable unless the org's daily allowance is spent.
 */
export class RateLimitError extends BulkError {
  constructor(options: {
    retryAfterMs?: number;
    message?: string;
    daily?: boolean;
    statusCode?: number;
    details?: Record<string, unknown>;
  } = {}) {
    super({
      code: options.daily ? BulkErrorCode.DailyLimitExceeded : BulkErrorCode.RateLimited,
      message:
        options.message ??
        (options.retryAfterMs !== undefined
          ? `Rate limited, retry after ${options.retryAfterMs}ms`
          : 'Rate limited'),
      statusCode: options.statusCode ?? 429,
      retryable: !options.daily,
      retryAfterMs: options.retryAfterMs,
      details: options.details,
    });
    this.name = 'RateLimitError';
  }
}

// ============================================================================
// Network/Server Errors (Retryable)
// ============================================================================

export class NetworkError extends BulkError {
  constructor(message: string, cause?: unknown, details?: Record<string, unknown>) {
    super({
      code: BulkErrorCode.NetworkError,
      message: `Network error: ${message}`,
      retryable: true,
      details,
      cause,
    });
    this.name = 'NetworkError';
  }
}

/**
 * A single HTTP request exceeded the configured request timeout.
 */
export class RequestTimeoutError extends BulkError {
  constructor(timeoutMs: number, details: Record<string, unknown> = {}) {
    super({
      code: BulkErrorCode.RequestTimeout,
      message: `Request timed out after ${timeoutMs}ms`,
      retryable: true,
      details: { ...details, timeoutMs },
    });
    this.name = 'RequestTimeoutError';
  }
}

export class ServerError extends BulkError {
  constructor(
    statusCode: number,
    message: string = 'Bulk service error',
    options: {
      retryAfterMs?: number;
      retryable?: boolean;
      code?: BulkErrorCode;
      details?: Record<string, unknown>;
    } = {}
  ) {
    super({
      code: options.code ?? (statusCode === 503 ? BulkErrorCode.ServiceUnavailable : BulkErrorCode.ServerError),
      message,
      statusCode,
      retryable: options.retryable ?? true,
      retryAfterMs: options.retryAfterMs,
      details: options.details,
    });
    this.name = 'ServerError';
  }
}

// ============================================================================
// Job Lifecycle Errors
// ============================================================================

/**
 * Operation is not valid for the job's current state.
 */
export class StateError extends BulkError {
  constructor(jobId: string, operation: string, state: string, expected: readonly string[]) {
    super({
      code: BulkErrorCode.InvalidJobState,
      message: `Cannot ${operation} job ${jobId} in state ${state} (expected ${expected.join(' or ')})`,
      details: { jobId, operation, state, expected },
    });
    this.name = 'StateError';
  }
}

/**
 * Polling budget exhausted while the job was still running.
 *
 * The job keeps running server-side; poll again with the same job to resume.
 */
export class TimeoutError extends BulkError {
  constructor(jobId: string, waitedMs: number, lastObservedState: string) {
    super({
      code: BulkErrorCode.PollTimeout,
      message: `Job ${jobId} still ${lastObservedState} after ${waitedMs}ms`,
      details: { jobId, waitedMs, lastObservedState },
    });
    this.name = 'TimeoutError';
  }
}

/**
 * Job ended in Failed or Aborted.
 */
export class JobFailedError extends BulkError {
  constructor(jobId: string, state: string, reason?: string) {
    super({
      code: BulkErrorCode.JobFailed,
      message: reason ? `Bulk job ${jobId} ended ${state}: ${reason}` : `Bulk job ${jobId} ended ${state}`,
      details: { jobId, state, reason },
    });
    this.name = 'JobFailedError';
  }
}

/**
 * One or more partitions of a chunked export did not complete.
 */
export class PartialChunkFailureError extends BulkError {
  readonly failedPartitions: ReadonlyArray<{ partition: number; jobId: string; state: string }>;

  constructor(
    parentJobId: string,
    failedPartitions: ReadonlyArray<{ partition: number; jobId: string; state: string }>
  ) {
    const names = failedPartitions.map((p) => `#${p.partition} ${p.jobId} (${p.state})`).join(', ');
    super({
      code: BulkErrorCode.PartialChunkFailure,
      message: `Chunked export ${parentJobId} failed in ${failedPartitions.length} partition(s): ${names}`,
      details: { parentJobId, failedPartitions },
    });
    this.name = 'PartialChunkFailureError';
    this.failedPartitions = failedPartitions;
  }
}

/**
 * Success and error outcome counts do not add up to the submitted rows.
 */
export class OutcomeMismatchError extends BulkError {
  constructor(
    jobId: string,
    counts: { submitted: number; succeeded: number; failed: number; unprocessed: number },
    missingKeys: readonly string[] = []
  ) {
    super({
      code: BulkErrorCode.OutcomeMismatch,
      message:
        `Job ${jobId} reported ${counts.succeeded} succeeded + ${counts.failed} failed` +
        ` + ${counts.unprocessed} unprocessed for ${counts.submitted} submitted rows`,
      details: { jobId, ...counts, missingKeys },
    });
    this.name = 'OutcomeMismatchError';
  }
}

// ============================================================================
// Transformer Errors (Non-Retryable)
// ============================================================================

export class EncodingError extends BulkError {
  constructor(encoding: string, cause?: unknown) {
    super({
      code: BulkErrorCode.EncodingError,
      message: `Input is not valid ${encoding}`,
      details: { encoding },
      cause,
    });
    this.name = 'EncodingError';
  }
}

export class MappingError extends BulkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: BulkErrorCode.MappingError,
      message,
      details,
    });
    this.name = 'MappingError';
  }
}

// ============================================================================
// Error Parsing Utilities
// ============================================================================

function parseRetryAfter(header: string | undefined): number | undefined {
  if (!header) return undefined;
  const seconds = Number.parseFloat(header);
  if (!Number.isNaN(seconds)) {
    return Math.max(0, Math.round(seconds * 1000));
  }
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - Date.now());
}

/**
 * Parses a Bulk API error response into the appropriate error type.
 */
export function parseBulkApiError(
  statusCode: number,
  body: BulkApiErrorResponse | BulkApiErrorResponse[] | null,
  retryAfterHeader?: string,
  context: Record<string, unknown> = {}
): BulkError {
  // The service returns either an array of errors or a single error
  const errors = Array.isArray(body) ? body : body ? [body] : [];
  const first = errors[0];
  const errorCode = first?.errorCode ?? '';
  const message = first?.message ?? `HTTP ${statusCode}`;
  const retryAfterMs = parseRetryAfter(retryAfterHeader);
  const details = { ...context, statusCode, errorCode: errorCode || undefined };

  switch (errorCode) {
    case 'INVALID_SESSION_ID':
    case 'INVALID_AUTH_HEADER':
      return new AuthError(message, { code: BulkErrorCode.SessionExpired, statusCode, details });

    case 'INSUFFICIENT_ACCESS':
    case 'INSUFFICIENT_ACCESS_OR_READONLY':
    case 'API_DISABLED_FOR_ORG':
      return new AuthError(message, { code: BulkErrorCode.PermissionDenied, statusCode, details });

    case 'REQUEST_LIMIT_EXCEEDED':
    case 'EXCEEDED_ID_LIMIT':
      if (message.toLowerCase().includes('concurrent')) {
        return new RateLimitError({ retryAfterMs: retryAfterMs ?? 1000, message, statusCode, details });
      }
      return new RateLimitError({ retryAfterMs, message, statusCode, daily: true, details });

    case 'MALFORMED_QUERY':
    case 'INVALID_FIELD':
    case 'INVALID_TYPE':
    case 'INVALIDJOB':
    case 'INVALID_QUERY_LOCATOR':
      return new RequestError(`${errorCode}: ${message}`, {
        code: BulkErrorCode.InvalidQuery,
        statusCode,
        details,
      });

    default:
      break;
  }

  switch (statusCode) {
    case 401:
      return new AuthError(message, { statusCode, details });

    case 403:
      return new AuthError(message, { code: BulkErrorCode.PermissionDenied, statusCode, details });

    case 404:
      return new RequestError(message, { code: BulkErrorCode.NotFound, statusCode, details });

    case 429:
      return new RateLimitError({ retryAfterMs, statusCode, details });

    default:
      if (statusCode >= 500) {
        return new ServerError(statusCode, message, { retryAfterMs, details });
      }
      return new RequestError(errorCode ? `${errorCode}: ${message}` : message, { statusCode, details });
  }
}

export function isBulkError(error: unknown): error is BulkError {
  return error instanceof BulkError;
}

/**
 * Checks if an error is retryable by the transport.
 */
export function isRetryableError(error: unknown): boolean {
  if (isBulkError(error)) {
    return error.retryable;
  }
  // fetch rejects with a TypeError on connection failures
  return error instanceof TypeError && error.message.includes('fetch');
}

export function getRetryDelayMs(error: unknown): number | undefined {
  return isBulkError(error) ? error.retryAfterMs : undefined;
}
