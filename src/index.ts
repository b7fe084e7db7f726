/**
 * bulk-bridge - Main Entry Point
 *
 * Converts legacy ALL master-data files to CSV, loads them through Bulk API 2.0
 * ingest jobs, and exports query results across locator pages and PK chunks.
 */

// ============================================================================
// Type Definitions
// ============================================================================

export type {
  JobKind,
  IngestOperation,
  QueryOperation,
  BulkOperation,
  BulkJobState,
  TerminalState,
  ColumnDelimiter,
  LineEnding,
  BulkJobInfo,
  QueryResultsPage,
  BulkJob,
  ChunkJob,
  ResultBatch,
  IngestOutcome,
  IngestResults,
} from './types/index.js';

export {
  INGEST_OPERATIONS,
  QUERY_OPERATIONS,
  BULK_JOB_STATES,
  TERMINAL_STATES,
  isTerminalState,
  isIngestOperation,
  isQueryOperation,
} from './types/index.js';

// ============================================================================
// Configuration
// ============================================================================

export type {
  BulkBridgeConfig,
  RetryConfig,
  AuthMethod,
  AccessTokenAuth,
  ClientCredentialsAuth,
} from './config/index.js';

export {
  BulkBridgeConfigBuilder,
  SecretString,
  normalizeApiVersion,
  tokenUrlForDomain,
  DEFAULT_API_VERSION,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_CHUNK_CONCURRENCY,
  DEFAULT_PAGE_SIZE,
  DEFAULT_UPLOAD_LIMIT_BYTES,
} from './config/index.js';

// ============================================================================
// Errors
// ============================================================================

export {
  BulkErrorCode,
  BulkError,
  ConfigurationError,
  AuthError,
  RequestError,
  RateLimitError,
  NetworkError,
  RequestTimeoutError,
  ServerError,
  StateError,
  TimeoutError,
  JobFailedError,
  PartialChunkFailureError,
  OutcomeMismatchError,
  EncodingError,
  MappingError,
  parseBulkApiError,
  isBulkError,
  isRetryableError,
  getRetryDelayMs,
} from './errors/index.js';

// ============================================================================
// Auth, Transport and Services
// ============================================================================

export type { AuthProvider, FetchLike } from './auth/index.js';
export { AccessTokenAuthProvider, ClientCredentialsAuthProvider, createAuthProvider } from './auth/index.js';

export type { ApiResponse, BulkClientOptions, RequestOptions } from './client/index.js';
export { BulkClient, createBulkClient, createBulkClientFromEnv } from './client/index.js';

export type { IngestJobService, CreateIngestJobOptions } from './services/ingest.js';
export { createIngestJobService } from './services/ingest.js';
export type { QueryJobService, CreateQueryJobOptions, GetResultsOptions } from './services/query.js';
export { createQueryJobService, parseLocator } from './services/query.js';

// ============================================================================
// Resilience
// ============================================================================

export type {
  Sleep,
  Clock,
  PollIntervalPolicy,
  ConstantPollPolicy,
  ExponentialPollPolicy,
} from './resilience/polling.js';
export {
  DEFAULT_INGEST_POLL_POLICY,
  DEFAULT_QUERY_POLL_POLICY,
  pollDelayMs,
  withTimeout,
} from './resilience/polling.js';
export { RetryExecutor } from './resilience/retry.js';

// ============================================================================
// Transformation
// ============================================================================

export type { MappingSpec, MappingEntry } from './transform/mapping.js';
export {
  mappingSpecSchema,
  parseMappingSpec,
  loadMappingSpec,
  loadMappingRegistry,
  defaultOutputCsv,
} from './transform/mapping.js';
export type { ConvertedCsv } from './transform/transformer.js';
export { convertAllFile, decodeInput, transformRow, buildHeader } from './transform/transformer.js';

// ============================================================================
// Orchestration
// ============================================================================

export type { JobOrchestratorOptions, CreateJobOptions, FetchedResults } from './orchestrator/job-orchestrator.js';
export { JobOrchestrator } from './orchestrator/job-orchestrator.js';
export type { AssembledResult, ResultAssemblerOptions } from './orchestrator/result-assembler.js';
export { ResultAssembler, mergeResultBatches } from './orchestrator/result-assembler.js';
export {
  parseIngestResults,
  correlateOutcomes,
  findMissingKeys,
  verifyOutcomeCounts,
} from './orchestrator/outcomes.js';

// ============================================================================
// Flows
// ============================================================================

export { runConvertFlow } from './flows/convert.js';
export { runIngestFlow } from './flows/ingest.js';
export { runExportFlow, buildSoql, buildCheckedSoql, objectFromQuery } from './flows/export.js';

// ============================================================================
// Observability
// ============================================================================

export type { Logger, MetricsCollector, Observability } from './observability/index.js';
export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  MetricNames,
  NoopMetricsCollector,
  InMemoryMetricsCollector,
  createNoopObservability,
  createInMemoryObservability,
  createConsoleObservability,
} from './observability/index.js';
