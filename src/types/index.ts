/**
 * Bulk API 2.0 and master-data type definitions.
 *
 * Wire types mirror the JSON the bulk service returns; the BulkJob family is the
 * local handle the orchestrator passes between calls.
 */

// ============================================================================
// Operations and States
// ============================================================================

/**
 * Kind of server-side bulk job.
 */
export type JobKind = 'ingest' | 'query';

/**
 * Operations accepted by ingest jobs.
 */
export type IngestOperation = 'insert' | 'update' | 'upsert' | 'delete';

/**
 * Operations accepted by query jobs. `queryAll` includes deleted and archived records.
 */
export type QueryOperation = 'query' | 'queryAll';

/**
 * Any bulk operation.
 */
export type BulkOperation = IngestOperation | QueryOperation;

export const INGEST_OPERATIONS: readonly IngestOperation[] = ['insert', 'update', 'upsert', 'delete'];

export const QUERY_OPERATIONS: readonly QueryOperation[] = ['query', 'queryAll'];

/**
 * Server-reported job state.
 */
export type BulkJobState =
  | 'Open'
  | 'UploadComplete'
  | 'InProgress'
  | 'JobComplete'
  | 'Failed'
  | 'Aborted';

/**
 * States a job never leaves.
 */
export type TerminalState = 'JobComplete' | 'Failed' | 'Aborted';

export const BULK_JOB_STATES: readonly BulkJobState[] = [
  'Open',
  'UploadComplete',
  'InProgress',
  'JobComplete',
  'Failed',
  'Aborted',
];

export const TERMINAL_STATES: readonly TerminalState[] = ['JobComplete', 'Failed', 'Aborted'];

export function isTerminalState(state: BulkJobState): state is TerminalState {
  return state === 'JobComplete' || state === 'Failed' || state === 'Aborted';
}

export function isIngestOperation(operation: BulkOperation): operation is IngestOperation {
  return operation !== 'query' && operation !== 'queryAll';
}

export function isQueryOperation(operation: BulkOperation): operation is QueryOperation {
  return operation === 'query' || operation === 'queryAll';
}

/**
 * The column delimiter for CSV data in Bulk API jobs.
 */
export type ColumnDelimiter =
  | 'BACKQUOTE'
  | 'CARET'
  | 'COMMA'
  | 'PIPE'
  | 'SEMICOLON'
  | 'TAB';

/**
 * The line ending format for CSV data in Bulk API jobs.
 */
export type LineEnding = 'LF' | 'CRLF';

// ============================================================================
// Wire Types
// ============================================================================

/**
 * Job information as returned by `/jobs/ingest/{id}` and `/jobs/query/{id}`.
 */
export interface BulkJobInfo {
  /** The unique identifier for the job */
  id: string;

  /** The type of operation for this job */
  operation: BulkOperation;

  /** The API name of the SObject (ingest jobs, and query jobs once parsed) */
  object?: string;

  /** The current state of the job */
  state: BulkJobState;

  /** The external ID field name for upsert operations */
  externalIdFieldName?: string;

  createdById?: string;
  createdDate?: string;
  systemModstamp?: string;
  contentType?: string;
  columnDelimiter?: ColumnDelimiter;
  lineEnding?: LineEnding;
  apiVersion?: number | string;

  /** The number of records processed so far */
  numberRecordsProcessed?: number;

  /** The number of records that failed (ingest only) */
  numberRecordsFailed?: number;

  /** Server-side failure reason for Failed jobs */
  errorMessage?: string;

  /** Partition job ids, present when PK chunking was requested and honored */
  chunkJobIds?: string[];
}

/**
 * One page of query results, as read from `/jobs/query/{id}/results`.
 */
export interface QueryResultsPage {
  /** Raw CSV body, header line included */
  body: string;

  /** Locator of the next page; absent on the last page */
  locator?: string;

  /** Record count reported by the `Sforce-NumberOfRecords` header */
  numberOfRecords?: number;
}

// ============================================================================
// Local Job Handles
// ============================================================================

/**
 * Local handle for one server-side bulk job.
 *
 * Only the orchestrator mutates it, and only from server-reported state.
 */
export interface BulkJob {
  readonly jobId: string;
  readonly kind: JobKind;
  readonly operation: BulkOperation;
  /** SObject name for ingest jobs, query text for query jobs */
  readonly target: string;
  state: BulkJobState;
  readonly createdAt: Date;
  /** Set once a terminal state has been observed */
  closedAt?: Date;
  /** Set when an ingest job was moved to UploadComplete */
  uploadCompletedAt?: Date;
  readonly contentType: 'CSV';
  readonly externalIdField?: string;
  /** Continuation token of the next unread result page (query jobs) */
  locator?: string;
  /** Partition jobs for chunked queries, in server listing order */
  chunks?: ChunkJob[];
  /** Number of batches uploaded through this handle */
  uploadedBatches: number;
  /** Number of data rows uploaded through this handle */
  submittedRows: number;
  recordsProcessed?: number;
  recordsFailed?: number;
  errorMessage?: string;
}

/**
 * Partition of a chunked query job.
 */
export interface ChunkJob extends BulkJob {
  readonly kind: 'query';
  readonly parentJobId: string;
  /** Position in the server's chunk listing; defines merge order */
  readonly partition: number;
}

/**
 * One retrieved page of a query job's results.
 */
export interface ResultBatch {
  /** CSV records in server order; `rows[0]` is the header line */
  rows: string[];
  /** Whether this is the first page of its owning job */
  isFirstPage: boolean;
  /** Locator of the next page; absent when exhausted */
  nextLocator?: string;
}

/**
 * Per-record result of an ingest job.
 */
export interface IngestOutcome {
  /** Record id assigned by the service, when known */
  recordId?: string;
  success: boolean;
  /** Whether the record was created (upsert/insert) */
  created?: boolean;
  errorCode?: string;
  errorMessage?: string;
  /** The submitted field values echoed back by the service */
  fields: Record<string, string>;
}

/**
 * Both outcome streams of an ingest job plus any records the service never processed.
 */
export interface IngestResults {
  successes: IngestOutcome[];
  failures: IngestOutcome[];
  unprocessed: Record<string, string>[];
  /** Raw CSV bodies, kept for the result files */
  successCsv: string;
  failureCsv: string;
  unprocessedCsv: string;
}
