/**
 * Bulk job state machine.
 *
 * Drives a BulkJob through Open → UploadComplete → InProgress → terminal, and
 * reads its results. The job handle is only changed from server-reported state.
 */

import type { BulkClient } from '../client/index.js';
import { countDataRows, splitCsvRecords } from '../csv/index.js';
import { RequestError, StateError, TimeoutError } from '../errors/index.js';
import { MetricNames, type Logger, type MetricsCollector } from '../observability/index.js';
import {
  DEFAULT_QUERY_POLL_POLICY,
  defaultSleep,
  pollDelayMs,
  systemClock,
  type Clock,
  type PollIntervalPolicy,
  type Sleep,
} from '../resilience/polling.js';
import { createIngestJobService, type IngestJobService } from '../services/ingest.js';
import { createQueryJobService, type QueryJobService } from '../services/query.js';
import {
  TERMINAL_STATES,
  isIngestOperation,
  isQueryOperation,
  isTerminalState,
  type BulkJob,
  type BulkJobInfo,
  type BulkJobState,
  type BulkOperation,
  type ChunkJob,
  type IngestResults,
  type JobKind,
  type LineEnding,
  type ResultBatch,
  type TerminalState,
} from '../types/index.js';
import { parseIngestResults } from './outcomes.js';

export interface JobOrchestratorOptions {
  /** Overrides the default policy for both job kinds */
  pollPolicy?: PollIntervalPolicy;
  sleep?: Sleep;
  clock?: Clock;
  /** `maxRecords` hint for query result pages */
  pageSize?: number;
}

export interface CreateJobOptions {
  /** PK chunk size for query jobs; unset runs the query unpartitioned */
  pkChunkSize?: number;
  /** Line ending of the CSV an ingest job will receive. Default: LF */
  lineEnding?: LineEnding;
}

export type FetchedResults =
  | { kind: 'ingest'; results: IngestResults }
  | { kind: 'query'; batches: ResultBatch[] };

function buildJob(kind: JobKind, target: string, info: BulkJobInfo, createdAt: Date): BulkJob {
  const job: BulkJob = {
    jobId: info.id,
    kind,
    operation: info.operation,
    target,
    state: info.state,
    createdAt,
    contentType: 'CSV',
    externalIdField: info.externalIdFieldName,
    uploadedBatches: 0,
    submittedRows: 0,
    recordsProcessed: info.numberRecordsProcessed,
    recordsFailed: info.numberRecordsFailed,
    errorMessage: info.errorMessage,
  };

  if (kind === 'query' && info.chunkJobIds && info.chunkJobIds.length > 0) {
    job.chunks = info.chunkJobIds.map(
      (chunkId, partition): ChunkJob => ({
        jobId: chunkId,
        kind: 'query',
        operation: info.operation,
        target,
        state: info.state,
        createdAt,
        contentType: 'CSV',
        uploadedBatches: 0,
        submittedRows: 0,
        parentJobId: info.id,
        partition,
      })
    );
  }

  if (isTerminalState(info.state)) {
    job.closedAt = createdAt;
  }
  return job;
}

export class JobOrchestrator {
  private readonly client: BulkClient;
  private readonly ingest: IngestJobService;
  private readonly query: QueryJobService;
  private readonly ingestPollPolicy: PollIntervalPolicy;
  private readonly queryPollPolicy: PollIntervalPolicy;
  private readonly sleep: Sleep;
  /** Clock poll budgets are measured against */
  readonly clock: Clock;
  private readonly pageSize: number;

  constructor(client: BulkClient, options: JobOrchestratorOptions = {}) {
    this.client = client;
    this.ingest = createIngestJobService(client);
    this.query = createQueryJobService(client);
    this.ingestPollPolicy = options.pollPolicy ?? client.configuration.pollPolicy;
    this.queryPollPolicy = options.pollPolicy ?? DEFAULT_QUERY_POLL_POLICY;
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? systemClock;
    this.pageSize = options.pageSize ?? client.configuration.pageSize;
  }

  /**
   * Query job endpoints, for callers that need describe or raw page access.
   */
  get queryService(): QueryJobService {
    return this.query;
  }

  /**
   * Largest body `uploadBatch` accepts.
   */
  get uploadLimitBytes(): number {
    return this.client.configuration.uploadLimitBytes;
  }

  get logger(): Logger {
    return this.client.logger;
  }

  get metrics(): MetricsCollector {
    return this.client.metrics;
  }

  /**
   * Policy `pollUntilDone` uses when the caller passes none.
   */
  defaultPollPolicy(kind: JobKind): PollIntervalPolicy {
    return kind === 'ingest' ? this.ingestPollPolicy : this.queryPollPolicy;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Creates a server-side job.
   *
   * @param target - SObject name for ingest jobs, query text for query jobs
   */
  async createJob(
    kind: JobKind,
    operation: BulkOperation,
    target: string,
    externalIdField?: string,
    options: CreateJobOptions = {}
  ): Promise<BulkJob> {
    if (!target || target.trim().length === 0) {
      throw new RequestError(`A ${kind} job needs a ${kind === 'ingest' ? 'target object' : 'query'}`);
    }

    let info: BulkJobInfo;
    if (kind === 'ingest') {
      if (!isIngestOperation(operation)) {
        throw new RequestError(`Operation ${operation} is not valid for ingest jobs`, { details: { operation } });
      }
      info = await this.ingest.createJob({
        object: target,
        operation,
        externalIdFieldName: externalIdField,
        lineEnding: options.lineEnding,
      });
    } else {
      if (!isQueryOperation(operation)) {
        throw new RequestError(`Operation ${operation} is not valid for query jobs`, { details: { operation } });
      }
      if (options.pkChunkSize !== undefined && (!Number.isInteger(options.pkChunkSize) || options.pkChunkSize < 1)) {
        throw new RequestError('PK chunk size must be a positive integer', {
          details: { pkChunkSize: options.pkChunkSize },
        });
      }
      info = await this.query.createJob({ operation, query: target, pkChunkSize: options.pkChunkSize });
    }

    this.client.metrics.increment(MetricNames.JOBS_CREATED, 1, { kind, operation });
    return buildJob(kind, target, info, new Date());
  }

  /**
   * Uploads one CSV batch to an open ingest job. May be called repeatedly.
   */
  async uploadBatch(job: BulkJob, csv: string | Uint8Array): Promise<void> {
    if (job.kind !== 'ingest') {
      throw new RequestError(`Job ${job.jobId} is a query job; only ingest jobs accept uploads`);
    }
    if (job.state !== 'Open') {
      throw new StateError(job.jobId, 'upload to', job.state, ['Open']);
    }

    const text = typeof csv === 'string' ? csv : new TextDecoder('utf-8').decode(csv);
    const limit = this.client.configuration.uploadLimitBytes;
    const size = Buffer.byteLength(text, 'utf8');
    if (size > limit) {
      throw new RequestError(`Batch of ${size} bytes exceeds the upload limit of ${limit} bytes`, {
        details: { jobId: job.jobId, size, limit },
      });
    }

    await this.ingest.uploadJobData(job.jobId, text);

    const rows = countDataRows(text);
    job.uploadedBatches += 1;
    job.submittedRows += rows;
    this.client.metrics.increment(MetricNames.BATCHES_UPLOADED);
    this.client.metrics.increment(MetricNames.ROWS_UPLOADED, rows);
  }

  /**
   * Marks the upload complete. Already-closed jobs are left as they are.
   */
  async closeJob(job: BulkJob): Promise<void> {
    if (job.kind !== 'ingest') {
      throw new RequestError(`Job ${job.jobId} is a query job; query jobs are never closed by the caller`);
    }
    if (job.state === 'UploadComplete') {
      return;
    }
    if (job.state !== 'Open') {
      throw new StateError(job.jobId, 'close', job.state, ['Open', 'UploadComplete']);
    }

    const info = await this.ingest.closeJob(job.jobId);
    job.uploadCompletedAt = new Date();
    this.applyInfo(job, info);
  }

  /**
   * Re-reads job state until it is terminal or the policy's budget runs out.
   *
   * Intermediate states are not written to the job, so a TimeoutError leaves it as
   * it was; calling again with the same job resumes waiting. The server job is
   * never aborted from here.
   */
  async pollUntilDone(job: BulkJob, policy?: PollIntervalPolicy): Promise<TerminalState> {
    if (isTerminalState(job.state)) {
      return job.state;
    }

    const effective = policy ?? this.defaultPollPolicy(job.kind);
    const start = this.clock.now();
    let slept = 0;
    let observed = job.state;

    for (let attempt = 1; ; attempt++) {
      const info = await this.getJobInfo(job);
      this.client.metrics.increment(MetricNames.JOB_POLLS, 1, { kind: job.kind });

      if (isTerminalState(info.state)) {
        this.applyInfo(job, info);
        return info.state;
      }

      observed = info.state;
      const elapsed = Math.max(this.clock.now() - start, slept);
      const delay = pollDelayMs(effective, attempt);
      if (elapsed + delay > effective.timeoutMs) {
        this.client.logger.warn('Job still running after poll budget', {
          jobId: job.jobId,
          state: observed,
          waitedMs: elapsed,
        });
        throw new TimeoutError(job.jobId, elapsed, observed);
      }

      this.client.logger.debug('Job not finished', { jobId: job.jobId, state: observed, nextPollMs: delay });
      await this.sleep(delay);
      slept += delay;
    }
  }

  /**
   * Reads the results of a terminal job.
   */
  async fetchResults(job: BulkJob): Promise<FetchedResults> {
    if (job.kind === 'ingest') {
      return { kind: 'ingest', results: await this.fetchIngestResults(job) };
    }

    const batches: ResultBatch[] = [];
    job.locator = undefined;
    let batch = await this.fetchResultPage(job);
    batches.push(batch);
    while (batch.nextLocator !== undefined) {
      batch = await this.fetchResultPage(job, batch.nextLocator);
      batches.push(batch);
    }
    return { kind: 'query', batches };
  }

  /**
   * Success, failure and unprocessed streams of a terminal ingest job. Absent
   * streams come back empty.
   */
  async fetchIngestResults(job: BulkJob): Promise<IngestResults> {
    if (job.kind !== 'ingest') {
      throw new RequestError(`Job ${job.jobId} is a query job; use fetchResultPage`);
    }
    this.requireTerminal(job, 'fetch results of');

    const [successCsv, failureCsv, unprocessedCsv] = await Promise.all([
      this.ingest.getSuccessfulResults(job.jobId),
      this.ingest.getFailedResults(job.jobId),
      this.ingest.getUnprocessedRecords(job.jobId),
    ]);

    const results = parseIngestResults(successCsv, failureCsv, unprocessedCsv);
    this.client.metrics.increment(MetricNames.OUTCOMES_SUCCEEDED, results.successes.length);
    this.client.metrics.increment(MetricNames.OUTCOMES_FAILED, results.failures.length);
    return results;
  }

  /**
   * Reads one result page of a completed query job and advances `job.locator`.
   *
   * @param locator - Page to read; omit for the first page
   */
  async fetchResultPage(job: BulkJob, locator?: string): Promise<ResultBatch> {
    if (job.kind !== 'query') {
      throw new RequestError(`Job ${job.jobId} is an ingest job; use fetchIngestResults`);
    }
    if (job.state !== 'JobComplete') {
      throw new StateError(job.jobId, 'read results of', job.state, ['JobComplete']);
    }

    const page = await this.query.getResults(job.jobId, { locator, maxRecords: this.pageSize });
    const rows = splitCsvRecords(page.body);
    job.locator = page.locator;

    this.client.metrics.increment(MetricNames.RESULT_PAGES);
    this.client.metrics.increment(MetricNames.RESULT_ROWS, Math.max(0, rows.length - 1));
    this.client.logger.debug('Result page read', {
      jobId: job.jobId,
      rows: Math.max(0, rows.length - 1),
      hasMore: page.locator !== undefined,
    });

    return {
      rows,
      isFirstPage: locator === undefined,
      nextLocator: page.locator,
    };
  }

  /**
   * Aborts a running job. Terminal jobs cannot be aborted.
   */
  async abort(job: BulkJob): Promise<void> {
    if (isTerminalState(job.state)) {
      throw new StateError(job.jobId, 'abort', job.state, ['Open', 'UploadComplete', 'InProgress']);
    }
    const info =
      job.kind === 'ingest' ? await this.ingest.abortJob(job.jobId) : await this.query.abortJob(job.jobId);
    this.applyInfo(job, info);
  }

  /**
   * Deletes a terminal job and its results from the server.
   */
  async delete(job: BulkJob): Promise<void> {
    this.requireTerminal(job, 'delete');
    if (job.kind === 'ingest') {
      await this.ingest.deleteJob(job.jobId);
    } else {
      await this.query.deleteJob(job.jobId);
    }
  }

  /**
   * Re-reads the job's state from the server into the handle.
   */
  async refresh(job: BulkJob): Promise<BulkJobState> {
    this.applyInfo(job, await this.getJobInfo(job));
    return job.state;
  }

  /**
   * Rebuilds a job handle from the server, e.g. to keep polling after a TimeoutError.
   *
   * Job info carries no query text, so a resumed query job's `target` is the
   * `target` passed here, or empty.
   */
  async resume(jobId: string, kind: JobKind, target?: string): Promise<BulkJob> {
    const info = kind === 'ingest' ? await this.ingest.getJobInfo(jobId) : await this.query.getJobInfo(jobId);
    const createdAt = info.createdDate ? new Date(info.createdDate) : new Date();
    const resumedTarget = target ?? (kind === 'ingest' ? (info.object ?? jobId) : '');
    return buildJob(kind, resumedTarget, info, createdAt);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private getJobInfo(job: BulkJob): Promise<BulkJobInfo> {
    return job.kind === 'ingest' ? this.ingest.getJobInfo(job.jobId) : this.query.getJobInfo(job.jobId);
  }

  private requireTerminal(job: BulkJob, operation: string): void {
    if (!isTerminalState(job.state)) {
      throw new StateError(job.jobId, operation, job.state, TERMINAL_STATES);
    }
  }

  private applyInfo(job: BulkJob, info: BulkJobInfo): void {
    // Never reopen a terminal job
    if (isTerminalState(job.state)) return;

    job.state = info.state;
    job.recordsProcessed = info.numberRecordsProcessed ?? job.recordsProcessed;
    job.recordsFailed = info.numberRecordsFailed ?? job.recordsFailed;
    job.errorMessage = info.errorMessage ?? job.errorMessage;

    if (isTerminalState(info.state)) {
      job.closedAt = new Date();
      this.client.metrics.increment(MetricNames.JOBS_TERMINAL, 1, { kind: job.kind, state: info.state });
      this.client.logger.info('Job finished', {
        jobId: job.jobId,
        state: info.state,
        recordsProcessed: job.recordsProcessed,
        recordsFailed: job.recordsFailed,
      });
    }
  }
}
