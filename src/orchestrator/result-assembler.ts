/**
 * Query result assembly: locator chains, chunk fan-out and the single-header merge.
 */

import { JobFailedError, PartialChunkFailureError } from '../errors/index.js';
import { MetricNames, NoopLogger, type Logger } from '../observability/index.js';
import { withTimeout, type PollIntervalPolicy } from '../resilience/polling.js';
import type { BulkJob, ResultBatch } from '../types/index.js';
import type { JobOrchestrator } from './job-orchestrator.js';
import { mapAll, mapSettled } from './worker-pool.js';

export interface ResultAssemblerOptions {
  /** Chunks polled and read at once. Default: 4 */
  concurrency?: number;
  logger?: Logger;
}

export interface AssembledResult {
  /** Header line, empty when the query produced no output */
  header: string;
  /** Data lines in partition order, then page order */
  rows: string[];
  /** Header plus rows, LF-terminated */
  csv: string;
  rowCount: number;
  pageCount: number;
  partitionCount: number;
}

/**
 * Joins pages into one CSV. The header comes from the first page of the first
 * partition; every other page's header line is dropped.
 */
export function mergeResultBatches(partitions: readonly (readonly ResultBatch[])[]): AssembledResult {
  let header = '';
  const rows: string[] = [];
  let pageCount = 0;

  for (const pages of partitions) {
    for (const page of pages) {
      pageCount++;
      const [pageHeader, ...data] = page.rows;
      if (pageHeader === undefined) continue;
      if (header === '') {
        header = pageHeader;
      }
      rows.push(...data);
    }
  }

  const csv = header === '' ? '' : [header, ...rows].join('\n') + '\n';
  return {
    header,
    rows,
    csv,
    rowCount: rows.length,
    pageCount,
    partitionCount: partitions.length,
  };
}

export class ResultAssembler {
  private readonly orchestrator: JobOrchestrator;
  private readonly concurrency: number;
  private readonly logger: Logger;

  constructor(orchestrator: JobOrchestrator, options: ResultAssemblerOptions = {}) {
    this.orchestrator = orchestrator;
    this.concurrency = options.concurrency ?? 4;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Follows one job's locator chain from the first page until no locator is returned.
   */
  async collectPages(job: BulkJob): Promise<ResultBatch[]> {
    const pages: ResultBatch[] = [];
    let page = await this.orchestrator.fetchResultPage(job);
    pages.push(page);
    while (page.nextLocator !== undefined) {
      page = await this.orchestrator.fetchResultPage(job, page.nextLocator);
      pages.push(page);
    }
    return pages;
  }

  /**
   * Waits for a query job (and all its chunks) and returns the merged output.
   *
   * The policy's budget covers the whole export: chunks that start polling late
   * only get what is left of it. Nothing is returned unless every partition completed.
   */
  async assemble(job: BulkJob, policy?: PollIntervalPolicy): Promise<AssembledResult> {
    const chunks = job.chunks ?? [];
    if (chunks.length === 0) {
      const state = await this.orchestrator.pollUntilDone(job, policy);
      if (state !== 'JobComplete') {
        throw new JobFailedError(job.jobId, state, job.errorMessage);
      }
      const result = mergeResultBatches([await this.collectPages(job)]);
      this.logger.info('Query results assembled', {
        jobId: job.jobId,
        rows: result.rowCount,
        pages: result.pageCount,
      });
      return result;
    }

    this.logger.info('Waiting for chunked query', { jobId: job.jobId, chunks: chunks.length });

    const budget = policy ?? this.orchestrator.defaultPollPolicy('query');
    const clock = this.orchestrator.clock;
    const deadline = clock.now() + budget.timeoutMs;

    const tags = { jobId: job.jobId };
    let pending = chunks.length;
    this.orchestrator.metrics.gauge(MetricNames.CHUNKS_PENDING, pending, tags);

    // Join barrier: every chunk reaches a terminal state (or errors) before anything is read
    const settled = await mapSettled(chunks, this.concurrency, async (chunk) => {
      try {
        return await this.orchestrator.pollUntilDone(
          chunk,
          withTimeout(budget, Math.max(0, deadline - clock.now()))
        );
      } finally {
        pending--;
        this.orchestrator.metrics.gauge(MetricNames.CHUNKS_PENDING, pending, tags);
      }
    });
    for (const outcome of settled) {
      if (outcome.status === 'rejected') {
        throw outcome.reason;
      }
    }

    const failed = chunks.filter((chunk) => chunk.state !== 'JobComplete');
    if (failed.length > 0) {
      throw new PartialChunkFailureError(
        job.jobId,
        failed.map((chunk) => ({ partition: chunk.partition, jobId: chunk.jobId, state: chunk.state }))
      );
    }

    // Pages land in per-partition buffers; the merge runs single-threaded afterwards
    const buffers = await mapAll(chunks, this.concurrency, (chunk) => this.collectPages(chunk));
    const result = mergeResultBatches(buffers);
    this.logger.info('Chunked query results assembled', {
      jobId: job.jobId,
      partitions: result.partitionCount,
      rows: result.rowCount,
      pages: result.pageCount,
    });
    return result;
  }
}
