/**
 * Bulk API 2.0 query job endpoints (`/jobs/query`).
 */

import type { BulkClient } from '../client/index.js';
import type {
  BulkJobInfo,
  ColumnDelimiter,
  LineEnding,
  QueryOperation,
  QueryResultsPage,
} from '../types/index.js';
import { bulkJobInfoSchema, sObjectDescribeSchema } from './schemas.js';

export interface CreateQueryJobOptions {
  operation: QueryOperation;
  query: string;
  columnDelimiter?: ColumnDelimiter;
  lineEnding?: LineEnding;
  /** Partition size for PK chunking; unset disables chunking */
  pkChunkSize?: number;
}

export interface GetResultsOptions {
  /** Locator of the page to read; omit for the first page */
  locator?: string;
  /** Page size hint */
  maxRecords?: number;
}

export interface QueryJobService {
  createJob(options: CreateQueryJobOptions): Promise<BulkJobInfo>;
  getJobInfo(jobId: string): Promise<BulkJobInfo>;
  getResults(jobId: string, options?: GetResultsOptions): Promise<QueryResultsPage>;
  abortJob(jobId: string): Promise<BulkJobInfo>;
  deleteJob(jobId: string): Promise<void>;
  /** Field API names of an SObject, `Id` included */
  describeFields(object: string): Promise<Set<string>>;
}

/**
 * Reads the locator header; the service sends the literal "null" on the last page.
 */
export function parseLocator(header: string | undefined): string | undefined {
  if (header === undefined) return undefined;
  const trimmed = header.trim();
  return trimmed === '' || trimmed === 'null' ? undefined : trimmed;
}

export class QueryJobServiceImpl implements QueryJobService {
  private readonly client: BulkClient;
  private readonly basePath = '/jobs/query';

  constructor(client: BulkClient) {
    this.client = client;
  }

  async createJob(options: CreateQueryJobOptions): Promise<BulkJobInfo> {
    const requestBody: Record<string, unknown> = {
      operation: options.operation,
      query: options.query,
      contentType: 'CSV',
      columnDelimiter: options.columnDelimiter ?? 'COMMA',
      lineEnding: options.lineEnding ?? 'LF',
    };

    const headers: Record<string, string> = {};
    if (options.pkChunkSize !== undefined) {
      requestBody.pkChunking = `chunkSize=${options.pkChunkSize}`;
      headers['Sforce-Enable-PKChunking'] = `chunkSize=${options.pkChunkSize}`;
    }

    this.client.logger.info('Creating query job', {
      operation: options.operation,
      pkChunkSize: options.pkChunkSize,
    });

    const jobInfo = await this.client.sendJson('POST', this.basePath, requestBody, bulkJobInfoSchema, {
      headers,
      context: { operation: options.operation },
    });

    this.client.logger.info('Query job created', {
      jobId: jobInfo.id,
      state: jobInfo.state,
      chunks: jobInfo.chunkJobIds?.length ?? 0,
    });
    return jobInfo;
  }

  async getJobInfo(jobId: string): Promise<BulkJobInfo> {
    return this.client.getJson(`${this.basePath}/${jobId}`, bulkJobInfoSchema, undefined, {
      jobId,
      operation: 'status',
    });
  }

  async getResults(jobId: string, options: GetResultsOptions = {}): Promise<QueryResultsPage> {
    const response = await this.client.getText(
      `${this.basePath}/${jobId}/results`,
      { locator: options.locator, maxRecords: options.maxRecords },
      { context: { jobId, operation: 'results', locator: options.locator } }
    );

    const count = response.headers['sforce-numberofrecords'];
    const numberOfRecords = count === undefined ? undefined : Number.parseInt(count, 10);

    return {
      body: response.body,
      locator: parseLocator(response.headers['sforce-locator']),
      numberOfRecords: numberOfRecords === undefined || Number.isNaN(numberOfRecords) ? undefined : numberOfRecords,
    };
  }

  async abortJob(jobId: string): Promise<BulkJobInfo> {
    this.client.logger.info('Aborting query job', { jobId });
    return this.client.sendJson('PATCH', `${this.basePath}/${jobId}`, { state: 'Aborted' }, bulkJobInfoSchema, {
      context: { jobId, operation: 'abort' },
    });
  }

  async deleteJob(jobId: string): Promise<void> {
    this.client.logger.info('Deleting query job', { jobId });
    await this.client.delete(`${this.basePath}/${jobId}`, { jobId, operation: 'delete' });
  }

  async describeFields(object: string): Promise<Set<string>> {
    const describe = await this.client.getJson(
      `/sobjects/${encodeURIComponent(object)}/describe`,
      sObjectDescribeSchema,
      undefined,
      { object, operation: 'describe' }
    );
    const names = new Set(describe.fields.map((f) => f.name));
    names.add('Id');
    return names;
  }
}

export function createQueryJobService(client: BulkClient): QueryJobService {
  return new QueryJobServiceImpl(client);
}
