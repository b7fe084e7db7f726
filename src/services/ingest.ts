/**
 * Bulk API 2.0 ingest job endpoints (`/jobs/ingest`).
 */

import type { BulkClient } from '../client/index.js';
import type { BulkJobInfo, ColumnDelimiter, IngestOperation, LineEnding } from '../types/index.js';
import { RequestError } from '../errors/index.js';
import { bulkJobInfoSchema } from './schemas.js';

// ============================================================================
// Request Types
// ============================================================================

export interface CreateIngestJobOptions {
  /** The API name of the SObject to process */
  object: string;

  operation: IngestOperation;

  /** Required for upsert */
  externalIdFieldName?: string;

  lineEnding?: LineEnding;

  columnDelimiter?: ColumnDelimiter;
}

// ============================================================================
// Ingest Job Service
// ============================================================================

export interface IngestJobService {
  createJob(options: CreateIngestJobOptions): Promise<BulkJobInfo>;
  uploadJobData(jobId: string, csvData: string): Promise<void>;
  /** Marks the upload complete so the service starts processing */
  closeJob(jobId: string): Promise<BulkJobInfo>;
  abortJob(jobId: string): Promise<BulkJobInfo>;
  getJobInfo(jobId: string): Promise<BulkJobInfo>;
  getSuccessfulResults(jobId: string): Promise<string>;
  getFailedResults(jobId: string): Promise<string>;
  getUnprocessedRecords(jobId: string): Promise<string>;
  deleteJob(jobId: string): Promise<void>;
}

export class IngestJobServiceImpl implements IngestJobService {
  private readonly client: BulkClient;
  private readonly basePath = '/jobs/ingest';

  constructor(client: BulkClient) {
    this.client = client;
  }

  async createJob(options: CreateIngestJobOptions): Promise<BulkJobInfo> {
    if (options.operation === 'upsert' && !options.externalIdFieldName) {
      throw new RequestError('externalIdFieldName is required for upsert operations', {
        details: { object: options.object, operation: options.operation },
      });
    }

    const requestBody: Record<string, unknown> = {
      object: options.object,
      operation: options.operation,
      contentType: 'CSV',
      lineEnding: options.lineEnding ?? 'LF',
      columnDelimiter: options.columnDelimiter ?? 'COMMA',
    };
    if (options.externalIdFieldName) {
      requestBody.externalIdFieldName = options.externalIdFieldName;
    }

    this.client.logger.info('Creating ingest job', {
      object: options.object,
      operation: options.operation,
    });

    const jobInfo = await this.client.sendJson('POST', this.basePath, requestBody, bulkJobInfoSchema, {
      context: { object: options.object, operation: options.operation },
    });

    this.client.logger.info('Ingest job created', { jobId: jobInfo.id, state: jobInfo.state });
    return jobInfo;
  }

  async uploadJobData(jobId: string, csvData: string): Promise<void> {
    this.client.logger.info('Uploading data to ingest job', {
      jobId,
      dataSize: Buffer.byteLength(csvData, 'utf8'),
    });

    await this.client.putCsv(`${this.basePath}/${jobId}/batches`, csvData, {
      jobId,
      operation: 'upload',
    });
  }

  async closeJob(jobId: string): Promise<BulkJobInfo> {
    this.client.logger.info('Closing ingest job', { jobId });
    return this.patchState(jobId, 'UploadComplete');
  }

  async abortJob(jobId: string): Promise<BulkJobInfo> {
    this.client.logger.info('Aborting ingest job', { jobId });
    return this.patchState(jobId, 'Aborted');
  }

  async getJobInfo(jobId: string): Promise<BulkJobInfo> {
    return this.client.getJson(`${this.basePath}/${jobId}`, bulkJobInfoSchema, undefined, {
      jobId,
      operation: 'status',
    });
  }

  async getSuccessfulResults(jobId: string): Promise<string> {
    return this.getResultStream(jobId, 'successfulResults');
  }

  async getFailedResults(jobId: string): Promise<string> {
    return this.getResultStream(jobId, 'failedResults');
  }

  async getUnprocessedRecords(jobId: string): Promise<string> {
    return this.getResultStream(jobId, 'unprocessedrecords');
  }

  async deleteJob(jobId: string): Promise<void> {
    this.client.logger.info('Deleting ingest job', { jobId });
    await this.client.delete(`${this.basePath}/${jobId}`, { jobId, operation: 'delete' });
  }

  private async patchState(jobId: string, state: 'UploadComplete' | 'Aborted'): Promise<BulkJobInfo> {
    const jobInfo = await this.client.sendJson('PATCH', `${this.basePath}/${jobId}`, { state }, bulkJobInfoSchema, {
      context: { jobId, operation: state === 'Aborted' ? 'abort' : 'close' },
    });
    this.client.logger.info('Ingest job state changed', { jobId, state: jobInfo.state });
    return jobInfo;
  }

  private async getResultStream(
    jobId: string,
    stream: 'successfulResults' | 'failedResults' | 'unprocessedrecords'
  ): Promise<string> {
    this.client.logger.debug('Fetching ingest results', { jobId, stream });
    const response = await this.client.getText(`${this.basePath}/${jobId}/${stream}`, undefined, {
      context: { jobId, operation: stream },
    });
    return response.body;
  }
}

export function createIngestJobService(client: BulkClient): IngestJobService {
  return new IngestJobServiceImpl(client);
}
