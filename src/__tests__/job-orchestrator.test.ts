/**
 * Tests for the bulk job state machine.
 */

import { describe, it, expect } from 'vitest';
import { RequestError, StateError, TimeoutError } from '../errors/index.js';
import { LogLevel, MetricNames } from '../observability/index.js';
import { verifyOutcomeCounts } from '../orchestrator/outcomes.js';
import { createHarness } from './support/harness.js';

const ITEM_CSV = 'Code__c,Name\nC1,A\nC2,B\nC3,\n';

describe('JobOrchestrator ingest lifecycle', () => {
  it('should run create, upload, close, poll and read outcomes', async () => {
    const { server, orchestrator, observability, pollSleeps } = createHarness();
    server.planIngest({
      states: ['InProgress', 'JobComplete'],
      successCsv: 'sf__Id,sf__Created,Code__c\n001A,true,C1\n001B,false,C2\n',
      failureCsv: 'sf__Id,sf__Error,Code__c\n,REQUIRED_FIELD_MISSING:Required fields are missing: [Name],C3\n',
      numberRecordsProcessed: 3,
      numberRecordsFailed: 1,
    });

    const job = await orchestrator.createJob('ingest', 'upsert', 'Item__c', 'Code__c');
    expect(job).toMatchObject({
      jobId: '750I001',
      kind: 'ingest',
      operation: 'upsert',
      target: 'Item__c',
      state: 'Open',
      externalIdField: 'Code__c',
    });

    await orchestrator.uploadBatch(job, ITEM_CSV);
    expect(job.uploadedBatches).toBe(1);
    expect(job.submittedRows).toBe(3);
    expect(server.job('750I001').uploads).toEqual([ITEM_CSV]);

    await orchestrator.closeJob(job);
    expect(job.state).toBe('UploadComplete');
    expect(job.uploadCompletedAt).toBeInstanceOf(Date);

    await expect(orchestrator.pollUntilDone(job)).resolves.toBe('JobComplete');
    expect(pollSleeps).toEqual([5000]);
    expect(job.state).toBe('JobComplete');
    expect(job.recordsProcessed).toBe(3);
    expect(job.recordsFailed).toBe(1);
    expect(job.closedAt).toBeInstanceOf(Date);

    const results = await orchestrator.fetchIngestResults(job);
    expect(results.successes).toEqual([
      { recordId: '001A', success: true, created: true, fields: { Code__c: 'C1' } },
      { recordId: '001B', success: true, created: false, fields: { Code__c: 'C2' } },
    ]);
    expect(results.failures).toEqual([
      {
        recordId: undefined,
        success: false,
        errorCode: 'REQUIRED_FIELD_MISSING',
        errorMessage: 'Required fields are missing: [Name]',
        fields: { Code__c: 'C3' },
      },
    ]);
    expect(results.unprocessed).toEqual([]);
    expect(() => verifyOutcomeCounts(job, results)).not.toThrow();

    expect(observability.metrics.getCounter(MetricNames.ROWS_UPLOADED)).toBe(3);
    expect(observability.metrics.getCounter(MetricNames.OUTCOMES_SUCCEEDED)).toBe(2);
    expect(observability.metrics.getCounter(MetricNames.OUTCOMES_FAILED)).toBe(1);
    expect(
      observability.metrics.getCounter(MetricNames.JOBS_TERMINAL, { kind: 'ingest', state: 'JobComplete' })
    ).toBe(1);
  });

  it('should accept several uploads while the job is open', async () => {
    const { server, orchestrator } = createHarness();
    const job = await orchestrator.createJob('ingest', 'insert', 'Item__c');

    await orchestrator.uploadBatch(job, 'Code__c\nC1\n');
    await orchestrator.uploadBatch(job, new TextEncoder().encode('Code__c\nC2\nC3\n'));

    expect(job.uploadedBatches).toBe(2);
    expect(job.submittedRows).toBe(3);
    expect(server.job('750I001').uploads).toEqual(['Code__c\nC1\n', 'Code__c\nC2\nC3\n']);
  });

  it('should reject uploads after close and treat a second close as a no-op', async () => {
    const { server, orchestrator } = createHarness();
    const job = await orchestrator.createJob('ingest', 'insert', 'Item__c');
    await orchestrator.uploadBatch(job, ITEM_CSV);
    await orchestrator.closeJob(job);

    const error: unknown = await orchestrator.uploadBatch(job, ITEM_CSV).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(StateError);
    expect(error).toMatchObject({
      message: 'Cannot upload to job 750I001 in state UploadComplete (expected Open)',
    });

    await orchestrator.closeJob(job);
    expect(server.requestsTo('PATCH', '/jobs/ingest/750I001')).toHaveLength(1);
    expect(server.requestsTo('PUT', '/batches')).toHaveLength(1);
  });

  it('should refuse a batch over the upload limit without sending it', async () => {
    const { server, orchestrator } = createHarness({ uploadLimitBytes: 10 });
    const job = await orchestrator.createJob('ingest', 'insert', 'Item__c');

    await expect(orchestrator.uploadBatch(job, 'Code__c\nC1\n')).rejects.toThrow(
      'Batch of 11 bytes exceeds the upload limit of 10 bytes'
    );
    expect(server.requestsTo('PUT', '/batches')).toHaveLength(0);
    expect(job.uploadedBatches).toBe(0);
  });

  it('should validate job definitions before calling the service', async () => {
    const { server, orchestrator } = createHarness();

    await expect(orchestrator.createJob('ingest', 'insert', ' ')).rejects.toThrow(
      'A ingest job needs a target object'
    );
    await expect(orchestrator.createJob('ingest', 'query', 'Item__c')).rejects.toThrow(
      'Operation query is not valid for ingest jobs'
    );
    await expect(orchestrator.createJob('query', 'insert', 'SELECT Id FROM Account')).rejects.toThrow(
      'Operation insert is not valid for query jobs'
    );
    await expect(
      orchestrator.createJob('query', 'query', 'SELECT Id FROM Account', undefined, { pkChunkSize: 0 })
    ).rejects.toThrow('PK chunk size must be a positive integer');
    expect(server.requests).toHaveLength(0);
  });

  it('should keep query jobs out of the upload path', async () => {
    const { orchestrator } = createHarness();
    const job = await orchestrator.createJob('query', 'query', 'SELECT Id FROM Account');

    await expect(orchestrator.uploadBatch(job, ITEM_CSV)).rejects.toBeInstanceOf(RequestError);
    await expect(orchestrator.closeJob(job)).rejects.toBeInstanceOf(RequestError);
  });
});

describe('JobOrchestrator polling', () => {
  it('should time out without changing or aborting the job, then resume', async () => {
    const { server, orchestrator, observability, pollSleeps } = createHarness({
      pollPolicy: { type: 'constant', intervalMs: 1000, timeoutMs: 3000 },
    });
    server.planIngest({ states: ['InProgress'] });
    const job = await orchestrator.createJob('ingest', 'insert', 'Item__c');
    await orchestrator.uploadBatch(job, ITEM_CSV);
    await orchestrator.closeJob(job);

    const error: unknown = await orchestrator.pollUntilDone(job).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ message: 'Job 750I001 still InProgress after 3000ms' });
    expect(pollSleeps).toEqual([1000, 1000, 1000]);
    expect(job.state).toBe('UploadComplete');
    expect(server.job('750I001').state).toBe('InProgress');
    expect(server.requestsTo('PATCH', '/jobs/ingest/750I001')).toHaveLength(1);
    expect(observability.logger.getEntriesAtLevel(LogLevel.WARN).map((e) => e.message)).toEqual([
      'Job still running after poll budget',
    ]);

    server.job('750I001').states = ['JobComplete'];
    await expect(orchestrator.pollUntilDone(job)).resolves.toBe('JobComplete');
    expect(pollSleeps).toEqual([1000, 1000, 1000]);
  });

  it('should return a terminal state without calling the service', async () => {
    const { server, orchestrator } = createHarness();
    const job = await orchestrator.createJob('ingest', 'insert', 'Item__c');
    await orchestrator.abort(job);
    const before = server.requests.length;

    await expect(orchestrator.pollUntilDone(job)).resolves.toBe('Aborted');
    expect(server.requests).toHaveLength(before);
  });

  it('should rebuild a job handle from the server', async () => {
    const { server, orchestrator, pollSleeps } = createHarness();
    server.planIngest({ states: ['InProgress', 'JobComplete'], numberRecordsProcessed: 2 });
    const job = await orchestrator.createJob('ingest', 'insert', 'Item__c');
    await orchestrator.closeJob(job);

    const resumed = await orchestrator.resume('750I001', 'ingest');
    expect(resumed).toMatchObject({ jobId: '750I001', kind: 'ingest', target: 'Item__c', state: 'InProgress' });
    expect(resumed.uploadedBatches).toBe(0);

    await expect(orchestrator.pollUntilDone(resumed)).resolves.toBe('JobComplete');
    expect(resumed.recordsProcessed).toBe(2);
    expect(pollSleeps).toEqual([]);
  });

  it('should keep the query text given when resuming a query job', async () => {
    const { orchestrator } = createHarness();
    await orchestrator.createJob('query', 'query', 'SELECT Id FROM Account');

    const resumed = await orchestrator.resume('750Q001', 'query', 'SELECT Id FROM Account');
    expect(resumed).toMatchObject({ jobId: '750Q001', kind: 'query', target: 'SELECT Id FROM Account' });

    const unnamed = await orchestrator.resume('750Q001', 'query');
    expect(unnamed.target).toBe('');
  });
});

describe('JobOrchestrator abort and delete', () => {
  it('should abort a running job and refuse to abort it twice', async () => {
    const { server, orchestrator } = createHarness();
    const job = await orchestrator.createJob('ingest', 'insert', 'Item__c');

    await orchestrator.abort(job);
    expect(job.state).toBe('Aborted');
    expect(server.job('750I001').state).toBe('Aborted');

    await expect(orchestrator.abort(job)).rejects.toThrow(
      'Cannot abort job 750I001 in state Aborted (expected Open or UploadComplete or InProgress)'
    );
  });

  it('should delete only terminal jobs', async () => {
    const { server, orchestrator } = createHarness();
    const job = await orchestrator.createJob('ingest', 'insert', 'Item__c');

    await expect(orchestrator.delete(job)).rejects.toThrow(
      'Cannot delete job 750I001 in state Open (expected JobComplete or Failed or Aborted)'
    );

    await orchestrator.abort(job);
    await orchestrator.delete(job);
    expect(server.jobs.has('750I001')).toBe(false);
    expect(server.requestsTo('DELETE', '/jobs/ingest/750I001')).toHaveLength(1);
  });
});

describe('JobOrchestrator query jobs', () => {
  it('should expose PK chunk partitions in listing order', async () => {
    const { server, orchestrator } = createHarness();
    server.planQuery({ chunks: [{}, {}] });

    const job = await orchestrator.createJob('query', 'query', 'SELECT Id FROM Account', undefined, {
      pkChunkSize: 1000,
    });

    expect(job.jobId).toBe('750Q001');
    expect(job.chunks?.map((chunk) => [chunk.jobId, chunk.partition, chunk.parentJobId])).toEqual([
      ['750Q002', 0, '750Q001'],
      ['750Q003', 1, '750Q001'],
    ]);
    expect(server.job('750Q001').createBody).toMatchObject({ pkChunking: 'chunkSize=1000' });
  });

  it('should refuse to read results before the job completes', async () => {
    const { orchestrator } = createHarness();
    const job = await orchestrator.createJob('query', 'query', 'SELECT Id FROM Account');

    await expect(orchestrator.fetchResultPage(job)).rejects.toThrow(
      'Cannot read results of job 750Q001 in state UploadComplete (expected JobComplete)'
    );
  });

  it('should follow the locator chain to the last page', async () => {
    const { server, orchestrator, observability } = createHarness();
    server.planQuery({ states: ['InProgress', 'JobComplete'], pages: ['Id,Name\n1,a\n', 'Id,Name\n2,b\n3,c\n'] });
    const job = await orchestrator.createJob('query', 'query', 'SELECT Id, Name FROM Account');

    await expect(orchestrator.pollUntilDone(job)).resolves.toBe('JobComplete');
    const fetched = await orchestrator.fetchResults(job);

    expect(fetched).toEqual({
      kind: 'query',
      batches: [
        { rows: ['Id,Name', '1,a'], isFirstPage: true, nextLocator: '750Q001-p1' },
        { rows: ['Id,Name', '2,b', '3,c'], isFirstPage: false, nextLocator: undefined },
      ],
    });
    expect(job.locator).toBeUndefined();
    expect(server.requestsTo('GET', '/results').map((r) => r.query)).toEqual([
      { maxRecords: '100000' },
      { locator: '750Q001-p1', maxRecords: '100000' },
    ]);
    expect(observability.metrics.getCounter(MetricNames.RESULT_PAGES)).toBe(2);
    expect(observability.metrics.getCounter(MetricNames.RESULT_ROWS)).toBe(3);
  });

  it('should send the configured page size', async () => {
    const { server, orchestrator } = createHarness({ pageSize: 2 });
    server.planQuery({ pages: ['Id\n1\n'] });
    const job = await orchestrator.createJob('query', 'query', 'SELECT Id FROM Account');
    await orchestrator.pollUntilDone(job);

    await orchestrator.fetchResultPage(job);

    expect(server.requestsTo('GET', '/results')[0]?.query).toEqual({ maxRecords: '2' });
  });
});
