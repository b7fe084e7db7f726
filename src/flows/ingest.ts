/**
 * End-to-end ingest: convert, create job, upload, close, wait, write outcome files.
 */

import path from 'node:path';
import { parseCsvRecords, splitCsvForUpload } from '../csv/index.js';
import { ConfigurationError, JobFailedError } from '../errors/index.js';
import type { JobOrchestrator } from '../orchestrator/job-orchestrator.js';
import { verifyOutcomeCounts } from '../orchestrator/outcomes.js';
import { writeIngestResultFiles, type IngestResultFiles } from '../output/index.js';
import type { PollIntervalPolicy } from '../resilience/polling.js';
import type { MappingSpec } from '../transform/mapping.js';
import { decodeInput } from '../transform/transformer.js';
import type { BulkJob, TerminalState } from '../types/index.js';
import { readInputFile, runConvertFlow } from './convert.js';

export interface IngestFlowOptions {
  orchestrator: JobOrchestrator;
  spec: MappingSpec;
  inputPath: string;
  /** The input is already bulk-ready UTF-8 CSV; skip conversion */
  inputIsCsv?: boolean;
  /** Directory for outcome files. Default: output */
  outDir?: string;
  pollPolicy?: PollIntervalPolicy;
}

export interface IngestFlowResult {
  job: BulkJob;
  state: TerminalState;
  successCount: number;
  failureCount: number;
  unprocessedCount: number;
  files: IngestResultFiles;
  /** Converted CSV path, when the input was an ALL file */
  convertedCsv?: string;
}

interface UploadCsv {
  text: string;
  lineTerminator: '\n' | '\r\n';
  convertedCsv?: string;
}

async function loadUploadCsv(options: IngestFlowOptions): Promise<UploadCsv> {
  if (options.inputIsCsv) {
    const bytes = await readInputFile(options.inputPath);
    const text = decodeInput(bytes, 'utf-8');
    return { text, lineTerminator: text.includes('\r\n') ? '\r\n' : '\n' };
  }
  const converted = await runConvertFlow({
    inputPath: options.inputPath,
    spec: options.spec,
    logger: options.orchestrator.logger,
  });
  return { text: converted.text, lineTerminator: options.spec.lineTerminator, convertedCsv: converted.outputPath };
}

export async function runIngestFlow(options: IngestFlowOptions): Promise<IngestFlowResult> {
  const { orchestrator, spec } = options;
  const logger = orchestrator.logger.child({ masterKey: spec.masterKey });

  if (!spec.object) {
    throw new ConfigurationError(`Mapping ${spec.masterKey} has no target object`);
  }

  const { text, lineTerminator, convertedCsv } = await loadUploadCsv(options);
  const parts = splitCsvForUpload(text, orchestrator.uploadLimitBytes, lineTerminator);

  const job = await orchestrator.createJob('ingest', spec.operation, spec.object, spec.externalIdField, {
    lineEnding: lineTerminator === '\r\n' ? 'CRLF' : 'LF',
  });
  logger.info('Ingest job created', { jobId: job.jobId, object: spec.object, batches: parts.length });

  try {
    for (const part of parts) {
      await orchestrator.uploadBatch(job, part);
    }
    await orchestrator.closeJob(job);
  } catch (error) {
    // Only a job the server still reports Open is abandoned; anything submitted keeps running
    try {
      if ((await orchestrator.refresh(job)) === 'Open') {
        await orchestrator.abort(job);
      }
    } catch (abortError) {
      logger.warn('Could not abort job after upload failure', {
        jobId: job.jobId,
        error: abortError instanceof Error ? abortError.message : String(abortError),
      });
    }
    throw error;
  }

  const state = await orchestrator.pollUntilDone(job, options.pollPolicy);
  const results = await orchestrator.fetchIngestResults(job);
  const files = await writeIngestResultFiles(options.outDir ?? 'output', job.jobId, spec.masterKey, results);

  logger.info('Ingest outcome files written', {
    jobId: job.jobId,
    state,
    succeeded: results.successes.length,
    failed: results.failures.length,
    unprocessed: results.unprocessed.length,
    directory: path.dirname(files.success),
  });

  if (state !== 'JobComplete') {
    throw new JobFailedError(job.jobId, state, job.errorMessage);
  }

  const keyField = spec.externalIdField;
  verifyOutcomeCounts(job, results, {
    keyField,
    submittedKeys: keyField ? parseCsvRecords(text).map((record) => record[keyField] ?? '') : undefined,
  });

  return {
    job,
    state,
    successCount: results.successes.length,
    failureCount: results.failures.length,
    unprocessedCount: results.unprocessed.length,
    files,
    convertedCsv,
  };
}
