/**
 * End-to-end export: query job, locator/chunk assembly, one CSV on disk.
 */

import path from 'node:path';
import { RequestError } from '../errors/index.js';
import type { JobOrchestrator } from '../orchestrator/job-orchestrator.js';
import type { AssembledResult, ResultAssembler } from '../orchestrator/result-assembler.js';
import { exportFileName, writeOutputFile } from '../output/index.js';
import type { PollIntervalPolicy } from '../resilience/polling.js';
import type { BulkJob, QueryOperation } from '../types/index.js';

export interface SoqlOptions {
  object: string;
  fields: readonly string[];
  where?: string;
  orderBy?: string;
  limit?: number;
}

/**
 * Builds `SELECT Id, ... FROM object`. `Id` always comes first and repeated
 * fields are kept once, in first-seen order.
 */
export function buildSoql(options: SoqlOptions): string {
  if (!options.object.trim()) {
    throw new RequestError('An object name is required to build a query');
  }
  const seen = new Set<string>();
  const fields: string[] = [];
  for (const raw of ['Id', ...options.fields]) {
    const field = raw.trim();
    if (field === '' || seen.has(field.toLowerCase())) continue;
    seen.add(field.toLowerCase());
    fields.push(field);
  }

  let soql = `SELECT ${fields.join(', ')} FROM ${options.object.trim()}`;
  if (options.where?.trim()) soql += ` WHERE ${options.where.trim()}`;
  if (options.orderBy?.trim()) soql += ` ORDER BY ${options.orderBy.trim()}`;
  if (options.limit !== undefined) {
    if (!Number.isInteger(options.limit) || options.limit < 1) {
      throw new RequestError('Query limit must be a positive integer', { details: { limit: options.limit } });
    }
    soql += ` LIMIT ${options.limit}`;
  }
  return soql;
}

/**
 * SObject named in a query's FROM clause, if any.
 */
export function objectFromQuery(query: string): string | undefined {
  return /\bFROM\s+([A-Za-z0-9_]+)/i.exec(query)?.[1];
}

/**
 * Splits requested fields into those the object describes and those it does not.
 * Comparison ignores case, as field API names do.
 */
export function partitionFields(
  requested: readonly string[],
  available: ReadonlySet<string>
): { known: string[]; unknown: string[] } {
  const lower = new Set([...available].map((name) => name.toLowerCase()));
  const known: string[] = [];
  const unknown: string[] = [];
  for (const field of requested) {
    (lower.has(field.toLowerCase()) ? known : unknown).push(field);
  }
  return { known, unknown };
}

/**
 * Builds a query for `options.object`, first dropping fields the object does not have.
 */
export async function buildCheckedSoql(orchestrator: JobOrchestrator, options: SoqlOptions): Promise<string> {
  const available = await orchestrator.queryService.describeFields(options.object);
  const { known, unknown } = partitionFields(options.fields, available);
  if (unknown.length > 0) {
    orchestrator.logger.warn('Skipping fields missing from object', { object: options.object, fields: unknown });
  }
  return buildSoql({ ...options, fields: known });
}

export interface ExportFlowOptions {
  orchestrator: JobOrchestrator;
  assembler: ResultAssembler;
  query: string;
  operation?: QueryOperation;
  pkChunkSize?: number;
  /** Exact output path; otherwise `<outDir>/<object>_<timestamp>.csv` */
  outputPath?: string;
  /** Default: output */
  outDir?: string;
  now?: () => Date;
  pollPolicy?: PollIntervalPolicy;
}

export interface ExportFlowResult {
  job: BulkJob;
  outputPath: string;
  result: AssembledResult;
}

export async function runExportFlow(options: ExportFlowOptions): Promise<ExportFlowResult> {
  const { orchestrator, assembler } = options;
  const now = options.now ?? (() => new Date());

  const job = await orchestrator.createJob('query', options.operation ?? 'query', options.query, undefined, {
    pkChunkSize: options.pkChunkSize,
  });
  orchestrator.logger.info('Query job created', {
    jobId: job.jobId,
    chunks: job.chunks?.length ?? 0,
  });

  // Nothing touches disk until every page of every partition is merged
  const result = await assembler.assemble(job, options.pollPolicy);

  const outputPath =
    options.outputPath ??
    path.join(options.outDir ?? 'output', exportFileName(objectFromQuery(options.query) ?? 'export', now()));
  await writeOutputFile(outputPath, result.csv);

  orchestrator.logger.info('Export written', { jobId: job.jobId, output: outputPath, rows: result.rowCount });
  return { job, outputPath, result };
}
