/**
 * bulk-bridge command line.
 *
 * Commands:
 *   bulk-bridge convert <input> --config <mapping.json>  - ALL file to bulk-ready CSV
 *   bulk-bridge ingest <masterKey> <input>              - convert, load and collect outcomes
 *   bulk-bridge export --query <soql>                   - query export to one CSV
 *
 * Exit codes: 0 success, 2 auth failure, 3 transport/request failure,
 * 4 partial data failure, 1 anything else.
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import type { FetchLike } from '../auth/index.js';
import { createBulkClient } from '../client/index.js';
import { BulkBridgeConfigBuilder } from '../config/index.js';
import {
  AuthError,
  ConfigurationError,
  NetworkError,
  OutcomeMismatchError,
  PartialChunkFailureError,
  RateLimitError,
  RequestError,
  RequestTimeoutError,
  ServerError,
} from '../errors/index.js';
import { runConvertFlow } from '../flows/convert.js';
import { buildCheckedSoql, buildSoql, runExportFlow } from '../flows/export.js';
import { runIngestFlow } from '../flows/ingest.js';
import type { Observability } from '../observability/index.js';
import { JobOrchestrator } from '../orchestrator/job-orchestrator.js';
import { ResultAssembler } from '../orchestrator/result-assembler.js';
import type { Sleep } from '../resilience/polling.js';
import { loadMappingRegistry, loadMappingSpec } from '../transform/mapping.js';
import type { QueryOperation } from '../types/index.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_AUTH = 2;
export const EXIT_TRANSPORT = 3;
export const EXIT_PARTIAL = 4;

export interface CliContext {
  env: NodeJS.ProcessEnv;
  observability: Observability;
  fetch?: FetchLike;
  sleep?: Sleep;
  now?: () => Date;
  /** Result lines; defaults to stdout */
  write?: (line: string) => void;
  /** Commander usage and error text; defaults to stderr */
  writeErr?: (text: string) => void;
}

interface ConvertCommandOptions {
  config: string;
  output?: string;
}

interface IngestCommandOptions {
  mappings: string;
  csv?: boolean;
  outDir: string;
  failOnRowErrors?: boolean;
}

interface ExportCommandOptions {
  query?: string;
  object?: string;
  fields?: string[];
  where?: string;
  orderBy?: string;
  limit?: number;
  checkFields?: boolean;
  operation: QueryOperation;
  output?: string;
  outDir: string;
  pageSize?: number;
  chunkSize?: number;
}

/**
 * Maps a failure to the process exit status.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof PartialChunkFailureError || error instanceof OutcomeMismatchError) {
    return EXIT_PARTIAL;
  }
  if (error instanceof AuthError) {
    return EXIT_AUTH;
  }
  if (
    error instanceof RequestError ||
    error instanceof RateLimitError ||
    error instanceof NetworkError ||
    error instanceof RequestTimeoutError ||
    error instanceof ServerError
  ) {
    return EXIT_TRANSPORT;
  }
  return EXIT_FAILURE;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parseQueryOperation(value: string): QueryOperation {
  if (value === 'query' || value === 'queryAll') {
    return value;
  }
  throw new InvalidArgumentError('Must be query or queryAll.');
}

function parseFieldList(value: string): string[] {
  return value
    .split(',')
    .map((field) => field.trim())
    .filter((field) => field.length > 0);
}

function createRuntime(ctx: CliContext, pageSize?: number): { orchestrator: JobOrchestrator; assembler: ResultAssembler } {
  const builder = BulkBridgeConfigBuilder.fromEnv(ctx.env);
  if (pageSize !== undefined) {
    builder.withPageSize(pageSize);
  }
  const config = builder.build();
  const client = createBulkClient(config, {
    observability: ctx.observability,
    fetch: ctx.fetch,
    sleep: ctx.sleep,
  });
  const orchestrator = new JobOrchestrator(client, { sleep: ctx.sleep });
  const assembler = new ResultAssembler(orchestrator, {
    concurrency: config.chunkConcurrency,
    logger: ctx.observability.logger,
  });
  return { orchestrator, assembler };
}

/**
 * Builds the program. Actions report their exit status through `setExitCode`.
 */
export function createProgram(ctx: CliContext, setExitCode: (code: number) => void): Command {
  const write = ctx.write ?? ((line: string) => process.stdout.write(line + '\n'));

  const program = new Command()
    .name('bulk-bridge')
    .description('Master-data conversion and Bulk API 2.0 ingest/export')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => (ctx.write ? ctx.write(text.trimEnd()) : process.stdout.write(text)),
      writeErr: (text) => (ctx.writeErr ? ctx.writeErr(text) : process.stderr.write(text)),
    });

  program
    .command('convert')
    .description('Convert an ALL master file to bulk-ready CSV')
    .argument('<input>', 'ALL file to convert')
    .requiredOption('-c, --config <file>', 'Mapping JSON file')
    .option('-o, --output <file>', 'Output CSV path (default: output/<masterKey>_upsert_ready.csv)')
    .action(async (input: string, options: ConvertCommandOptions) => {
      const spec = await loadMappingSpec(options.config);
      const result = await runConvertFlow({
        inputPath: input,
        spec,
        outputPath: options.output,
        logger: ctx.observability.logger,
      });
      write(`${result.outputPath}\t${result.rowCount} rows`);
    });

  program
    .command('ingest')
    .description('Convert a master file, load it through a bulk ingest job and write outcome files')
    .argument('<masterKey>', 'Master key of the mapping to use')
    .argument('<input>', 'ALL file (or CSV with --csv)')
    .option('-m, --mappings <dir>', 'Directory of mapping JSON files', 'mappings')
    .option('--csv', 'Input is already bulk-ready UTF-8 CSV')
    .option('--out-dir <dir>', 'Directory for outcome files', 'output')
    .option('--fail-on-row-errors', 'Exit with status 4 when any row is rejected')
    .action(async (masterKey: string, input: string, options: IngestCommandOptions) => {
      const registry = await loadMappingRegistry(options.mappings);
      const spec = registry.get(masterKey);
      if (!spec) {
        throw new ConfigurationError(
          `Unknown master key ${masterKey} (known: ${[...registry.keys()].join(', ')})`
        );
      }

      const { orchestrator } = createRuntime(ctx);
      const result = await runIngestFlow({
        orchestrator,
        spec,
        inputPath: input,
        inputIsCsv: options.csv,
        outDir: options.outDir,
      });

      write(
        `${result.job.jobId}\t${result.state}\tsucceeded=${result.successCount}` +
          `\tfailed=${result.failureCount}\tunprocessed=${result.unprocessedCount}`
      );
      write(result.files.success);
      write(result.files.error);
      if (options.failOnRowErrors && (result.failureCount > 0 || result.unprocessedCount > 0)) {
        setExitCode(EXIT_PARTIAL);
      }
    });

  program
    .command('export')
    .description('Run a bulk query and write all pages to one CSV')
    .option('-q, --query <soql>', 'Query to run')
    .option('--object <name>', 'Build the query for this object instead of --query')
    .option('--fields <list>', 'Comma-separated fields for --object (Id is always included)', parseFieldList)
    .option('--where <condition>', 'WHERE clause for --object')
    .option('--order-by <clause>', 'ORDER BY clause for --object')
    .option('--limit <n>', 'LIMIT for --object', parsePositiveInt)
    .option('--check-fields', 'Drop fields the object does not describe')
    .option('--operation <op>', 'query or queryAll', parseQueryOperation, 'query')
    .option('-o, --output <file>', 'Output CSV path (default: <out-dir>/<object>_<timestamp>.csv)')
    .option('--out-dir <dir>', 'Output directory', 'output')
    .option('--page-size <n>', 'Records per result page', parsePositiveInt)
    .option('--chunk-size <n>', 'Enable PK chunking with this chunk size', parsePositiveInt)
    .action(async (options: ExportCommandOptions) => {
      if (options.query && options.object) {
        throw new ConfigurationError('Use either --query or --object, not both');
      }

      const { orchestrator, assembler } = createRuntime(ctx, options.pageSize);

      let query: string;
      if (options.query) {
        query = options.query;
      } else if (options.object) {
        const soqlOptions = {
          object: options.object,
          fields: options.fields ?? [],
          where: options.where,
          orderBy: options.orderBy,
          limit: options.limit,
        };
        query = options.checkFields ? await buildCheckedSoql(orchestrator, soqlOptions) : buildSoql(soqlOptions);
      } else {
        throw new ConfigurationError('One of --query or --object is required');
      }

      const result = await runExportFlow({
        orchestrator,
        assembler,
        query,
        operation: options.operation,
        pkChunkSize: options.chunkSize,
        outputPath: options.output,
        outDir: options.outDir,
        now: ctx.now,
      });
      write(`${result.outputPath}\t${result.result.rowCount} rows`);
    });

  return program;
}

/**
 * Runs the CLI and returns the exit status. Never throws.
 */
export async function runCli(argv: readonly string[], ctx: CliContext): Promise<number> {
  let exitCode = EXIT_OK;
  const program = createProgram(ctx, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: 'user' });
    return exitCode;
  } catch (error) {
    // Commander has already printed usage errors, help and version
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    const code = exitCodeFor(error);
    ctx.observability.logger.error('Command failed', {
      error: error instanceof Error ? error.message : String(error),
      errorType: error instanceof Error ? error.name : typeof error,
      exitCode: code,
    });
    return code;
  }
}
