/**
 * Tests for the command line entry points and exit codes.
 */

import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  EXIT_AUTH,
  EXIT_FAILURE,
  EXIT_OK,
  EXIT_PARTIAL,
  EXIT_TRANSPORT,
  exitCodeFor,
  runCli,
  type CliContext,
} from '../cli/index.js';
import {
  AuthError,
  ConfigurationError,
  NetworkError,
  OutcomeMismatchError,
  PartialChunkFailureError,
  RateLimitError,
  ServerError,
} from '../errors/index.js';
import { createInMemoryObservability, LogLevel } from '../observability/index.js';
import { FAKE_ENV, FakeBulkServer } from './support/fake-bulk-server.js';

let dir: string;
let mappingsDir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'bulk-bridge-cli-'));
  mappingsDir = path.join(dir, 'mappings');
  await mkdir(mappingsDir);
  await writeFile(
    path.join(mappingsDir, 'department.json'),
    JSON.stringify({
      master_key: 'DPT',
      sf_object: 'Department__c',
      external_id_field: 'DptCode__c',
      input_encoding: 'utf-8',
      owner_id_column: null,
      mapping: [
        { index: 0, field: 'DptCode__c' },
        { index: 1, field: 'Name' },
      ],
      output_csv: path.join(dir, 'DPT_upsert_ready.csv'),
    }),
    'utf8'
  );
  await writeFile(path.join(dir, 'DPT.ALL'), 'D01,Sales\nD02,Support\n', 'utf8');
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function setup() {
  const server = new FakeBulkServer();
  const observability = createInMemoryObservability();
  const lines: string[] = [];
  const errors: string[] = [];
  const ctx: CliContext = {
    env: FAKE_ENV,
    observability,
    fetch: server.fetch,
    sleep: async () => {},
    now: () => new Date(2024, 0, 2, 3, 4, 5),
    write: (line) => lines.push(line),
    writeErr: (text) => errors.push(text),
  };
  return { server, observability, lines, errors, run: (...argv: string[]) => runCli(argv, ctx) };
}

const SUCCESS_CSV = 'sf__Id,sf__Created,DptCode__c,Name\na01,true,D01,Sales\n';
const FAILURE_CSV = 'sf__Id,sf__Error,DptCode__c,Name\n,DUPLICATE_VALUE:duplicate value found,D02,Support\n';

describe('convert', () => {
  it('should write the converted CSV and report the row count', async () => {
    const { lines, run } = setup();
    const output = path.join(dir, 'dpt.csv');

    const code = await run('convert', path.join(dir, 'DPT.ALL'), '-c', path.join(mappingsDir, 'department.json'), '-o', output);

    expect(code).toBe(EXIT_OK);
    expect(lines).toEqual([`${output}\t2 rows`]);
    expect(await readFile(output, 'utf8')).toBe('DptCode__c,Name\nD01,Sales\nD02,Support\n');
  });
});

describe('ingest', () => {
  it('should report counts and outcome files, exiting 0 despite row errors', async () => {
    const { server, lines, run } = setup();
    server.planIngest({ successCsv: SUCCESS_CSV, failureCsv: FAILURE_CSV });
    const outDir = path.join(dir, 'out');

    const code = await run('ingest', 'DPT', path.join(dir, 'DPT.ALL'), '-m', mappingsDir, '--out-dir', outDir);

    expect(code).toBe(EXIT_OK);
    expect(lines).toEqual([
      '750I001\tJobComplete\tsucceeded=1\tfailed=1\tunprocessed=0',
      path.join(outDir, '750I001_DPT_success.csv'),
      path.join(outDir, '750I001_DPT_error.csv'),
    ]);
  });

  it('should exit 4 on row errors when asked to', async () => {
    const { server, run } = setup();
    server.planIngest({ successCsv: SUCCESS_CSV, failureCsv: FAILURE_CSV });

    const code = await run(
      'ingest',
      'DPT',
      path.join(dir, 'DPT.ALL'),
      '-m',
      mappingsDir,
      '--out-dir',
      path.join(dir, 'out'),
      '--fail-on-row-errors'
    );

    expect(code).toBe(EXIT_PARTIAL);
  });

  it('should exit 1 for an unknown master key', async () => {
    const { server, observability, run } = setup();

    const code = await run('ingest', 'ITM', path.join(dir, 'DPT.ALL'), '-m', mappingsDir);

    expect(code).toBe(EXIT_FAILURE);
    expect(server.requests).toHaveLength(0);
    expect(observability.logger.getEntriesAtLevel(LogLevel.ERROR).map((e) => e.context)).toEqual([
      {
        error: 'Configuration error: Unknown master key ITM (known: DPT)',
        errorType: 'ConfigurationError',
        exitCode: EXIT_FAILURE,
      },
    ]);
  });
});

describe('export', () => {
  it('should build the query from an object and write a timestamped file', async () => {
    const { server, lines, run } = setup();
    server.describes.set('Account', ['Name']);
    server.planQuery({ pages: ['Id,Name\n001,Acme\n'] });
    const outDir = path.join(dir, 'exports');

    const code = await run('export', '--object', 'Account', '--fields', 'Name,Fax', '--check-fields', '--out-dir', outDir);

    expect(code).toBe(EXIT_OK);
    expect(server.job('750Q001').createBody).toMatchObject({ query: 'SELECT Id, Name FROM Account' });
    const output = path.join(outDir, 'Account_20240102_030405.csv');
    expect(lines).toEqual([`${output}\t1 rows`]);
    expect(await readFile(output, 'utf8')).toBe('Id,Name\n001,Acme\n');
  });

  it('should send the page size and chunk size', async () => {
    const { server, run } = setup();
    server.planQuery({ chunks: [{ pages: ['Id\n001\n'] }] });

    const code = await run(
      'export',
      '-q',
      'SELECT Id FROM Account',
      '--page-size',
      '500',
      '--chunk-size',
      '250000',
      '-o',
      path.join(dir, 'a.csv')
    );

    expect(code).toBe(EXIT_OK);
    expect(server.job('750Q001').createHeaders['sforce-enable-pkchunking']).toBe('chunkSize=250000');
    expect(server.requestsTo('GET', '/results')[0]?.query).toEqual({ maxRecords: '500' });
  });

  it('should exit 4 when a partition fails', async () => {
    const { server, run } = setup();
    server.planQuery({ chunks: [{ pages: ['Id\n001\n'] }, { states: ['Failed'] }] });

    const code = await run('export', '-q', 'SELECT Id FROM Account', '--chunk-size', '1', '-o', path.join(dir, 'a.csv'));

    expect(code).toBe(EXIT_PARTIAL);
  });

  it('should exit 2 when the session is rejected', async () => {
    const { server, run } = setup();
    server.failWith({
      path: '/jobs/query',
      status: 401,
      body: [{ errorCode: 'INVALID_SESSION_ID', message: 'Session expired or invalid' }],
    });

    expect(await run('export', '-q', 'SELECT Id FROM Account', '-o', path.join(dir, 'a.csv'))).toBe(EXIT_AUTH);
  });

  it('should exit 3 for a malformed query', async () => {
    const { server, run } = setup();
    server.failWith({
      path: '/jobs/query',
      status: 400,
      body: [{ errorCode: 'MALFORMED_QUERY', message: 'unexpected token: FORM' }],
    });

    expect(await run('export', '-q', 'SELECT Id FORM Account', '-o', path.join(dir, 'a.csv'))).toBe(EXIT_TRANSPORT);
  });

  it('should exit 1 when both --query and --object are given', async () => {
    const { server, run } = setup();

    expect(await run('export', '-q', 'SELECT Id FROM Account', '--object', 'Account')).toBe(EXIT_FAILURE);
    expect(server.requests).toHaveLength(0);
  });

  it('should reject a non-numeric page size before doing anything', async () => {
    const { server, errors, run } = setup();

    expect(await run('export', '-q', 'SELECT Id FROM Account', '--page-size', 'abc')).toBe(1);
    expect(errors.join('')).toContain('Must be a positive integer.');
    expect(server.requests).toHaveLength(0);
  });
});

describe('program', () => {
  it('should print the version', async () => {
    const { lines, run } = setup();

    expect(await run('--version')).toBe(EXIT_OK);
    expect(lines).toEqual(['0.1.0']);
  });
});

describe('exitCodeFor', () => {
  it('should map error types to exit codes', () => {
    expect(exitCodeFor(new PartialChunkFailureError('750Q001', []))).toBe(EXIT_PARTIAL);
    expect(
      exitCodeFor(new OutcomeMismatchError('750I001', { submitted: 2, succeeded: 1, failed: 0, unprocessed: 0 }))
    ).toBe(EXIT_PARTIAL);
    expect(exitCodeFor(new AuthError())).toBe(EXIT_AUTH);
    expect(exitCodeFor(new RateLimitError({ retryAfterMs: 1000 }))).toBe(EXIT_TRANSPORT);
    expect(exitCodeFor(new NetworkError('socket hang up'))).toBe(EXIT_TRANSPORT);
    expect(exitCodeFor(new ServerError(503))).toBe(EXIT_TRANSPORT);
    expect(exitCodeFor(new ConfigurationError('bad'))).toBe(EXIT_FAILURE);
    expect(exitCodeFor(new Error('unexpected'))).toBe(EXIT_FAILURE);
  });
});
