/**
 * Per-record ingest outcomes and their reconciliation against the submitted rows.
 */

import { parseCsvRecords } from '../csv/index.js';
import { OutcomeMismatchError } from '../errors/index.js';
import type { BulkJob, IngestOutcome, IngestResults } from '../types/index.js';

const ID_COLUMN = 'sf__Id';
const CREATED_COLUMN = 'sf__Created';
const ERROR_COLUMN = 'sf__Error';

function echoedFields(record: Record<string, string>): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const [key, value] of Object.entries(record)) {
    if (!key.startsWith('sf__')) {
      fields[key] = value;
    }
  }
  return fields;
}

/**
 * Splits `sf__Error` ("CODE:message") into its parts.
 */
export function parseRecordError(raw: string): { errorCode?: string; errorMessage?: string } {
  const text = raw.trim();
  if (text.length === 0) return {};

  const colon = text.indexOf(':');
  if (colon > 0 && /^[A-Z_]+$/.test(text.slice(0, colon))) {
    return { errorCode: text.slice(0, colon), errorMessage: text.slice(colon + 1).trim() };
  }
  return { errorMessage: text };
}

export function parseSuccessOutcomes(csv: string): IngestOutcome[] {
  return parseCsvRecords(csv).map((record) => ({
    recordId: record[ID_COLUMN] || undefined,
    success: true,
    created: record[CREATED_COLUMN] === undefined ? undefined : record[CREATED_COLUMN].toLowerCase() === 'true',
    fields: echoedFields(record),
  }));
}

export function parseFailureOutcomes(csv: string): IngestOutcome[] {
  return parseCsvRecords(csv).map((record) => ({
    recordId: record[ID_COLUMN] || undefined,
    success: false,
    ...parseRecordError(record[ERROR_COLUMN] ?? ''),
    fields: echoedFields(record),
  }));
}

export function parseIngestResults(successCsv: string, failureCsv: string, unprocessedCsv: string): IngestResults {
  return {
    successes: parseSuccessOutcomes(successCsv),
    failures: parseFailureOutcomes(failureCsv),
    unprocessed: parseCsvRecords(unprocessedCsv),
    successCsv,
    failureCsv,
    unprocessedCsv,
  };
}

/**
 * Indexes outcomes by the value of `keyField` in the echoed record.
 *
 * Records are matched by content; the service does not keep submission order.
 */
export function correlateOutcomes(results: IngestResults, keyField: string): Map<string, IngestOutcome> {
  const byKey = new Map<string, IngestOutcome>();
  for (const outcome of [...results.successes, ...results.failures]) {
    const key = outcome.fields[keyField];
    if (key !== undefined && key !== '') {
      byKey.set(key, outcome);
    }
  }
  return byKey;
}

/**
 * Submitted keys with neither an outcome nor an unprocessed record.
 */
export function findMissingKeys(
  results: IngestResults,
  keyField: string,
  submittedKeys: readonly string[]
): string[] {
  const seen = new Set(correlateOutcomes(results, keyField).keys());
  for (const record of results.unprocessed) {
    const key = record[keyField];
    if (key) seen.add(key);
  }
  return submittedKeys.filter((key) => key !== '' && !seen.has(key));
}

/**
 * Checks that every submitted row is accounted for exactly once.
 *
 * The submitted count comes from the job's uploads, or from the server's
 * processed count for a resumed job.
 */
export function verifyOutcomeCounts(
  job: BulkJob,
  results: IngestResults,
  options: { keyField?: string; submittedKeys?: readonly string[] } = {}
): void {
  const succeeded = results.successes.length;
  const failed = results.failures.length;
  const unprocessed = results.unprocessed.length;

  let submitted: number;
  let accounted: number;
  if (job.uploadedBatches > 0) {
    submitted = job.submittedRows;
    accounted = succeeded + failed + unprocessed;
  } else if (job.recordsProcessed !== undefined) {
    submitted = job.recordsProcessed;
    accounted = succeeded + failed;
  } else {
    return;
  }

  if (accounted !== submitted) {
    const missingKeys =
      options.keyField && options.submittedKeys
        ? findMissingKeys(results, options.keyField, options.submittedKeys)
        : [];
    throw new OutcomeMismatchError(job.jobId, { submitted, succeeded, failed, unprocessed }, missingKeys);
  }
}
