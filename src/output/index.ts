/**
 * Result file writers.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { splitCsvRecords } from '../csv/index.js';
import type { IngestResults } from '../types/index.js';

export interface IngestResultFiles {
  success: string;
  error: string;
  successExcel: string;
  errorExcel: string;
}

/**
 * Rewrites a CSV body with a UTF-8 BOM and CRLF line endings so spreadsheet
 * tools detect the encoding. Line breaks inside quoted fields are kept.
 */
export function toSpreadsheetCsv(csv: string): string {
  const records = splitCsvRecords(csv);
  if (records.length === 0) {
    return '\uFEFF';
  }
  return '\uFEFF' + records.join('\r\n') + '\r\n';
}

/**
 * Writes `<jobId>_<masterKey>_success.csv` / `_error.csv` as returned by the
 * service, plus their `_excel` variants.
 */
export async function writeIngestResultFiles(
  outDir: string,
  jobId: string,
  masterKey: string,
  results: Pick<IngestResults, 'successCsv' | 'failureCsv'>
): Promise<IngestResultFiles> {
  await mkdir(outDir, { recursive: true });

  const base = path.join(outDir, `${jobId}_${masterKey}`);
  const files: IngestResultFiles = {
    success: `${base}_success.csv`,
    error: `${base}_error.csv`,
    successExcel: `${base}_success_excel.csv`,
    errorExcel: `${base}_error_excel.csv`,
  };

  await Promise.all([
    writeFile(files.success, results.successCsv, 'utf8'),
    writeFile(files.error, results.failureCsv, 'utf8'),
    writeFile(files.successExcel, toSpreadsheetCsv(results.successCsv), 'utf8'),
    writeFile(files.errorExcel, toSpreadsheetCsv(results.failureCsv), 'utf8'),
  ]);
  return files;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local-time stamp in `YYYYMMDD_HHMMSS` form.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * `<prefix>_<YYYYMMDD_HHMMSS>.csv`
 */
export function exportFileName(prefix: string, date: Date = new Date()): string {
  return `${prefix}_${formatTimestamp(date)}.csv`;
}

/**
 * Writes a file, creating its directory first.
 */
export async function writeOutputFile(filePath: string, contents: string | Buffer): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, contents);
}
