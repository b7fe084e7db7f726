/**
 * CSV helpers shared by the transformer, the result assembler and the result writers.
 */

import { parse } from 'csv-parse/sync';
import { RequestError, ServerError, BulkErrorCode } from '../errors/index.js';

/**
 * Quotes a field when it contains the delimiter, a quote or a line break.
 */
export function escapeCsvField(value: unknown, delimiter: string = ','): string {
  if (value === null || value === undefined) {
    return '';
  }

  const str = String(value);
  if (str.includes(delimiter) || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

export function formatCsvRow(fields: readonly unknown[], delimiter: string = ','): string {
  return fields.map((field) => escapeCsvField(field, delimiter)).join(delimiter);
}

/**
 * Splits CSV text into raw record lines without their terminators.
 *
 * Line breaks inside quoted fields stay part of the record. Blank lines are dropped.
 */
export function splitCsvRecords(text: string): string[] {
  const records: string[] = [];
  let start = 0;
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '"') {
      inQuotes = !inQuotes;
    } else if (ch === '\n' && !inQuotes) {
      const end = i > start && text[i - 1] === '\r' ? i - 1 : i;
      const record = text.slice(start, end);
      if (record.length > 0) records.push(record);
      start = i + 1;
    }
  }

  const tail = text.slice(start);
  if (tail.length > 0 && tail !== '\r') {
    records.push(tail.endsWith('\r') ? tail.slice(0, -1) : tail);
  }
  return records;
}

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'))
  );
}

export interface ParseCsvOptions {
  delimiter?: string;
  /** Allow rows with differing column counts. Default: true */
  relaxColumnCount?: boolean;
}

/**
 * Parses CSV text into rows of fields.
 */
export function parseCsv(text: string, options: ParseCsvOptions = {}): string[][] {
  const rows: unknown = parse(text, {
    delimiter: options.delimiter ?? ',',
    relax_column_count: options.relaxColumnCount ?? true,
    skip_empty_lines: true,
    bom: true,
  });
  if (!isStringMatrix(rows)) {
    throw new ServerError(200, 'CSV parser returned an unexpected shape', {
      retryable: false,
      code: BulkErrorCode.InvalidResponse,
    });
  }
  return rows;
}

/**
 * Parses CSV text with a header row into records keyed by column name.
 */
export function parseCsvRecords(text: string, options: ParseCsvOptions = {}): Record<string, string>[] {
  const rows = parseCsv(text, options);
  const header = rows[0];
  if (!header) {
    return [];
  }

  return rows.slice(1).map((values) => {
    const record: Record<string, string> = {};
    header.forEach((column, index) => {
      record[column] = values[index] ?? '';
    });
    return record;
  });
}

/**
 * Number of data rows (records after the header).
 */
export function countDataRows(csv: string): number {
  return Math.max(0, splitCsvRecords(csv).length - 1);
}

/**
 * Splits a CSV body into parts that each fit in `limitBytes`, repeating the header in every part.
 */
export function splitCsvForUpload(csv: string, limitBytes: number, lineTerminator: string = '\n'): string[] {
  const records = splitCsvRecords(csv);
  const header = records[0];
  if (header === undefined || records.length === 1) {
    return [csv];
  }

  const terminatorBytes = Buffer.byteLength(lineTerminator, 'utf8');
  const headerBytes = Buffer.byteLength(header, 'utf8') + terminatorBytes;
  const parts: string[] = [];
  let current: string[] = [];
  let currentBytes = headerBytes;

  for (const record of records.slice(1)) {
    const recordBytes = Buffer.byteLength(record, 'utf8') + terminatorBytes;
    if (headerBytes + recordBytes > limitBytes) {
      throw new RequestError(`A single CSV row exceeds the upload limit of ${limitBytes} bytes`, {
        details: { limitBytes, rowBytes: recordBytes },
      });
    }
    if (currentBytes + recordBytes > limitBytes) {
      parts.push([header, ...current].join(lineTerminator) + lineTerminator);
      current = [];
      currentBytes = headerBytes;
    }
    current.push(record);
    currentBytes += recordBytes;
  }

  parts.push([header, ...current].join(lineTerminator) + lineTerminator);
  return parts;
}
