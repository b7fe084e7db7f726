/**
 * Record transformer: decodes ALL files and rewrites their rows as bulk-ready CSV.
 */

import { ConfigurationError, EncodingError, MappingError } from '../errors/index.js';
import { formatCsvRow, parseCsv } from '../csv/index.js';
import type { MappingSpec } from './mapping.js';

// Labels the platform decoder does not know under these names
const ENCODING_ALIASES: Record<string, string> = {
  cp932: 'shift_jis',
  ms932: 'shift_jis',
  'windows-31j': 'shift_jis',
  sjis: 'shift_jis',
  'utf-8-sig': 'utf-8',
  utf8: 'utf-8',
};

/**
 * Decodes raw input bytes. Malformed sequences are rejected, never replaced.
 */
export function decodeInput(bytes: Uint8Array, encoding: string): string {
  const label = ENCODING_ALIASES[encoding.trim().toLowerCase()] ?? encoding.trim().toLowerCase();

  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(label, { fatal: true });
  } catch (error) {
    throw new ConfigurationError(`Unsupported input encoding: ${encoding}`, { cause: String(error) });
  }

  try {
    return decoder.decode(bytes);
  } catch (error) {
    throw new EncodingError(encoding, error);
  }
}

export interface ParsedAllFile {
  /** Header row, when the mapping declares one */
  header?: string[];
  rows: string[][];
}

/**
 * Splits decoded ALL text into rows using the mapping's delimiter.
 */
export function parseAllFile(text: string, spec: Pick<MappingSpec, 'delimiter' | 'hasHeader'>): ParsedAllFile {
  const rows = parseCsv(text, { delimiter: spec.delimiter });
  if (!spec.hasHeader) {
    return { rows };
  }
  const [header, ...data] = rows;
  return { header, rows: data };
}

export interface ResolvedMapping {
  /** Source column per mapping entry */
  columns: number[];
  /** Output field per mapping entry */
  fields: string[];
}

/**
 * Turns mapping indices into column numbers. Column names need a header row.
 */
export function resolveMapping(spec: MappingSpec, header?: readonly string[]): ResolvedMapping {
  const columns = spec.mapping.map((entry) => {
    if (typeof entry.index === 'number') {
      return entry.index;
    }
    if (header) {
      const position = header.indexOf(entry.index);
      if (position === -1) {
        throw new MappingError(`Column ${entry.index} (for ${entry.field}) is not in the input header`, {
          column: entry.index,
          field: entry.field,
        });
      }
      return position;
    }
    if (/^\d+$/.test(entry.index)) {
      return Number.parseInt(entry.index, 10);
    }
    throw new MappingError(`Column name ${entry.index} (for ${entry.field}) requires hasHeader`, {
      column: entry.index,
      field: entry.field,
    });
  });

  return { columns, fields: spec.mapping.map((entry) => entry.field) };
}

/**
 * Output header: mapped fields, then the owner column, then fixed extra fields.
 */
export function buildHeader(spec: MappingSpec): string[] {
  return [
    ...spec.mapping.map((entry) => entry.field),
    ...(spec.ownerIdColumn ? [spec.ownerIdColumn] : []),
    ...Object.keys(spec.extraFields),
  ];
}

/**
 * Maps one source row to output columns in header order.
 *
 * @param rowNumber - 1-based source line, used in error details
 */
export function transformRow(
  rawRow: readonly string[],
  spec: MappingSpec,
  resolved: ResolvedMapping = resolveMapping(spec),
  rowNumber?: number
): string[] {
  const mapped = resolved.columns.map((column, i) => {
    const value = rawRow[column];
    if (value === undefined) {
      throw new MappingError(
        `Row ${rowNumber ?? '?'} has ${rawRow.length} columns; ${resolved.fields[i]} reads column ${column}`,
        { rowNumber, column, field: resolved.fields[i], rowLength: rawRow.length }
      );
    }
    return value;
  });

  return [
    ...mapped,
    ...(spec.ownerIdColumn ? [spec.ownerIdValue] : []),
    ...Object.values(spec.extraFields),
  ];
}

export interface ConvertedCsv {
  /** Encoded output, BOM included for utf-8-bom */
  csv: Buffer;
  /** Output text without BOM */
  text: string;
  header: string[];
  rowCount: number;
}

/**
 * Converts a whole ALL file to bulk-ready CSV.
 */
export function convertAllFile(bytes: Uint8Array, spec: MappingSpec): ConvertedCsv {
  const parsed = parseAllFile(decodeInput(bytes, spec.inputEncoding), spec);
  const resolved = resolveMapping(spec, parsed.header);
  const header = buildHeader(spec);
  const firstLine = spec.hasHeader ? 2 : 1;

  const lines = [formatCsvRow(header)];
  parsed.rows.forEach((row, i) => {
    lines.push(formatCsvRow(transformRow(row, spec, resolved, firstLine + i)));
  });

  const text = lines.join(spec.lineTerminator) + spec.lineTerminator;
  const bom = spec.outputEncoding === 'utf-8-bom' ? '\uFEFF' : '';

  return {
    csv: Buffer.from(bom + text, 'utf8'),
    text,
    header,
    rowCount: parsed.rows.length,
  };
}
