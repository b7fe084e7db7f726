/**
 * Tests for CSV helpers.
 */

import { describe, it, expect } from 'vitest';
import {
  countDataRows,
  escapeCsvField,
  formatCsvRow,
  parseCsvRecords,
  splitCsvForUpload,
  splitCsvRecords,
} from '../csv/index.js';
import { RequestError } from '../errors/index.js';
import { toSpreadsheetCsv } from '../output/index.js';

describe('escapeCsvField', () => {
  it('should quote only when needed', () => {
    expect(escapeCsvField('plain')).toBe('plain');
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('two\nlines')).toBe('"two\nlines"');
    expect(escapeCsvField(undefined)).toBe('');
  });

  it('should quote for the given delimiter', () => {
    expect(formatCsvRow(['a;b', 'c,d'], ';')).toBe('"a;b";c,d');
  });
});

describe('splitCsvRecords', () => {
  it('should keep quoted line breaks inside their record', () => {
    expect(splitCsvRecords('Id,Note\r\n1,"a\nb"\r\n\r\n2,c')).toEqual(['Id,Note', '1,"a\nb"', '2,c']);
  });

  it('should return nothing for empty input', () => {
    expect(splitCsvRecords('')).toEqual([]);
  });
});

describe('parseCsvRecords', () => {
  it('should key rows by header and fill short rows', () => {
    expect(parseCsvRecords('a,b\n1,2\n3\n')).toEqual([
      { a: '1', b: '2' },
      { a: '3', b: '' },
    ]);
  });
});

describe('countDataRows', () => {
  it('should not count the header or embedded line breaks', () => {
    expect(countDataRows('a,b\n1,2\n"x\ny",3\n')).toBe(2);
    expect(countDataRows('a,b\n')).toBe(0);
  });
});

describe('splitCsvForUpload', () => {
  it('should repeat the header in every part', () => {
    expect(splitCsvForUpload('H\nr1\nr2\nr3\n', 8)).toEqual(['H\nr1\nr2\n', 'H\nr3\n']);
  });

  it('should return the body unchanged when it has no data rows', () => {
    expect(splitCsvForUpload('H\n', 1)).toEqual(['H\n']);
  });

  it('should use the given line terminator', () => {
    expect(splitCsvForUpload('H\r\nr1\r\n', 100, '\r\n')).toEqual(['H\r\nr1\r\n']);
  });

  it('should reject a row that cannot fit', () => {
    expect(() => splitCsvForUpload('H\nr1\n', 4)).toThrow(RequestError);
  });
});

describe('toSpreadsheetCsv', () => {
  it('should add a BOM and CRLF line endings', () => {
    expect(toSpreadsheetCsv('a,b\n1,"x\ny"\n')).toBe('\uFEFFa,b\r\n1,"x\ny"\r\n');
    expect(toSpreadsheetCsv('')).toBe('\uFEFF');
  });
});
