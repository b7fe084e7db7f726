/**
 * Tests for mapping file validation and loading.
 */

import { mkdtemp, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../errors/index.js';
import { defaultOutputCsv, loadMappingRegistry, loadMappingSpec, parseMappingSpec } from '../transform/mapping.js';

async function tempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'bulk-bridge-mapping-'));
}

describe('parseMappingSpec', () => {
  it('should accept snake_case keys and fill defaults', () => {
    const spec = parseMappingSpec({
      master_key: 'DPT',
      sf_object: 'Department__c',
      external_id_field: 'DptCode__c',
      mapping: [{ index: 7, field: 'DptCode__c' }],
    });

    expect(spec).toEqual({
      masterKey: 'DPT',
      object: 'Department__c',
      operation: 'upsert',
      externalIdField: 'DptCode__c',
      mapping: [{ index: 7, field: 'DptCode__c' }],
      inputEncoding: 'cp932',
      outputEncoding: 'utf-8',
      delimiter: ',',
      lineTerminator: '\n',
      hasHeader: false,
      ownerIdColumn: 'OwnerId',
      ownerIdValue: '',
      extraFields: {},
    });
  });

  it('should stringify fixed extra field values', () => {
    const spec = parseMappingSpec({
      masterKey: 'X',
      mapping: [{ index: 0, field: 'A__c' }],
      extraFields: { Active__c: true, Rank__c: 3 },
    });
    expect(spec.extraFields).toEqual({ Active__c: 'true', Rank__c: '3' });
  });

  it('should reject an empty mapping list', () => {
    expect(() => parseMappingSpec({ masterKey: 'X', mapping: [] }, 'x.json')).toThrow(
      'Configuration error: Invalid mapping in x.json: mapping: mapping must contain at least one entry'
    );
  });

  it('should reject output fields produced twice', () => {
    expect(() =>
      parseMappingSpec({
        masterKey: 'X',
        mapping: [
          { index: 0, field: 'Name' },
          { index: 1, field: 'Name' },
        ],
      })
    ).toThrow('mapping: output field Name is produced more than once');
  });

  it('should reject a clash with the owner column', () => {
    expect(() => parseMappingSpec({ masterKey: 'X', mapping: [{ index: 0, field: 'OwnerId' }] })).toThrow(
      ConfigurationError
    );
  });

  it('should reject negative column numbers and unknown line terminators', () => {
    expect(() => parseMappingSpec({ masterKey: 'X', mapping: [{ index: -1, field: 'A' }] })).toThrow(
      ConfigurationError
    );
    expect(() =>
      parseMappingSpec({ masterKey: 'X', mapping: [{ index: 0, field: 'A' }], lineTerminator: '\r' })
    ).toThrow(ConfigurationError);
  });
});

describe('defaultOutputCsv', () => {
  it('should derive the path from the master key unless one is given', () => {
    const spec = parseMappingSpec({ masterKey: 'DPT', mapping: [{ index: 0, field: 'A' }] });
    expect(defaultOutputCsv(spec)).toBe(path.join('output', 'DPT_upsert_ready.csv'));
    expect(defaultOutputCsv({ ...spec, outputCsv: 'out/dpt.csv' })).toBe('out/dpt.csv');
  });
});

describe('loadMappingSpec', () => {
  it('should report missing files and invalid JSON as configuration errors', async () => {
    const dir = await tempDir();
    await writeFile(path.join(dir, 'broken.json'), '{ not json', 'utf8');

    await expect(loadMappingSpec(path.join(dir, 'missing.json'))).rejects.toThrow(ConfigurationError);
    await expect(loadMappingSpec(path.join(dir, 'broken.json'))).rejects.toThrow('is not valid JSON');
  });
});

describe('loadMappingRegistry', () => {
  it('should key every JSON mapping in a directory by master key', async () => {
    const dir = await tempDir();
    await writeFile(
      path.join(dir, 'a.json'),
      JSON.stringify({ master_key: 'DPT', mapping: [{ index: 0, field: 'A' }] }),
      'utf8'
    );
    await writeFile(
      path.join(dir, 'b.json'),
      JSON.stringify({ master_key: 'ITM', mapping: [{ index: 0, field: 'B' }] }),
      'utf8'
    );
    await writeFile(path.join(dir, 'notes.txt'), 'ignored', 'utf8');

    const registry = await loadMappingRegistry(dir);

    expect([...registry.keys()]).toEqual(['DPT', 'ITM']);
  });

  it('should reject duplicate master keys', async () => {
    const dir = await tempDir();
    const body = JSON.stringify({ master_key: 'DPT', mapping: [{ index: 0, field: 'A' }] });
    await writeFile(path.join(dir, 'a.json'), body, 'utf8');
    await writeFile(path.join(dir, 'b.json'), body, 'utf8');

    await expect(loadMappingRegistry(dir)).rejects.toThrow('Duplicate master key DPT');
  });

  it('should reject an empty directory', async () => {
    const dir = await tempDir();
    await expect(loadMappingRegistry(dir)).rejects.toThrow('No mapping files found');
  });
});

describe('shipped mappings', () => {
  it('should load the department mapping', async () => {
    const registry = await loadMappingRegistry('mappings');
    const spec = registry.get('DPT');

    expect(spec).toMatchObject({
      object: 'Department__c',
      operation: 'upsert',
      externalIdField: 'DptCode__c',
      inputEncoding: 'cp932',
      ownerIdColumn: 'OwnerId',
    });
    expect(spec?.mapping.map((entry) => entry.index)).toEqual([1, 2, 7, 9, 10, 11, 12, 13, 23, 24]);
  });
});
