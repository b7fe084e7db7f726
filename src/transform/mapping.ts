/**
 * Declarative master-data mapping files.
 *
 * A mapping file is JSON. Keys may be camelCase (`masterKey`) or snake_case
 * (`master_key`, `sf_object`, `lineterminator`) so existing converter configs load unchanged.
 */

import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

const KEY_ALIASES: Record<string, string> = {
  sfObject: 'object',
  lineterminator: 'lineTerminator',
};

function toCamelCase(key: string): string {
  return key.replace(/_([a-z])/g, (_match, letter: string) => letter.toUpperCase());
}

function normalizeKeys(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const camel = toCamelCase(key);
    result[KEY_ALIASES[camel] ?? camel] = entry;
  }
  return result;
}

function normalizeOutputEncoding(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  switch (value.trim().toLowerCase()) {
    case 'utf8':
    case 'utf-8':
      return 'utf-8';
    case 'utf-8-sig':
    case 'utf8-bom':
    case 'utf-8-bom':
      return 'utf-8-bom';
    default:
      return value;
  }
}

const mappingEntrySchema = z.object({
  /** 0-based column number, or a column name when the input has a header row */
  index: z.union([z.number().int().nonnegative(), z.string().min(1)]),
  /** Target field API name */
  field: z.string().min(1),
});

const fixedValueSchema = z.union([z.string(), z.number(), z.boolean()]).transform((v) => String(v));

export const mappingSpecSchema = z.preprocess(
  normalizeKeys,
  z
    .object({
      masterKey: z.string().min(1),
      object: z.string().min(1).optional(),
      operation: z.enum(['insert', 'update', 'upsert', 'delete']).default('upsert'),
      externalIdField: z.string().min(1).optional(),
      mapping: z.array(mappingEntrySchema).min(1, 'mapping must contain at least one entry'),
      inputEncoding: z.string().min(1).default('cp932'),
      outputEncoding: z.preprocess(normalizeOutputEncoding, z.enum(['utf-8', 'utf-8-bom']).default('utf-8')),
      delimiter: z.string().length(1).default(','),
      lineTerminator: z.enum(['\n', '\r\n']).default('\n'),
      hasHeader: z.boolean().default(false),
      ownerIdColumn: z.string().min(1).nullable().default('OwnerId'),
      ownerIdValue: z.string().default(''),
      extraFields: z.record(fixedValueSchema).default({}),
      outputCsv: z.string().min(1).optional(),
    })
    .superRefine((spec, ctx) => {
      const seen = new Set<string>();
      const names = [
        ...spec.mapping.map((m) => m.field),
        ...Object.keys(spec.extraFields),
        ...(spec.ownerIdColumn ? [spec.ownerIdColumn] : []),
      ];
      for (const name of names) {
        if (seen.has(name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `output field ${name} is produced more than once`,
            path: ['mapping'],
          });
        }
        seen.add(name);
      }
    })
);

export type MappingSpec = z.infer<typeof mappingSpecSchema>;

export type MappingEntry = MappingSpec['mapping'][number];

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validates a parsed mapping document.
 */
export function parseMappingSpec(value: unknown, source: string = '<inline>'): MappingSpec {
  const result = mappingSpecSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(`Invalid mapping in ${source}: ${formatIssues(result.error)}`, {
      source,
      issues: result.error.issues,
    });
  }
  return result.data;
}

export async function loadMappingSpec(filePath: string): Promise<MappingSpec> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Mapping file not found: ${filePath}`, { cause: String(error) });
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Mapping file ${filePath} is not valid JSON`, { cause: String(error) });
  }
  return parseMappingSpec(document, filePath);
}

/**
 * Loads every `*.json` mapping in a directory, keyed by master key.
 */
export async function loadMappingRegistry(dir: string): Promise<Map<string, MappingSpec>> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (error) {
    throw new ConfigurationError(`Mapping directory not found: ${dir}`, { cause: String(error) });
  }

  const registry = new Map<string, MappingSpec>();
  for (const name of entries.filter((e) => e.toLowerCase().endsWith('.json')).sort()) {
    const spec = await loadMappingSpec(path.join(dir, name));
    if (registry.has(spec.masterKey)) {
      throw new ConfigurationError(`Duplicate master key ${spec.masterKey} in ${dir}`, { file: name });
    }
    registry.set(spec.masterKey, spec);
  }

  if (registry.size === 0) {
    throw new ConfigurationError(`No mapping files found in ${dir}`);
  }
  return registry;
}

/**
 * Default path of the converted CSV for a mapping.
 */
export function defaultOutputCsv(spec: MappingSpec): string {
  return spec.outputCsv ?? path.join('output', `${spec.masterKey}_upsert_ready.csv`);
}
