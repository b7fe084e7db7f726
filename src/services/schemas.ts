/**
 * Response schemas for the bulk job endpoints.
 */

import { z } from 'zod';

export const bulkOperationSchema = z.enum(['insert', 'update', 'upsert', 'delete', 'query', 'queryAll']);

export const bulkJobStateSchema = z.enum([
  'Open',
  'UploadComplete',
  'InProgress',
  'JobComplete',
  'Failed',
  'Aborted',
]);

/**
 * Job info returned by create, close, abort and status calls.
 */
export const bulkJobInfoSchema = z.object({
  id: z.string().min(1),
  operation: bulkOperationSchema,
  object: z.string().optional(),
  state: bulkJobStateSchema,
  externalIdFieldName: z.string().nullish().transform((v) => v ?? undefined),
  createdById: z.string().optional(),
  createdDate: z.string().optional(),
  systemModstamp: z.string().optional(),
  contentType: z.string().optional(),
  columnDelimiter: z.enum(['BACKQUOTE', 'CARET', 'COMMA', 'PIPE', 'SEMICOLON', 'TAB']).optional(),
  lineEnding: z.enum(['LF', 'CRLF']).optional(),
  apiVersion: z.union([z.number(), z.string()]).optional(),
  numberRecordsProcessed: z.number().optional(),
  numberRecordsFailed: z.number().optional(),
  errorMessage: z.string().nullish().transform((v) => v ?? undefined),
  chunkJobIds: z.array(z.string()).optional(),
});

/**
 * Subset of `/sobjects/{name}/describe` used to check export field lists.
 */
export const sObjectDescribeSchema = z.object({
  name: z.string(),
  fields: z.array(z.object({ name: z.string() })),
});
