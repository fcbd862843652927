import { z } from 'zod';
import { DIAGNOSTIC_CODES } from './ingest';

/** Runtime validators for documents that cross a file boundary */

export const fieldValueSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('string'), value: z.string() }),
  z.object({ kind: z.literal('integer'), value: z.number().int() }),
  z.object({ kind: z.literal('float'), value: z.number() }),
  z.object({ kind: z.literal('datetime'), value: z.string().regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/) }),
  z.object({ kind: z.literal('boolean'), value: z.boolean() }),
  z.object({ kind: z.literal('absent') }),
]);

export const diagnosticSchema = z.object({
  severity: z.enum(['info', 'warning']),
  code: z.enum(DIAGNOSTIC_CODES),
  message: z.string(),
  tab: z.string().optional(),
  field: z.string().optional(),
  address: z.string().optional(),
});

const metadataValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const extractedTabSchema = z.object({
  tabName: z.string(),
  schemaId: z.string(),
  fields: z.record(fieldValueSchema),
  diagnostics: z.array(diagnosticSchema).default([]),
});

/** A NormalizedPayload written out as JSON and uploaded in place of a workbook */
export const normalizedPayloadSchema = z.object({
  metadata: z.record(metadataValueSchema).default({}),
  schemas: z.record(z.string()).default({}),
  tabs: z.array(extractedTabSchema),
  diagnostics: z.array(diagnosticSchema).default([]),
});

export const storedValueSchema = metadataValueSchema;
