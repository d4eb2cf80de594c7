/**
 * Zod schemas for validating persisted snapshots and change logs
 */

import { z } from 'zod';
import { isCaptureDate } from '../utils/dates.js';

/** `YYYY-MM-DD` calendar date */
export const captureDateSchema = z
  .string()
  .refine(isCaptureDate, { message: 'Expected a calendar date in YYYY-MM-DD form' });

export const fieldValueSchema = z.union([z.string(), z.number(), z.null()]);

export const attributeRecordSchema = z.record(fieldValueSchema);

export const contextFieldsSchema = z
  .object({
    name: z.string().min(1).optional(),
    state: z.string().min(1).optional(),
    status: z.string().min(1).optional(),
  })
  .strict();

/** Attribute schema definition */
export const snapshotSchemaDefinition = z
  .object({
    keyField: z.string().min(1),
    fields: z.array(z.string().min(1)).min(1),
    trackedFields: z.array(z.string().min(1)).min(1),
    contextFields: contextFieldsSchema.default({}),
  })
  .superRefine((value, ctx) => {
    const known = new Set<string>();
    value.fields.forEach((field, i) => {
      if (known.has(field)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate field: ${field}`,
          path: ['fields', i],
        });
      }
      known.add(field);
    });

    value.trackedFields.forEach((field, i) => {
      if (!known.has(field)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Tracked field is not part of the schema: ${field}`,
          path: ['trackedFields', i],
        });
      }
    });

    for (const [role, field] of Object.entries(value.contextFields)) {
      if (field !== undefined && !known.has(field)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Context field is not part of the schema: ${field}`,
          path: ['contextFields', role],
        });
      }
    }
  });

/** On-disk snapshot file */
export const storedSnapshotSchema = z.object({
  version: z.literal(1),
  capturedAt: captureDateSchema,
  schema: snapshotSchemaDefinition,
  records: z.array(
    z.object({
      key: z.string().min(1),
      attributes: attributeRecordSchema,
    })
  ),
});

const changeContextSchema = z.object({
  name: fieldValueSchema,
  state: fieldValueSchema,
  status: fieldValueSchema,
});

const changeBase = z.object({
  key: z.string().min(1),
  detectedOn: captureDateSchema,
  context: changeContextSchema,
});

export const changeRecordSchema = z.discriminatedUnion('kind', [
  changeBase.extend({
    kind: z.literal('NEW'),
    field: z.null(),
    oldValue: z.null(),
    newValue: attributeRecordSchema,
  }),
  changeBase.extend({
    kind: z.literal('REMOVED'),
    field: z.null(),
    oldValue: attributeRecordSchema,
    newValue: z.null(),
  }),
  changeBase.extend({
    kind: z.literal('FIELD_UPDATE'),
    field: z.string().min(1),
    oldValue: fieldValueSchema,
    newValue: fieldValueSchema,
  }),
]);

export const changeSummarySchema = z.object({
  newCount: z.number().int().min(0),
  removedCount: z.number().int().min(0),
  fieldUpdateCount: z.number().int().min(0),
  totalChanges: z.number().int().min(0),
  fieldBreakdown: z.record(z.number().int().min(0)),
});

/** Structured per-run change log document */
export const changeLogDocumentSchema = z.object({
  detectionDate: captureDateSchema,
  previousCapturedAt: captureDateSchema,
  currentCapturedAt: captureDateSchema,
  summary: changeSummarySchema,
  changes: z.array(changeRecordSchema),
});

/** One line of the history run ledger */
export const historyRunSchema = z.object({
  detectionDate: captureDateSchema,
  recordCount: z.number().int().min(0),
  /** Size of the history file once this run was appended */
  endOffset: z.number().int().min(0),
  appendedAt: z.string().min(1),
});

export type StoredSnapshot = z.infer<typeof storedSnapshotSchema>;
export type ChangeLogDocument = z.infer<typeof changeLogDocumentSchema>;
export type HistoryRun = z.infer<typeof historyRunSchema>;
export type SnapshotSchemaInput = z.input<typeof snapshotSchemaDefinition>;

/**
 * Render zod issues as an indented list
 */
export function formatZodIssues(label: string, err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}
