/**
 * Snapshot Builder
 *
 * Turns normalized rows into an immutable Snapshot.
 */

import type {
  AttributeRecord,
  EntityKey,
  FieldValue,
  RawRow,
  Snapshot,
  SnapshotSchema,
} from '@regwatch/core';
import {
  ChangeEngineError,
  ValueNormalizer,
  formatZodIssues,
  isCaptureDate,
  snapshotSchemaDefinition,
} from '@regwatch/core';

export interface SnapshotInput {
  /** Capture date, `YYYY-MM-DD` */
  capturedAt: string;
  schema: SnapshotSchema;
  rows: Iterable<RawRow>;
}

/**
 * Validate a schema definition and return a frozen copy
 */
export function resolveSchema(schema: SnapshotSchema): SnapshotSchema {
  const result = snapshotSchemaDefinition.safeParse(schema);
  if (!result.success) {
    throw new ChangeEngineError({
      code: 'INVALID_SNAPSHOT',
      message: formatZodIssues('Invalid snapshot schema', result.error),
    });
  }

  const { keyField, fields, trackedFields, contextFields } = result.data;
  return Object.freeze({
    keyField,
    fields: Object.freeze([...fields]),
    trackedFields: Object.freeze([...trackedFields]),
    contextFields: Object.freeze({ ...contextFields }),
  });
}

function readKey(row: RawRow, keyField: string): EntityKey {
  const raw = row[keyField];
  if (raw === null || raw === undefined) return '';
  return String(raw).trim();
}

/**
 * Build a snapshot from rows.
 *
 * Every schema field is normalized with the shared normalizer; fields the row
 * lacks become an explicit null. Keys must be present and unique.
 */
export function buildSnapshot(input: SnapshotInput, normalizer: ValueNormalizer): Snapshot {
  if (!isCaptureDate(input.capturedAt)) {
    throw new ChangeEngineError({
      code: 'INVALID_SNAPSHOT',
      message: `Invalid capture date '${input.capturedAt}'`,
      suggestion: 'Use a calendar date in YYYY-MM-DD form.',
    });
  }

  const schema = resolveSchema(input.schema);
  const records = new Map<EntityKey, AttributeRecord>();

  let index = 0;
  for (const row of input.rows) {
    const key = readKey(row, schema.keyField);
    if (!key) {
      throw new ChangeEngineError({
        code: 'MISSING_KEY',
        message: `Row ${index} has no value for key field '${schema.keyField}'`,
        context: { row: index, capturedAt: input.capturedAt },
      });
    }
    if (records.has(key)) {
      throw new ChangeEngineError({
        code: 'DUPLICATE_KEY',
        message: `Entity key '${key}' appears more than once in the ${input.capturedAt} snapshot`,
        suggestion: 'Deduplicate the extract before building the snapshot.',
        context: { key, row: index, capturedAt: input.capturedAt },
      });
    }

    const attributes: Record<string, FieldValue> = {};
    for (const field of schema.fields) {
      attributes[field] = normalizer.normalize(field, row[field]);
    }
    records.set(key, Object.freeze(attributes));
    index++;
  }

  return Object.freeze({
    capturedAt: input.capturedAt,
    schema,
    records,
  });
}
