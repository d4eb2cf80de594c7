/**
 * Change record constructors
 *
 * Every record is frozen together with its context and whole-record values,
 * and no two records share a nested object.
 */

import type {
  AttributeRecord,
  ChangeContext,
  ContextFields,
  EntityKey,
  FieldUpdateChange,
  FieldValue,
  NewEntityChange,
  RemovedEntityChange,
} from '@regwatch/core';
import { projectRecord } from '@regwatch/core';

/**
 * Descriptive context of a record (missing roles are null)
 */
export function extractContext(record: AttributeRecord, contextFields: ContextFields): ChangeContext {
  const pick = (field: string | undefined): FieldValue =>
    field === undefined ? null : record[field] ?? null;

  return {
    name: pick(contextFields.name),
    state: pick(contextFields.state),
    status: pick(contextFields.status),
  };
}

export function createNewEntityChange(
  key: EntityKey,
  record: AttributeRecord,
  fields: readonly string[],
  contextFields: ContextFields,
  detectedOn: string
): NewEntityChange {
  const change: NewEntityChange = {
    key,
    kind: 'NEW',
    field: null,
    oldValue: null,
    newValue: Object.freeze(projectRecord(record, fields)),
    detectedOn,
    context: Object.freeze(extractContext(record, contextFields)),
  };
  return Object.freeze(change);
}

export function createRemovedEntityChange(
  key: EntityKey,
  record: AttributeRecord,
  fields: readonly string[],
  contextFields: ContextFields,
  detectedOn: string
): RemovedEntityChange {
  const change: RemovedEntityChange = {
    key,
    kind: 'REMOVED',
    field: null,
    oldValue: Object.freeze(projectRecord(record, fields)),
    newValue: null,
    detectedOn,
    context: Object.freeze(extractContext(record, contextFields)),
  };
  return Object.freeze(change);
}

export function createFieldUpdateChange(
  key: EntityKey,
  field: string,
  oldValue: FieldValue,
  newValue: FieldValue,
  context: ChangeContext,
  detectedOn: string
): FieldUpdateChange {
  const change: FieldUpdateChange = {
    key,
    kind: 'FIELD_UPDATE',
    field,
    oldValue,
    newValue,
    detectedOn,
    context: Object.freeze({ ...context }),
  };
  return Object.freeze(change);
}
