/**
 * Utility functions for working with attribute records
 */

import type { AttributeRecord, EntityKey, FieldValue } from '../types/index.js';

/**
 * Order entity keys by code unit, independent of locale
 */
export function compareKeys(a: EntityKey, b: EntityKey): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Sorted copy of a key collection
 */
export function sortKeys(keys: Iterable<EntityKey>): EntityKey[] {
  return Array.from(keys).sort(compareKeys);
}

/**
 * Project a record onto the given fields, in that order.
 * Fields absent from the record become null.
 */
export function projectRecord(
  record: AttributeRecord,
  fields: readonly string[]
): AttributeRecord {
  const out: Record<string, FieldValue> = {};
  for (const field of fields) {
    out[field] = record[field] ?? null;
  }
  return out;
}

/**
 * Canonical textual form of a whole record (keys in schema order)
 */
export function canonicalJson(record: AttributeRecord, fields: readonly string[]): string {
  return JSON.stringify(projectRecord(record, fields));
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}
