/**
 * Record types for registry snapshots
 */

/** Stable, unique identifier of a tracked entity (e.g. a registration number) */
export type EntityKey = string;

/** A single attribute value; missing values are an explicit null */
export type FieldValue = string | number | null;

/** Fixed-shape attribute record of one entity - every schema field is present */
export type AttributeRecord = Readonly<Record<string, FieldValue>>;

/** A raw row as handed over by the record normalizer, before snapshot construction */
export type RawRow = {
  [field: string]: unknown;
};
