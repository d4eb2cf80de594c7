/**
 * Attribute schema types shared by snapshots and the diff engine
 */

/** Descriptive roles carried through into change records */
export type ContextRole = 'name' | 'state' | 'status';

/** Maps each descriptive role to the field that holds it */
export type ContextFields = Readonly<Partial<Record<ContextRole, string>>>;

export interface SnapshotSchema {
  /** Column holding the entity key */
  keyField: string;
  /** Ordered list of every attribute field */
  fields: readonly string[];
  /** Ordered subset of `fields` monitored for change */
  trackedFields: readonly string[];
  /** Descriptive fields used for reporting only */
  contextFields: ContextFields;
}
