/**
 * Change Detection Types
 *
 * Output of one comparison run between two snapshots.
 */

import type { AttributeRecord, EntityKey, FieldValue } from './record.js';

/** Kind of change detected */
export type ChangeKind = 'NEW' | 'REMOVED' | 'FIELD_UPDATE';

/** Descriptive context carried through from the snapshot */
export interface ChangeContext {
  name: FieldValue;
  state: FieldValue;
  status: FieldValue;
}

interface ChangeRecordBase {
  key: EntityKey;
  /** Capture date of the current snapshot */
  detectedOn: string;
  context: ChangeContext;
}

/** Entity present in current but not in previous */
export interface NewEntityChange extends ChangeRecordBase {
  kind: 'NEW';
  field: null;
  oldValue: null;
  newValue: AttributeRecord;
}

/** Entity present in previous but not in current */
export interface RemovedEntityChange extends ChangeRecordBase {
  kind: 'REMOVED';
  field: null;
  oldValue: AttributeRecord;
  newValue: null;
}

/** Tracked field whose normalized value differs */
export interface FieldUpdateChange extends ChangeRecordBase {
  kind: 'FIELD_UPDATE';
  field: string;
  oldValue: FieldValue;
  newValue: FieldValue;
}

export type ChangeRecord = NewEntityChange | RemovedEntityChange | FieldUpdateChange;

/** Summary statistics for a change set */
export interface ChangeSummary {
  newCount: number;
  removedCount: number;
  fieldUpdateCount: number;
  totalChanges: number;
  /** Field updates per tracked field, in schema order */
  fieldBreakdown: Record<string, number>;
}

/** Ordered result of one comparison run */
export interface ChangeSet {
  previousCapturedAt: string;
  currentCapturedAt: string;
  /** Equal to `currentCapturedAt` */
  detectedOn: string;
  changes: readonly ChangeRecord[];
  summary: ChangeSummary;
}

/** Three-way key partition of two snapshots */
export interface KeyPartition {
  appeared: EntityKey[];
  disappeared: EntityKey[];
  common: EntityKey[];
}
