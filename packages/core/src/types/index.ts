/**
 * Type exports for core
 */

export type { EntityKey, FieldValue, AttributeRecord, RawRow } from './record.js';
export type { ContextRole, ContextFields, SnapshotSchema } from './schema.js';
export type { Snapshot, SnapshotInfo, SnapshotPair } from './snapshot.js';
export type {
  ChangeKind,
  ChangeContext,
  NewEntityChange,
  RemovedEntityChange,
  FieldUpdateChange,
  ChangeRecord,
  ChangeSummary,
  ChangeSet,
  KeyPartition,
} from './change.js';
