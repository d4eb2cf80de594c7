/**
 * Snapshot types
 */

import type { AttributeRecord, EntityKey } from './record.js';
import type { SnapshotSchema } from './schema.js';

/**
 * Immutable full capture of the registry at one date.
 *
 * Records are keyed by entity key; every record carries every schema field.
 */
export interface Snapshot {
  /** Capture date, `YYYY-MM-DD` */
  readonly capturedAt: string;
  readonly schema: SnapshotSchema;
  readonly records: ReadonlyMap<EntityKey, AttributeRecord>;
}

/** Snapshot metadata */
export interface SnapshotInfo {
  capturedAt: string;
  recordCount: number;
  trackedFields: readonly string[];
  /** File path where the snapshot is stored */
  filePath: string;
}

/** The two snapshots compared by one run, in chronological order */
export interface SnapshotPair {
  previous: Snapshot;
  current: Snapshot;
}
