/**
 * Read-only views over persisted snapshots and change logs.
 *
 * Query layers and summary consumers depend on these, never on the
 * diff engine or on the writers.
 */

import type { ChangeRecord, Snapshot, SnapshotPair } from '../types/index.js';
import type { ChangeLogDocument } from '../validation/index.js';

export interface SnapshotReader {
  /** Capture dates, oldest first */
  list(): Promise<string[]>;

  /**
   * The snapshot captured on exactly this date.
   * @throws SnapshotNotFoundError
   */
  asOf(capturedAt: string): Promise<Snapshot>;

  /**
   * The two most recent snapshots, in chronological order.
   * @throws InsufficientHistoryError
   */
  latestPair(): Promise<SnapshotPair>;
}

export interface ChangeLogReader {
  /** Detection dates of written runs, oldest first */
  listRuns(): Promise<string[]>;

  /** Structured change log of one run */
  readRun(detectionDate: string): Promise<ChangeLogDocument>;

  /** Every appended change record, in history order */
  readHistory(): Promise<ChangeRecord[]>;
}
