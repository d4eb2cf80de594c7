/**
 * Snapshot Module
 */

export { SnapshotStore } from './snapshot-store.js';
export type { ConsecutiveDates } from './snapshot-store.js';
export { buildSnapshot, resolveSchema } from './snapshot-builder.js';
export type { SnapshotInput } from './snapshot-builder.js';
export { parseSnapshotCsv, readSnapshotCsv } from './csv-snapshot-reader.js';
export type { CsvSnapshotOptions } from './csv-snapshot-reader.js';
