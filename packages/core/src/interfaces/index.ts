export type { SnapshotReader, ChangeLogReader } from './readers.js';
