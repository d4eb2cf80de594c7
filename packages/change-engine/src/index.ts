/**
 * @regwatch/change-engine
 *
 * Snapshot storage, snapshot comparison and change log persistence.
 */

// Snapshots
export {
  SnapshotStore,
  buildSnapshot,
  resolveSchema,
  parseSnapshotCsv,
  readSnapshotCsv,
} from './snapshots/index.js';
export type { ConsecutiveDates, SnapshotInput, CsvSnapshotOptions } from './snapshots/index.js';

// Diff
export {
  DiffEngine,
  DEFAULT_SHARD_SIZE,
  FieldComparator,
  compareShard,
  splitIntoShards,
  summarizeChanges,
  affectedStates,
} from './diff/index.js';
export type { DiffEngineConfig, FieldDifference, ShardContext } from './diff/index.js';

// Change log
export {
  ChangeLogWriter,
  toChangeLogDocument,
  toTabularRow,
  unescapeCell,
  CHANGE_LOG_COLUMNS,
  CHANGE_LOG_TYPES,
} from './changelog/index.js';
export type {
  ChangeLogWriterOptions,
  RunArtifacts,
  ChangeLogType,
  TabularChangeRow,
  TabularOptions,
} from './changelog/index.js';

// Formatters
export { formatChangeSet } from './formatters/index.js';
export type { FormatOptions } from './formatters/index.js';

// Query
export { parseQuery, QueryInterpreter } from './query/index.js';
export type { QueryCommand, QueryVocabulary, QueryResult } from './query/index.js';
