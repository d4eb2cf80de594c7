/**
 * Diff Module
 */

export { DiffEngine, DEFAULT_SHARD_SIZE } from './diff-engine.js';
export type { DiffEngineConfig } from './diff-engine.js';
export { FieldComparator } from './field-comparator.js';
export type { FieldDifference } from './field-comparator.js';
export { compareShard, splitIntoShards } from './shards.js';
export type { ShardContext } from './shards.js';
export { summarizeChanges, affectedStates } from './change-summary.js';
export {
  extractContext,
  createNewEntityChange,
  createRemovedEntityChange,
  createFieldUpdateChange,
} from './change-records.js';
