/**
 * Field comparison over disjoint shards of the common key set.
 *
 * A shard touches only its own keys' records and returns a shard-local list,
 * so shards can be evaluated independently and merged afterwards.
 */

import type { ContextFields, EntityKey, FieldUpdateChange, Snapshot } from '@regwatch/core';
import { FieldComparator } from './field-comparator.js';
import { createFieldUpdateChange, extractContext } from './change-records.js';

export interface ShardContext {
  previous: Snapshot;
  current: Snapshot;
  comparator: FieldComparator;
  contextFields: ContextFields;
  detectedOn: string;
}

export function splitIntoShards<T>(items: readonly T[], shardSize: number): T[][] {
  const shards: T[][] = [];
  for (let start = 0; start < items.length; start += shardSize) {
    shards.push(items.slice(start, start + shardSize));
  }
  return shards;
}

export function compareShard(keys: readonly EntityKey[], ctx: ShardContext): FieldUpdateChange[] {
  const updates: FieldUpdateChange[] = [];

  for (const key of keys) {
    const previousRecord = ctx.previous.records.get(key);
    const currentRecord = ctx.current.records.get(key);
    if (!previousRecord || !currentRecord) continue;

    const differences = ctx.comparator.compareRecords(previousRecord, currentRecord);
    if (differences.length === 0) continue;

    const context = extractContext(currentRecord, ctx.contextFields);
    for (const diff of differences) {
      updates.push(
        createFieldUpdateChange(key, diff.field, diff.oldValue, diff.newValue, context, ctx.detectedOn)
      );
    }
  }

  return updates;
}
