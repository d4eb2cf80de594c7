/**
 * Diff Engine
 *
 * Pure, synchronous comparison of two snapshots. No I/O and no logging:
 * the same inputs always give the same ordered change set.
 */

import type {
  ChangeRecord,
  ChangeSet,
  ContextFields,
  KeyPartition,
  Snapshot,
} from '@regwatch/core';
import {
  ChangeEngineError,
  SchemaMismatchError,
  ValueNormalizer,
  compareKeys,
  sortKeys,
} from '@regwatch/core';
import { FieldComparator } from './field-comparator.js';
import { compareShard, splitIntoShards, type ShardContext } from './shards.js';
import { createNewEntityChange, createRemovedEntityChange } from './change-records.js';
import { summarizeChanges } from './change-summary.js';

export const DEFAULT_SHARD_SIZE = 5000;

export interface DiffEngineConfig {
  /** Ordered tracked fields both snapshots must share */
  trackedFields: readonly string[];
  /** Descriptive fields carried into change records */
  contextFields?: ContextFields;
  /** Must be the normalizer the snapshots were built with */
  normalizer?: ValueNormalizer;
  /** Common keys compared per shard (default: 5000) */
  shardSize?: number;
}

function sameFields(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((field, i) => field === b[i]);
}

function missingFrom(source: readonly string[], target: readonly string[]): string[] {
  const present = new Set(target);
  return source.filter((field) => !present.has(field));
}

/**
 * Computes the three-way partition (appeared, disappeared, field-mutated)
 * between two snapshots.
 *
 * Output order: ascending entity key; within one key, tracked-field order.
 */
export class DiffEngine {
  private readonly trackedFields: readonly string[];
  private readonly contextFields: ContextFields;
  private readonly comparator: FieldComparator;
  private readonly shardSize: number;

  constructor(config: DiffEngineConfig) {
    if (config.trackedFields.length === 0) {
      throw new ChangeEngineError({
        code: 'INVALID_CONFIG',
        message: 'DiffEngine requires at least one tracked field',
      });
    }
    if (new Set(config.trackedFields).size !== config.trackedFields.length) {
      throw new ChangeEngineError({
        code: 'INVALID_CONFIG',
        message: 'DiffEngine tracked fields must be unique',
        context: { trackedFields: [...config.trackedFields] },
      });
    }
    const shardSize = config.shardSize ?? DEFAULT_SHARD_SIZE;
    if (!Number.isInteger(shardSize) || shardSize < 1) {
      throw new ChangeEngineError({
        code: 'INVALID_CONFIG',
        message: `DiffEngine shardSize must be >= 1 (got ${shardSize})`,
        context: { shardSize },
      });
    }

    this.trackedFields = Object.freeze([...config.trackedFields]);
    this.contextFields = Object.freeze({ ...(config.contextFields ?? {}) });
    this.comparator = new FieldComparator(
      this.trackedFields,
      config.normalizer ?? new ValueNormalizer()
    );
    this.shardSize = shardSize;
  }

  /**
   * Compare two snapshots.
   *
   * @throws SchemaMismatchError when the snapshots (or the engine) disagree on tracked fields
   */
  diff(previous: Snapshot, current: Snapshot): ChangeSet {
    this.assertComparable(previous, current);

    const { appeared, disappeared, common } = this.partition(previous, current);
    const detectedOn = current.capturedAt;
    const changes: ChangeRecord[] = [];

    // Phase 1: set reconciliation
    for (const key of appeared) {
      const record = current.records.get(key);
      if (record) {
        changes.push(
          createNewEntityChange(key, record, current.schema.fields, this.contextFields, detectedOn)
        );
      }
    }
    for (const key of disappeared) {
      const record = previous.records.get(key);
      if (record) {
        changes.push(
          createRemovedEntityChange(key, record, previous.schema.fields, this.contextFields, detectedOn)
        );
      }
    }

    // Phase 2: field comparison over independent shards
    const shardContext: ShardContext = {
      previous,
      current,
      comparator: this.comparator,
      contextFields: this.contextFields,
      detectedOn,
    };
    for (const shard of splitIntoShards(common, this.shardSize)) {
      for (const update of compareShard(shard, shardContext)) {
        changes.push(update);
      }
    }

    // Phase 3: assembly
    changes.sort((a, b) => this.compareChanges(a, b));

    return Object.freeze({
      previousCapturedAt: previous.capturedAt,
      currentCapturedAt: current.capturedAt,
      detectedOn,
      changes: Object.freeze(changes),
      summary: summarizeChanges(changes, this.trackedFields),
    });
  }

  /**
   * Key partition of two snapshots, each list sorted by key
   */
  partition(previous: Snapshot, current: Snapshot): KeyPartition {
    const appeared: string[] = [];
    const common: string[] = [];
    for (const key of current.records.keys()) {
      if (previous.records.has(key)) {
        common.push(key);
      } else {
        appeared.push(key);
      }
    }

    const disappeared: string[] = [];
    for (const key of previous.records.keys()) {
      if (!current.records.has(key)) disappeared.push(key);
    }

    return {
      appeared: sortKeys(appeared),
      disappeared: sortKeys(disappeared),
      common: sortKeys(common),
    };
  }

  /**
   * @throws SchemaMismatchError
   */
  assertComparable(previous: Snapshot, current: Snapshot): void {
    const previousFields = previous.schema.trackedFields;
    const currentFields = current.schema.trackedFields;

    if (!sameFields(previousFields, currentFields)) {
      throw new SchemaMismatchError(
        `Snapshots ${previous.capturedAt} and ${current.capturedAt} do not share the same tracked fields`,
        {
          previous: [...previousFields],
          current: [...currentFields],
          missing: missingFrom(previousFields, currentFields),
          extra: missingFrom(currentFields, previousFields),
        }
      );
    }

    if (!sameFields(currentFields, this.trackedFields)) {
      throw new SchemaMismatchError(
        `Snapshot tracked fields do not match the engine configuration`,
        {
          configured: [...this.trackedFields],
          snapshot: [...currentFields],
          missing: missingFrom(this.trackedFields, currentFields),
          extra: missingFrom(currentFields, this.trackedFields),
        }
      );
    }
  }

  private compareChanges(a: ChangeRecord, b: ChangeRecord): number {
    return compareKeys(a.key, b.key) || this.fieldRank(a) - this.fieldRank(b);
  }

  private fieldRank(change: ChangeRecord): number {
    return change.field === null ? -1 : this.trackedFields.indexOf(change.field);
  }
}
