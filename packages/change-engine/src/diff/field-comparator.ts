/**
 * FieldComparator
 *
 * Compares the tracked fields of two versions of one entity.
 */

import type { AttributeRecord, FieldValue } from '@regwatch/core';
import { ValueNormalizer } from '@regwatch/core';

export interface FieldDifference {
  field: string;
  oldValue: FieldValue;
  newValue: FieldValue;
}

export class FieldComparator {
  constructor(
    private readonly trackedFields: readonly string[],
    private readonly normalizer: ValueNormalizer
  ) {}

  /**
   * Field-level differences, in tracked-field order.
   *
   * A null on one side only is a difference; nulls on both sides are not.
   */
  compareRecords(previous: AttributeRecord, current: AttributeRecord): FieldDifference[] {
    const differences: FieldDifference[] = [];

    for (const field of this.trackedFields) {
      const oldValue = this.normalizer.normalize(field, previous[field]);
      const newValue = this.normalizer.normalize(field, current[field]);

      if (oldValue !== newValue) {
        differences.push({ field, oldValue, newValue });
      }
    }

    return differences;
  }
}
