/**
 * Change set statistics
 */

import type { ChangeRecord, ChangeSummary } from '@regwatch/core';
import { compareKeys } from '@regwatch/core';

export function summarizeChanges(
  changes: readonly ChangeRecord[],
  trackedFields: readonly string[]
): ChangeSummary {
  let newCount = 0;
  let removedCount = 0;
  let fieldUpdateCount = 0;
  const perField = new Map<string, number>();

  for (const change of changes) {
    switch (change.kind) {
      case 'NEW':
        newCount++;
        break;
      case 'REMOVED':
        removedCount++;
        break;
      case 'FIELD_UPDATE':
        fieldUpdateCount++;
        perField.set(change.field, (perField.get(change.field) ?? 0) + 1);
        break;
    }
  }

  // Tracked-field order first, then anything else in order of appearance
  const fieldBreakdown: Record<string, number> = {};
  for (const field of [...trackedFields, ...perField.keys()]) {
    const count = perField.get(field);
    if (count && !(field in fieldBreakdown)) {
      fieldBreakdown[field] = count;
    }
  }

  return {
    newCount,
    removedCount,
    fieldUpdateCount,
    totalChanges: changes.length,
    fieldBreakdown,
  };
}

/**
 * Distinct states touched by a set of changes, sorted
 */
export function affectedStates(changes: readonly ChangeRecord[]): string[] {
  const states = new Set<string>();
  for (const change of changes) {
    if (change.context.state !== null) states.add(String(change.context.state));
  }
  return Array.from(states).sort(compareKeys);
}
