/**
 * Change Set Formatter
 *
 * Plain-text report of one comparison run.
 */

import type { ChangeRecord, ChangeSet } from '@regwatch/core';
import { affectedStates } from '../diff/change-summary.js';
import { formatEntity, formatValue } from './utils.js';

export interface FormatOptions {
  /** Records listed per section (default: 10) */
  limit?: number;
}

function pushSection(
  lines: string[],
  title: string,
  changes: ChangeRecord[],
  limit: number,
  describe: (change: ChangeRecord) => string
): void {
  if (changes.length === 0) return;

  lines.push(`### ${title} (${changes.length})`);
  for (const change of changes.slice(0, limit)) {
    lines.push(`- ${describe(change)}`);
  }
  if (changes.length > limit) {
    lines.push(`... and ${changes.length - limit} more`);
  }
  lines.push('');
}

/**
 * Format a change set as plain text
 */
export function formatChangeSet(changeSet: ChangeSet, options: FormatOptions = {}): string {
  const limit = options.limit ?? 10;
  const lines: string[] = [];
  const { summary } = changeSet;

  // Header
  lines.push(`## Change Summary for ${changeSet.detectedOn}`);
  lines.push(`Compared: ${changeSet.previousCapturedAt} -> ${changeSet.currentCapturedAt}`);
  lines.push('');

  // Summary
  lines.push(`### Summary`);
  if (summary.totalChanges === 0) {
    lines.push(`No changes detected.`);
  } else {
    lines.push(`- New Incorporations: ${summary.newCount}`);
    lines.push(`- Deregistrations: ${summary.removedCount}`);
    lines.push(`- Field Updates: ${summary.fieldUpdateCount}`);
    lines.push(`- Total Changes: ${summary.totalChanges}`);

    const states = affectedStates(changeSet.changes);
    if (states.length > 0) {
      lines.push(`- Affected States: ${states.join(', ')}`);
    }
  }
  lines.push('');

  const breakdown = Object.entries(summary.fieldBreakdown);
  if (breakdown.length > 0) {
    lines.push(`### Updates by Field`);
    for (const [field, count] of breakdown) {
      lines.push(`- ${field}: ${count}`);
    }
    lines.push('');
  }

  const byKind = (kind: ChangeRecord['kind']) => changeSet.changes.filter((c) => c.kind === kind);

  pushSection(lines, 'New Incorporations', byKind('NEW'), limit, (c) =>
    formatEntity(c.key, c.context.name)
  );
  pushSection(lines, 'Deregistrations', byKind('REMOVED'), limit, (c) =>
    formatEntity(c.key, c.context.name)
  );
  pushSection(lines, 'Field Updates', byKind('FIELD_UPDATE'), limit, (c) =>
    `${formatEntity(c.key, c.context.name)}: ${c.field ?? ''} ${formatValue(c.oldValue)} -> ${formatValue(c.newValue)}`
  );

  return lines.join('\n').trimEnd();
}
