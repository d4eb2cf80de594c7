/**
 * Formatter Utilities
 */

import type { AttributeRecord, FieldValue } from '@regwatch/core';

/**
 * Format a value for display
 */
export function formatValue(value: FieldValue | AttributeRecord): string {
  if (value === null) return '(empty)';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Display label of an entity: its name when known, then its key
 */
export function formatEntity(key: string, name: FieldValue): string {
  return name === null ? key : `${name} (${key})`;
}
