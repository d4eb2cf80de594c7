/**
 * Flat tabular projection of change records
 */

import type { AttributeRecord, ChangeKind, ChangeRecord, FieldValue } from '@regwatch/core';

export type ChangeLogType = 'NEW_INCORPORATION' | 'DEREGISTRATION' | 'FIELD_UPDATE';

export const CHANGE_LOG_TYPES: Readonly<Record<ChangeKind, ChangeLogType>> = {
  NEW: 'NEW_INCORPORATION',
  REMOVED: 'DEREGISTRATION',
  FIELD_UPDATE: 'FIELD_UPDATE',
};

export const CHANGE_LOG_COLUMNS = [
  'entity_key',
  'change_type',
  'field_changed',
  'old_value',
  'new_value',
  'detection_date',
  'company_name',
  'state',
  'status',
] as const;

export type ChangeLogColumn = (typeof CHANGE_LOG_COLUMNS)[number];

export type TabularChangeRow = Record<ChangeLogColumn, string>;

export interface TabularOptions {
  /**
   * Prefix text cells starting with =, +, - or @ so spreadsheet tools do not
   * evaluate them. Cells already starting with the prefix are prefixed again,
   * so unescapeCell() restores every value. Default: true.
   */
  sanitizeFormulas?: boolean;
  /** Prefix used when sanitizeFormulas is enabled (default: "'") */
  formulaEscapePrefix?: string;
}

const FORMULA_PATTERN = /^[\t\r\n ]*[=+\-@]/;

function renderCell(
  value: FieldValue | AttributeRecord,
  options: Required<TabularOptions>
): string {
  if (value === null) return '';
  if (typeof value === 'number') return String(value);
  if (typeof value === 'object') return JSON.stringify(value);
  if (!options.sanitizeFormulas || options.formulaEscapePrefix.length === 0) return value;
  return FORMULA_PATTERN.test(value) || value.startsWith(options.formulaEscapePrefix)
    ? `${options.formulaEscapePrefix}${value}`
    : value;
}

/**
 * Reverse the formula escape applied to a text cell
 */
export function unescapeCell(cell: string, formulaEscapePrefix = "'"): string {
  if (formulaEscapePrefix.length === 0 || !cell.startsWith(formulaEscapePrefix)) return cell;
  return cell.slice(formulaEscapePrefix.length);
}

/**
 * Project a change record onto the change log columns.
 *
 * Whole-record values (NEW / REMOVED) are rendered as JSON with keys in
 * schema order; null becomes an empty cell.
 */
export function toTabularRow(change: ChangeRecord, options: TabularOptions = {}): TabularChangeRow {
  const resolved: Required<TabularOptions> = {
    sanitizeFormulas: options.sanitizeFormulas ?? true,
    formulaEscapePrefix: options.formulaEscapePrefix ?? "'",
  };
  const cell = (value: FieldValue | AttributeRecord) => renderCell(value, resolved);

  return {
    entity_key: cell(change.key),
    change_type: CHANGE_LOG_TYPES[change.kind],
    field_changed: change.field ?? '',
    old_value: cell(change.oldValue),
    new_value: cell(change.newValue),
    detection_date: change.detectedOn,
    company_name: cell(change.context.name),
    state: cell(change.context.state),
    status: cell(change.context.status),
  };
}
