/**
 * Change Log Module
 */

export {
  ChangeLogWriter,
  toChangeLogDocument,
  CSV_FILE_NAME,
  JSON_FILE_NAME,
  HISTORY_FILE_NAME,
  HISTORY_LEDGER_FILE_NAME,
} from './change-log-writer.js';
export type { ChangeLogWriterOptions, RunArtifacts } from './change-log-writer.js';
export { toTabularRow, unescapeCell, CHANGE_LOG_COLUMNS, CHANGE_LOG_TYPES } from './tabular.js';
export type { ChangeLogType, ChangeLogColumn, TabularChangeRow, TabularOptions } from './tabular.js';
