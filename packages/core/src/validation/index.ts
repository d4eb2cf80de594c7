export {
  captureDateSchema,
  fieldValueSchema,
  attributeRecordSchema,
  contextFieldsSchema,
  snapshotSchemaDefinition,
  storedSnapshotSchema,
  changeRecordSchema,
  changeSummarySchema,
  changeLogDocumentSchema,
  historyRunSchema,
  formatZodIssues,
} from './schemas.js';
export type {
  StoredSnapshot,
  ChangeLogDocument,
  HistoryRun,
  SnapshotSchemaInput,
} from './schemas.js';
