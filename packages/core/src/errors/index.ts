export {
  ChangeEngineError,
  InsufficientHistoryError,
  SchemaMismatchError,
  DuplicateSnapshotError,
  DuplicateRunError,
  SnapshotNotFoundError,
  isRecoverable,
  wrapError,
} from './change-engine-error.js';
export type { ChangeEngineErrorCode, ChangeEngineErrorDetails } from './change-engine-error.js';
