/**
 * Error types for change detection
 * Every failure propagates to the run orchestrator, which decides whether to retry
 */

export type ChangeEngineErrorCode =
  | 'INSUFFICIENT_HISTORY'
  | 'SCHEMA_MISMATCH'
  | 'DUPLICATE_SNAPSHOT'
  | 'DUPLICATE_RUN'
  | 'SNAPSHOT_NOT_FOUND'
  | 'DUPLICATE_KEY'
  | 'MISSING_KEY'
  | 'INVALID_SNAPSHOT'
  | 'INVALID_RUN_DATE'
  | 'HISTORY_OUT_OF_ORDER'
  | 'STORAGE_ERROR'
  | 'CHANGE_LOG_ERROR'
  | 'INVALID_QUERY'
  | 'INVALID_CONFIG';

export interface ChangeEngineErrorDetails {
  /** Error code for programmatic handling */
  code: ChangeEngineErrorCode;
  /** Human-readable message */
  message: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
  /** Whether the caller may retry later (default: false) */
  recoverable?: boolean;
}

export class ChangeEngineError extends Error {
  readonly code: ChangeEngineErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;
  readonly recoverable: boolean;

  constructor(details: ChangeEngineErrorDetails) {
    super(details.message);
    this.name = 'ChangeEngineError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;
    this.recoverable = details.recoverable ?? false;

    if (details.cause) {
      this.cause = details.cause;
    }

    Error.captureStackTrace(this, new.target);
  }

  /**
   * Format error for log output and the command line
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }
    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
      recoverable: this.recoverable,
    };
  }
}

/** Fewer than two snapshots exist; retry once another snapshot is appended */
export class InsufficientHistoryError extends ChangeEngineError {
  constructor(available: number) {
    super({
      code: 'INSUFFICIENT_HISTORY',
      message: `Change detection needs at least two snapshots, found ${available}`,
      suggestion: 'Append the next snapshot and run again.',
      context: { available },
      recoverable: true,
    });
    this.name = 'InsufficientHistoryError';
  }
}

/** The two snapshots (or a snapshot and the engine) disagree on tracked fields */
export class SchemaMismatchError extends ChangeEngineError {
  constructor(message: string, context: Record<string, unknown>) {
    super({
      code: 'SCHEMA_MISMATCH',
      message,
      suggestion: 'Rebuild the snapshots with the same tracked-field schema before comparing.',
      context,
    });
    this.name = 'SchemaMismatchError';
  }
}

export class DuplicateSnapshotError extends ChangeEngineError {
  constructor(capturedAt: string, filePath?: string) {
    super({
      code: 'DUPLICATE_SNAPSHOT',
      message: `A snapshot captured on ${capturedAt} already exists`,
      suggestion: 'Snapshots are immutable; use a different capture date.',
      context: { capturedAt, filePath },
    });
    this.name = 'DuplicateSnapshotError';
  }
}

export class DuplicateRunError extends ChangeEngineError {
  constructor(detectionDate: string, location?: string) {
    super({
      code: 'DUPLICATE_RUN',
      message: `A change log for ${detectionDate} already exists`,
      suggestion: 'Change logs are never overwritten; inspect the existing run instead.',
      context: { detectionDate, location },
    });
    this.name = 'DuplicateRunError';
  }
}

export class SnapshotNotFoundError extends ChangeEngineError {
  constructor(capturedAt: string, cause?: Error) {
    super({
      code: 'SNAPSHOT_NOT_FOUND',
      message: `No snapshot captured on ${capturedAt}`,
      suggestion: 'List the available snapshots and pick an existing capture date.',
      context: { capturedAt },
      cause,
    });
    this.name = 'SnapshotNotFoundError';
  }
}

/**
 * Whether a failure may clear up on its own (only insufficient history does)
 */
export function isRecoverable(error: unknown): boolean {
  return error instanceof ChangeEngineError && error.recoverable;
}

/**
 * Helper to wrap unknown errors as ChangeEngineError
 */
export function wrapError(
  error: unknown,
  code: ChangeEngineErrorCode,
  message?: string
): ChangeEngineError {
  if (error instanceof ChangeEngineError) {
    return error;
  }

  const cause = error instanceof Error ? error : undefined;
  const detail = error instanceof Error ? error.message : String(error);

  return new ChangeEngineError({
    code,
    message: message ? `${message}: ${detail}` : detail,
    cause,
  });
}
