/**
 * Run orchestration: snapshot import, one comparison run, and backfill of
 * every consecutive pair that has no change log yet.
 */

import type {
  ChangeSet,
  ChangeSummary,
  Logger,
  SnapshotInfo,
  SnapshotPair,
} from '@regwatch/core';
import {
  ChangeEngineError,
  InsufficientHistoryError,
  ValueNormalizer,
  createRunId,
} from '@regwatch/core';
import {
  ChangeLogWriter,
  DiffEngine,
  QueryInterpreter,
  SnapshotStore,
  formatChangeSet,
  readSnapshotCsv,
  type RunArtifacts,
} from '@regwatch/change-engine';
import type { ConfigFile } from './config.js';

export interface PipelineContext {
  config: ConfigFile;
  logger: Logger;
  normalizer: ValueNormalizer;
  store: SnapshotStore;
  changeLog: ChangeLogWriter;
  engine: DiffEngine;
}

export type RunResult =
  | {
      status: 'completed';
      runId: string;
      detectionDate: string;
      previousCapturedAt: string;
      summary: ChangeSummary;
      artifacts: RunArtifacts;
      historyRecords: number;
      report: string;
    }
  | {
      status: 'waiting';
      runId: string;
      available: number;
      message: string;
    };

export interface BackfillResult {
  /** Runs compared and written, oldest first */
  completed: Array<Extract<RunResult, { status: 'completed' }>>;
  /** Runs whose change log existed but was missing from the history */
  recovered: string[];
  /** Runs already written and appended */
  skipped: string[];
}

/**
 * Wire the stores and the engine from a validated config
 */
export function createContext(config: ConfigFile, logger: Logger): PipelineContext {
  const normalizer = new ValueNormalizer(config.normalization);
  return {
    config,
    logger,
    normalizer,
    store: new SnapshotStore(config.snapshotDir, logger),
    changeLog: new ChangeLogWriter({
      baseDir: config.changeLogDir,
      delimiter: config.csv.delimiter,
      sanitizeFormulas: config.csv.sanitizeFormulas,
      formulaEscapePrefix: config.csv.formulaEscapePrefix,
      logger,
    }),
    engine: new DiffEngine({
      trackedFields: config.schema.trackedFields,
      contextFields: config.schema.contextFields,
      normalizer,
      shardSize: config.engine.shardSize,
    }),
  };
}

export function createQueryInterpreter(ctx: PipelineContext): QueryInterpreter {
  return new QueryInterpreter(ctx.changeLog, ctx.store, { limit: ctx.config.query.limit });
}

/**
 * Load a registry extract and store it as the snapshot of `capturedAt`
 */
export async function importSnapshot(
  ctx: PipelineContext,
  capturedAt: string,
  filePath: string
): Promise<SnapshotInfo> {
  const snapshot = await readSnapshotCsv(filePath, capturedAt, ctx.config.schema, ctx.normalizer, {
    delimiter: ctx.config.csv.delimiter,
    quote: ctx.config.csv.quote,
    encoding: ctx.config.csv.encoding,
  });
  return ctx.store.append(snapshot);
}

async function assertHistoryAccepts(ctx: PipelineContext, detectionDate: string): Promise<void> {
  const runs = await ctx.changeLog.readLedger();
  const last = runs[runs.length - 1];
  if (last && last.detectionDate > detectionDate) {
    throw new ChangeEngineError({
      code: 'HISTORY_OUT_OF_ORDER',
      message: `Cannot record ${detectionDate} after ${last.detectionDate} has been appended to history`,
      suggestion: 'Runs are recorded oldest first; this gap cannot be filled.',
      context: { detectionDate, lastAppended: last.detectionDate },
    });
  }
}

async function recordRun(
  ctx: PipelineContext,
  changeSet: ChangeSet,
  runId: string,
  logger: Logger
): Promise<Extract<RunResult, { status: 'completed' }>> {
  const detectionDate = changeSet.detectedOn;

  // Everything that can fail without side effects is checked before write()
  await assertHistoryAccepts(ctx, detectionDate);

  const artifacts = await ctx.changeLog.write(changeSet, detectionDate);
  const historyRecords = await ctx.changeLog.appendToHistory(changeSet);

  logger.info('Run completed', {
    detectionDate,
    totalChanges: changeSet.summary.totalChanges,
    historyRecords,
  });

  return {
    status: 'completed',
    runId,
    detectionDate,
    previousCapturedAt: changeSet.previousCapturedAt,
    summary: changeSet.summary,
    artifacts,
    historyRecords,
    report: formatChangeSet(changeSet),
  };
}

/**
 * Compare the two most recent snapshots and persist the result.
 *
 * Fewer than two snapshots is not a failure: the result is `waiting`.
 */
export async function runPipeline(ctx: PipelineContext): Promise<RunResult> {
  const runId = createRunId();
  const logger = ctx.logger.child({ runId });

  let pair: SnapshotPair;
  try {
    pair = await ctx.store.latestPair();
  } catch (err) {
    if (err instanceof InsufficientHistoryError) {
      logger.warn('Waiting for more snapshots', { error: err });
      return { status: 'waiting', runId, available: snapshotsAvailable(err), message: err.message };
    }
    throw err;
  }

  logger.info('Comparing snapshots', {
    previous: pair.previous.capturedAt,
    current: pair.current.capturedAt,
  });

  const changeSet = ctx.engine.diff(pair.previous, pair.current);
  logger.debug('Diff finished', { ...changeSet.summary });

  return recordRun(ctx, changeSet, runId, logger);
}

/**
 * Bring the change logs up to date with the snapshot store, oldest pair first
 */
export async function backfill(ctx: PipelineContext): Promise<BackfillResult> {
  const runId = createRunId();
  const logger = ctx.logger.child({ runId });
  const result: BackfillResult = { completed: [], recovered: [], skipped: [] };

  const pairs = await ctx.store.consecutiveDates();
  const appended = new Set((await ctx.changeLog.readLedger()).map((run) => run.detectionDate));

  for (const { previous, current } of pairs) {
    if (await ctx.changeLog.hasRun(current)) {
      if (appended.has(current)) {
        result.skipped.push(current);
        continue;
      }

      // Written but never appended: replay the stored run into the history
      const document = await ctx.changeLog.readRun(current);
      await ctx.changeLog.appendToHistory({
        previousCapturedAt: document.previousCapturedAt,
        currentCapturedAt: document.currentCapturedAt,
        detectedOn: document.detectionDate,
        changes: document.changes,
        summary: document.summary,
      });
      logger.warn('Recovered run missing from history', { detectionDate: current });
      result.recovered.push(current);
      continue;
    }

    const [previousSnapshot, currentSnapshot] = await Promise.all([
      ctx.store.asOf(previous),
      ctx.store.asOf(current),
    ]);
    logger.info('Comparing snapshots', { previous, current });
    const changeSet = ctx.engine.diff(previousSnapshot, currentSnapshot);
    result.completed.push(await recordRun(ctx, changeSet, runId, logger));
  }

  logger.info('Backfill finished', {
    completed: result.completed.length,
    recovered: result.recovered.length,
    skipped: result.skipped.length,
  });
  return result;
}

function snapshotsAvailable(err: InsufficientHistoryError): number {
  const available = err.context?.available;
  return typeof available === 'number' ? available : 0;
}
