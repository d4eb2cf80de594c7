/**
 * Change Log Writer
 *
 * Durable, never-overwritten storage of change sets.
 *
 * Layout:
 *   {baseDir}/runs/{YYYY-MM-DD}/change_log.csv   flat tabular form
 *   {baseDir}/runs/{YYYY-MM-DD}/change_log.json  structured form
 *   {baseDir}/history.ndjson                     cumulative history, one record per line
 *   {baseDir}/history-runs.ndjson                run ledger for the history file
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { stringify } from 'csv-stringify/sync';
import type {
  ChangeLogDocument,
  ChangeLogReader,
  ChangeRecord,
  ChangeSet,
  HistoryRun,
  Logger,
} from '@regwatch/core';
import {
  ChangeEngineError,
  DuplicateRunError,
  changeLogDocumentSchema,
  changeRecordSchema,
  formatZodIssues,
  historyRunSchema,
  isCaptureDate,
  wrapError,
} from '@regwatch/core';
import { CHANGE_LOG_COLUMNS, toTabularRow, type TabularOptions } from './tabular.js';
import { isErrnoException, pathExists, readDirOrEmpty } from '../utils/fs.js';

export const CSV_FILE_NAME = 'change_log.csv';
export const JSON_FILE_NAME = 'change_log.json';
export const HISTORY_FILE_NAME = 'history.ndjson';
export const HISTORY_LEDGER_FILE_NAME = 'history-runs.ndjson';

export interface ChangeLogWriterOptions extends TabularOptions {
  /** Root directory for change logs (default: './data/change_logs') */
  baseDir?: string;
  /** CSV delimiter (default: ',') */
  delimiter?: string;
  logger?: Logger;
}

/** Paths written for one run */
export interface RunArtifacts {
  detectionDate: string;
  directory: string;
  csvPath: string;
  jsonPath: string;
  recordCount: number;
}

interface LedgerState {
  runs: HistoryRun[];
  /** Byte length of the committed entries */
  committedBytes: number;
  size: number;
}

function parseJsonLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

/**
 * Structured form of a change set
 */
export function toChangeLogDocument(changeSet: ChangeSet): ChangeLogDocument {
  return {
    detectionDate: changeSet.detectedOn,
    previousCapturedAt: changeSet.previousCapturedAt,
    currentCapturedAt: changeSet.currentCapturedAt,
    summary: changeSet.summary,
    changes: [...changeSet.changes],
  };
}

export class ChangeLogWriter implements ChangeLogReader {
  private static writeQueue = new Map<string, Promise<void>>();

  private readonly baseDir: string;
  private readonly logger?: Logger;

  constructor(private readonly options: ChangeLogWriterOptions = {}) {
    this.baseDir = options.baseDir ?? './data/change_logs';
    this.logger = options.logger;
  }

  private get runsDir(): string {
    return path.join(this.baseDir, 'runs');
  }

  private get historyPath(): string {
    return path.join(this.baseDir, HISTORY_FILE_NAME);
  }

  private get ledgerPath(): string {
    return path.join(this.baseDir, HISTORY_LEDGER_FILE_NAME);
  }

  private getRunDir(detectionDate: string): string {
    return path.join(this.runsDir, detectionDate);
  }

  /**
   * Write the per-date artifacts of one run.
   *
   * Both files are written into a temporary directory that is renamed into
   * place, so either the whole run is visible or nothing is.
   *
   * @throws DuplicateRunError if a change log for this date already exists
   */
  async write(changeSet: ChangeSet, date: string): Promise<RunArtifacts> {
    if (!isCaptureDate(date) || date !== changeSet.detectedOn) {
      throw new ChangeEngineError({
        code: 'INVALID_RUN_DATE',
        message: `Run date '${date}' does not match the change set detection date '${changeSet.detectedOn}'`,
        context: { date, detectedOn: changeSet.detectedOn },
      });
    }

    const runDir = this.getRunDir(date);
    if (await pathExists(runDir)) {
      throw new DuplicateRunError(date, runDir);
    }

    try {
      await fs.mkdir(this.runsDir, { recursive: true });
    } catch (err) {
      throw wrapError(err, 'CHANGE_LOG_ERROR', `Failed to create change log directory: ${this.runsDir}`);
    }

    const tmpDir = await fs
      .mkdtemp(path.join(this.runsDir, `.tmp-${date}-`))
      .catch((err: unknown) => {
        throw wrapError(err, 'CHANGE_LOG_ERROR', `Failed to stage change log for ${date}`);
      });
    try {
      await fs.writeFile(path.join(tmpDir, CSV_FILE_NAME), this.renderCsv(changeSet), 'utf-8');
      await fs.writeFile(
        path.join(tmpDir, JSON_FILE_NAME),
        `${JSON.stringify(toChangeLogDocument(changeSet), null, 2)}\n`,
        'utf-8'
      );
      await fs.rename(tmpDir, runDir);
    } catch (err) {
      await fs.rm(tmpDir, { recursive: true, force: true }).catch((cleanupErr: unknown) => {
        this.logger?.warn('Failed to remove staged change log', {
          directory: tmpDir,
          error: cleanupErr instanceof Error ? cleanupErr.message : String(cleanupErr),
        });
      });
      if (isErrnoException(err) && (err.code === 'ENOTEMPTY' || err.code === 'EEXIST')) {
        throw new DuplicateRunError(date, runDir);
      }
      throw wrapError(err, 'CHANGE_LOG_ERROR', `Failed to write change log for ${date}`);
    }

    const artifacts: RunArtifacts = {
      detectionDate: date,
      directory: runDir,
      csvPath: path.join(runDir, CSV_FILE_NAME),
      jsonPath: path.join(runDir, JSON_FILE_NAME),
      recordCount: changeSet.changes.length,
    };
    this.logger?.info('Change log written', { ...artifacts });
    return artifacts;
  }

  /**
   * Append a run's records to the cumulative history.
   *
   * Runs must arrive in chronological order and at most once. Each ledger
   * entry records where the history file ended after that run; bytes past the
   * last entry belong to an interrupted append and are dropped before the next
   * one, and are never returned by readHistory().
   *
   * @returns number of records appended
   */
  async appendToHistory(changeSet: ChangeSet): Promise<number> {
    const date = changeSet.detectedOn;

    return this.enqueueWrite(this.historyPath, async () => {
      try {
        await fs.mkdir(this.baseDir, { recursive: true });
      } catch (err) {
        throw wrapError(err, 'CHANGE_LOG_ERROR', `Failed to create change log directory: ${this.baseDir}`);
      }

      const ledger = await this.readLedgerState();
      const runs = ledger.runs;
      const last = runs[runs.length - 1];

      if (runs.some((run) => run.detectionDate === date)) {
        throw new DuplicateRunError(date, this.ledgerPath);
      }
      if (last && last.detectionDate > date) {
        throw new ChangeEngineError({
          code: 'HISTORY_OUT_OF_ORDER',
          message: `Cannot append ${date} to history after ${last.detectionDate}`,
          suggestion: 'Append runs in chronological order.',
          context: { date, lastAppended: last.detectionDate },
        });
      }

      const committedOffset = last?.endOffset ?? 0;
      await this.discardTornLedger(ledger);
      await this.discardUncommitted(committedOffset);

      const payload = changeSet.changes.map((change) => `${JSON.stringify(change)}\n`).join('');
      const entry: HistoryRun = {
        detectionDate: date,
        recordCount: changeSet.changes.length,
        endOffset: committedOffset + Buffer.byteLength(payload, 'utf-8'),
        appendedAt: new Date().toISOString(),
      };

      try {
        if (payload) {
          await fs.appendFile(this.historyPath, payload, 'utf-8');
        }
        await fs.appendFile(this.ledgerPath, `${JSON.stringify(entry)}\n`, 'utf-8');
      } catch (err) {
        throw wrapError(err, 'CHANGE_LOG_ERROR', `Failed to append ${date} to history`);
      }

      this.logger?.info('History appended', {
        detectionDate: date,
        recordCount: entry.recordCount,
      });
      return entry.recordCount;
    });
  }

  /**
   * Detection dates of written runs, oldest first
   */
  async listRuns(): Promise<string[]> {
    const entries = await readDirOrEmpty(this.runsDir);
    return entries.filter(isCaptureDate).sort();
  }

  async hasRun(detectionDate: string): Promise<boolean> {
    return pathExists(this.getRunDir(detectionDate));
  }

  /**
   * Read the structured change log of one run
   */
  async readRun(detectionDate: string): Promise<ChangeLogDocument> {
    const filePath = path.join(this.getRunDir(detectionDate), JSON_FILE_NAME);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      throw wrapError(err, 'CHANGE_LOG_ERROR', `No change log for ${detectionDate}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      throw wrapError(err, 'CHANGE_LOG_ERROR', `Failed to parse change log '${filePath}'`);
    }

    const result = changeLogDocumentSchema.safeParse(parsed);
    if (!result.success) {
      throw new ChangeEngineError({
        code: 'CHANGE_LOG_ERROR',
        message: formatZodIssues(`Invalid change log '${filePath}'`, result.error),
      });
    }
    return result.data;
  }

  /**
   * Every committed history record, in history order
   */
  async readHistory(): Promise<ChangeRecord[]> {
    const runs = await this.readLedger();
    const committedOffset = runs[runs.length - 1]?.endOffset ?? 0;
    if (committedOffset === 0) return [];

    let content: Buffer;
    try {
      content = await fs.readFile(this.historyPath);
    } catch (err) {
      throw wrapError(err, 'CHANGE_LOG_ERROR', 'Failed to read change history');
    }

    const lines = content
      .subarray(0, committedOffset)
      .toString('utf-8')
      .split('\n')
      .filter((line) => line.trim().length > 0);

    return lines.map((line, i) => {
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (err) {
        throw wrapError(err, 'CHANGE_LOG_ERROR', `Unreadable history record on line ${i + 1}`);
      }
      const result = changeRecordSchema.safeParse(parsed);
      if (!result.success) {
        throw new ChangeEngineError({
          code: 'CHANGE_LOG_ERROR',
          message: formatZodIssues(`Invalid history record on line ${i + 1}`, result.error),
        });
      }
      return result.data;
    });
  }

  /**
   * Runs recorded in the history ledger, in append order
   */
  async readLedger(): Promise<HistoryRun[]> {
    return (await this.readLedgerState()).runs;
  }

  /**
   * Committed ledger entries plus the byte length they occupy. Reading stops
   * at the first line that is unterminated or not JSON: it and everything
   * after it belong to an interrupted append.
   */
  private async readLedgerState(): Promise<LedgerState> {
    let content: Buffer;
    try {
      content = await fs.readFile(this.ledgerPath);
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return { runs: [], committedBytes: 0, size: 0 };
      }
      throw wrapError(err, 'CHANGE_LOG_ERROR', 'Failed to read history ledger');
    }

    const runs: HistoryRun[] = [];
    let offset = 0;
    while (offset < content.length) {
      const end = content.indexOf(0x0a, offset);
      if (end === -1) break;
      const line = content.subarray(offset, end).toString('utf-8');
      if (line.trim().length > 0) {
        const parsed = parseJsonLine(line);
        if (parsed === undefined) break;
        const result = historyRunSchema.safeParse(parsed);
        if (!result.success) {
          throw new ChangeEngineError({
            code: 'CHANGE_LOG_ERROR',
            message: formatZodIssues('Invalid history ledger entry', result.error),
          });
        }
        runs.push(result.data);
      }
      offset = end + 1;
    }
    return { runs, committedBytes: offset, size: content.length };
  }

  private async discardTornLedger(state: LedgerState): Promise<void> {
    if (state.size <= state.committedBytes) return;
    this.logger?.warn('Dropping torn history ledger entry', {
      committedBytes: state.committedBytes,
      size: state.size,
    });
    try {
      await fs.truncate(this.ledgerPath, state.committedBytes);
    } catch (err) {
      throw wrapError(err, 'CHANGE_LOG_ERROR', 'Failed to repair history ledger');
    }
  }

  private async discardUncommitted(committedOffset: number): Promise<void> {
    let size: number;
    try {
      size = (await fs.stat(this.historyPath)).size;
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return;
      throw wrapError(err, 'CHANGE_LOG_ERROR', 'Failed to inspect change history');
    }

    if (size > committedOffset) {
      this.logger?.warn('Dropping uncommitted history records', {
        committedOffset,
        size,
      });
      try {
        await fs.truncate(this.historyPath, committedOffset);
      } catch (err) {
        throw wrapError(err, 'CHANGE_LOG_ERROR', 'Failed to discard uncommitted history');
      }
    }
  }

  private renderCsv(changeSet: ChangeSet): string {
    const delimiter = this.options.delimiter ?? ',';
    if (changeSet.changes.length === 0) {
      // Header-only file for a run without changes
      return stringify([[...CHANGE_LOG_COLUMNS]], { delimiter });
    }
    const rows = changeSet.changes.map((change) => toTabularRow(change, this.options));
    return stringify(rows, {
      header: true,
      columns: [...CHANGE_LOG_COLUMNS],
      delimiter,
    });
  }

  private enqueueWrite<T>(filePath: string, op: () => Promise<T>): Promise<T> {
    const queue = ChangeLogWriter.writeQueue;
    const previous = queue.get(filePath) ?? Promise.resolve();
    const next = previous.then(op);
    const release = (): void => {
      if (queue.get(filePath) === tail) {
        queue.delete(filePath);
      }
    };
    const tail: Promise<void> = next.then(release, release);
    queue.set(filePath, tail);
    return next;
  }
}
