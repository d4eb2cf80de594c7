/**
 * Snapshot Store
 *
 * Append-only, chronologically ordered series of registry snapshots.
 */

import { promises as fs } from 'fs';
import { randomUUID } from 'crypto';
import * as path from 'path';
import type {
  AttributeRecord,
  EntityKey,
  Logger,
  Snapshot,
  SnapshotInfo,
  SnapshotPair,
  SnapshotReader,
  StoredSnapshot,
} from '@regwatch/core';
import {
  ChangeEngineError,
  DuplicateSnapshotError,
  InsufficientHistoryError,
  SnapshotNotFoundError,
  compareKeys,
  formatZodIssues,
  isCaptureDate,
  storedSnapshotSchema,
  wrapError,
} from '@regwatch/core';
import { resolveSchema } from './snapshot-builder.js';
import { isErrnoException, readDirOrEmpty } from '../utils/fs.js';

const FILE_PATTERN = /^snapshot_(\d{4}-\d{2}-\d{2})\.json$/;

/** Two capture dates that follow each other in the store */
export interface ConsecutiveDates {
  previous: string;
  current: string;
}

/**
 * Manages snapshot storage on the filesystem.
 *
 * One JSON file per capture date: {baseDir}/snapshot_{YYYY-MM-DD}.json.
 * Files are created exclusively and never rewritten.
 */
export class SnapshotStore implements SnapshotReader {
  constructor(
    private readonly baseDir: string = './data/snapshots',
    private readonly logger?: Logger
  ) {}

  /**
   * Get the file path for a snapshot
   */
  private getFilePath(capturedAt: string): string {
    return path.join(this.baseDir, `snapshot_${capturedAt}.json`);
  }

  /**
   * Ensure the snapshot directory exists
   */
  private async ensureDir(): Promise<void> {
    try {
      await fs.mkdir(this.baseDir, { recursive: true });
    } catch (err) {
      throw wrapError(err, 'STORAGE_ERROR', `Failed to create snapshot directory: ${this.baseDir}`);
    }
  }

  /**
   * Store a new snapshot.
   *
   * @throws DuplicateSnapshotError if a snapshot with the same capture date exists
   */
  async append(snapshot: Snapshot): Promise<SnapshotInfo> {
    if (!isCaptureDate(snapshot.capturedAt)) {
      throw new ChangeEngineError({
        code: 'INVALID_SNAPSHOT',
        message: `Invalid capture date '${snapshot.capturedAt}'`,
      });
    }

    const filePath = this.getFilePath(snapshot.capturedAt);
    const keys = Array.from(snapshot.records.keys()).sort(compareKeys);
    const stored: StoredSnapshot = {
      version: 1,
      capturedAt: snapshot.capturedAt,
      schema: {
        keyField: snapshot.schema.keyField,
        fields: [...snapshot.schema.fields],
        trackedFields: [...snapshot.schema.trackedFields],
        contextFields: { ...snapshot.schema.contextFields },
      },
      records: keys.map((key) => ({
        key,
        attributes: { ...snapshot.records.get(key) },
      })),
    };

    // Refuse anything asOf() could not load back
    const checked = storedSnapshotSchema.safeParse(stored);
    if (!checked.success) {
      throw new ChangeEngineError({
        code: 'INVALID_SNAPSHOT',
        message: formatZodIssues(`Invalid snapshot '${snapshot.capturedAt}'`, checked.error),
      });
    }
    this.hydrate(checked.data, filePath);

    await this.ensureDir();

    const tmpPath = path.join(this.baseDir, `.${path.basename(filePath)}.${randomUUID()}.tmp`);
    try {
      await fs.writeFile(tmpPath, JSON.stringify(stored), 'utf-8');
      // link() refuses an existing target, so a second append for the same date cannot overwrite
      await fs.link(tmpPath, filePath);
    } catch (err) {
      if (isErrnoException(err) && err.code === 'EEXIST') {
        throw new DuplicateSnapshotError(snapshot.capturedAt, filePath);
      }
      throw wrapError(err, 'STORAGE_ERROR', `Failed to save snapshot '${snapshot.capturedAt}'`);
    } finally {
      await fs.rm(tmpPath, { force: true });
    }

    this.logger?.info('Snapshot appended', {
      capturedAt: snapshot.capturedAt,
      recordCount: keys.length,
    });

    return {
      capturedAt: snapshot.capturedAt,
      recordCount: keys.length,
      trackedFields: stored.schema.trackedFields,
      filePath,
    };
  }

  /**
   * Capture dates of all stored snapshots, oldest first
   */
  async list(): Promise<string[]> {
    const files = await readDirOrEmpty(this.baseDir);
    const dates: string[] = [];
    for (const file of files) {
      const match = FILE_PATTERN.exec(file);
      if (match?.[1] && isCaptureDate(match[1])) {
        dates.push(match[1]);
      }
    }
    return dates.sort();
  }

  /**
   * Check if a snapshot exists for a capture date
   */
  async has(capturedAt: string): Promise<boolean> {
    const dates = await this.list();
    return dates.includes(capturedAt);
  }

  /**
   * Every pair of consecutive capture dates, oldest first
   */
  async consecutiveDates(): Promise<ConsecutiveDates[]> {
    const dates = await this.list();
    const pairs: ConsecutiveDates[] = [];
    for (let i = 1; i < dates.length; i++) {
      const previous = dates[i - 1];
      const current = dates[i];
      if (previous && current) pairs.push({ previous, current });
    }
    return pairs;
  }

  /**
   * The two most recent snapshots, in chronological order.
   *
   * @throws InsufficientHistoryError when fewer than two snapshots exist
   */
  async latestPair(): Promise<SnapshotPair> {
    const dates = await this.list();
    const previousDate = dates[dates.length - 2];
    const currentDate = dates[dates.length - 1];

    if (!previousDate || !currentDate) {
      throw new InsufficientHistoryError(dates.length);
    }

    const [previous, current] = await Promise.all([
      this.asOf(previousDate),
      this.asOf(currentDate),
    ]);
    return { previous, current };
  }

  /**
   * Load the snapshot captured on exactly this date.
   *
   * @throws SnapshotNotFoundError
   */
  async asOf(capturedAt: string): Promise<Snapshot> {
    if (!isCaptureDate(capturedAt)) {
      throw new SnapshotNotFoundError(capturedAt);
    }

    const filePath = this.getFilePath(capturedAt);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        throw new SnapshotNotFoundError(capturedAt, err);
      }
      throw wrapError(err, 'STORAGE_ERROR', `Failed to read snapshot '${capturedAt}'`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      throw wrapError(err, 'INVALID_SNAPSHOT', `Failed to parse snapshot '${capturedAt}'`);
    }

    const result = storedSnapshotSchema.safeParse(parsed);
    if (!result.success) {
      throw new ChangeEngineError({
        code: 'INVALID_SNAPSHOT',
        message: formatZodIssues(`Invalid snapshot file '${filePath}'`, result.error),
      });
    }

    return this.hydrate(result.data, filePath);
  }

  private hydrate(stored: StoredSnapshot, filePath: string): Snapshot {
    const schema = resolveSchema(stored.schema);
    const records = new Map<EntityKey, AttributeRecord>();

    for (const { key, attributes } of stored.records) {
      if (records.has(key)) {
        throw new ChangeEngineError({
          code: 'DUPLICATE_KEY',
          message: `Entity key '${key}' appears more than once in '${filePath}'`,
          context: { key, filePath },
        });
      }
      const absent = schema.fields.filter((field) => !(field in attributes));
      if (absent.length > 0) {
        throw new ChangeEngineError({
          code: 'INVALID_SNAPSHOT',
          message: `Record '${key}' in '${filePath}' lacks fields: ${absent.join(', ')}`,
          context: { key, absent },
        });
      }
      records.set(key, Object.freeze(attributes));
    }

    return Object.freeze({ capturedAt: stored.capturedAt, schema, records });
  }
}
