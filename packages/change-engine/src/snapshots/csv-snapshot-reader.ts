/**
 * CSV Snapshot Reader
 * Loads a normalized registry extract (one row per entity) into a Snapshot
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { RawRow, Snapshot, SnapshotSchema } from '@regwatch/core';
import {
  ChangeEngineError,
  SchemaMismatchError,
  ValueNormalizer,
  wrapError,
} from '@regwatch/core';
import { buildSnapshot } from './snapshot-builder.js';

export interface CsvSnapshotOptions {
  /** CSV delimiter (default: ',') */
  delimiter?: string;
  /** Quote character (default: '"') */
  quote?: string;
  /** Character encoding (default: utf-8) */
  encoding?: BufferEncoding;
}

const FORBIDDEN_RECORD_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

const csvRowsSchema = z.array(z.array(z.string()));

function parseRows(content: string | Buffer, options: CsvSnapshotOptions): string[][] {
  let parsed: unknown;
  try {
    parsed = parse(content, {
      columns: false, // Parse rows first so we can safely map headers ourselves
      bom: true,
      delimiter: options.delimiter ?? ',',
      quote: options.quote ?? '"',
      skip_empty_lines: true,
      trim: true,
      cast: false, // The value normalizer decides what a value means
    });
  } catch (err) {
    throw wrapError(err, 'INVALID_SNAPSHOT', 'Failed to parse snapshot CSV');
  }

  const result = csvRowsSchema.safeParse(parsed);
  if (!result.success) {
    throw new ChangeEngineError({
      code: 'INVALID_SNAPSHOT',
      message: 'Snapshot CSV did not parse into rows of text cells',
    });
  }
  return result.data;
}

/**
 * Parse CSV content into a snapshot.
 *
 * The header row must contain the key field and every schema field; extra
 * columns are ignored.
 */
export function parseSnapshotCsv(
  content: string | Buffer,
  capturedAt: string,
  schema: SnapshotSchema,
  normalizer: ValueNormalizer,
  options: CsvSnapshotOptions = {}
): Snapshot {
  const [headerRow, ...dataRows] = parseRows(content, options);
  const headers = headerRow ?? [];

  for (const header of headers) {
    if (FORBIDDEN_RECORD_KEYS.has(header)) {
      throw new ChangeEngineError({
        code: 'INVALID_SNAPSHOT',
        message: `Unsafe CSV header name: ${header}`,
        suggestion: 'Rename the column to a safe field name and try again.',
      });
    }
  }

  const present = new Set(headers);
  const missing = [schema.keyField, ...schema.fields].filter((f) => !present.has(f));
  if (missing.length > 0) {
    throw new SchemaMismatchError(
      `Snapshot CSV for ${capturedAt} is missing schema columns: ${missing.join(', ')}`,
      { capturedAt, missing }
    );
  }

  const rows = dataRows.map((row) => {
    const record: RawRow = Object.create(null);
    headers.forEach((header, i) => {
      record[header] = row[i];
    });
    return record;
  });

  return buildSnapshot({ capturedAt, schema, rows }, normalizer);
}

/**
 * Read a CSV file into a snapshot
 */
export async function readSnapshotCsv(
  filePath: string,
  capturedAt: string,
  schema: SnapshotSchema,
  normalizer: ValueNormalizer,
  options: CsvSnapshotOptions = {}
): Promise<Snapshot> {
  let content: string;
  try {
    content = await readFile(filePath, { encoding: options.encoding ?? 'utf-8' });
  } catch (err) {
    throw wrapError(err, 'STORAGE_ERROR', `Failed to read snapshot CSV '${filePath}'`);
  }
  return parseSnapshotCsv(content, capturedAt, schema, normalizer, options);
}
