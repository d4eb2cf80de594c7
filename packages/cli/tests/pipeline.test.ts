import { afterEach, describe, expect, it } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DuplicateRunError, Logger } from '@regwatch/core';
import {
  backfill,
  createContext,
  createQueryInterpreter,
  importSnapshot,
  parseConfig,
  runPipeline,
  type PipelineContext,
} from '../src/index.js';

let tmpDir = '';

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

const HEADER = 'CIN,COMPANY_NAME,STATE,COMPANY_STATUS,AUTHORIZED_CAPITAL';

const EXTRACTS: Record<string, string[]> = {
  '2024-01-01': ['K1,Acme Widgets,Kerala,Active,"1,00,000"'],
  '2024-01-02': ['K1,Acme Widgets,Kerala,Struck Off,100000', 'K2,Beta Traders,Goa,Active,200'],
  '2024-01-03': ['K2,Beta Traders,Goa,Active,300'],
};

function setup(): { ctx: PipelineContext; logs: string[] } {
  tmpDir = mkdtempSync(join(tmpdir(), 'regwatch-pipeline-'));
  const config = parseConfig({
    snapshotDir: join(tmpDir, 'snapshots'),
    changeLogDir: join(tmpDir, 'change_logs'),
    schema: {
      keyField: 'CIN',
      fields: ['COMPANY_NAME', 'STATE', 'COMPANY_STATUS', 'AUTHORIZED_CAPITAL'],
      trackedFields: ['COMPANY_NAME', 'COMPANY_STATUS', 'AUTHORIZED_CAPITAL'],
      contextFields: { name: 'COMPANY_NAME', state: 'STATE', status: 'COMPANY_STATUS' },
    },
    normalization: { fields: { COMPANY_STATUS: 'enum', AUTHORIZED_CAPITAL: 'numeric' } },
  });
  const logs: string[] = [];
  const logger = new Logger({ format: 'json', level: 'debug', write: (line) => logs.push(line) });
  return { ctx: createContext(config, logger), logs };
}

async function importDay(ctx: PipelineContext, date: string): Promise<void> {
  const filePath = join(tmpDir, `extract_${date}.csv`);
  writeFileSync(filePath, [HEADER, ...(EXTRACTS[date] ?? [])].join('\n'));
  await importSnapshot(ctx, date, filePath);
}

describe('runPipeline', () => {
  it('waits until two snapshots exist', async () => {
    const { ctx } = setup();
    await importDay(ctx, '2024-01-01');

    const result = await runPipeline(ctx);

    expect(result.status).toBe('waiting');
    if (result.status === 'waiting') {
      expect(result.available).toBe(1);
      expect(result.message).toBe('Change detection needs at least two snapshots, found 1');
    }
    expect(await ctx.changeLog.listRuns()).toEqual([]);
  });

  it('compares the latest pair and records the run', async () => {
    const { ctx, logs } = setup();
    await importDay(ctx, '2024-01-01');
    await importDay(ctx, '2024-01-02');

    const result = await runPipeline(ctx);

    expect(result.status).toBe('completed');
    if (result.status !== 'completed') return;

    expect(result.detectionDate).toBe('2024-01-02');
    expect(result.previousCapturedAt).toBe('2024-01-01');
    expect(result.summary).toEqual({
      newCount: 1,
      removedCount: 0,
      fieldUpdateCount: 1,
      totalChanges: 2,
      fieldBreakdown: { COMPANY_STATUS: 1 },
    });
    expect(result.historyRecords).toBe(2);
    expect(existsSync(result.artifacts.csvPath)).toBe(true);
    expect(readFileSync(result.artifacts.csvPath, 'utf-8').split('\n')[1]).toBe(
      'K1,FIELD_UPDATE,COMPANY_STATUS,ACTIVE,STRUCK OFF,2024-01-02,Acme Widgets,Kerala,STRUCK OFF'
    );
    expect(result.report.split('\n')[0]).toBe('## Change Summary for 2024-01-02');

    const completed = logs
      .map((line): unknown => JSON.parse(line))
      .find((entry) => typeof entry === 'object' && entry !== null && 'msg' in entry && entry.msg === 'Run completed');
    expect(completed).toMatchObject({ runId: result.runId, detectionDate: '2024-01-02', historyRecords: 2 });
  });

  it('refuses to record the same run twice', async () => {
    const { ctx } = setup();
    await importDay(ctx, '2024-01-01');
    await importDay(ctx, '2024-01-02');
    await runPipeline(ctx);

    await expect(runPipeline(ctx)).rejects.toBeInstanceOf(DuplicateRunError);
    expect(await ctx.changeLog.readHistory()).toHaveLength(2);
  });
});

describe('backfill', () => {
  it('records every consecutive pair oldest first', async () => {
    const { ctx } = setup();
    for (const date of ['2024-01-01', '2024-01-02', '2024-01-03']) {
      await importDay(ctx, date);
    }

    const first = await backfill(ctx);
    expect(first.completed.map((run) => run.detectionDate)).toEqual(['2024-01-02', '2024-01-03']);
    expect(first.skipped).toEqual([]);

    const history = await ctx.changeLog.readHistory();
    expect(history.map((c) => `${c.detectedOn} ${c.key} ${c.kind}`)).toEqual([
      '2024-01-02 K1 FIELD_UPDATE',
      '2024-01-02 K2 NEW',
      '2024-01-03 K1 REMOVED',
      '2024-01-03 K2 FIELD_UPDATE',
    ]);

    const second = await backfill(ctx);
    expect(second.completed).toEqual([]);
    expect(second.skipped).toEqual(['2024-01-02', '2024-01-03']);
  });

  it('appends a written run that never reached the history', async () => {
    const { ctx } = setup();
    await importDay(ctx, '2024-01-01');
    await importDay(ctx, '2024-01-02');

    const pair = await ctx.store.latestPair();
    await ctx.changeLog.write(ctx.engine.diff(pair.previous, pair.current), '2024-01-02');

    const result = await backfill(ctx);

    expect(result.recovered).toEqual(['2024-01-02']);
    expect(result.completed).toEqual([]);
    expect(await ctx.changeLog.readHistory()).toHaveLength(2);
  });

  it('does not write a run older than the history', async () => {
    const { ctx } = setup();
    for (const date of ['2024-01-01', '2024-01-02', '2024-01-03']) {
      await importDay(ctx, date);
    }
    await runPipeline(ctx);

    await expect(backfill(ctx)).rejects.toMatchObject({ code: 'HISTORY_OUT_OF_ORDER' });
    expect(await ctx.changeLog.listRuns()).toEqual(['2024-01-03']);
  });
});

describe('query', () => {
  it('answers from the recorded history', async () => {
    const { ctx } = setup();
    for (const date of ['2024-01-01', '2024-01-02', '2024-01-03']) {
      await importDay(ctx, date);
    }
    await backfill(ctx);

    const answer = await createQueryInterpreter(ctx).ask('Show new incorporations in Goa');
    expect(answer.text).toBe('Found 1 new incorporations in Goa.\n- Beta Traders (K2) on 2024-01-02');
  });
});
