import { describe, expect, it } from 'vitest';
import type {
  ChangeLogDocument,
  ChangeLogReader,
  ChangeRecord,
  Snapshot,
  SnapshotPair,
  SnapshotReader,
} from '@regwatch/core';
import { InsufficientHistoryError, SnapshotNotFoundError } from '@regwatch/core';
import { DiffEngine, QueryInterpreter, parseQuery, toChangeLogDocument } from '../src/index.js';
import { normalizer, row, schema, snapshot } from './helpers.js';

class InMemorySnapshots implements SnapshotReader {
  constructor(private readonly snapshots: Snapshot[]) {}

  async list(): Promise<string[]> {
    return this.snapshots.map((s) => s.capturedAt);
  }

  async asOf(capturedAt: string): Promise<Snapshot> {
    const found = this.snapshots.find((s) => s.capturedAt === capturedAt);
    if (!found) throw new SnapshotNotFoundError(capturedAt);
    return found;
  }

  async latestPair(): Promise<SnapshotPair> {
    const previous = this.snapshots[this.snapshots.length - 2];
    const current = this.snapshots[this.snapshots.length - 1];
    if (!previous || !current) throw new InsufficientHistoryError(this.snapshots.length);
    return { previous, current };
  }
}

class InMemoryChangeLog implements ChangeLogReader {
  constructor(private readonly runs: ChangeLogDocument[]) {}

  async listRuns(): Promise<string[]> {
    return this.runs.map((run) => run.detectionDate);
  }

  async readRun(detectionDate: string): Promise<ChangeLogDocument> {
    const run = this.runs.find((r) => r.detectionDate === detectionDate);
    if (!run) throw new Error(`No change log for ${detectionDate}`);
    return run;
  }

  async readHistory(): Promise<ChangeRecord[]> {
    return this.runs.flatMap((run) => run.changes);
  }
}

const engine = new DiffEngine({
  trackedFields: schema.trackedFields,
  contextFields: schema.contextFields,
  normalizer,
});

const day1 = snapshot('2024-01-01', [row('K1', 'Acme Widgets', 'Kerala', 'Active', 100)]);
const day2 = snapshot('2024-01-02', [
  row('K1', 'Acme Widgets', 'Kerala', 'Struck Off', 100),
  row('K2', 'Beta Traders', 'Goa', 'Active', 200),
]);
const day3 = snapshot('2024-01-03', [row('K2', 'Beta Traders', 'Goa', 'Active', 300)]);

function createInterpreter(limit?: number): QueryInterpreter {
  const changeLog = new InMemoryChangeLog([
    toChangeLogDocument(engine.diff(day1, day2)),
    toChangeLogDocument(engine.diff(day2, day3)),
  ]);
  return new QueryInterpreter(changeLog, new InMemorySnapshots([day1, day2, day3]), { limit });
}

describe('parseQuery', () => {
  const vocabulary = {
    states: ['West Bengal', 'Kerala', 'Goa'],
    fields: ['COMPANY_STATUS', 'AUTHORIZED_CAPITAL'],
  };

  it('recognises new incorporations with an optional state', () => {
    expect(parseQuery('Show new incorporations in Kerala', vocabulary)).toEqual({
      kind: 'new_incorporations',
      state: 'Kerala',
    });
    expect(parseQuery('Any companies incorporated lately?', vocabulary)).toEqual({
      kind: 'new_incorporations',
    });
  });

  it('recognises deregistrations', () => {
    expect(parseQuery('How many companies were struck off?', vocabulary)).toEqual({
      kind: 'deregistrations',
    });
    expect(parseQuery('deregistered in west bengal', vocabulary)).toEqual({
      kind: 'deregistrations',
      state: 'West Bengal',
    });
  });

  it('recognises field updates by field name', () => {
    expect(parseQuery('Which companies changed AUTHORIZED_CAPITAL?', vocabulary)).toEqual({
      kind: 'field_updates',
      field: 'AUTHORIZED_CAPITAL',
    });
    expect(parseQuery('who updated their authorized capital', vocabulary)).toEqual({
      kind: 'field_updates',
      field: 'AUTHORIZED_CAPITAL',
    });
    expect(parseQuery('recent modifications', vocabulary)).toEqual({ kind: 'field_updates' });
  });

  it('recognises entity lookups', () => {
    expect(parseQuery('What happened to CIN u12345ka2020ptc000001?', vocabulary)).toEqual({
      kind: 'entity',
      key: 'U12345KA2020PTC000001',
    });
    expect(parseQuery('company status report', vocabulary)).toEqual({ kind: 'overview' });
  });

  it('recognises counts', () => {
    expect(parseQuery('How many changes so far?', vocabulary)).toEqual({
      kind: 'count',
      target: 'changes',
    });
    expect(parseQuery('total companies', vocabulary)).toEqual({ kind: 'count', target: 'entities' });
  });

  it('falls back to an overview', () => {
    expect(parseQuery('hello', vocabulary)).toEqual({ kind: 'overview' });
  });
});

describe('QueryInterpreter', () => {
  it('lists new incorporations in a state', async () => {
    const interpreter = createInterpreter();

    const goa = await interpreter.execute({ kind: 'new_incorporations', state: 'goa' });
    expect(goa.text).toBe('Found 1 new incorporations in goa.\n- Beta Traders (K2) on 2024-01-02');

    const kerala = await interpreter.execute({ kind: 'new_incorporations', state: 'Kerala' });
    expect(kerala.text).toBe('No new incorporations found in Kerala.');
  });

  it('answers free-text questions', async () => {
    const result = await createInterpreter().ask('How many companies were struck off?');

    expect(result.command).toEqual({ kind: 'deregistrations' });
    expect(result.text).toBe('Found 1 deregistrations.\n- Acme Widgets (K1) on 2024-01-03');
  });

  it('uses states seen in the history as vocabulary', async () => {
    const result = await createInterpreter().ask('new incorporations in Kerala');
    expect(result.command).toEqual({ kind: 'new_incorporations', state: 'Kerala' });
  });

  it('lists updates of one field', async () => {
    const result = await createInterpreter().execute({
      kind: 'field_updates',
      field: 'AUTHORIZED_CAPITAL',
    });
    expect(result.text).toBe(
      'Found 1 AUTHORIZED_CAPITAL updates.\n- Beta Traders (K2): AUTHORIZED_CAPITAL 200 -> 300 (2024-01-03)'
    );
  });

  it('truncates long answers', async () => {
    const result = await createInterpreter(1).execute({ kind: 'field_updates' });
    expect(result.text).toBe(
      [
        'Found 2 field updates.',
        '- Acme Widgets (K1): COMPANY_STATUS ACTIVE -> STRUCK OFF (2024-01-02)',
        '... and 1 more',
      ].join('\n')
    );
  });

  it('shows the history of one entity', async () => {
    const result = await createInterpreter().execute({ kind: 'entity', key: 'K1' });

    expect(result.kind).toBe('entity');
    if (result.kind === 'entity') {
      expect(result.record).toBeNull();
      expect(result.history).toHaveLength(2);
    }
    expect(result.text).toBe(
      [
        'K1 is not present in the latest snapshot.',
        '2 recorded changes:',
        '- 2024-01-02 COMPANY_STATUS: ACTIVE -> STRUCK OFF',
        '- 2024-01-03 deregistered',
      ].join('\n')
    );
  });

  it('counts changes and entities', async () => {
    const interpreter = createInterpreter();

    const changes = await interpreter.execute({ kind: 'count', target: 'changes' });
    expect(changes.text).toBe('Total changes recorded: 4');

    const entities = await interpreter.execute({ kind: 'count', target: 'entities' });
    expect(entities.text).toBe('Total companies in the latest snapshot: 1');
  });

  it('summarises the registry in an overview', async () => {
    const result = await createInterpreter().execute({ kind: 'overview' });
    expect(result.text.split('\n').slice(0, 5)).toEqual([
      'Registry overview:',
      '- Latest snapshot: 2024-01-03 (1 companies)',
      '- Runs written: 2',
      '- Changes recorded: 4',
      '- States with changes: 2',
    ]);
  });
});
