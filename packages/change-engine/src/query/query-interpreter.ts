/**
 * Query Interpreter
 *
 * Answers query commands from the persisted change history and the
 * snapshot store, through their read-only interfaces.
 */

import type {
  AttributeRecord,
  ChangeLogReader,
  ChangeRecord,
  Snapshot,
  SnapshotReader,
} from '@regwatch/core';
import { affectedStates } from '../diff/change-summary.js';
import { formatEntity, formatValue } from '../formatters/utils.js';
import { parseQuery, type QueryCommand, type QueryVocabulary } from './commands.js';

export type QueryResult =
  | { kind: 'changes'; command: QueryCommand; changes: ChangeRecord[]; text: string }
  | {
      kind: 'entity';
      command: QueryCommand;
      key: string;
      record: AttributeRecord | null;
      history: ChangeRecord[];
      text: string;
    }
  | { kind: 'count'; command: QueryCommand; count: number; text: string }
  | { kind: 'overview'; command: QueryCommand; text: string };

export interface QueryInterpreterOptions {
  /** Records listed per answer (default: 10) */
  limit?: number;
}

function sameText(a: unknown, b: string): boolean {
  return typeof a === 'string' && a.toLowerCase() === b.toLowerCase();
}

export class QueryInterpreter {
  private readonly limit: number;

  constructor(
    private readonly changeLog: ChangeLogReader,
    private readonly snapshots: SnapshotReader,
    options: QueryInterpreterOptions = {}
  ) {
    this.limit = options.limit ?? 10;
  }

  /**
   * Parse and execute a free-text question
   */
  async ask(text: string): Promise<QueryResult> {
    const [latest, history] = await Promise.all([
      this.latestSnapshot(),
      this.changeLog.readHistory(),
    ]);
    return this.execute(parseQuery(text, this.vocabulary(latest, history)));
  }

  async execute(command: QueryCommand): Promise<QueryResult> {
    switch (command.kind) {
      case 'new_incorporations':
      case 'deregistrations': {
        const kind = command.kind === 'new_incorporations' ? 'NEW' : 'REMOVED';
        const label = command.kind === 'new_incorporations' ? 'new incorporations' : 'deregistrations';
        const history = await this.changeLog.readHistory();
        const { state } = command;
        const changes = history.filter(
          (c) => c.kind === kind && (state === undefined || sameText(c.context.state, state))
        );
        const where = state ? ` in ${state}` : '';
        const text =
          changes.length === 0
            ? `No ${label} found${where}.`
            : this.renderList(`Found ${changes.length} ${label}${where}.`, changes, (c) =>
                `${formatEntity(c.key, c.context.name)} on ${c.detectedOn}`
              );
        return { kind: 'changes', command, changes, text };
      }

      case 'field_updates': {
        const history = await this.changeLog.readHistory();
        const { field } = command;
        const changes = history.filter(
          (c) => c.kind === 'FIELD_UPDATE' && (field === undefined || c.field === field)
        );
        const what = field ? `${field} updates` : 'field updates';
        const text =
          changes.length === 0
            ? `No ${what} found.`
            : this.renderList(`Found ${changes.length} ${what}.`, changes, (c) =>
                `${formatEntity(c.key, c.context.name)}: ${c.field ?? ''} ${formatValue(c.oldValue)} -> ${formatValue(c.newValue)} (${c.detectedOn})`
              );
        return { kind: 'changes', command, changes, text };
      }

      case 'entity': {
        const [history, latest] = await Promise.all([
          this.changeLog.readHistory(),
          this.latestSnapshot(),
        ]);
        const own = history.filter((c) => c.key === command.key);
        const record = latest?.records.get(command.key) ?? null;

        const lines = [
          record
            ? `${command.key} is present in the ${latest?.capturedAt ?? ''} snapshot.`
            : `${command.key} is not present in the latest snapshot.`,
        ];
        if (own.length === 0) {
          lines.push('No recorded changes.');
        } else {
          lines.push(`${own.length} recorded changes:`);
          for (const c of own) {
            lines.push(
              c.kind === 'FIELD_UPDATE'
                ? `- ${c.detectedOn} ${c.field}: ${formatValue(c.oldValue)} -> ${formatValue(c.newValue)}`
                : `- ${c.detectedOn} ${c.kind === 'NEW' ? 'incorporated' : 'deregistered'}`
            );
          }
        }
        return { kind: 'entity', command, key: command.key, record, history: own, text: lines.join('\n') };
      }

      case 'count': {
        if (command.target === 'entities') {
          const latest = await this.latestSnapshot();
          const count = latest?.records.size ?? 0;
          return {
            kind: 'count',
            command,
            count,
            text: `Total companies in the latest snapshot: ${count}`,
          };
        }
        const history = await this.changeLog.readHistory();
        return {
          kind: 'count',
          command,
          count: history.length,
          text: `Total changes recorded: ${history.length}`,
        };
      }

      case 'overview':
        return { kind: 'overview', command, text: await this.renderOverview() };
    }
  }

  private async renderOverview(): Promise<string> {
    const [runs, history, latest] = await Promise.all([
      this.changeLog.listRuns(),
      this.changeLog.readHistory(),
      this.latestSnapshot(),
    ]);

    const lines = ['Registry overview:'];
    lines.push(
      latest
        ? `- Latest snapshot: ${latest.capturedAt} (${latest.records.size} companies)`
        : '- No snapshots stored'
    );
    lines.push(`- Runs written: ${runs.length}`);
    lines.push(`- Changes recorded: ${history.length}`);

    const states = affectedStates(history);
    if (states.length > 0) {
      lines.push(`- States with changes: ${states.length}`);
    }

    lines.push('');
    lines.push('You can ask:');
    lines.push("- 'Show new incorporations in <state>'");
    lines.push("- 'How many companies were struck off?'");
    lines.push("- 'Which companies changed AUTHORIZED_CAPITAL?'");
    lines.push("- 'What happened to CIN <key>?'");
    return lines.join('\n');
  }

  private renderList(
    heading: string,
    changes: ChangeRecord[],
    describe: (change: ChangeRecord) => string
  ): string {
    const lines = [heading];
    for (const change of changes.slice(0, this.limit)) {
      lines.push(`- ${describe(change)}`);
    }
    if (changes.length > this.limit) {
      lines.push(`... and ${changes.length - this.limit} more`);
    }
    return lines.join('\n');
  }

  private async latestSnapshot(): Promise<Snapshot | undefined> {
    const dates = await this.snapshots.list();
    const last = dates[dates.length - 1];
    return last ? this.snapshots.asOf(last) : undefined;
  }

  private vocabulary(latest: Snapshot | undefined, history: ChangeRecord[]): QueryVocabulary {
    const states = new Set<string>(affectedStates(history));

    const stateField = latest?.schema.contextFields.state;
    if (latest && stateField) {
      for (const record of latest.records.values()) {
        const value = record[stateField];
        if (typeof value === 'string') states.add(value);
      }
    }

    return {
      // Longest first, so "West Bengal" wins over "Bengal"
      states: Array.from(states).sort((a, b) => b.length - a.length),
      fields: latest?.schema.trackedFields ?? [],
    };
  }
}
