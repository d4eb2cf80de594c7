import { describe, expect, it } from 'vitest';
import { DiffEngine, formatChangeSet } from '../src/index.js';
import { normalizer, row, schema, snapshot } from './helpers.js';

const engine = new DiffEngine({
  trackedFields: schema.trackedFields,
  contextFields: schema.contextFields,
  normalizer,
});

const day1 = snapshot('2024-01-01', [row('K1', 'Acme Widgets', 'Kerala', 'Active', 100)]);

describe('formatChangeSet', () => {
  it('renders the summary and each section', () => {
    const day2 = snapshot('2024-01-02', [
      row('K1', 'Acme Widgets', 'Kerala', 'Struck Off', 100),
      row('K2', 'Beta Traders', 'Goa', 'Active', 200),
    ]);

    expect(formatChangeSet(engine.diff(day1, day2))).toBe(
      [
        '## Change Summary for 2024-01-02',
        'Compared: 2024-01-01 -> 2024-01-02',
        '',
        '### Summary',
        '- New Incorporations: 1',
        '- Deregistrations: 0',
        '- Field Updates: 1',
        '- Total Changes: 2',
        '- Affected States: Goa, Kerala',
        '',
        '### Updates by Field',
        '- COMPANY_STATUS: 1',
        '',
        '### New Incorporations (1)',
        '- Beta Traders (K2)',
        '',
        '### Field Updates (1)',
        '- Acme Widgets (K1): COMPANY_STATUS ACTIVE -> STRUCK OFF',
      ].join('\n')
    );
  });

  it('says so when nothing changed', () => {
    const same = snapshot('2024-01-02', [row('K1', 'Acme Widgets', 'Kerala', 'Active', 100)]);

    expect(formatChangeSet(engine.diff(day1, same))).toBe(
      [
        '## Change Summary for 2024-01-02',
        'Compared: 2024-01-01 -> 2024-01-02',
        '',
        '### Summary',
        'No changes detected.',
      ].join('\n')
    );
  });

  it('limits records per section', () => {
    const day2 = snapshot('2024-01-02', [
      row('K1', 'Acme Widgets', 'Kerala', 'Active', 100),
      row('K2', 'Beta Traders', 'Goa', 'Active', 200),
      row('K3', 'Gamma Foods', 'Goa', 'Active', ''),
    ]);

    const text = formatChangeSet(engine.diff(day1, day2), { limit: 1 });
    expect(text.split('\n').slice(-3)).toEqual([
      '### New Incorporations (2)',
      '- Beta Traders (K2)',
      '... and 1 more',
    ]);
  });
});
