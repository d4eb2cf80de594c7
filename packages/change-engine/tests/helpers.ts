import type { RawRow, Snapshot, SnapshotSchema } from '@regwatch/core';
import { ValueNormalizer } from '@regwatch/core';
import { buildSnapshot } from '../src/index.js';

export const schema: SnapshotSchema = {
  keyField: 'CIN',
  fields: ['COMPANY_NAME', 'STATE', 'COMPANY_STATUS', 'AUTHORIZED_CAPITAL'],
  trackedFields: ['COMPANY_NAME', 'COMPANY_STATUS', 'AUTHORIZED_CAPITAL'],
  contextFields: { name: 'COMPANY_NAME', state: 'STATE', status: 'COMPANY_STATUS' },
};

export const normalizer = new ValueNormalizer({
  fields: { COMPANY_STATUS: 'enum', AUTHORIZED_CAPITAL: 'numeric' },
});

export function row(
  cin: string,
  name: string,
  state: string,
  status: string,
  capital: string | number
): RawRow {
  return {
    CIN: cin,
    COMPANY_NAME: name,
    STATE: state,
    COMPANY_STATUS: status,
    AUTHORIZED_CAPITAL: capital,
  };
}

export function snapshot(capturedAt: string, rows: RawRow[], override?: Partial<SnapshotSchema>): Snapshot {
  return buildSnapshot({ capturedAt, schema: { ...schema, ...override }, rows }, normalizer);
}
