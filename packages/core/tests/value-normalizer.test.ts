import { describe, expect, it } from 'vitest';
import { ValueNormalizer } from '../src/index.js';

const normalizer = new ValueNormalizer({
  fields: {
    COMPANY_STATUS: 'enum',
    AUTHORIZED_CAPITAL: 'numeric',
  },
  nullTokens: ['NA', '-'],
});

describe('ValueNormalizer', () => {
  it('collapses whitespace in text fields', () => {
    expect(normalizer.normalize('COMPANY_NAME', '  Acme   Widgets\tPvt Ltd ')).toBe('Acme Widgets Pvt Ltd');
  });

  it('treats empty cells and null tokens as missing', () => {
    expect(normalizer.normalize('COMPANY_NAME', '')).toBeNull();
    expect(normalizer.normalize('COMPANY_NAME', '   ')).toBeNull();
    expect(normalizer.normalize('COMPANY_NAME', 'na')).toBeNull();
    expect(normalizer.normalize('AUTHORIZED_CAPITAL', ' - ')).toBeNull();
    expect(normalizer.normalize('COMPANY_NAME', undefined)).toBeNull();
    expect(normalizer.normalize('COMPANY_NAME', null)).toBeNull();
  });

  it('uppercases enum fields', () => {
    expect(normalizer.normalize('COMPANY_STATUS', ' struck  off ')).toBe('STRUCK OFF');
  });

  it('parses grouped and prefixed capital amounts', () => {
    expect(normalizer.normalize('AUTHORIZED_CAPITAL', '1,00,000')).toBe(100000);
    expect(normalizer.normalize('AUTHORIZED_CAPITAL', '100,000')).toBe(100000);
    expect(normalizer.normalize('AUTHORIZED_CAPITAL', '₹ 1,00,000')).toBe(100000);
    expect(normalizer.normalize('AUTHORIZED_CAPITAL', 'Rs. 2500.50')).toBe(2500.5);
    expect(normalizer.normalize('AUTHORIZED_CAPITAL', 'INR 500')).toBe(500);
    expect(normalizer.normalize('AUTHORIZED_CAPITAL', 100000)).toBe(100000);
  });

  it('keeps unparseable numeric cells as text', () => {
    expect(normalizer.normalize('AUTHORIZED_CAPITAL', 'ten lakh')).toBe('ten lakh');
  });

  it('stringifies numbers in text fields', () => {
    expect(normalizer.normalize('COMPANY_NAME', 42)).toBe('42');
    expect(normalizer.normalize('COMPANY_NAME', Number.NaN)).toBeNull();
  });

  it('is idempotent', () => {
    const samples: Array<[string, unknown]> = [
      ['COMPANY_NAME', '  Acme   Widgets '],
      ['COMPANY_STATUS', 'active'],
      ['AUTHORIZED_CAPITAL', '₹1,00,000'],
      ['AUTHORIZED_CAPITAL', 'ten lakh'],
      ['COMPANY_NAME', 'NA'],
    ];
    for (const [field, value] of samples) {
      const once = normalizer.normalize(field, value);
      expect(normalizer.normalize(field, once)).toBe(once);
    }
  });

  it('compares values after normalization', () => {
    expect(normalizer.equals('AUTHORIZED_CAPITAL', '1,00,000', 100000)).toBe(true);
    expect(normalizer.equals('COMPANY_STATUS', 'Active', 'ACTIVE ')).toBe(true);
    expect(normalizer.equals('COMPANY_NAME', 'Acme', 'acme')).toBe(false);
  });

  it('falls back to the default kind', () => {
    const enums = new ValueNormalizer({ defaultKind: 'enum' });
    expect(enums.kindOf('ANYTHING')).toBe('enum');
    expect(enums.normalize('ANYTHING', 'mixed Case')).toBe('MIXED CASE');
  });
});
