/**
 * ValueNormalizer
 *
 * Canonical form of attribute values. The same instance is used when a
 * snapshot is built and when two snapshots are compared, so a value that
 * survived snapshot construction never produces a spurious difference.
 */

import type { FieldValue } from '../types/index.js';

export type NormalizationKind = 'text' | 'enum' | 'numeric';

export interface NormalizationRules {
  /** Kind applied to fields without an explicit rule (default: 'text') */
  defaultKind?: NormalizationKind;
  /** Per-field kinds */
  fields?: Readonly<Record<string, NormalizationKind>>;
  /** Cell contents treated as missing, compared case-insensitively (default: none) */
  nullTokens?: readonly string[];
}

const CURRENCY_PREFIX = /^(?:₹|rs\.?|inr)/i;

/** Digits with optional comma grouping (western or lakh/crore) and decimals */
const GROUPED_NUMBER = /^[+-]?\d[\d,]*(?:\.\d+)?$/;

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export class ValueNormalizer {
  private readonly defaultKind: NormalizationKind;
  private readonly fieldKinds: ReadonlyMap<string, NormalizationKind>;
  private readonly nullTokens: ReadonlySet<string>;

  constructor(rules: NormalizationRules = {}) {
    this.defaultKind = rules.defaultKind ?? 'text';
    this.fieldKinds = new Map(Object.entries(rules.fields ?? {}));
    this.nullTokens = new Set((rules.nullTokens ?? []).map((t) => t.trim().toLowerCase()));
  }

  kindOf(field: string): NormalizationKind {
    return this.fieldKinds.get(field) ?? this.defaultKind;
  }

  /**
   * Normalize a value for the given field.
   *
   * Idempotent: `normalize(f, normalize(f, v)) === normalize(f, v)`.
   */
  normalize(field: string, value: unknown): FieldValue {
    const kind = this.kindOf(field);

    if (value === null || value === undefined) return null;

    if (typeof value === 'number') {
      if (!Number.isFinite(value)) return null;
      return kind === 'numeric' ? value : this.normalizeText(kind, String(value));
    }

    const text = this.toText(value);
    if (kind === 'numeric') {
      return this.normalizeNumeric(text);
    }
    return this.normalizeText(kind, text);
  }

  /**
   * Compare two values after normalization
   */
  equals(field: string, a: unknown, b: unknown): boolean {
    return this.normalize(field, a) === this.normalize(field, b);
  }

  private toText(value: unknown): string {
    if (typeof value === 'string') return value;
    if (value instanceof Date) return value.toISOString().split('T')[0] ?? '';
    if (typeof value === 'object') return JSON.stringify(value);
    return String(value);
  }

  private normalizeText(kind: NormalizationKind, raw: string): FieldValue {
    const collapsed = collapseWhitespace(raw);
    if (collapsed === '' || this.nullTokens.has(collapsed.toLowerCase())) {
      return null;
    }
    return kind === 'enum' ? collapsed.toUpperCase() : collapsed;
  }

  private normalizeNumeric(raw: string): FieldValue {
    const text = this.normalizeText('text', raw);
    if (text === null || typeof text === 'number') return text;

    const compact = text.replace(/\s+/g, '').replace(CURRENCY_PREFIX, '');
    if (!GROUPED_NUMBER.test(compact)) {
      // Unparseable values are kept as text rather than guessed at
      return text;
    }

    const parsed = Number(compact.replace(/,/g, ''));
    return Number.isFinite(parsed) ? parsed : text;
  }
}
