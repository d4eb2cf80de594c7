export { ValueNormalizer } from './value-normalizer.js';
export type { NormalizationKind, NormalizationRules } from './value-normalizer.js';
