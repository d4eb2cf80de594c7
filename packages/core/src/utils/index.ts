export { compareKeys, sortKeys, projectRecord, canonicalJson, isPlainObject } from './records.js';
export { isCaptureDate, toCaptureDate } from './dates.js';
