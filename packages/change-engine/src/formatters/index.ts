export { formatChangeSet } from './change-formatter.js';
export type { FormatOptions } from './change-formatter.js';
export { formatValue, formatEntity } from './utils.js';
