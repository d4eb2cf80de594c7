/**
 * @regwatch/core
 *
 * Data model, normalization, errors and shared utilities for registry
 * change detection
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Normalization
export * from './normalization/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';

// Logging
export * from './logging/index.js';
