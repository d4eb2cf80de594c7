export { Logger, createRunId, serializeLogValue } from './logger.js';
export type { LogLevel, LogFormat, LoggerOptions } from './logger.js';
