export { parseQuery } from './commands.js';
export type { QueryCommand, QueryVocabulary } from './commands.js';
export { QueryInterpreter } from './query-interpreter.js';
export type { QueryResult, QueryInterpreterOptions } from './query-interpreter.js';
