/**
 * @regwatch/cli
 *
 * Config loading and run orchestration behind the regwatch command.
 */

export {
  ConfigError,
  DEFAULT_TRACKED_FIELDS,
  configFileSchema,
  expandEnvVars,
  formatZodError,
  loadConfig,
  parseConfig,
} from './config.js';
export type { ConfigFile, EnvExpansionOptions } from './config.js';
export {
  backfill,
  createContext,
  createQueryInterpreter,
  importSnapshot,
  runPipeline,
} from './pipeline.js';
export type { BackfillResult, PipelineContext, RunResult } from './pipeline.js';
export { USAGE, UsageError, parseCliArgs } from './args.js';
export type { CliArgs, CliCommand } from './args.js';
