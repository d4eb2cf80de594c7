#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   regwatch import --date 2024-01-02 --file ./extract.csv --config ./regwatch.json
 *   regwatch run --config ./regwatch.json
 */

import { resolve } from 'node:path';
import { ChangeEngineError, Logger, isRecoverable } from '@regwatch/core';
import { USAGE, UsageError, parseCliArgs, type CliArgs } from './args.js';
import { ConfigError, loadConfig, parseConfig, type ConfigFile } from './config.js';
import {
  backfill,
  createContext,
  createQueryInterpreter,
  importSnapshot,
  runPipeline,
} from './pipeline.js';

function print(text: string): void {
  process.stdout.write(`${text}\n`);
}

async function resolveConfig(path: string | undefined): Promise<ConfigFile> {
  if (path) return loadConfig(path);
  const defaults = parseConfig({});
  return {
    ...defaults,
    snapshotDir: resolve(process.cwd(), defaults.snapshotDir),
    changeLogDir: resolve(process.cwd(), defaults.changeLogDir),
  };
}

async function execute(args: Exclude<CliArgs, { command: 'help' }>): Promise<number> {
  const config = await resolveConfig(args.config);
  const logger = new Logger({
    level: config.logging?.level,
    format: config.logging?.format,
  });
  const ctx = createContext(config, logger);

  switch (args.command) {
    case 'import': {
      const info = await importSnapshot(ctx, args.date, resolve(process.cwd(), args.file));
      print(`Stored snapshot ${info.capturedAt} (${info.recordCount} records)`);
      return 0;
    }

    case 'run': {
      const result = await runPipeline(ctx);
      if (result.status === 'waiting') {
        print(result.message);
        return 0;
      }
      print(result.report);
      print('');
      print(`Change log: ${result.artifacts.csvPath}`);
      return 0;
    }

    case 'backfill': {
      const result = await backfill(ctx);
      for (const run of result.completed) {
        print(`${run.detectionDate}: ${run.summary.totalChanges} changes -> ${run.artifacts.directory}`);
      }
      for (const date of result.recovered) {
        print(`${date}: appended existing change log to history`);
      }
      print(
        `Backfill complete: ${result.completed.length} written, ${result.recovered.length} recovered, ${result.skipped.length} up to date`
      );
      return 0;
    }

    case 'query': {
      const answer = await createQueryInterpreter(ctx).ask(args.text);
      print(answer.text);
      logger.debug('Query answered', { command: answer.command });
      return 0;
    }
  }
}

async function main(): Promise<number> {
  const logger = new Logger();

  let args: CliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(err.message);
      console.error('');
      console.error(USAGE);
      return 1;
    }
    throw err;
  }

  if (args.command === 'help') {
    print(USAGE);
    return 0;
  }

  try {
    return await execute(args);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      return 1;
    }
    if (error instanceof ChangeEngineError) {
      console.error(error.toActionableMessage());
      return isRecoverable(error) ? 0 : 1;
    }
    logger.error('Command failed', { error });
    return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
