export type CliCommand = 'import' | 'run' | 'backfill' | 'query';

const COMMANDS: readonly CliCommand[] = ['import', 'run', 'backfill', 'query'];

export type CliArgs =
  | { command: 'import'; config?: string; date: string; file: string }
  | { command: 'run'; config?: string }
  | { command: 'backfill'; config?: string }
  | { command: 'query'; config?: string; text: string }
  | { command: 'help' };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = [
  'Usage: regwatch <command> [--config <config.json>]',
  '',
  'Commands:',
  '  import --date <YYYY-MM-DD> --file <extract.csv>   Store a registry extract as a snapshot',
  '  run                                               Compare the two latest snapshots',
  '  backfill                                          Compare every pair without a change log',
  '  query <question...>                               Ask about recorded changes',
].join('\n');

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some((command) => command === value);
}

/**
 * Parse `process.argv.slice(2)`
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const [first, ...rest] = argv;
  if (first === undefined || first === '--help' || first === '-h' || first === 'help') {
    return { command: 'help' };
  }
  if (!isCommand(first)) {
    throw new UsageError(`Unknown command: ${first}`);
  }

  const flags = new Map<string, string>();
  const positionals: string[] = [];
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === undefined) continue;
    if (arg.startsWith('--')) {
      const value = rest[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new UsageError(`Missing value for ${arg}`);
      }
      flags.set(arg.slice(2), value);
      i++;
    } else {
      positionals.push(arg);
    }
  }

  const config = flags.get('config');
  const allowed = first === 'import' ? ['config', 'date', 'file'] : ['config'];
  for (const flag of flags.keys()) {
    if (!allowed.includes(flag)) {
      throw new UsageError(`Unknown option for ${first}: --${flag}`);
    }
  }

  switch (first) {
    case 'import': {
      const date = flags.get('date');
      const file = flags.get('file');
      if (!date || !file) {
        throw new UsageError('import requires --date <YYYY-MM-DD> and --file <extract.csv>');
      }
      return { command: 'import', config, date, file };
    }
    case 'query': {
      const text = positionals.join(' ').trim();
      if (!text) {
        throw new UsageError('query requires a question');
      }
      return { command: 'query', config, text };
    }
    case 'run':
    case 'backfill':
      if (positionals.length > 0) {
        throw new UsageError(`${first} takes no arguments`);
      }
      return first === 'run' ? { command: 'run', config } : { command: 'backfill', config };
  }
}
