/**
 * Command-line argument parsing for the drive-replicate CLI.
 */

export type CommandName = 'run' | 'auth' | 'help';

export interface CliOptions {
  command: CommandName;
  planPath?: string;
  account?: string;
}

export const USAGE = `
Drive folder replication

Usage:
  npm run replicate                      Copy every batch in the plan file
  npm run replicate -- --plan my.json    Use another plan file
  npm run auth                           Connect a Google account

Options:
  --plan, -p       Plan file path (default: REPLICATION_PLAN_PATH or ./drive-config.json)
  --account, -a    Credential key to use (default: GOOGLE_ACCOUNT or "default")
  --help, -h       Show this help message
`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (!value || value.startsWith('-')) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { command: 'run' };
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--plan' || arg === '-p') {
      options.planPath = takeValue(args, i, arg);
      i++;
    } else if (arg === '--account' || arg === '-a') {
      options.account = takeValue(args, i, arg);
      i++;
    } else if (arg === '--help' || arg === '-h') {
      options.command = 'help';
      return options;
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  if (positional.length > 1) {
    throw new UsageError(`Unexpected arguments: ${positional.slice(1).join(' ')}`);
  }

  const [command] = positional;
  if (command === 'run' || command === 'auth' || command === 'help') {
    options.command = command;
  } else if (command !== undefined) {
    throw new UsageError(`Unknown command: ${command}`);
  }

  return options;
}
