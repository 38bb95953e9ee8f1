/**
 * Command line parsing
 */

export const COMMANDS = ['daemon', 'manual', 'test', 'status', 'check', 'cleanup', 'export'] as const;

export type Command = (typeof COMMANDS)[number];

export interface CliArgs {
  command?: Command;
  configPath?: string;
  envFile?: string;
  verbose: boolean;
  days?: number;
  out?: string;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `Usage: ipwatch <command> [options]

Commands:
  daemon    Run a check every day at SCHEDULE_TIME (default 09:00)
  manual    Run one check and always send a notification
  test      Run one check without notifying or recording, and test the webhook
  status    Show the IP history summary
  check     Print the effective configuration (webhook token masked)
  cleanup   Remove history events older than --days (default IP_HISTORY_KEEP_DAYS)
  export    Write the history to --out (default ip_history_export_<time>.json)

Options:
  --config <file>     JSON config file (values support \${VAR} and \${VAR:-default})
  --env-file <file>   dotenv file to load (default .env)
  --days <n>          Retention window for cleanup
  --out <file>        Destination for export
  --verbose           Log at debug level
  -h, --help          Show this help`;

function isCommand(value: string): value is Command {
  return (COMMANDS as readonly string[]).includes(value);
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { verbose: false, help: false };

  const valueOf = (flag: string, index: number): string => {
    const value = argv[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    switch (arg) {
      case '--config':
        args.configPath = valueOf(arg, i++);
        break;
      case '--env-file':
        args.envFile = valueOf(arg, i++);
        break;
      case '--out':
        args.out = valueOf(arg, i++);
        break;
      case '--days': {
        const raw = valueOf(arg, i++);
        const days = Number(raw);
        if (!Number.isInteger(days) || days < 0) {
          throw new UsageError(`--days must be a non-negative integer, got ${raw}`);
        }
        args.days = days;
        break;
      }
      case '--verbose':
      case '-v':
        args.verbose = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        if (args.command !== undefined) {
          throw new UsageError(`Unexpected argument: ${arg}`);
        }
        if (!isCommand(arg)) {
          throw new UsageError(`Unknown command: ${arg}`);
        }
        args.command = arg;
    }
  }

  return args;
}
