export type Command = 'query' | 'load' | 'init-schema';

export interface CliOptions {
  command?: Command;
  queryPath?: string;
  outputPath: string;
  dataDirectory?: string;
  parallel: boolean;
  debug: boolean;
  help: boolean;
  version: boolean;
}

export class UsageError extends Error {
  override readonly name = 'UsageError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const DEFAULT_OUTPUT_PATH = 'output.txt';

const COMMANDS: readonly Command[] = ['query', 'load', 'init-schema'];

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

export const USAGE = `
Usage:
  region-query query --query <file.json> [--output <file.txt>] [--parallel]
  region-query load --data-directory <dir>
  region-query init-schema

Options:
  --query, -q <file>            Query description (JSON)
  --output, -o <file>           Result file, one "<x> <y>" line per point
                                Default: ${DEFAULT_OUTPUT_PATH}
  --data-directory, -d <dir>    Directory holding points.txt, categories.txt, groups.txt
  --parallel                    Evaluate sibling operands concurrently
                                Env: REGION_QUERY_PARALLEL=true
  --debug                       Enable debug logging to stderr
  --help, -h                    Show this help message
  --version, -v                 Show version number

Environment:
  DATABASE_URL                  PostgreSQL connection string (required)
  LOG_LEVEL                     fatal|error|warn|info|debug|trace|silent (default: info)
  PG_POOL_MAX                   Connection pool size (default: 4)
  PG_STATEMENT_TIMEOUT_MS       Per-statement timeout, 0 disables (default: 30000)
`.trim();

export function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = {
    outputPath: DEFAULT_OUTPUT_PATH,
    parallel: false,
    debug: false,
    help: false,
    version: false,
  };

  const value = (i: number, flag: string): string => {
    const v = args[i];
    if (v === undefined || v.startsWith('-')) {
      throw new UsageError(`${flag} needs a value`);
    }
    return v;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    switch (arg) {
      case '--query':
      case '-q':
        options.queryPath = value(++i, arg);
        break;

      case '--output':
      case '-o':
        options.outputPath = value(++i, arg);
        break;

      case '--data-directory':
      case '--data_directory':
      case '-d':
        options.dataDirectory = value(++i, arg);
        break;

      case '--parallel':
        options.parallel = true;
        break;

      case '--debug':
        options.debug = true;
        break;

      case '--help':
      case '-h':
        options.help = true;
        break;

      case '--version':
      case '-v':
        options.version = true;
        break;

      default:
        if (arg.startsWith('-')) {
          throw new UsageError(`unknown option ${arg}`);
        }
        if (options.command !== undefined) {
          throw new UsageError(`unexpected argument ${arg}`);
        }
        if (!isCommand(arg)) {
          throw new UsageError(`unknown command ${arg}`);
        }
        options.command = arg;
    }
  }

  if (options.help || options.version) return options;

  // Bare flags select the command, as in `region-query --query q.json --output out.txt`
  if (options.command === undefined) {
    if (options.queryPath !== undefined) options.command = 'query';
    else if (options.dataDirectory !== undefined) options.command = 'load';
    else throw new UsageError('missing command');
  }
  if (options.command === 'query' && options.queryPath === undefined) {
    throw new UsageError('query needs --query <file>');
  }
  if (options.command === 'load' && options.dataDirectory === undefined) {
    throw new UsageError('load needs --data-directory <dir>');
  }
  return options;
}
