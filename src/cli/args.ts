import { isRunRole, HarnessConfig } from '../config/HarnessConfig';
import { isLogLevel } from '../common/logger';

export const HELP_TEXT = [
  'tick-consistency: measure per-tick delivery of sequenced unreliable updates',
  '',
  'Usage: tick-consistency [options]',
  '',
  'Options:',
  '  -t, --run-type <server|client>  role to run (default: server)',
  '  -i, --ip <host:port>            address to listen on or connect to (default: 127.0.0.1:25570)',
  '  -d, --duration <seconds>        test duration (default: 10)',
  '  -c, --config <path>             YAML configuration file',
  '      --tick-rate <hz>            scheduler iterations per second (default: 64)',
  '      --send-rate <hz>            client updates per second (default: 64)',
  '      --log-level <level>         debug, info, warn or error (default: info)',
  '  -h, --help                      show this help'
].join('\n');

/**
 * Raised for malformed command lines
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliArgs {
  overrides: Partial<HarnessConfig>;
  configPath?: string;
  help: boolean;
}

type ArgSpec = {
  flags: string[];
  apply: (args: CliArgs, value: string) => void;
};

const parseNumber = (flag: string, value: string): number => {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new UsageError(`${flag} expects a number, got "${value}"`);
  }
  return parsed;
};

const ARG_SPECS: ArgSpec[] = [
  {
    flags: ['-t', '--run-type'],
    apply: (args, value) => {
      if (!isRunRole(value)) {
        throw new UsageError(`--run-type must be "server" or "client", got "${value}"`);
      }
      args.overrides.role = value;
    }
  },
  {
    flags: ['-i', '--ip'],
    apply: (args, value) => {
      args.overrides.address = value;
    }
  },
  {
    flags: ['-d', '--duration'],
    apply: (args, value) => {
      args.overrides.durationSeconds = parseNumber('--duration', value);
    }
  },
  {
    flags: ['-c', '--config'],
    apply: (args, value) => {
      args.configPath = value;
    }
  },
  {
    flags: ['--tick-rate'],
    apply: (args, value) => {
      args.overrides.tickRate = parseNumber('--tick-rate', value);
    }
  },
  {
    flags: ['--send-rate'],
    apply: (args, value) => {
      args.overrides.sendRate = parseNumber('--send-rate', value);
    }
  },
  {
    flags: ['--log-level'],
    apply: (args, value) => {
      if (!isLogLevel(value)) {
        throw new UsageError(`--log-level must be one of debug, info, warn, error, got "${value}"`);
      }
      args.overrides.logLevel = value;
    }
  }
];

function findSpec(flag: string): ArgSpec | undefined {
  return ARG_SPECS.find(spec => spec.flags.includes(flag));
}

/**
 * Parse `process.argv.slice(2)`. Flags take their value either as the next
 * argument or after `=`.
 */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { overrides: {}, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '-h' || arg === '--help') {
      args.help = true;
      continue;
    }

    const equals = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = equals === -1 ? arg : arg.slice(0, equals);
    const spec = findSpec(flag);
    if (!spec) {
      throw new UsageError(`Unknown option: ${arg}`);
    }

    let value: string | undefined;
    if (equals !== -1) {
      value = arg.slice(equals + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined) {
      throw new UsageError(`${flag} requires a value`);
    }

    spec.apply(args, value);
  }

  return args;
}
