/**
 * Argument Splitter
 *
 * Separates supervisor options from the child command line.
 * Option parsing stops permanently at the first bare `--` or at the first
 * operand; from there on every token belongs to the child, untouched.
 */

import { ErrorCode } from '../errors/error-codes';
import { ArgumentError } from '../errors/supervisor-error';
import { SupervisorConfig } from '../config/supervisor-config';

/**
 * Supervisor-only options
 */
export interface SupervisorOptions {
  verbose: boolean;
  label?: string;
  timeoutSeconds?: number;
  chdir?: string;
}

/**
 * One supervised run: options plus the child's argv
 */
export interface Invocation {
  readonly options: Readonly<SupervisorOptions>;
  readonly command: readonly string[];
}

export type SplitResult =
  | { kind: 'run'; invocation: Invocation }
  | { kind: 'help' }
  | { kind: 'version' };

export const SEPARATOR = '--';

type ValueOption = 'label' | 'timeout' | 'chdir';

const VALUE_OPTIONS: Record<string, ValueOption> = {
  '--label': 'label',
  '--timeout': 'timeout',
  '--chdir': 'chdir',
  '-C': 'chdir',
};

/**
 * Parse a --timeout value in seconds (fractions allowed, must be > 0)
 */
export function parseTimeoutSeconds(raw: string): number {
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (trimmed === '' || !Number.isFinite(value) || value <= 0) {
    throw new ArgumentError(ErrorCode.E103_INVALID_TIMEOUT, `'${raw}' (expected a positive number of seconds)`);
  }
  return value;
}

function applyValue(options: SupervisorOptions, name: ValueOption, value: string): void {
  switch (name) {
    case 'label':
      options.label = value;
      break;
    case 'timeout':
      options.timeoutSeconds = parseTimeoutSeconds(value);
      break;
    case 'chdir':
      options.chdir = value;
      break;
  }
}

function freezeInvocation(options: SupervisorOptions, command: string[]): Invocation {
  if (command.length === 0) {
    throw new ArgumentError(ErrorCode.E101_NOT_ENOUGH_ARGUMENTS);
  }
  return Object.freeze({
    options: Object.freeze({ ...options }),
    command: Object.freeze([...command]),
  });
}

/**
 * Split raw arguments into supervisor options and the child command
 * @throws ArgumentError on malformed or insufficient input
 */
export function splitArguments(args: readonly string[]): SplitResult {
  const options: SupervisorOptions = { verbose: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === SEPARATOR) {
      return { kind: 'run', invocation: freezeInvocation(options, args.slice(i + 1)) };
    }

    // Operand: the child command starts here
    if (!arg.startsWith('-') || arg === '-') {
      return { kind: 'run', invocation: freezeInvocation(options, args.slice(i)) };
    }

    if (arg === '--help' || arg === '-h') {
      return { kind: 'help' };
    }
    if (arg === '--version') {
      return { kind: 'version' };
    }
    if (arg === '--verbose') {
      options.verbose = true;
      continue;
    }

    // --name=value
    const eq = arg.indexOf('=');
    if (arg.startsWith('--') && eq > 0) {
      const name = VALUE_OPTIONS[arg.slice(0, eq)];
      if (name) {
        applyValue(options, name, arg.slice(eq + 1));
        continue;
      }
    }

    // --name value / -C value
    const name = VALUE_OPTIONS[arg];
    if (name) {
      if (i + 1 >= args.length) {
        throw new ArgumentError(ErrorCode.E102_MISSING_OPTION_VALUE, arg);
      }
      applyValue(options, name, args[++i]);
      continue;
    }

    throw new ArgumentError(ErrorCode.E104_UNKNOWN_OPTION, arg);
  }

  return { kind: 'run', invocation: freezeInvocation(options, []) };
}

/**
 * Fill options the command line left open from the loaded configuration
 */
export function withConfigDefaults(invocation: Invocation, config: Readonly<SupervisorConfig>): Invocation {
  const { options } = invocation;
  return Object.freeze({
    options: Object.freeze({
      ...options,
      verbose: options.verbose || config.verbose,
      timeoutSeconds: options.timeoutSeconds ?? config.defaultTimeoutSeconds,
    }),
    command: invocation.command,
  });
}
