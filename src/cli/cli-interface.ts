/**
 * CLI Interface for testrunner
 *
 * Wires argv and environment into one Supervisor run and returns the exit
 * status. Does not touch process.exitCode itself; see ./index.ts.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Invocation, splitArguments, withConfigDefaults } from './argument-splitter';
import {
  SupervisorConfig,
  loadSupervisorConfig,
  ENV_TIMEOUT,
  ENV_VERBOSE,
  ENV_WARNING_MARGIN,
} from '../config/supervisor-config';
import { EXIT_USAGE } from '../errors/error-codes';
import { SupervisorError } from '../errors/supervisor-error';
import { LogSink, StderrSink } from '../logging/log-sink';
import { Supervisor, SupervisorDependencies } from '../supervisor/supervisor';

/**
 * Help text
 */
export const HELP_TEXT = `Usage: testrunner [options] [--] <command> [args...]

Runs <command> once, passing its arguments through untouched, and exits with
the child's exit status.

Options:
  --verbose              Log begin/end markers for the child to stderr
  --label=<text>         Name used in markers (default: command basename)
  --label <text>
  --timeout <seconds>    Kill the child after this many seconds
  --chdir <path>, -C <path>
                         Change to <path> before starting the child
  --help, -h             Show this help message
  --version              Show version

Everything after "--" (or from the first non-option argument on) belongs to
the child, including arguments that look like options.

Exit status:
  <n>                    The child exited with status <n>
  124                    The child was killed after --timeout expired
  128+<n>                The child died from signal <n>
  2                      Usage error or --help
  3                      Invalid configuration (--chdir target, environment)
  126, 127               The command could not be started / was not found

Environment:
  ${ENV_TIMEOUT}       Default --timeout in seconds
  ${ENV_VERBOSE}       1 to enable --verbose by default
  ${ENV_WARNING_MARGIN} Fraction of the timeout that triggers the
                         "dangerously close" warning (default 0.2)
`;

/**
 * Version - read from package.json
 */
export function getVersion(): string {
  const packageJsonPath = path.join(__dirname, '..', '..', 'package.json');
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (err) {
    return `unknown (${err instanceof Error ? err.message : String(err)})`;
  }
  return 'unknown';
}

export interface CliIO {
  /** Usage and version text */
  stdout: (text: string) => void;
  sink: LogSink;
  env: Record<string, string | undefined>;
}

const DEFAULT_IO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  sink: new StderrSink(),
  env: process.env,
};

/**
 * Run the supervisor for one argv
 * @returns exit status for the supervisor process
 */
export async function runCli(
  args: readonly string[],
  io: Partial<CliIO> = {},
  deps: Omit<SupervisorDependencies, 'config' | 'sink'> = {}
): Promise<number> {
  const { stdout, sink, env } = { ...DEFAULT_IO, ...io };

  let invocation: Invocation;
  let config: Readonly<SupervisorConfig>;
  try {
    const split = splitArguments(args);
    if (split.kind === 'help') {
      stdout(HELP_TEXT);
      return EXIT_USAGE;
    }
    if (split.kind === 'version') {
      stdout(`testrunner ${getVersion()}\n`);
      return 0;
    }
    config = loadSupervisorConfig(env);
    invocation = withConfigDefaults(split.invocation, config);
  } catch (err) {
    if (err instanceof SupervisorError) {
      return new Supervisor({ ...deps, sink }).fail(err).exitCode;
    }
    throw err;
  }

  const supervisor = new Supervisor({ ...deps, config, sink });
  const result = await supervisor.run(invocation);
  return result.exitCode;
}
