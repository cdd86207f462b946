/**
 * Child Launcher
 *
 * Spawns the child with its argv exactly as given and inherited standard
 * streams, and captures its TerminationInfo exactly once.
 */

import { spawn, ChildProcess } from 'child_process';
import * as os from 'os';
import { ErrorCode } from '../errors/error-codes';
import { SpawnError } from '../errors/supervisor-error';
import { TerminationInfo, TerminationPlatform, posixExit, posixSignal, windowsExit } from '../models/outcome';

/**
 * Single-owner handle to the running child
 */
export interface ChildHandle {
  readonly pid: number | undefined;
  /** Resolves once, when the OS reports the child gone */
  readonly exited: Promise<TerminationInfo>;
  /**
   * Request termination. Issues at most one signal over the handle's life.
   * @returns true if a signal was sent by this call
   */
  terminate(): boolean;
}

export interface LaunchOptions {
  /** Errors the child emits after a successful spawn (e.g. a failed kill) */
  onError?: (error: Error) => void;
  platform?: TerminationPlatform;
}

export type LaunchChild = (command: readonly string[], options?: LaunchOptions) => Promise<ChildHandle>;

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(os.constants.signals));

export function currentPlatform(): TerminationPlatform {
  return process.platform === 'win32' ? 'windows' : 'posix';
}

/**
 * Convert Node's exit event arguments to TerminationInfo
 */
export function toTerminationInfo(
  code: number | null,
  signal: NodeJS.Signals | null,
  platform: TerminationPlatform
): TerminationInfo {
  if (code !== null) {
    return platform === 'windows' ? windowsExit(code) : posixExit(code);
  }
  if (platform === 'posix' && signal !== null) {
    // Node does not expose the core-dump bit of the wait status
    return posixSignal(SIGNAL_NUMBERS.get(signal) ?? 0, signal, false);
  }
  // Killed on Windows, or no status at all
  return Object.freeze({ platform, exitCode: null, signal: null, signalName: null, coreDumped: false });
}

function wrapChild(child: ChildProcess, platform: TerminationPlatform): ChildHandle {
  let terminateRequested = false;
  let hasExited = false;

  const exited = new Promise<TerminationInfo>((resolve) => {
    child.once('exit', (code, signal) => {
      hasExited = true;
      resolve(toTerminationInfo(code, signal, platform));
    });
  });

  return {
    pid: child.pid,
    exited,
    terminate(): boolean {
      if (terminateRequested || hasExited) {
        return false;
      }
      terminateRequested = true;
      return child.kill('SIGTERM');
    },
  };
}

/**
 * Spawn the child. Resolves once the OS has started it.
 * @throws SpawnError carrying the OS error text (ENOENT, EACCES, ...)
 */
export const launchChild: LaunchChild = (command, options = {}) => {
  const platform = options.platform ?? currentPlatform();
  const [file, ...args] = command;

  return new Promise<ChildHandle>((resolve, reject) => {
    let child: ChildProcess;
    try {
      child = spawn(file, args, {
        stdio: 'inherit',
        shell: false,
        windowsHide: false,
      });
    } catch (err) {
      reject(toSpawnError(file, err));
      return;
    }

    const handle = wrapChild(child, platform);

    const onStartupError = (err: Error) => {
      reject(toSpawnError(file, err));
    };
    child.once('error', onStartupError);

    child.once('spawn', () => {
      child.removeListener('error', onStartupError);
      child.on('error', (err: Error) => {
        if (options.onError) {
          options.onError(err);
        } else {
          throw err;
        }
      });
      resolve(handle);
    });
  });
};

function toSpawnError(file: string, err: unknown): SpawnError {
  const message = err instanceof Error ? err.message : String(err);
  const syscallCode = errorCode(err);
  const code = syscallCode === 'ENOENT' ? ErrorCode.E301_COMMAND_NOT_FOUND : ErrorCode.E302_SPAWN_FAILURE;
  return new SpawnError(code, `${file}: ${message}`, syscallCode);
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
