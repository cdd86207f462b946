/**
 * Working-Directory Controller
 *
 * Changes the supervisor's own working directory before launch so the child
 * inherits it. Validation happens first; a bad target never reaches spawn.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ErrorCode } from '../errors/error-codes';
import { ConfigurationError } from '../errors/supervisor-error';

export type ChangeDirectory = (directory: string) => void;

/**
 * Resolve and validate a --chdir target
 * @returns absolute path of the directory
 * @throws ConfigurationError if the path is missing or not a directory
 */
export function resolveWorkingDirectory(target: string, base: string = process.cwd()): string {
  const resolved = path.resolve(base, target);

  let stats: fs.Stats;
  try {
    stats = fs.statSync(resolved);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(ErrorCode.E201_DIRECTORY_NOT_FOUND, target, { resolved, reason });
  }

  if (!stats.isDirectory()) {
    throw new ConfigurationError(ErrorCode.E202_NOT_A_DIRECTORY, target, { resolved });
  }

  return resolved;
}

/**
 * Validate and enter the directory
 * @returns absolute path now in effect
 */
export function applyWorkingDirectory(
  target: string,
  chdir: ChangeDirectory = (directory) => process.chdir(directory)
): string {
  const resolved = resolveWorkingDirectory(target);
  chdir(resolved);
  return resolved;
}
