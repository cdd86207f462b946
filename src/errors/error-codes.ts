/**
 * Error Codes for testrunner
 */

/**
 * Error Categories
 */
export enum ErrorCategory {
  ARGUMENT = 'ARGUMENT',
  CONFIGURATION = 'CONFIGURATION',
  LAUNCH = 'LAUNCH',
}

/**
 * Error Codes
 * E1xx: Argument Errors - malformed or insufficient command line, nothing spawned
 * E2xx: Configuration Errors - invalid environment or working directory, nothing spawned
 * E3xx: Launch Errors - the child could not be started
 */
export enum ErrorCode {
  // E1xx: Argument Errors
  E101_NOT_ENOUGH_ARGUMENTS = 'E101',
  E102_MISSING_OPTION_VALUE = 'E102',
  E103_INVALID_TIMEOUT = 'E103',
  E104_UNKNOWN_OPTION = 'E104',

  // E2xx: Configuration Errors
  E201_DIRECTORY_NOT_FOUND = 'E201',
  E202_NOT_A_DIRECTORY = 'E202',
  E203_INVALID_ENVIRONMENT_VALUE = 'E203',

  // E3xx: Launch Errors
  E301_COMMAND_NOT_FOUND = 'E301',
  E302_SPAWN_FAILURE = 'E302',
}

/**
 * Error messages for each error code
 */
const ERROR_MESSAGES: Record<string, string> = {
  // E1xx
  E101: 'not enough arguments',
  E102: 'option requires a value',
  E103: 'invalid timeout',
  E104: 'unknown option',

  // E2xx
  E201: 'working directory does not exist',
  E202: 'working directory is not a directory',
  E203: 'invalid environment value',

  // E3xx
  E301: 'command not found',
  E302: 'failed to start command',
};

/**
 * Supervisor exit codes for fatal conditions (no child outcome to mirror)
 */
export const EXIT_INTERNAL = 1;
export const EXIT_USAGE = 2;
export const EXIT_CONFIGURATION = 3;
export const EXIT_CANNOT_EXECUTE = 126;
export const EXIT_NOT_FOUND = 127;

/**
 * Get the error category for an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const codeStr = code.toString();
  if (codeStr.startsWith('E1')) {
    return ErrorCategory.ARGUMENT;
  }
  if (codeStr.startsWith('E2')) {
    return ErrorCategory.CONFIGURATION;
  }
  if (codeStr.startsWith('E3')) {
    return ErrorCategory.LAUNCH;
  }
  throw new Error(`Unknown error code: ${code}`);
}

/**
 * Get the error message for an error code
 */
export function getErrorMessage(code: ErrorCode): string {
  const codeStr = code.toString();
  return ERROR_MESSAGES[codeStr] || `Unknown error: ${code}`;
}

/**
 * Map an error code to the exit status the supervisor terminates with
 */
export function getExitCodeForError(code: ErrorCode): number {
  if (code === ErrorCode.E301_COMMAND_NOT_FOUND) {
    return EXIT_NOT_FOUND;
  }
  if (isArgumentError(code)) {
    return EXIT_USAGE;
  }
  if (isConfigurationError(code)) {
    return EXIT_CONFIGURATION;
  }
  if (isLaunchError(code)) {
    return EXIT_CANNOT_EXECUTE;
  }
  return EXIT_INTERNAL;
}

/**
 * Check if the error code is an argument error (E1xx)
 */
export function isArgumentError(code: ErrorCode): boolean {
  return getErrorCategory(code) === ErrorCategory.ARGUMENT;
}

/**
 * Check if the error code is a configuration error (E2xx)
 */
export function isConfigurationError(code: ErrorCode): boolean {
  return getErrorCategory(code) === ErrorCategory.CONFIGURATION;
}

/**
 * Check if the error code is a launch error (E3xx)
 */
export function isLaunchError(code: ErrorCode): boolean {
  return getErrorCategory(code) === ErrorCategory.LAUNCH;
}
