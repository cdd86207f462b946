/**
 * Supervisor Error - Base error class for testrunner
 */

import { ErrorCode, ErrorCategory, getErrorCategory, getErrorMessage, getExitCodeForError } from './error-codes';

/**
 * Base error class for fatal supervisor conditions.
 * Child outcomes (non-zero exit, signal, timeout) are never errors.
 */
export class SupervisorError extends Error {
  public readonly code: ErrorCode;
  public readonly category: ErrorCategory;
  public readonly context?: string;

  constructor(code: ErrorCode, context?: string) {
    const baseMessage = getErrorMessage(code);
    super(context ? `${baseMessage}: ${context}` : baseMessage);
    this.name = 'SupervisorError';
    this.code = code;
    this.category = getErrorCategory(code);
    this.context = context;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Exit status the supervisor terminates with for this error
   */
  get exitCode(): number {
    return getExitCodeForError(this.code);
  }
}

/**
 * Malformed or insufficient command line input
 */
export class ArgumentError extends SupervisorError {
  constructor(code: ErrorCode, context?: string) {
    super(code, context);
    this.name = 'ArgumentError';
  }
}

/**
 * Invalid configuration detected before launch (environment, --chdir target)
 */
export class ConfigurationError extends SupervisorError {
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, context?: string, details?: Record<string, unknown>) {
    super(code, context);
    this.name = 'ConfigurationError';
    this.details = details;
  }
}

/**
 * The child could not be started; carries the OS error text
 */
export class SpawnError extends SupervisorError {
  public readonly syscallCode?: string;

  constructor(code: ErrorCode, context: string, syscallCode?: string) {
    super(code, context);
    this.name = 'SpawnError';
    this.syscallCode = syscallCode;
  }
}
