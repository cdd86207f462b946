/**
 * testrunner - library entry
 *
 * Supervises one child command: timeout, exit classification, lifecycle
 * markers and working directory.
 */

export { Supervisor } from './supervisor/supervisor';
export type { SupervisorDependencies } from './supervisor/supervisor';
export { SupervisorState, STATE_TRANSITIONS } from './supervisor/types';
export type { SupervisorContext, SupervisorResult } from './supervisor/types';
export { launchChild, toTerminationInfo } from './supervisor/child-launcher';
export type { ChildHandle, LaunchChild, LaunchOptions } from './supervisor/child-launcher';

export { splitArguments, withConfigDefaults, parseTimeoutSeconds } from './cli/argument-splitter';
export type { Invocation, SupervisorOptions, SplitResult } from './cli/argument-splitter';
export { runCli, HELP_TEXT } from './cli/cli-interface';
export type { CliIO } from './cli/cli-interface';

export {
  classifyTermination,
  describeOutcome,
  exitCodeFor,
  outcomeSuffix,
  timeoutMessage,
  EXIT_TIMEOUT,
  SIGNAL_EXIT_BASE,
} from './classifier/exit-classifier';
export { WINDOWS_FAULTS, lookupWindowsFault } from './classifier/windows-faults';

export * from './models/outcome';

export { TimeoutMonitor } from './timeout/timeout-monitor';

export { LifecycleLogger, sanitizeLabel, defaultLabel, effectiveLabel } from './logging/lifecycle-logger';
export { StderrSink, MemorySink } from './logging/log-sink';
export type { LogSink } from './logging/log-sink';

export { applyWorkingDirectory, resolveWorkingDirectory } from './workdir/working-directory';

export { loadSupervisorConfig, DEFAULTS, WARNING_MARGIN_RATIO } from './config/supervisor-config';
export type { SupervisorConfig } from './config/supervisor-config';

export { ErrorCode, ErrorCategory, getErrorMessage, getExitCodeForError } from './errors/error-codes';
export { SupervisorError, ArgumentError, ConfigurationError, SpawnError } from './errors/supervisor-error';
