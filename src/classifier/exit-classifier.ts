/**
 * Exit Classifier
 *
 * Maps raw TerminationInfo to an Outcome, and renders the supervisor-authored
 * messages and exit status for an Outcome. Only this module looks at the
 * platform; everything downstream consumes the Outcome variant.
 */

import {
  NormalExit,
  Outcome,
  PlatformFault,
  Signaled,
  TerminationInfo,
  normalExit,
  platformFault,
  signaled,
} from '../models/outcome';
import { formatHex, lookupWindowsFault, toUnsigned32 } from './windows-faults';

/**
 * Exit status of a child the supervisor killed after its deadline
 */
export const EXIT_TIMEOUT = 124;

/**
 * POSIX shells report death by signal n as 128 + n
 */
export const SIGNAL_EXIT_BASE = 128;

/**
 * TerminateProcess() exit status used when Node kills a child on Windows
 */
const WINDOWS_KILLED_EXIT_CODE = 1;

export type ChildOutcome = NormalExit | Signaled | PlatformFault;

/**
 * Classify a finished process
 */
export function classifyTermination(info: TerminationInfo): ChildOutcome {
  if (info.platform === 'windows') {
    // No signals on Windows; a null code means the child was killed
    if (info.exitCode === null) {
      return normalExit(WINDOWS_KILLED_EXIT_CODE);
    }
    const faultName = lookupWindowsFault(info.exitCode);
    if (faultName) {
      return platformFault(toUnsigned32(info.exitCode), faultName);
    }
    return normalExit(info.exitCode);
  }

  if (info.signal !== null) {
    return signaled(info.signal, info.signalName, info.coreDumped);
  }
  // No status reported at all: count it as a failure
  return normalExit(info.exitCode ?? 1);
}

/**
 * Render seconds the way they were given (5, 0.5, 120)
 */
export function formatSeconds(seconds: number): string {
  return String(seconds);
}

export function timeoutMessage(timeoutSeconds: number): string {
  return `Timed out after ${formatSeconds(timeoutSeconds)} seconds`;
}

/**
 * Lines describing how the child ended; empty for a normal exit
 */
export function describeOutcome(outcome: Outcome): string[] {
  switch (outcome.kind) {
    case 'normal-exit':
      return [];
    case 'signaled':
      return [`Process exited due to signal ${outcome.signal}${outcome.cored ? '; dumped core' : ''}`];
    case 'platform-fault':
      return [`Process exited due to exception ${formatHex(outcome.rawCode)} (${outcome.faultName})`];
    case 'timed-out':
      return [timeoutMessage(outcome.timeoutSeconds), ...describeOutcome(outcome.termination)];
  }
}

/**
 * Exit status the supervisor itself terminates with
 */
export function exitCodeFor(outcome: Outcome): number {
  switch (outcome.kind) {
    case 'normal-exit':
      return outcome.code;
    case 'signaled':
      return SIGNAL_EXIT_BASE + outcome.signal;
    case 'platform-fault':
      return outcome.rawCode;
    case 'timed-out':
      return EXIT_TIMEOUT;
  }
}

function detail(outcome: ChildOutcome): string {
  switch (outcome.kind) {
    case 'normal-exit':
      return `exit code ${outcome.code}`;
    case 'signaled':
      return `signal ${outcome.signal}`;
    case 'platform-fault':
      return `exit code ${formatHex(outcome.rawCode)}`;
  }
}

/**
 * Human-readable suffix of the verbose end marker
 */
export function outcomeSuffix(outcome: Outcome): string {
  switch (outcome.kind) {
    case 'normal-exit':
      return `${outcome.code === 0 ? 'ok' : 'failed'}, ${detail(outcome)}`;
    case 'signaled':
    case 'platform-fault':
      return `crashed, ${detail(outcome)}`;
    case 'timed-out':
      return `timed out, ${detail(outcome.termination)}`;
  }
}
