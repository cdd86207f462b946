/**
 * Termination data and normalized outcomes
 *
 * TerminationInfo is what the OS reported for the finished child.
 * Outcome is the platform-neutral classification every formatter and the
 * exit-code mapping consume.
 */

export type TerminationPlatform = 'posix' | 'windows';

/**
 * Raw OS-level result of a finished or killed process
 */
export interface TerminationInfo {
  readonly platform: TerminationPlatform;
  /** Exit code, null when the process died from a signal */
  readonly exitCode: number | null;
  /** Signal number, null on normal exit */
  readonly signal: number | null;
  readonly signalName: string | null;
  readonly coreDumped: boolean;
}

export interface NormalExit {
  readonly kind: 'normal-exit';
  readonly code: number;
}

export interface Signaled {
  readonly kind: 'signaled';
  readonly signal: number;
  readonly signalName: string | null;
  readonly cored: boolean;
}

export interface PlatformFault {
  readonly kind: 'platform-fault';
  readonly rawCode: number;
  readonly faultName: string;
}

export interface TimedOut {
  readonly kind: 'timed-out';
  readonly timeoutSeconds: number;
  /** How the child ended after being terminated */
  readonly termination: NormalExit | Signaled | PlatformFault;
}

export type Outcome = NormalExit | Signaled | PlatformFault | TimedOut;

export function normalExit(code: number): NormalExit {
  return Object.freeze({ kind: 'normal-exit', code });
}

export function signaled(signal: number, signalName: string | null, cored: boolean): Signaled {
  return Object.freeze({ kind: 'signaled', signal, signalName, cored });
}

export function platformFault(rawCode: number, faultName: string): PlatformFault {
  return Object.freeze({ kind: 'platform-fault', rawCode, faultName });
}

export function timedOut(timeoutSeconds: number, termination: NormalExit | Signaled | PlatformFault): TimedOut {
  return Object.freeze({ kind: 'timed-out', timeoutSeconds, termination });
}

export function posixExit(exitCode: number): TerminationInfo {
  return Object.freeze({ platform: 'posix', exitCode, signal: null, signalName: null, coreDumped: false });
}

export function posixSignal(signal: number, signalName: string | null = null, coreDumped = false): TerminationInfo {
  return Object.freeze({ platform: 'posix', exitCode: null, signal, signalName, coreDumped });
}

export function windowsExit(exitCode: number): TerminationInfo {
  return Object.freeze({ platform: 'windows', exitCode, signal: null, signalName: null, coreDumped: false });
}
