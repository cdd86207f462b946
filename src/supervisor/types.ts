/**
 * Supervisor Core types
 */

import { Outcome } from '../models/outcome';
import { SupervisorError } from '../errors/supervisor-error';

/**
 * Supervisor states, in the order a run visits them
 */
export enum SupervisorState {
  IDLE = 'Idle',
  PARSED = 'Parsed',
  CHDIR_APPLIED = 'ChDirApplied',
  LAUNCHED = 'Launched',
  RACING = 'Racing',
  TERMINATED = 'Terminated',
  REPORTED = 'Reported',
}

/**
 * Allowed transitions. Any state may jump to REPORTED on a fatal error.
 */
export const STATE_TRANSITIONS: Readonly<Record<SupervisorState, readonly SupervisorState[]>> = {
  [SupervisorState.IDLE]: [SupervisorState.PARSED, SupervisorState.REPORTED],
  [SupervisorState.PARSED]: [SupervisorState.CHDIR_APPLIED, SupervisorState.LAUNCHED, SupervisorState.REPORTED],
  [SupervisorState.CHDIR_APPLIED]: [SupervisorState.LAUNCHED, SupervisorState.REPORTED],
  [SupervisorState.LAUNCHED]: [SupervisorState.RACING, SupervisorState.REPORTED],
  [SupervisorState.RACING]: [SupervisorState.TERMINATED, SupervisorState.REPORTED],
  [SupervisorState.TERMINATED]: [SupervisorState.REPORTED],
  [SupervisorState.REPORTED]: [],
};

/**
 * Per-run context threaded through Launch, Wait and Report
 */
export interface SupervisorContext {
  readonly label: string;
  readonly verbose: boolean;
  readonly command: readonly string[];
  readonly timeoutSeconds?: number;
  workingDirectory?: string;
  startedAt?: number;
  elapsedMs?: number;
  pid?: number;
}

/**
 * Result of one supervised run
 */
export interface SupervisorResult {
  /** Exit status the supervisor should terminate with */
  exitCode: number;
  /** Classified outcome; absent when the child never ran */
  outcome?: Outcome;
  /** Fatal supervisor error; absent when the child ran */
  error?: SupervisorError;
  context: SupervisorContext;
  transitions: SupervisorState[];
}
