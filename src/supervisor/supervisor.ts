/**
 * Supervisor Core
 *
 * Runs exactly one child per instance:
 *   parse -> (chdir) -> (begin marker) -> launch -> race deadline -> classify
 *   -> (end marker) -> exit code
 *
 * The core is the only owner of the child handle. The Timeout Monitor signals
 * intent; the core issues the single terminate() and reaps the child.
 */

import { SupervisorConfig, DEFAULTS } from '../config/supervisor-config';
import { Invocation } from '../cli/argument-splitter';
import { SupervisorError } from '../errors/supervisor-error';
import {
  classifyTermination,
  describeOutcome,
  exitCodeFor,
  outcomeSuffix,
  timeoutMessage,
} from '../classifier/exit-classifier';
import { Outcome, TerminationInfo, TerminationPlatform, timedOut } from '../models/outcome';
import { LifecycleLogger, effectiveLabel } from '../logging/lifecycle-logger';
import { LogSink, StderrSink } from '../logging/log-sink';
import { TimeoutMonitor } from '../timeout/timeout-monitor';
import { ChangeDirectory, applyWorkingDirectory } from '../workdir/working-directory';
import { ChildHandle, LaunchChild, launchChild } from './child-launcher';
import { STATE_TRANSITIONS, SupervisorContext, SupervisorResult, SupervisorState } from './types';

/**
 * Collaborators; defaults talk to the real process and OS
 */
export interface SupervisorDependencies {
  config?: Readonly<SupervisorConfig>;
  sink?: LogSink;
  launch?: LaunchChild;
  changeDirectory?: ChangeDirectory;
  /** Milliseconds since the epoch */
  now?: () => number;
  platform?: TerminationPlatform;
}

type RaceResult = { kind: 'exited'; info: TerminationInfo } | { kind: 'deadline' };

export class Supervisor {
  private state: SupervisorState = SupervisorState.IDLE;
  private readonly transitions: SupervisorState[] = [SupervisorState.IDLE];
  private readonly config: Readonly<SupervisorConfig>;
  private readonly sink: LogSink;
  private readonly launch: LaunchChild;
  private readonly changeDirectory?: ChangeDirectory;
  private readonly now: () => number;
  private readonly platform?: TerminationPlatform;
  private readonly lifecycle: LifecycleLogger;

  constructor(deps: SupervisorDependencies = {}) {
    this.config = deps.config ?? DEFAULTS;
    this.sink = deps.sink ?? new StderrSink();
    this.launch = deps.launch ?? launchChild;
    this.changeDirectory = deps.changeDirectory;
    this.now = deps.now ?? Date.now;
    this.platform = deps.platform;
    this.lifecycle = new LifecycleLogger(this.sink, {
      prefix: this.config.logPrefix,
      childKind: this.config.childKind,
      now: this.now,
    });
  }

  getState(): SupervisorState {
    return this.state;
  }

  /**
   * Write a fatal supervisor error the way every fatal condition is reported
   */
  reportError(error: SupervisorError): void {
    this.sink.writeLine(`${this.config.logPrefix}: ${error.message}`);
  }

  /**
   * Report a failure that happened before an Invocation existed (bad argv)
   */
  fail(error: SupervisorError): SupervisorResult {
    this.reportError(error);
    this.transition(SupervisorState.REPORTED);
    return {
      exitCode: error.exitCode,
      error,
      context: { label: '', verbose: false, command: [] },
      transitions: [...this.transitions],
    };
  }

  /**
   * Supervise one child to completion
   */
  async run(invocation: Invocation): Promise<SupervisorResult> {
    this.transition(SupervisorState.PARSED);

    const { options, command } = invocation;
    const context: SupervisorContext = {
      label: effectiveLabel(options.label, command),
      verbose: options.verbose,
      command,
      timeoutSeconds: options.timeoutSeconds,
    };

    let begun = false;
    try {
      if (options.chdir !== undefined) {
        context.workingDirectory = applyWorkingDirectory(options.chdir, this.changeDirectory);
        this.transition(SupervisorState.CHDIR_APPLIED);
      }

      if (context.verbose) {
        this.lifecycle.begin(context.label, command);
        begun = true;
      }

      context.startedAt = this.now();
      const child = await this.launch(command, {
        platform: this.platform,
        onError: (err) => this.sink.writeLine(`${this.config.logPrefix}: ${err.message}`),
      });
      context.pid = child.pid;
      this.transition(SupervisorState.LAUNCHED);

      const outcome = await this.wait(child, context);
      return this.report(outcome, context);
    } catch (err) {
      if (!(err instanceof SupervisorError)) {
        throw err;
      }
      this.reportError(err);
      if (begun) {
        this.lifecycle.end(context.label, `failed, exit code ${err.exitCode}`);
      }
      this.transition(SupervisorState.REPORTED);
      return {
        exitCode: err.exitCode,
        error: err,
        context,
        transitions: [...this.transitions],
      };
    }
  }

  /**
   * Wait for the child, racing the deadline when a timeout is configured
   */
  private async wait(child: ChildHandle, context: SupervisorContext): Promise<Outcome> {
    this.transition(SupervisorState.RACING);

    const timeoutSeconds = context.timeoutSeconds;
    if (timeoutSeconds === undefined) {
      const info = await child.exited;
      this.markTerminated(context);
      return this.classify(info);
    }

    const monitor = new TimeoutMonitor(timeoutSeconds, this.config.warningMarginRatio);
    const expiry = monitor.arm();
    const deadline = new Promise<RaceResult>((resolve) => {
      expiry.addEventListener('abort', () => resolve({ kind: 'deadline' }), { once: true });
    });
    const completion = child.exited.then((info): RaceResult => ({ kind: 'exited', info }));

    const first = await Promise.race([completion, deadline]);

    if (first.kind === 'exited') {
      monitor.disarm();
      const elapsedMs = this.markTerminated(context);
      if (monitor.isDangerouslyClose(elapsedMs)) {
        for (const line of monitor.warningLines(elapsedMs)) {
          this.sink.writeLine(line);
        }
      }
      return this.classify(first.info);
    }

    // Deadline first: one terminate, then reap the same child
    child.terminate();
    this.sink.writeLine(timeoutMessage(timeoutSeconds));
    const info = await child.exited;
    this.markTerminated(context);

    const termination = classifyTermination(info);
    for (const line of describeOutcome(termination)) {
      this.sink.writeLine(line);
    }
    return timedOut(timeoutSeconds, termination);
  }

  private classify(info: TerminationInfo): Outcome {
    const outcome = classifyTermination(info);
    for (const line of describeOutcome(outcome)) {
      this.sink.writeLine(line);
    }
    return outcome;
  }

  private markTerminated(context: SupervisorContext): number {
    const elapsedMs = this.now() - (context.startedAt ?? this.now());
    context.elapsedMs = elapsedMs;
    this.transition(SupervisorState.TERMINATED);
    return elapsedMs;
  }

  private report(outcome: Outcome, context: SupervisorContext): SupervisorResult {
    if (context.verbose) {
      this.lifecycle.end(context.label, outcomeSuffix(outcome));
    }
    this.transition(SupervisorState.REPORTED);
    return {
      exitCode: exitCodeFor(outcome),
      outcome,
      context,
      transitions: [...this.transitions],
    };
  }

  private transition(next: SupervisorState): void {
    if (!STATE_TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Invalid supervisor state transition: ${this.state} -> ${next}`);
    }
    this.state = next;
    this.transitions.push(next);
  }
}
