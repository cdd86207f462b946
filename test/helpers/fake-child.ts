/**
 * In-process stand-ins for the child process used by Supervisor unit tests
 */

import { ChildHandle, LaunchChild, LaunchOptions } from '../../src/supervisor/child-launcher';
import { TerminationInfo } from '../../src/models/outcome';

export class FakeChild implements ChildHandle {
  readonly pid = 4242;
  readonly exited: Promise<TerminationInfo>;
  terminateCalls = 0;
  private settled = false;
  private resolveExit: (info: TerminationInfo) => void = () => undefined;

  /**
   * @param onTerminate how the child dies once terminate() is called;
   *   omitted means it ignores the request
   */
  constructor(private readonly onTerminate?: () => TerminationInfo) {
    this.exited = new Promise<TerminationInfo>((resolve) => {
      this.resolveExit = resolve;
    });
  }

  finish(info: TerminationInfo): void {
    if (this.settled) {
      return;
    }
    this.settled = true;
    this.resolveExit(info);
  }

  terminate(): boolean {
    this.terminateCalls++;
    if (this.onTerminate) {
      this.finish(this.onTerminate());
    }
    return true;
  }
}

export interface FakeLauncher {
  launch: LaunchChild;
  calls: Array<{ command: readonly string[]; options?: LaunchOptions }>;
}

/**
 * Launcher that hands out the given child; `script` runs on the next
 * turn of the event loop, after the supervisor starts waiting.
 */
export function fakeLauncher(child: FakeChild, script?: (child: FakeChild) => void): FakeLauncher {
  const calls: FakeLauncher['calls'] = [];
  const launch: LaunchChild = async (command, options) => {
    calls.push({ command, options });
    if (script) {
      setImmediate(() => script(child));
    }
    return child;
  };
  return { launch, calls };
}

/**
 * Launcher that fails like spawn() does for a missing executable
 */
export function failingLauncher(error: Error): FakeLauncher {
  const calls: FakeLauncher['calls'] = [];
  const launch: LaunchChild = async (command, options) => {
    calls.push({ command, options });
    throw error;
  };
  return { launch, calls };
}

/**
 * Manually advanced clock (milliseconds since the epoch)
 */
export class FakeClock {
  constructor(public time = 1_700_000_000_000) {}

  now = (): number => this.time;

  advance(ms: number): void {
    this.time += ms;
  }
}
