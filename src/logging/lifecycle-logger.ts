/**
 * Lifecycle Logger
 *
 * Verbose begin/end markers around one supervised child:
 *
 *   <prefix>: begin <label> @<timestamp>: [<child-kind>] <command>
 *   <prefix>: end <label>: <outcome-suffix>
 *
 * Colons separate fields, so labels never contain one.
 */

import * as path from 'path';
import { LogSink } from './log-sink';

export interface LifecycleLoggerOptions {
  prefix: string;
  childKind: string;
  /** Milliseconds since the epoch */
  now?: () => number;
}

/**
 * Replace every ':' with '__'
 */
export function sanitizeLabel(label: string): string {
  return label.split(':').join('__');
}

/**
 * Executable name of the child
 */
export function defaultLabel(command: readonly string[]): string {
  return command.length > 0 ? path.basename(command[0]) : '';
}

/**
 * Label shown in markers: explicit label or executable name, sanitized
 */
export function effectiveLabel(explicit: string | undefined, command: readonly string[]): string {
  return sanitizeLabel(explicit ?? defaultLabel(command));
}

/**
 * Seconds since the epoch with millisecond precision
 */
export function formatTimestamp(epochMs: number): string {
  return (epochMs / 1000).toFixed(3);
}

export class LifecycleLogger {
  private readonly now: () => number;

  constructor(
    private readonly sink: LogSink,
    private readonly options: LifecycleLoggerOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  begin(label: string, command: readonly string[]): string {
    const line =
      `${this.options.prefix}: begin ${sanitizeLabel(label)} @${formatTimestamp(this.now())}: ` +
      `[${this.options.childKind}] ${command.join(' ')}`;
    this.sink.writeLine(line);
    return line;
  }

  end(label: string, suffix: string): string {
    const line = `${this.options.prefix}: end ${sanitizeLabel(label)}: ${suffix}`;
    this.sink.writeLine(line);
    return line;
  }
}
