/**
 * Line sinks for supervisor-authored output
 *
 * Everything the supervisor says goes to standard error, one line per call,
 * unbuffered. Standard output belongs to the child.
 */

export interface LogSink {
  writeLine(line: string): void;
}

/**
 * Writes each line straight to process.stderr
 */
export class StderrSink implements LogSink {
  constructor(private readonly stream: NodeJS.WritableStream = process.stderr) {}

  writeLine(line: string): void {
    this.stream.write(`${line}\n`);
  }
}

/**
 * Keeps lines in memory (bounded) for inspection
 */
export class MemorySink implements LogSink {
  private lines: string[] = [];
  private maxEntries: number;

  constructor(options: { maxEntries?: number } = {}) {
    this.maxEntries = options.maxEntries ?? 1000;
  }

  writeLine(line: string): void {
    this.lines.push(line);

    // Trim if over limit
    if (this.lines.length > this.maxEntries) {
      this.lines = this.lines.slice(-this.maxEntries);
    }
  }

  getAll(): string[] {
    return [...this.lines];
  }

  clear(): void {
    this.lines = [];
  }
}
