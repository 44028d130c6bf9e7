/**
 * Bross Sequential Analysis - Progress Feedback
 * ==============================================
 * Progress bar for long permutation runs
 */

export interface ProgressReporter {
  start(total: number): void;
  update(done: number, total: number): void;
  finish(): void;
}

/** Writable target, e.g. process.stderr */
export interface ProgressStream {
  write(chunk: string): unknown;
}

export const silentProgress: ProgressReporter = {
  start: () => undefined,
  update: () => undefined,
  finish: () => undefined,
};

/**
 * Redraw interval: every iteration for short runs, about 100 redraws otherwise
 */
export function progressInterval(total: number): number {
  return total > 200 ? Math.max(1, Math.round(total / 100)) : 1;
}

export function formatProgress(done: number, total: number, width = 30): string {
  const ratio = total > 0 ? Math.min(1, done / total) : 0;
  const filled = Math.round(ratio * width);
  const bar = '█'.repeat(filled) + '░'.repeat(width - filled);
  return `${bar} ${done} of ${total} (${(100 * ratio).toFixed(1)}%)`;
}

export class ConsoleProgress implements ProgressReporter {
  private stream: ProgressStream;
  private label: string;
  private every = 1;
  private active = false;

  constructor(stream: ProgressStream, label = 'Running permutations...') {
    this.stream = stream;
    this.label = label;
  }

  start(total: number): void {
    this.every = progressInterval(total);
    this.active = true;
    this.stream.write(`${this.label}\n`);
  }

  update(done: number, total: number): void {
    if (!this.active) return;
    if (done % this.every === 0 || done === total) {
      this.stream.write(`\r${formatProgress(done, total)}`);
    }
  }

  finish(): void {
    if (!this.active) return;
    this.active = false;
    this.stream.write('\n');
  }
}

export function createConsoleProgress(stream: ProgressStream = process.stderr, label?: string): ProgressReporter {
  return new ConsoleProgress(stream, label);
}
