/**
 * ProgressTracker
 * Draws a single progress bar line for long-running file loops
 */

import chalk from 'chalk';
import * as logger from '../../utils/logger';

type WriteFn = typeof process.stdout.write;

export interface ProgressTrackerOptions {
  /** Defaults to whether stdout is a terminal */
  isTTY?: boolean;
}

const CLEAR_LINE = '\r\x1B[K';
const BAR_WIDTH = 40;

function chunkText(chunk: unknown): string {
  if (typeof chunk === 'string') {
    return chunk;
  }
  return chunk instanceof Uint8Array ? Buffer.from(chunk).toString() : '';
}

/**
 * ProgressTracker keeps the bar on the last line while other output is
 * written above it. It draws nothing when stdout is not a terminal or
 * the verbosity is quiet.
 */
export class ProgressTracker {
  readonly label: string;
  readonly enabled: boolean;
  totalItems = 0;
  completedItems = 0;
  failedItems = 0;
  currentItem = '';
  private updateInterval: NodeJS.Timeout | null = null;
  private isTrackingActive = false;
  private hasDrawnProgressBar = false;
  private readonly originalStdoutWrite: WriteFn;
  private readonly originalStderrWrite: WriteFn;

  constructor(
    label: string,
    verbosity: number = logger.Verbosity.Normal,
    options: ProgressTrackerOptions = {},
  ) {
    this.label = label;
    const isTTY = options.isTTY ?? process.stdout.isTTY === true;
    this.enabled = isTTY && verbosity >= logger.Verbosity.Normal;
    this.originalStdoutWrite = process.stdout.write.bind(process.stdout);
    this.originalStderrWrite = process.stderr.write.bind(process.stderr);
  }

  initialize(totalItems: number): void {
    this.totalItems = totalItems;
    this.completedItems = 0;
    this.failedItems = 0;
    this.currentItem = '';
  }

  recordSuccess(): void {
    this.completedItems++;
  }

  recordFailure(): void {
    this.failedItems++;
  }

  setCurrentItem(name: string): void {
    this.currentItem = name;
  }

  /**
   * Replace stdout and stderr writes so that the bar is cleared before other
   * output and redrawn after each complete line.
   */
  private setupOutputInterception(): void {
    const intercept = (stream: NodeJS.WriteStream, original: WriteFn) => {
      const write = (...args: unknown[]): boolean => {
        this.clearBar();
        const result: unknown = Reflect.apply(original, stream, args);
        if (chunkText(args[0]).includes('\n')) {
          this.drawBar();
        }
        return result !== false;
      };
      Object.defineProperty(stream, 'write', {
        value: write,
        configurable: true,
        writable: true,
      });
    };
    intercept(process.stdout, this.originalStdoutWrite);
    intercept(process.stderr, this.originalStderrWrite);
  }

  private restoreOutput(): void {
    process.stdout.write = this.originalStdoutWrite;
    process.stderr.write = this.originalStderrWrite;
  }

  renderBar(): string {
    const processed = this.completedItems + this.failedItems;
    const percentage = this.getProgressPercentage();
    const completeWidth = Math.floor((percentage / 100) * BAR_WIDTH);
    const bar =
      chalk.green('█'.repeat(completeWidth)) +
      chalk.gray('░'.repeat(BAR_WIDTH - completeWidth));
    const failures =
      this.failedItems > 0 ? chalk.red(` (${this.failedItems} failed)`) : '';
    const current = this.currentItem ? ` ${chalk.gray(this.currentItem)}` : '';
    return `${this.label} [${bar}] ${percentage}% | ${processed}/${this.totalItems}${failures}${current}`;
  }

  private clearBar(): void {
    if (this.hasDrawnProgressBar) {
      this.originalStdoutWrite(CLEAR_LINE);
      this.hasDrawnProgressBar = false;
    }
  }

  private drawBar(): void {
    if (!this.isTrackingActive) {
      return;
    }
    this.originalStdoutWrite(CLEAR_LINE + this.renderBar());
    this.hasDrawnProgressBar = true;
  }

  startProgressUpdates(intervalMs = 250): void {
    this.stopProgressUpdates();
    if (!this.enabled) {
      return;
    }

    this.isTrackingActive = true;
    this.setupOutputInterception();
    this.updateInterval = setInterval(() => this.displayProgress(), intervalMs);
    this.displayProgress();
  }

  stopProgressUpdates(): void {
    if (this.updateInterval) {
      clearInterval(this.updateInterval);
      this.updateInterval = null;
    }
    if (!this.isTrackingActive) {
      return;
    }

    this.clearBar();
    this.isTrackingActive = false;
    this.restoreOutput();
  }

  displayProgress(): void {
    if (!this.isTrackingActive) {
      return;
    }
    this.drawBar();

    if (this.isComplete()) {
      this.stopProgressUpdates();
    }
  }

  getProgressPercentage(): number {
    const processed = this.completedItems + this.failedItems;
    return this.totalItems > 0
      ? Math.floor((processed / this.totalItems) * 100)
      : 0;
  }

  isComplete(): boolean {
    return (
      this.totalItems > 0 &&
      this.completedItems + this.failedItems >= this.totalItems
    );
  }
}

export function createProgressTracker(
  label: string,
  verbosity: number = logger.Verbosity.Normal,
  options: ProgressTrackerOptions = {},
): ProgressTracker {
  return new ProgressTracker(label, verbosity, options);
}

/**
 * Draw `tracker` while `task` runs and always clear it afterwards.
 */
export async function withProgress<T>(
  tracker: ProgressTracker,
  task: () => Promise<T>,
): Promise<T> {
  tracker.startProgressUpdates();
  try {
    return await task();
  } finally {
    tracker.stopProgressUpdates();
  }
}
