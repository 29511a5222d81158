import type { ProgressState } from "../types";

export interface ProgressReporterOptions {
  total: number;
  prefix?: string;
  suffix?: string;
  decimals?: number;
  length?: number;
  fill?: string;
  stream?: NodeJS.WritableStream;
}

/**
 * Single-line terminal progress bar. Counts only move forward, and once the
 * bar has reached the total every later update is ignored.
 */
export class ProgressReporter {
  private readonly total: number;
  private readonly prefix: string;
  private readonly suffix: string;
  private readonly decimals: number;
  private readonly length: number;
  private readonly fill: string;
  private readonly stream: NodeJS.WritableStream;
  private completed = 0;
  private finished = false;
  private lineOpen = false;

  constructor(options: ProgressReporterOptions) {
    this.total = Math.max(0, options.total);
    this.prefix = options.prefix ?? "Progress:";
    this.suffix = options.suffix ?? "Complete";
    this.decimals = options.decimals ?? 1;
    this.length = options.length ?? 50;
    this.fill = options.fill ?? "█";
    this.stream = options.stream ?? process.stderr;
  }

  get state(): ProgressState {
    return { completed: this.completed, total: this.total };
  }

  get isFinished(): boolean {
    return this.finished;
  }

  update(completed: number): void {
    if (this.finished) {
      return;
    }

    this.completed = Math.min(Math.max(this.completed, completed), this.total);
    this.stream.write(this.render());
    this.lineOpen = true;

    if (this.completed === this.total) {
      this.finished = true;
      this.breakLine();
    }
  }

  /** Ends a partly drawn bar line so other output starts on its own line. */
  breakLine(): void {
    if (!this.lineOpen) {
      return;
    }
    this.lineOpen = false;
    this.stream.write("\n");
  }

  render(): string {
    const ratio = this.total === 0 ? 1 : this.completed / this.total;
    const percent = (100 * ratio).toFixed(this.decimals);
    const filledLength = Math.floor(this.length * ratio);
    const bar = this.fill.repeat(filledLength) + "-".repeat(this.length - filledLength);
    return `\r${this.prefix} |${bar}| ${percent}% ${this.suffix}`;
  }
}
