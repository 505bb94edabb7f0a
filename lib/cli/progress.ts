/**
 * Terminal progress displays for the compactor CLI.
 *
 * `runWithProgress` draws a single bar for one document's extraction.
 * `ParallelProgress` redraws a block of lines showing every running document
 * of a batch, and prints a one-line summary when stopped.
 */

import path from "node:path";
import type { Observable } from "rxjs";
import type { TaskStatus, TaskTracker, TaskUpdate } from "../pipeline/runner";

// ANSI escape codes
const ESC = "\x1b";
const CLEAR_LINE = `${ESC}[2K`;
const MOVE_UP = (n: number) => `${ESC}[${n}A`;
const HIDE_CURSOR = `${ESC}[?25l`;
const SHOW_CURSOR = `${ESC}[?25h`;
const DIM = `${ESC}[2m`;
const RESET = `${ESC}[0m`;
const GREEN = `${ESC}[32m`;
const YELLOW = `${ESC}[33m`;
const RED = `${ESC}[31m`;
const CYAN = `${ESC}[36m`;
const BOLD = `${ESC}[1m`;

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
const FRAME_MS = 80;

/** Anything text can be written to; process.stderr in practice. */
export interface OutputStream {
  write(chunk: string): boolean;
}

export interface ProgressOptions {
  label: string;
  unit?: string;
  barWidth?: number;
  stream?: OutputStream;
}

export function spinnerFrame(frame: number): string {
  return SPINNER_FRAMES[frame % SPINNER_FRAMES.length];
}

/** Filled/empty block bar; `done` is clamped to `total`. */
export function progressBar(done: number, total: number, width: number): string {
  const ratio = total > 0 ? Math.min(done, total) / total : 0;
  const filled = Math.round(ratio * width);
  return "█".repeat(filled) + "░".repeat(width - filled);
}

// ============================================================================
// Single document
// ============================================================================

/**
 * Draw a spinner and page bar while `source` emits, finishing with a check
 * mark or a cross. Resolves or rejects with the source.
 */
export function runWithProgress<T>(
  source: Observable<T>,
  mapper: (value: T) => { current: number; total: number },
  options: ProgressOptions
): Promise<void> {
  const { label, unit = "pages", barWidth = 20, stream = process.stderr } = options;

  let current = 0;
  let total = 0;
  let frame = 0;

  const line = (mark: string, bar: string) => `${mark} ${label}  ${bar}  ${current}/${total} ${unit}`;

  return new Promise<void>((resolve, reject) => {
    const timer = setInterval(() => {
      stream.write(`\r${line(spinnerFrame(frame++), progressBar(current, total, barWidth))}`);
    }, FRAME_MS);

    source.subscribe({
      next(value) {
        ({ current, total } = mapper(value));
      },
      error(err: unknown) {
        clearInterval(timer);
        stream.write(`\n✗ ${label}  ${err instanceof Error ? err.message : String(err)}\n`);
        reject(err);
      },
      complete() {
        clearInterval(timer);
        stream.write(`\r${line("✔", progressBar(total, total, barWidth))}\n`);
        resolve();
      },
    });
  });
}

// ============================================================================
// Batch
// ============================================================================

export interface TaskState {
  id: string;
  label: string;
  status: TaskStatus;
  step?: string;
  error?: string;
  removedPages?: number;
  startTime?: number;
}

export interface BatchStats {
  completed: number;
  failed: number;
  running: number;
  pending: number;
  removedPages: number;
}

export interface ParallelProgressOptions {
  stream?: OutputStream;
  /** Running documents listed beneath the header */
  maxVisibleTasks?: number;
  barWidth?: number;
}

/**
 * Live display of a batch. Receives task updates from the worker pool and
 * redraws on a timer between `start` and `stop`.
 */
export class ParallelProgress implements TaskTracker {
  private tasks = new Map<string, TaskState>();
  private totalCount = 0;
  private frame = 0;
  private timer: ReturnType<typeof setInterval> | null = null;
  private renderedLines = 0;
  private startTime = Date.now();
  private readonly stream: OutputStream;
  private readonly maxVisibleTasks: number;
  private readonly barWidth: number;

  constructor(options: ParallelProgressOptions = {}) {
    this.stream = options.stream ?? process.stderr;
    this.maxVisibleTasks = options.maxVisibleTasks ?? 16;
    this.barWidth = options.barWidth ?? 30;
  }

  start(totalCount: number): void {
    this.totalCount = totalCount;
    this.startTime = Date.now();
    this.stream.write(HIDE_CURSOR);
    this.timer = setInterval(() => {
      this.frame++;
      this.render();
    }, FRAME_MS);
    this.render();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.clearDisplay();
    this.stream.write(SHOW_CURSOR);
    this.stream.write(`\n${this.summaryLine()}\n\n`);
  }

  /**
   * Show the display while `work` runs. The display is stopped and the
   * cursor restored whether `work` resolves or rejects.
   */
  async track<T>(totalCount: number, work: () => Promise<T>): Promise<T> {
    this.start(totalCount);
    try {
      return await work();
    } finally {
      this.stop();
    }
  }

  updateTask(id: string, update: TaskUpdate): void {
    const existing: TaskState = this.tasks.get(id) ?? {
      id,
      label: path.basename(id),
      status: "pending",
    };
    // Labels from the pool are full paths; keep the short one.
    const next: TaskState = { ...existing, ...update, label: existing.label };

    if (next.status === "running" && existing.startTime === undefined) {
      next.startTime = Date.now();
    }
    this.tasks.set(id, next);
  }

  getStats(): BatchStats {
    const stats: BatchStats = { completed: 0, failed: 0, running: 0, pending: 0, removedPages: 0 };
    for (const task of this.tasks.values()) {
      if (task.status === "completed") stats.completed++;
      else if (task.status === "failed") stats.failed++;
      else if (task.status === "running") stats.running++;
      stats.removedPages += task.removedPages ?? 0;
    }
    stats.pending = Math.max(0, this.totalCount - stats.completed - stats.failed - stats.running);
    return stats;
  }

  private clearDisplay(): void {
    if (this.renderedLines === 0) return;
    this.stream.write(MOVE_UP(this.renderedLines));
    this.stream.write(`${CLEAR_LINE}\n`.repeat(this.renderedLines));
    this.stream.write(MOVE_UP(this.renderedLines));
    this.renderedLines = 0;
  }

  private render(): void {
    this.clearDisplay();

    const stats = this.getStats();
    const lines = ["", this.headerLine(stats), ""];

    const running = [...this.tasks.values()].filter((t) => t.status === "running");
    running.slice(0, this.maxVisibleTasks).forEach((task, i) => {
      lines.push(this.taskLine(task, i));
    });
    if (running.length > this.maxVisibleTasks) {
      lines.push(`  ${DIM}…and ${running.length - this.maxVisibleTasks} more${RESET}`);
    }

    lines.push("", this.footerLine(stats), "");

    this.stream.write(lines.join("\n"));
    this.renderedLines = lines.length;
  }

  private headerLine(stats: BatchStats): string {
    const done = stats.completed + stats.failed;
    const pct = this.totalCount > 0 ? Math.round((done / this.totalCount) * 100) : 0;
    const bar = progressBar(done, this.totalCount, this.barWidth);
    const elapsed = formatDuration(Date.now() - this.startTime);
    return `${BOLD}${CYAN}${spinnerFrame(this.frame)}${RESET} Compacting documents  ${GREEN}${bar}${RESET}  ${BOLD}${done}${RESET}/${this.totalCount}  ${DIM}${pct}%  ${elapsed}${RESET}`;
  }

  private taskLine(task: TaskState, index: number): string {
    const elapsed = task.startTime === undefined ? "" : formatDuration(Date.now() - task.startTime);
    const step = task.step ? `${DIM}${task.step}${RESET}` : "";
    return `  ${YELLOW}${spinnerFrame(this.frame + index)}${RESET} ${task.label}  ${step}  ${DIM}${elapsed}${RESET}`;
  }

  private footerLine(stats: BatchStats): string {
    const parts = [
      `Running: ${stats.running}`,
      `Pending: ${stats.pending}`,
      `Completed: ${GREEN}${stats.completed}${RESET}`,
      `Pages removed: ${stats.removedPages}`,
    ];
    if (stats.failed > 0) parts.push(`Failed: ${RED}${stats.failed}${RESET}`);
    return `  ${parts.join(`${DIM}  |  ${RESET}`)}`;
  }

  summaryLine(): string {
    const { completed, failed, removedPages } = this.getStats();
    const elapsed = formatDuration(Date.now() - this.startTime);
    const pages = `${removedPages} page(s) removed`;
    if (failed === 0) {
      return `${GREEN}✔${RESET} ${BOLD}Compacted${RESET} ${completed} document(s), ${pages}, in ${elapsed}`;
    }
    return `${YELLOW}⚠${RESET} ${BOLD}Compacted${RESET} ${completed} document(s), ${RED}${failed} failed${RESET}, ${pages}, in ${elapsed}`;
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes}m ${seconds % 60}s`;
  return `${Math.floor(minutes / 60)}h ${minutes % 60}m`;
}
