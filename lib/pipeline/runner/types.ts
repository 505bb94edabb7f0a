/**
 * Runner layer types.
 *
 * These interfaces define the contracts between the pure core steps and the
 * infrastructure (PDF collaborators, progress emission).
 */

import type { SnapshotExtractor } from "../../pdf/snapshots";
import type { DocumentCompactor } from "../../pdf/compact";
import type { DocumentOutcome, FailureStage, GroupingScope } from "../core/types";

// ============================================================================
// Collaborators
// ============================================================================

/**
 * The two document operations the pipeline needs. Passed in explicitly so
 * tests can substitute in-memory fakes.
 */
export interface Collaborators {
  extractor: SnapshotExtractor;
  compactor: DocumentCompactor;
}

// ============================================================================
// Progress Interface
// ============================================================================

export type ProgressEvent =
  // Batch-level events
  | { type: "batch-start"; documents: number; grouping: GroupingScope }
  | { type: "batch-complete"; completed: number; failed: number; removedPages: number }
  // Document-level events
  | { type: "document-start"; documentId: string }
  | { type: "document-progress"; documentId: string; page: number; totalPages: number }
  | { type: "document-extracted"; documentId: string; pageCount: number; titles: number }
  | {
      type: "document-complete";
      documentId: string;
      outputPath: string;
      keptCount: number;
      removedCount: number;
      written: boolean;
    }
  | { type: "document-error"; documentId: string; stage: FailureStage; error: string };

/**
 * Progress emitter interface.
 *
 * Implementations can log to console, drive a progress display, collect
 * events in tests, etc.
 */
export interface Progress {
  emit(event: ProgressEvent): void;
}

/**
 * No-op progress emitter for when progress tracking isn't needed.
 */
export const nullProgress: Progress = {
  emit: () => {},
};

/**
 * Console-based progress emitter for CLI usage.
 */
export function createConsoleProgress(): Progress {
  return {
    emit(event) {
      switch (event.type) {
        case "batch-start":
          console.log(
            `Compacting ${event.documents} document(s) with ${event.grouping} grouping...`
          );
          break;
        case "batch-complete":
          console.log(
            `Batch finished: ${event.completed} succeeded, ${event.failed} failed, ${event.removedPages} page(s) removed`
          );
          break;
        case "document-start":
          console.log(`[${event.documentId}] Starting extraction...`);
          break;
        case "document-progress":
          break;
        case "document-extracted":
          console.log(
            `[${event.documentId}] Extracted ${event.pageCount} page(s), ${event.titles} distinct title(s)`
          );
          break;
        case "document-complete":
          if (event.written) {
            console.log(`Filtered PDF saved as ${event.outputPath}`);
          } else {
            console.log(`[${event.documentId}] Dry run, would write ${event.outputPath}`);
          }
          console.log(`Number of slides removed: ${event.removedCount}`);
          break;
        case "document-error":
          console.error(`[${event.documentId}] Error in ${formatStage(event.stage)}: ${event.error}`);
          break;
      }
    },
  };
}

function formatStage(stage: FailureStage): string {
  switch (stage) {
    case "extract":
      return "extraction";
    case "compact":
      return "compaction";
    case "pipeline":
      return "pipeline";
  }
}

// ============================================================================
// Runner Configuration
// ============================================================================

export interface OutputOptions {
  suffix: string;
  outDir?: string;
  /** Compute retention without writing output */
  dryRun?: boolean;
}

export interface RunContext {
  collaborators: Collaborators;
  progress: Progress;
  output: OutputOptions;
}

export interface BatchOptions {
  concurrency: number;
  grouping: GroupingScope;
  /** Per-task updates, e.g. a live CLI display */
  tracker?: TaskTracker;
}

export type TaskStatus = "pending" | "running" | "completed" | "failed";

export interface TaskUpdate {
  label?: string;
  status?: TaskStatus;
  step?: string;
  error?: string;
  /** Pages dropped from the document, once known */
  removedPages?: number;
}

export interface TaskTracker {
  updateTask(id: string, update: TaskUpdate): void;
}

export interface BatchSummary {
  outcomes: DocumentOutcome[];
  completed: number;
  failed: number;
  keptPages: number;
  removedPages: number;
}
