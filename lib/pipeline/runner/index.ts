/**
 * Pipeline Runner Module
 *
 * Provides the orchestration layer for running the pure core steps
 * against PDF collaborators with progress tracking.
 */

export {
  type Collaborators,
  type Progress,
  type ProgressEvent,
  type RunContext,
  type OutputOptions,
  type BatchOptions,
  type BatchSummary,
  type TaskTracker,
  type TaskUpdate,
  type TaskStatus,
  nullProgress,
  createConsoleProgress,
} from "./types";

// Document-level runners
export { runDocument, runExtraction, runCompaction } from "./document-runner";

// Batch runner
export { runBatch, summarize } from "./batch-runner";

export { runParallel, type ParallelExecutorOptions, type ParallelResult } from "./parallel";

// Re-export factory for convenient setup
export { createRunner, pdfCollaborators, type CreateRunnerOptions } from "./factory";
