/**
 * Batch Runner
 *
 * Fans documents out over a bounded worker pool. With per-document grouping
 * each document runs its own pipeline. With global grouping titles are shared
 * across the batch, so extraction must finish for every document before the
 * single retention pass, after which compaction fans out again.
 */

import type { ExtractedDocument } from "../../pdf/snapshots";
import { indexSnapshots } from "../core/group-index";
import { buildRetentionSet } from "../core/retention";
import type { DocumentOutcome, FailureStage } from "../core/types";
import { failed, runCompaction, runDocument, runExtraction } from "./document-runner";
import { runParallel, type ParallelResult } from "./parallel";
import type { BatchOptions, BatchSummary, RunContext, TaskTracker } from "./types";

export async function runBatch(
  sourcePaths: string[],
  ctx: RunContext,
  options: BatchOptions
): Promise<BatchSummary> {
  const documents = [...new Set(sourcePaths)].sort();
  ctx.progress.emit({
    type: "batch-start",
    documents: documents.length,
    grouping: options.grouping,
  });

  const outcomes =
    options.grouping === "global"
      ? await runGlobal(documents, ctx, options)
      : await runPerDocument(documents, ctx, options);

  const summary = summarize(documents.map((id) => outcomeFor(outcomes, id)));
  ctx.progress.emit({
    type: "batch-complete",
    completed: summary.completed,
    failed: summary.failed,
    removedPages: summary.removedPages,
  });
  return summary;
}

// ============================================================================
// Per-document grouping
// ============================================================================

async function runPerDocument(
  documents: string[],
  ctx: RunContext,
  options: BatchOptions
): Promise<Map<string, DocumentOutcome>> {
  const outcomes = new Map<string, DocumentOutcome>();

  const run = await runParallel(
    documents,
    (doc) => doc,
    async (doc) => {
      options.tracker?.updateTask(doc, { step: "extracting..." });
      const outcome = await runDocument(doc, ctx);
      outcomes.set(doc, outcome);
      settle(outcome, options.tracker);
    },
    { concurrency: options.concurrency, progress: options.tracker }
  );

  recordUnexpected(run, outcomes, ctx, "pipeline");
  return outcomes;
}

// ============================================================================
// Global grouping
// ============================================================================

async function runGlobal(
  documents: string[],
  ctx: RunContext,
  options: BatchOptions
): Promise<Map<string, DocumentOutcome>> {
  const outcomes = new Map<string, DocumentOutcome>();
  const extracted = new Map<string, ExtractedDocument>();

  // Phase 1: extract everything. Tasks stay "running" on the tracker until
  // their compaction finishes in phase 3.
  const extractRun = await runParallel(
    documents,
    (doc) => doc,
    async (doc) => {
      options.tracker?.updateTask(doc, { label: doc, status: "running", step: "extracting..." });
      const result = await runExtraction(doc, ctx);
      if (result.ok) {
        extracted.set(doc, result.value);
        options.tracker?.updateTask(doc, { step: "waiting for batch" });
        return;
      }
      outcomes.set(doc, failed(ctx, doc, "extract", result.error.message));
      options.tracker?.updateTask(doc, { status: "failed", error: result.error.message });
    },
    { concurrency: options.concurrency }
  );
  for (const { id, error } of extractRun.errors) {
    options.tracker?.updateTask(id, { status: "failed", error: error.message });
  }
  recordUnexpected(extractRun, outcomes, ctx, "extract");

  // Phase 2: one retention pass over all titles, in document order
  const ready = documents.filter((doc) => extracted.has(doc) && !outcomes.has(doc));
  const retained = buildRetentionSet(
    indexSnapshots(ready.flatMap((doc) => extracted.get(doc)?.snapshots ?? []))
  );

  // Phase 3: compact each document against the shared set
  const compactRun = await runParallel(
    ready,
    (doc) => doc,
    async (doc) => {
      const source = extracted.get(doc);
      if (!source) throw new Error(`No extraction result for ${doc}`);
      options.tracker?.updateTask(doc, { step: "compacting..." });
      const outcome = await runCompaction(source, retained, ctx);
      outcomes.set(doc, outcome);
      settle(outcome, options.tracker);
    },
    { concurrency: options.concurrency, progress: options.tracker }
  );
  recordUnexpected(compactRun, outcomes, ctx, "compact");

  return outcomes;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Surface a failed outcome to the worker pool so trackers count it, and hand
 * a completed one's removal count to the tracker.
 */
function settle(outcome: DocumentOutcome, tracker: TaskTracker | undefined): void {
  if (outcome.status === "failed") throw new Error(outcome.error);
  tracker?.updateTask(outcome.documentId, { removedPages: outcome.result.removedCount });
}

/** Errors thrown by a collaborator rather than returned as an outcome. */
function recordUnexpected(
  run: ParallelResult,
  outcomes: Map<string, DocumentOutcome>,
  ctx: RunContext,
  stage: FailureStage
): void {
  for (const { id, error } of run.errors) {
    if (outcomes.has(id)) continue;
    outcomes.set(id, failed(ctx, id, stage, error.message));
  }
}

function outcomeFor(outcomes: Map<string, DocumentOutcome>, id: string): DocumentOutcome {
  return (
    outcomes.get(id) ?? {
      status: "failed",
      documentId: id,
      stage: "pipeline",
      error: "Document was not processed",
    }
  );
}

export function summarize(outcomes: DocumentOutcome[]): BatchSummary {
  const sorted = [...outcomes].sort((a, b) =>
    a.documentId < b.documentId ? -1 : a.documentId > b.documentId ? 1 : 0
  );
  let completed = 0;
  let failedCount = 0;
  let keptPages = 0;
  let removedPages = 0;

  for (const outcome of sorted) {
    if (outcome.status === "completed") {
      completed++;
      keptPages += outcome.result.keptCount;
      removedPages += outcome.result.removedCount;
    } else {
      failedCount++;
    }
  }

  return { outcomes: sorted, completed, failed: failedCount, keptPages, removedPages };
}
