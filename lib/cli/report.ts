import type { BatchSummary, Progress } from "../pipeline/runner";

/**
 * Replay batch outcomes through a progress sink once the live display is gone.
 */
export function reportSummary(
  summary: BatchSummary,
  report: Progress
): void {
  for (const outcome of summary.outcomes) {
    if (outcome.status === "completed") {
      const { result } = outcome;
      report.emit({
        type: "document-complete",
        documentId: result.sourceDocumentId,
        outputPath: result.outputDocumentId,
        keptCount: result.keptCount,
        removedCount: result.removedCount,
        written: result.written,
      });
    } else {
      report.emit({
        type: "document-error",
        documentId: outcome.documentId,
        stage: outcome.stage,
        error: outcome.error,
      });
    }
  }
  report.emit({
    type: "batch-complete",
    completed: summary.completed,
    failed: summary.failed,
    removedPages: summary.removedPages,
  });
}

