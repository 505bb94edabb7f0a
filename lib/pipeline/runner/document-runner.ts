/**
 * Document Runner
 *
 * Runs the pipeline for one document:
 * 1. Snapshot extraction
 * 2. Grouping by title
 * 3. Retention selection
 * 4. Compaction (skipped on dry runs)
 */

import { outputPathFor } from "../../documents";
import type { ExtractedDocument } from "../../pdf/snapshots";
import { indexSnapshots } from "../core/group-index";
import { buildRetentionSet, restrictToDocument } from "../core/retention";
import type {
  CompactionResult,
  DocumentOutcome,
  FailureStage,
  Outcome,
  RetentionSet,
} from "../core/types";
import type { RunContext } from "./types";

// ============================================================================
// Extraction
// ============================================================================

export async function runExtraction(
  sourcePath: string,
  ctx: RunContext
): Promise<Outcome<ExtractedDocument>> {
  ctx.progress.emit({ type: "document-start", documentId: sourcePath });

  const extracted = await ctx.collaborators.extractor.extract(sourcePath, (p) => {
    ctx.progress.emit({
      type: "document-progress",
      documentId: sourcePath,
      page: p.page,
      totalPages: p.totalPages,
    });
  });

  if (extracted.ok) {
    const titles = new Set(extracted.value.snapshots.map((s) => s.title)).size;
    ctx.progress.emit({
      type: "document-extracted",
      documentId: sourcePath,
      pageCount: extracted.value.pageCount,
      titles,
    });
  }
  return extracted;
}

// ============================================================================
// Compaction
// ============================================================================

/**
 * Apply a retention set to an extracted document. Positions outside the
 * document's own page range are ignored.
 */
export async function runCompaction(
  doc: ExtractedDocument,
  retained: RetentionSet,
  ctx: RunContext
): Promise<DocumentOutcome> {
  const keep = restrictToDocument(retained, doc.pageCount);
  const outputPath = outputPathFor(doc.documentId, ctx.output);

  if (ctx.output.dryRun) {
    return complete(ctx, {
      sourceDocumentId: doc.documentId,
      outputDocumentId: outputPath,
      keptCount: keep.length,
      removedCount: doc.pageCount - keep.length,
      retained: keep,
      written: false,
    });
  }

  const compacted = await ctx.collaborators.compactor.compact({
    sourcePath: doc.documentId,
    outputPath,
    keep: new Set(keep),
  });

  if (!compacted.ok) {
    return failed(ctx, doc.documentId, "compact", compacted.error.message);
  }

  return complete(ctx, {
    sourceDocumentId: doc.documentId,
    outputDocumentId: compacted.value.outputPath,
    keptCount: compacted.value.keptCount,
    removedCount: compacted.value.removedCount,
    retained: keep,
    written: true,
  });
}

// ============================================================================
// Full document pipeline
// ============================================================================

/**
 * Extract, select and compact one document with per-document grouping.
 */
export async function runDocument(
  sourcePath: string,
  ctx: RunContext
): Promise<DocumentOutcome> {
  const extracted = await runExtraction(sourcePath, ctx);
  if (!extracted.ok) {
    return failed(ctx, sourcePath, "extract", extracted.error.message);
  }

  const retained = buildRetentionSet(indexSnapshots(extracted.value.snapshots));
  return runCompaction(extracted.value, retained, ctx);
}

// ============================================================================
// Helpers
// ============================================================================

function complete(
  ctx: RunContext,
  result: CompactionResult
): DocumentOutcome {
  ctx.progress.emit({
    type: "document-complete",
    documentId: result.sourceDocumentId,
    outputPath: result.outputDocumentId,
    keptCount: result.keptCount,
    removedCount: result.removedCount,
    written: result.written,
  });
  return { status: "completed", documentId: result.sourceDocumentId, result };
}

export function failed(
  ctx: RunContext,
  documentId: string,
  stage: FailureStage,
  error: string
): DocumentOutcome {
  ctx.progress.emit({ type: "document-error", documentId, stage, error });
  return { status: "failed", documentId, stage, error };
}
