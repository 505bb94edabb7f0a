/**
 * PDF Compaction
 *
 * Copies a chosen subset of a PDF's pages into a new document, in original
 * order. Output goes to a temporary sibling file that is renamed into place
 * only once fully written.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { randomBytes } from "node:crypto";
import mupdf from "mupdf";
import { CompactionError, toError } from "../errors";
import { fail, ok, type Outcome } from "../pipeline/core/types";
import { openPdfFromBuffer } from "./snapshots";

type PDFDoc = InstanceType<typeof mupdf.PDFDocument>;

// ============================================================================
// Types
// ============================================================================

export interface CompactRequest {
  sourcePath: string;
  outputPath: string;
  /** 1-based positions to keep */
  keep: ReadonlySet<number>;
}

export interface CompactedDocument {
  outputPath: string;
  keptCount: number;
  removedCount: number;
}

export interface DocumentCompactor {
  compact(request: CompactRequest): Promise<Outcome<CompactedDocument, CompactionError>>;
}

// ============================================================================
// Page selection
// ============================================================================

/**
 * Build a new PDF containing only the given pages of `pdfBuffer`.
 */
export function selectPdfPages(
  pdfBuffer: Buffer,
  keep: ReadonlySet<number>
): { pdf: Buffer; pageCount: number; keptCount: number } {
  const source = openPdfFromBuffer(pdfBuffer).asPDF();
  if (!source) {
    throw new Error("Source is not a PDF document");
  }

  const pageCount = source.countPages();
  const output: PDFDoc = new mupdf.PDFDocument();
  let keptCount = 0;

  for (let i = 0; i < pageCount; i++) {
    if (!keep.has(i + 1)) continue;
    output.graftPage(-1, source, i);
    keptCount++;
  }

  if (keptCount === 0) {
    throw new Error("No pages selected to keep");
  }

  const pdf = Buffer.from(output.saveToBuffer("garbage").asUint8Array());
  return { pdf, pageCount, keptCount };
}

// ============================================================================
// Collaborator
// ============================================================================

export const pdfDocumentCompactor: DocumentCompactor = {
  async compact({ sourcePath, outputPath, keep }) {
    const tmpPath = path.join(
      path.dirname(outputPath),
      `.${path.basename(outputPath)}.${randomBytes(4).toString("hex")}.tmp`
    );

    try {
      const pdfBuffer = await fs.readFile(sourcePath);
      const { pdf, pageCount, keptCount } = selectPdfPages(pdfBuffer, keep);

      await fs.mkdir(path.dirname(outputPath), { recursive: true });
      await fs.writeFile(tmpPath, pdf);
      await fs.rename(tmpPath, outputPath);

      return ok({
        outputPath,
        keptCount,
        removedCount: pageCount - keptCount,
      });
    } catch (err) {
      await fs.rm(tmpPath, { force: true });
      return fail(new CompactionError(sourcePath, toError(err)));
    }
  },
};
