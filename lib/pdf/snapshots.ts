/**
 * Slide Snapshot Extraction
 *
 * Reads each page's text from a PDF using mupdf and splits it into a title
 * (first non-empty line) and content (the rest).
 */

import fs from "node:fs/promises";
import mupdf, { type Document as MupdfDocument } from "mupdf";
import { ExtractionError, toError } from "../errors";
import {
  NO_CONTENT,
  NO_TITLE,
  fail,
  ok,
  type Outcome,
  type Snapshot,
} from "../pipeline/core/types";

// ============================================================================
// Types
// ============================================================================

export interface ExtractSnapshotsInput {
  /** PDF file contents as a Buffer */
  pdfBuffer: Buffer;
}

export interface ExtractProgress {
  page: number;
  totalPages: number;
}

export interface ExtractedDocument {
  documentId: string;
  pageCount: number;
  snapshots: Snapshot[];
}

export interface SnapshotExtractor {
  extract(
    sourcePath: string,
    onProgress?: (progress: ExtractProgress) => void
  ): Promise<Outcome<ExtractedDocument, ExtractionError>>;
}

// ============================================================================
// Main extraction function
// ============================================================================

/**
 * Extract one snapshot per page, in page order.
 *
 * Throws if the buffer is not a readable PDF.
 */
export async function extractSnapshots(
  input: ExtractSnapshotsInput,
  onProgress?: (progress: ExtractProgress) => void
): Promise<{ pageCount: number; snapshots: Snapshot[] }> {
  const doc = openPdfFromBuffer(input.pdfBuffer);
  const pageCount = doc.countPages();
  const snapshots: Snapshot[] = [];

  for (let i = 0; i < pageCount; i++) {
    const text = doc.loadPage(i).toStructuredText().asText();
    snapshots.push(parseSnapshot(i + 1, text));
    onProgress?.({ page: i + 1, totalPages: pageCount });
    await tick();
  }

  return { pageCount, snapshots };
}

/**
 * Split a page's text into title and content. The sentinels only stand in
 * for a page with no text at all.
 */
export function parseSnapshot(position: number, text: string): Snapshot {
  const lines = text.split(/\r?\n/);
  const titleIndex = lines.findIndex((line) => line.trim() !== "");

  if (titleIndex === -1) {
    return {
      position,
      title: NO_TITLE,
      content: NO_CONTENT,
      contentLength: NO_CONTENT.length,
    };
  }

  // A title-only page has empty content, so it never outweighs the first
  // bullet of its own build.
  const title = lines[titleIndex].trim();
  const content = lines.slice(titleIndex + 1).join("\n").trimEnd();

  return { position, title, content, contentLength: content.length };
}

/**
 * Human-readable dump of a snapshot, used by the inspect command.
 */
export function describeSnapshot(snapshot: Snapshot): string {
  return [
    `Page Number: ${snapshot.position}`,
    `Title: ${snapshot.title}`,
    `Content Length: ${snapshot.contentLength} characters`,
    `Content: ${snapshot.content}`,
    "",
  ].join("\n");
}

// ============================================================================
// Collaborator
// ============================================================================

export const pdfSnapshotExtractor: SnapshotExtractor = {
  async extract(sourcePath, onProgress) {
    try {
      const pdfBuffer = await fs.readFile(sourcePath);
      const { pageCount, snapshots } = await extractSnapshots({ pdfBuffer }, onProgress);
      return ok({ documentId: sourcePath, pageCount, snapshots });
    } catch (err) {
      return fail(new ExtractionError(sourcePath, toError(err)));
    }
  },
};

// ============================================================================
// Internal helpers
// ============================================================================

const tick = () => new Promise<void>((r) => setImmediate(r));

export function openPdfFromBuffer(buffer: Buffer): MupdfDocument {
  // Suppress mupdf stderr warnings
  const origWrite = process.stderr.write;
  process.stderr.write = () => true;
  try {
    return mupdf.Document.openDocument(buffer, "application/pdf");
  } finally {
    process.stderr.write = origWrite;
  }
}
