/**
 * Core types for the slide compaction pipeline.
 *
 * These types define the data structures that flow through pipeline steps.
 * They are independent of PDF handling, the filesystem, or the CLI.
 */

// ============================================================================
// Snapshot - the fundamental unit of work
// ============================================================================

export interface Snapshot {
  position: number; // 1-based, document order
  title: string; // First non-empty line, or "No Title"
  content: string; // Remaining text, or "No Content"
  contentLength: number; // content.length
}

export const NO_TITLE = "No Title";
export const NO_CONTENT = "No Content";

// ============================================================================
// Groups - snapshots sharing a title
// ============================================================================

export interface GroupEntry {
  position: number;
  contentLength: number;
}

/** Title -> entries in first-seen order. Map iteration order is insertion order. */
export type GroupIndex = Map<string, GroupEntry[]>;

export type RetentionSet = ReadonlySet<number>;

// ============================================================================
// Results
// ============================================================================

export interface CompactionResult {
  sourceDocumentId: string;
  outputDocumentId: string;
  keptCount: number;
  removedCount: number;
  /** Positions kept, ascending */
  retained: number[];
  /** False for dry runs */
  written: boolean;
}

/**
 * Tagged outcome returned by the PDF collaborators in place of throwing.
 */
export type Outcome<T, E extends Error = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ============================================================================
// Per-document outcome reported by the runners
// ============================================================================

export type FailureStage = "extract" | "compact" | "pipeline";

export type DocumentOutcome =
  | { status: "completed"; documentId: string; result: CompactionResult }
  | { status: "failed"; documentId: string; stage: FailureStage; error: string };

export type GroupingScope = "document" | "global";
