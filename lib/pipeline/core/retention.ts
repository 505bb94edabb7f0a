/**
 * Retention selection.
 *
 * Progressive reveals grow a slide's text page by page. Within a title group,
 * a drop in content length marks the page before it as a finished build (a
 * local peak), and the group's last page is always the final state.
 */

import type { GroupEntry, GroupIndex, RetentionSet } from "./types";

/**
 * Pick the positions of one title group that survive compaction.
 */
export function selectRetained(entries: readonly GroupEntry[]): Set<number> {
  if (entries.length === 0) return new Set();
  if (entries.length === 1) return new Set([entries[0].position]);

  const ordered = [...entries].sort((a, b) => a.position - b.position);
  const kept = new Set<number>();

  for (let i = 1; i < ordered.length; i++) {
    // Strict decrease only; equal lengths are still the same build.
    if (ordered[i].contentLength < ordered[i - 1].contentLength) {
      kept.add(ordered[i - 1].position);
    }
  }

  kept.add(ordered[ordered.length - 1].position);
  return kept;
}

/**
 * Union of the per-group selections.
 */
export function buildRetentionSet(index: GroupIndex): Set<number> {
  const kept = new Set<number>();
  for (const entries of index.values()) {
    for (const position of selectRetained(entries)) kept.add(position);
  }
  return kept;
}

/**
 * Limit a retention set to one document's pages (1..pageCount), ascending.
 * Needed when the set was built from several documents at once.
 */
export function restrictToDocument(
  retained: RetentionSet,
  pageCount: number
): number[] {
  return [...retained]
    .filter((p) => Number.isInteger(p) && p >= 1 && p <= pageCount)
    .sort((a, b) => a - b);
}
