import type { GroupEntry, GroupIndex, Snapshot } from "./types";

/**
 * Partition snapshots by exact title, keeping first-seen order for both
 * titles and the positions within each title.
 *
 * A repeated (title, position) pair only happens when several documents are
 * indexed together; the later length replaces the earlier one in place.
 */
export function indexSnapshots(snapshots: Iterable<Snapshot>): GroupIndex {
  const index: GroupIndex = new Map();
  for (const snapshot of snapshots) {
    const entries = index.get(snapshot.title) ?? [];
    const entry: GroupEntry = {
      position: snapshot.position,
      contentLength: snapshot.contentLength,
    };
    const existing = entries.findIndex((e) => e.position === entry.position);
    if (existing === -1) {
      entries.push(entry);
    } else {
      entries[existing] = entry;
    }
    index.set(snapshot.title, entries);
  }
  return index;
}

/** All positions present in the index, ascending. */
export function indexedPositions(index: GroupIndex): number[] {
  const positions = new Set<number>();
  for (const entries of index.values()) {
    for (const entry of entries) positions.add(entry.position);
  }
  return [...positions].sort((a, b) => a - b);
}
