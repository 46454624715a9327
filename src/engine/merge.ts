import type { SnapshotIndex } from '../types/snapshot.js';

/**
 * Folds indexes in the order given. Strictly smaller distance wins, so on a
 * tie the earlier index keeps its candidate. Merging an index with itself
 * yields the same mapping.
 */
export function mergeIndexes(indexes: Iterable<SnapshotIndex>): SnapshotIndex {
  const merged: SnapshotIndex = new Map();
  for (const index of indexes) {
    for (const [url, candidate] of index) {
      const current = merged.get(url);
      if (!current || candidate.timeDistance < current.timeDistance) {
        merged.set(url, candidate);
      }
    }
  }
  return merged;
}
