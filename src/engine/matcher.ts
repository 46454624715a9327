import type { MasterListEntry } from '../types/master-list.js';
import type { Snapshot, SnapshotCandidate, SnapshotIndex } from '../types/snapshot.js';

export function buildArchiveUrl(archiveBaseUrl: string, timestamp: string, originalUrl: string): string {
  // The original URL is forwarded as the index returned it, unescaped.
  return `${archiveBaseUrl.replace(/\/+$/, '')}/${timestamp}/${originalUrl}`;
}

/**
 * `listedUrl` is the master-list URL the candidate was filed under. The
 * archive link keeps the URL the index actually captured.
 */
export function toSnapshot(
  candidate: SnapshotCandidate,
  archiveBaseUrl: string,
  listedUrl: string = candidate.originalUrl,
): Snapshot {
  return Object.freeze({
    archive_url: buildArchiveUrl(archiveBaseUrl, candidate.timestamp, candidate.originalUrl),
    timestamp: candidate.timestamp,
    original_url: listedUrl,
    status_code: candidate.statusCode,
    size_bytes: candidate.sizeBytes,
    days_diff: candidate.daysDiff,
  });
}

/** Stable ascending sort by `days_diff`; input order breaks ties. */
export function rankSnapshots(snapshots: readonly Snapshot[]): Snapshot[] {
  return [...snapshots].sort((a, b) => a.days_diff - b.days_diff);
}

/**
 * Joins the master list against the index. URLs without a capture are left
 * out; a URL listed twice is emitted once.
 */
export function matchSnapshots(
  masterList: readonly MasterListEntry[],
  index: SnapshotIndex,
  archiveBaseUrl: string,
): Snapshot[] {
  const seen = new Set<string>();
  const matched: Snapshot[] = [];

  for (const entry of masterList) {
    if (seen.has(entry.original)) continue;
    const candidate = index.get(entry.original);
    if (!candidate) continue;
    seen.add(entry.original);
    matched.push(toSnapshot(candidate, archiveBaseUrl, entry.original));
  }

  return rankSnapshots(matched);
}
