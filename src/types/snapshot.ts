export interface SnapshotCandidate {
  originalUrl: string;
  timestamp: string;
  statusCode: string;
  mimeType: string;
  sizeBytes: number;
  timeDistance: number;
  daysDiff: number;
}

/** Best candidate per original URL. Insertion order is first-seen order. */
export type SnapshotIndex = Map<string, SnapshotCandidate>;

/** Emitted record; field names are the on-disk JSON contract. */
export interface Snapshot {
  readonly archive_url: string;
  readonly timestamp: string;
  readonly original_url: string;
  readonly status_code: string;
  readonly size_bytes: number;
  readonly days_diff: number;
}
