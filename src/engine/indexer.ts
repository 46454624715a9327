import { z } from 'zod';
import type { CaptureRow, RawCaptureRow } from '../types/capture.js';
import type { SnapshotCandidate, SnapshotIndex } from '../types/snapshot.js';

/** Distance units per "day" in the 14-digit timestamp space. Approximate by definition. */
export const DAY_UNITS = 1_000_000;

const sizeSchema = z.union([
  z.string().regex(/^\d+$/).transform(Number),
  z.number().int().nonnegative(),
]);

const captureRowSchema = z.object({
  timestamp: z.string().regex(/^\d{14}$/),
  original: z.string().min(1),
  statuscode: z.string(),
  mimetype: z.string(),
  length: sizeSchema,
});

export interface IndexStats {
  rows: number;
  accepted: number;
  invalid: number;
  /** Valid rows dropped because their URL is outside `allowedUrls` */
  filtered: number;
}

export interface IndexBuildResult {
  index: SnapshotIndex;
  stats: IndexStats;
}

export function parseRow(raw: RawCaptureRow): CaptureRow | null {
  const parsed = captureRowSchema.safeParse(raw);
  if (!parsed.success) return null;
  return {
    timestamp: parsed.data.timestamp,
    originalUrl: parsed.data.original,
    statusCode: parsed.data.statuscode,
    mimeType: parsed.data.mimetype,
    sizeBytes: parsed.data.length,
  };
}

export function timeDistance(timestamp: string, targetTimestamp: string): number {
  return Math.abs(Number(timestamp) - Number(targetTimestamp));
}

export function toDaysDiff(distance: number): number {
  return Math.floor(distance / DAY_UNITS);
}

export function toCandidate(row: CaptureRow, targetTimestamp: string): SnapshotCandidate {
  const distance = timeDistance(row.timestamp, targetTimestamp);
  return {
    originalUrl: row.originalUrl,
    timestamp: row.timestamp,
    statusCode: row.statusCode,
    mimeType: row.mimeType,
    sizeBytes: row.sizeBytes,
    timeDistance: distance,
    daysDiff: toDaysDiff(distance),
  };
}

/**
 * Keeps the capture nearest to the target for every URL. A later row only
 * replaces an earlier one when strictly closer, so ties go to the first row seen.
 */
export function buildIndex(
  rows: Iterable<RawCaptureRow>,
  targetTimestamp: string,
  allowedUrls?: ReadonlySet<string>,
): IndexBuildResult {
  const index: SnapshotIndex = new Map();
  const stats: IndexStats = { rows: 0, accepted: 0, invalid: 0, filtered: 0 };

  for (const raw of rows) {
    stats.rows++;
    const row = parseRow(raw);
    if (!row) {
      stats.invalid++;
      continue;
    }
    if (allowedUrls && !allowedUrls.has(row.originalUrl)) {
      stats.filtered++;
      continue;
    }
    stats.accepted++;

    const candidate = toCandidate(row, targetTimestamp);
    const current = index.get(row.originalUrl);
    if (!current || candidate.timeDistance < current.timeDistance) {
      index.set(row.originalUrl, candidate);
    }
  }

  return { index, stats };
}

export interface NearestCaptureResult {
  candidate: SnapshotCandidate | null;
  stats: IndexStats;
}

/**
 * The single nearest valid row of a response, whatever URL it carries.
 * URL-scoped queries come back canonicalised (scheme, `www.`), so rows are
 * not filtered against the requested URL. Ties go to the first row seen.
 */
export function nearestCapture(rows: Iterable<RawCaptureRow>, targetTimestamp: string): NearestCaptureResult {
  const stats: IndexStats = { rows: 0, accepted: 0, invalid: 0, filtered: 0 };
  let nearest: SnapshotCandidate | null = null;

  for (const raw of rows) {
    stats.rows++;
    const row = parseRow(raw);
    if (!row) {
      stats.invalid++;
      continue;
    }
    stats.accepted++;

    const candidate = toCandidate(row, targetTimestamp);
    if (!nearest || candidate.timeDistance < nearest.timeDistance) {
      nearest = candidate;
    }
  }

  return { candidate: nearest, stats };
}
