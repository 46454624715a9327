import type { Snapshot } from '../types/snapshot.js';

export interface DaysDiffBucket {
  daysDiff: number;
  count: number;
}

export interface ResolutionSummary {
  masterListSize: number;
  found: number;
  /** Whole percent, rounded down */
  successRate: number;
  closest: Snapshot[];
  distribution: DaysDiffBucket[];
}

const CLOSEST_COUNT = 5;
const DISTRIBUTION_BUCKETS = 8;

export function summarizeSnapshots(snapshots: readonly Snapshot[], masterListSize: number): ResolutionSummary {
  const counts = new Map<number, number>();
  for (const snapshot of snapshots) {
    counts.set(snapshot.days_diff, (counts.get(snapshot.days_diff) ?? 0) + 1);
  }

  const distribution = [...counts.entries()]
    .map(([daysDiff, count]) => ({ daysDiff, count }))
    .sort((a, b) => a.daysDiff - b.daysDiff)
    .slice(0, DISTRIBUTION_BUCKETS);

  return {
    masterListSize,
    found: snapshots.length,
    successRate: masterListSize > 0 ? Math.floor((snapshots.length * 100) / masterListSize) : 0,
    closest: snapshots.slice(0, CLOSEST_COUNT),
    distribution,
  };
}

export function formatSummary(summary: ResolutionSummary): string[] {
  const lines = [
    `URLs in master list: ${summary.masterListSize}`,
    `Snapshots found: ${summary.found}`,
    `Success rate: ${summary.successRate}%`,
  ];

  if (summary.closest.length > 0) {
    lines.push('', 'Closest snapshots:');
    for (const snapshot of summary.closest) {
      lines.push(`  ${snapshot.days_diff} days: ${snapshot.original_url}`);
    }
    lines.push('', 'Distribution by distance from target date:');
    for (const bucket of summary.distribution) {
      lines.push(`  ${bucket.daysDiff} days: ${bucket.count} snapshots`);
    }
  }

  return lines;
}
