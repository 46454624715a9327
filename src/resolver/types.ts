import type { ArchiveIndex } from '../archive/cdx-client.js';
import type { Pacer } from '../compliance/rate-limiter.js';
import type { DateWindow } from '../types/capture.js';
import type { MasterListEntry } from '../types/master-list.js';
import type { Snapshot, SnapshotIndex } from '../types/snapshot.js';
import type { Logger } from '../utils/logger.js';

export const STRATEGY_NAMES = ['auto', 'domain', 'parallel', 'sequential'] as const;
export type StrategyName = (typeof STRATEGY_NAMES)[number];
export type ConcreteStrategy = Exclude<StrategyName, 'auto'>;

export interface ResolverSettings {
  archiveBaseUrl: string;
  windowDays: number;
  domainQueryLimit: number;
  batchQueryLimit: number;
  parallelism: number;
  /** `auto` goes sequential below this many master-list entries */
  sequentialThreshold: number;
}

export interface ResolverDeps {
  archive: ArchiveIndex;
  /** Gate between per-URL queries of the sequential strategy */
  pacer: Pacer;
  settings: ResolverSettings;
}

export interface ResolutionRequest {
  domain: string;
  /** `YYYYMMDD` */
  targetDate: string;
  masterList: readonly MasterListEntry[];
  strategy?: StrategyName;
  parallelism?: number;
}

export interface ResolutionStats {
  queries: number;
  failedQueries: number;
  batches: { total: number; failed: number };
  rows: number;
  invalidRows: number;
  filteredRows: number;
  indexedUrls: number;
}

export interface ResolutionResult {
  strategy: ConcreteStrategy;
  window: DateWindow;
  snapshots: Snapshot[];
  /** Nothing resolved. A valid outcome, not an error. */
  noMatches: boolean;
  stats: ResolutionStats;
}

/** Everything a strategy needs; built once per run by the resolver. */
export interface StrategyContext {
  domain: string;
  masterList: readonly MasterListEntry[];
  targetTimestamp: string;
  window: DateWindow;
  parallelism: number;
  archive: ArchiveIndex;
  pacer: Pacer;
  settings: ResolverSettings;
  log: Logger;
}

export interface StrategyOutcome {
  index: SnapshotIndex;
  stats: Omit<ResolutionStats, 'indexedUrls'>;
}

export function emptyStats(): Omit<ResolutionStats, 'indexedUrls'> {
  return {
    queries: 0,
    failedQueries: 0,
    batches: { total: 0, failed: 0 },
    rows: 0,
    invalidRows: 0,
    filteredRows: 0,
  };
}
