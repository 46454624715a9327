import { CdxClient, type ArchiveIndex } from '../archive/cdx-client.js';
import { RetryingArchiveIndex } from '../archive/retrying-index.js';
import { IntervalPacer, type Pacer } from '../compliance/rate-limiter.js';
import { config, type Config } from '../config.js';
import { masterListPath, snapshotListPath } from '../io/paths.js';
import { writeSnapshotList } from '../io/snapshot-store.js';
import { loadMasterList } from '../master-list/loader.js';
import { formatSummary, summarizeSnapshots } from '../report/summary.js';
import { resolveSnapshots } from '../resolver/resolver.js';
import type { ResolutionResult, ResolverSettings, StrategyName } from '../resolver/types.js';
import { parseTargetDate } from '../utils/date.js';

export interface FindSnapshotsOptions {
  domain: string;
  targetDate: string;
  dataDir: string;
  /** Defaults to `<dataDir>/<domain>_master_list.json` */
  masterList?: string;
  strategy: StrategyName;
  parallelism: number;
}

export interface FindSnapshotsDeps {
  archive?: ArchiveIndex;
  pacer?: Pacer;
  settings?: ResolverSettings;
}

export function resolverSettingsFromConfig(cfg: Config): ResolverSettings {
  return {
    archiveBaseUrl: cfg.ARCHIVE_BASE_URL,
    windowDays: cfg.WINDOW_DAYS,
    domainQueryLimit: cfg.DOMAIN_QUERY_LIMIT,
    batchQueryLimit: cfg.BATCH_QUERY_LIMIT,
    parallelism: cfg.PARALLELISM,
    sequentialThreshold: cfg.SEQUENTIAL_THRESHOLD,
  };
}

export function createArchiveIndex(cfg: Config): ArchiveIndex {
  const client = new CdxClient({
    baseUrl: cfg.CDX_API_URL,
    userAgent: cfg.USER_AGENT,
    headersTimeoutMs: cfg.QUERY_HEADERS_TIMEOUT_MS,
    bodyTimeoutMs: cfg.QUERY_BODY_TIMEOUT_MS,
  });
  if (cfg.QUERY_RETRIES === 0) return client;
  return new RetryingArchiveIndex(client, {
    retries: cfg.QUERY_RETRIES,
    backoff: { type: 'exponential', delay: cfg.QUERY_RETRY_DELAY_MS },
  });
}

/**
 * Validates input, resolves snapshots, writes `<domain>_snapshots_<date>.json`
 * and prints a summary. Bad dates and missing master lists fail before any
 * network call.
 */
export async function runFindSnapshots(
  options: FindSnapshotsOptions,
  deps: FindSnapshotsDeps = {},
): Promise<ResolutionResult> {
  const targetDate = parseTargetDate(options.targetDate);
  const masterList = await loadMasterList(
    options.masterList ?? masterListPath(options.dataDir, options.domain),
  );

  const result = await resolveSnapshots(
    {
      domain: options.domain,
      targetDate,
      masterList,
      strategy: options.strategy,
      parallelism: options.parallelism,
    },
    {
      archive: deps.archive ?? createArchiveIndex(config),
      pacer: deps.pacer ?? new IntervalPacer(config.SEQUENTIAL_DELAY_MS),
      settings: deps.settings ?? resolverSettingsFromConfig(config),
    },
  );

  const outPath = snapshotListPath(options.dataDir, options.domain, targetDate);
  await writeSnapshotList(outPath, result.snapshots);

  console.log(`Window: ${result.window.from} - ${result.window.to} (strategy: ${result.strategy})`);
  if (result.stats.batches.failed > 0) {
    console.log(`Failed batches: ${result.stats.batches.failed}/${result.stats.batches.total}`);
  } else if (result.stats.failedQueries > 0) {
    console.log(`Failed queries: ${result.stats.failedQueries}/${result.stats.queries}`);
  }
  if (result.noMatches) {
    console.log(`No archived snapshots found for ${options.domain} around ${targetDate}`);
  }
  for (const line of formatSummary(summarizeSnapshots(result.snapshots, masterList.length))) {
    console.log(line);
  }
  console.log(`Result: ${outPath}`);

  return result;
}
