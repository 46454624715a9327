import pLimit from 'p-limit';
import { buildIndex, type IndexStats } from '../engine/indexer.js';
import { mergeIndexes } from '../engine/merge.js';
import { batchUrlPattern, partitionBatches, type Batch } from '../engine/partition.js';
import type { MasterListEntry } from '../types/master-list.js';
import type { SnapshotIndex } from '../types/snapshot.js';
import { emptyStats, type StrategyContext, type StrategyOutcome } from './types.js';

type BatchOutcome =
  | { ok: true; batch: number; index: SnapshotIndex; stats: IndexStats }
  | { ok: false; batch: number; error: string };

async function runBatch(ctx: StrategyContext, batch: Batch<MasterListEntry>): Promise<BatchOutcome> {
  const log = ctx.log.child({ batch: batch.index, urls: batch.entries.length });
  const allowedUrls = new Set(batch.entries.map((entry) => entry.original));
  const urlPattern = batchUrlPattern(ctx.domain, batch.entries);

  try {
    const rows = await ctx.archive.queryCaptures({
      urlPattern,
      window: ctx.window,
      limit: ctx.settings.batchQueryLimit,
    });
    const { index, stats } = buildIndex(rows, ctx.targetTimestamp, allowedUrls);
    log.debug({ rows: stats.rows, invalid: stats.invalid, matched: index.size }, 'Batch indexed');
    return { ok: true, batch: batch.index, index, stats };
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    log.warn({ pattern: urlPattern, err: error }, 'Batch failed, continuing without it');
    return { ok: false, batch: batch.index, error };
  }
}

/**
 * Splits the master list into batches, queries and indexes them concurrently,
 * then merges the per-batch indexes once every batch has settled. Workers
 * share no state; the merge runs in batch order so output is reproducible.
 */
export async function resolveParallel(ctx: StrategyContext): Promise<StrategyOutcome> {
  const batches = partitionBatches(ctx.masterList, ctx.parallelism);
  const limit = pLimit(Math.max(1, Math.floor(ctx.parallelism)));
  const stats = emptyStats();

  ctx.log.info({ batches: batches.length, parallelism: ctx.parallelism }, 'Starting batch queries');

  const outcomes = await Promise.all(batches.map((batch) => limit(() => runBatch(ctx, batch))));
  outcomes.sort((a, b) => a.batch - b.batch);

  const indexes: SnapshotIndex[] = [];
  stats.batches.total = outcomes.length;
  for (const outcome of outcomes) {
    stats.queries++;
    if (!outcome.ok) {
      stats.failedQueries++;
      stats.batches.failed++;
      continue;
    }
    stats.rows += outcome.stats.rows;
    stats.invalidRows += outcome.stats.invalid;
    stats.filteredRows += outcome.stats.filtered;
    indexes.push(outcome.index);
  }

  if (stats.batches.failed > 0) {
    ctx.log.warn({ failed: stats.batches.failed, total: stats.batches.total }, 'Some batches failed');
  }

  return { index: mergeIndexes(indexes), stats };
}
