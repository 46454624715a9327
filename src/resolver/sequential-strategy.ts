import { nearestCapture } from '../engine/indexer.js';
import { mergeIndexes } from '../engine/merge.js';
import type { SnapshotIndex } from '../types/snapshot.js';
import { emptyStats, type StrategyContext, type StrategyOutcome } from './types.js';

/**
 * One narrow query per master-list URL, paced. The nearest row of each answer
 * is filed under the master-list URL even when the index returned a scheme or
 * host variant of it.
 */
export async function resolveSequential(ctx: StrategyContext): Promise<StrategyOutcome> {
  const stats = emptyStats();
  const indexes: SnapshotIndex[] = [];
  const total = ctx.masterList.length;

  for (const [position, entry] of ctx.masterList.entries()) {
    if (position === 0 || (position + 1) % 50 === 0) {
      ctx.log.info({ processed: position + 1, total }, 'Querying URLs');
    }

    await ctx.pacer.acquire();
    stats.queries++;
    try {
      const rows = await ctx.archive.queryCaptures({
        urlPattern: entry.original,
        window: ctx.window,
        limit: ctx.settings.batchQueryLimit,
      });
      const { candidate, stats: rowStats } = nearestCapture(rows, ctx.targetTimestamp);
      stats.rows += rowStats.rows;
      stats.invalidRows += rowStats.invalid;
      if (candidate) indexes.push(new Map([[entry.original, candidate]]));
    } catch (err) {
      stats.failedQueries++;
      ctx.log.warn(
        { url: entry.original, err: err instanceof Error ? err.message : String(err) },
        'URL query failed, skipping',
      );
    }
  }

  return { index: mergeIndexes(indexes), stats };
}
