import { EmptyWindowResultError } from '../errors.js';
import { buildIndex } from '../engine/indexer.js';
import { domainPattern } from '../engine/partition.js';
import { emptyStats, type StrategyContext, type StrategyOutcome } from './types.js';

/**
 * One domain-wide query. With a single aggregate query there is nothing to
 * fall back on, so a failed query propagates and an empty window is an error.
 */
export async function resolveDomainWide(ctx: StrategyContext): Promise<StrategyOutcome> {
  const urlPattern = domainPattern(ctx.domain);
  const stats = emptyStats();

  stats.queries++;
  const rows = await ctx.archive.queryCaptures({
    urlPattern,
    window: ctx.window,
    limit: ctx.settings.domainQueryLimit,
  });

  const { index, stats: indexStats } = buildIndex(rows, ctx.targetTimestamp);
  stats.rows = indexStats.rows;
  stats.invalidRows = indexStats.invalid;

  if (indexStats.accepted === 0) {
    throw new EmptyWindowResultError(urlPattern, ctx.window.from, ctx.window.to);
  }

  ctx.log.info({ rows: indexStats.rows, urls: index.size }, 'Domain captures indexed');
  if (indexStats.invalid > 0) {
    ctx.log.debug({ invalid: indexStats.invalid }, 'Dropped invalid capture rows');
  }

  return { index, stats };
}
