import { matchSnapshots } from '../engine/matcher.js';
import { computeWindow, parseTargetDate, toTargetTimestamp } from '../utils/date.js';
import { logger } from '../utils/logger.js';
import { resolveDomainWide } from './domain-strategy.js';
import { resolveParallel } from './parallel-strategy.js';
import { resolveSequential } from './sequential-strategy.js';
import type {
  ConcreteStrategy,
  ResolutionRequest,
  ResolutionResult,
  ResolverDeps,
  StrategyContext,
  StrategyOutcome,
} from './types.js';

const STRATEGIES: Record<ConcreteStrategy, (ctx: StrategyContext) => Promise<StrategyOutcome>> = {
  domain: resolveDomainWide,
  parallel: resolveParallel,
  sequential: resolveSequential,
};

export function pickStrategy(
  requested: ResolutionRequest['strategy'],
  masterListSize: number,
  parallelism: number,
  sequentialThreshold: number,
): ConcreteStrategy {
  if (requested && requested !== 'auto') return requested;
  if (masterListSize < sequentialThreshold) return 'sequential';
  return parallelism > 1 ? 'parallel' : 'domain';
}

/**
 * Resolves every master-list URL to its capture nearest the target date.
 * The date is validated before anything touches the network.
 */
export async function resolveSnapshots(
  request: ResolutionRequest,
  deps: ResolverDeps,
): Promise<ResolutionResult> {
  const targetDate = parseTargetDate(request.targetDate);
  const window = computeWindow(targetDate, deps.settings.windowDays);
  const parallelism = request.parallelism ?? deps.settings.parallelism;
  const strategy = pickStrategy(
    request.strategy,
    request.masterList.length,
    parallelism,
    deps.settings.sequentialThreshold,
  );

  const log = logger.child({ domain: request.domain, targetDate, strategy });
  log.info({ from: window.from, to: window.to, urls: request.masterList.length }, 'Resolving snapshots');

  const { index, stats } = await STRATEGIES[strategy]({
    domain: request.domain,
    masterList: request.masterList,
    targetTimestamp: toTargetTimestamp(targetDate),
    window,
    parallelism,
    archive: deps.archive,
    pacer: deps.pacer,
    settings: deps.settings,
    log,
  });

  const snapshots = matchSnapshots(request.masterList, index, deps.settings.archiveBaseUrl);
  log.info(
    { indexedUrls: index.size, matched: snapshots.length, failedQueries: stats.failedQueries },
    'Resolution finished',
  );

  return {
    strategy,
    window,
    snapshots,
    noMatches: snapshots.length === 0,
    stats: { ...stats, indexedUrls: index.size },
  };
}
