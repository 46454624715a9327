import { QueryFailedError } from '../errors.js';
import type { CaptureQuery, RawCaptureRow } from '../types/capture.js';
import { logger } from '../utils/logger.js';
import type { ArchiveIndex } from './cdx-client.js';

export interface RetryPolicy {
  retries: number;
  backoff: { type: 'exponential' | 'fixed'; delay: number };
}

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  if (policy.backoff.type === 'fixed') return policy.backoff.delay;
  return policy.backoff.delay * 2 ** (attempt - 1);
}

/**
 * Retries failed queries of the wrapped index. Only `QueryFailedError` is
 * retried; anything else is a bug and propagates immediately.
 */
export class RetryingArchiveIndex implements ArchiveIndex {
  constructor(
    private readonly inner: ArchiveIndex,
    private readonly policy: RetryPolicy,
    private readonly sleep: Sleep = defaultSleep,
  ) {}

  async queryCaptures(query: CaptureQuery): Promise<RawCaptureRow[]> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.inner.queryCaptures(query);
      } catch (err) {
        if (!(err instanceof QueryFailedError) || attempt > this.policy.retries) {
          throw err;
        }
        const delay = backoffDelay(this.policy, attempt);
        logger.warn(
          { pattern: query.urlPattern, attempt, delay, err: err.message },
          'Archive query failed, retrying',
        );
        await this.sleep(delay);
      }
    }
  }
}
