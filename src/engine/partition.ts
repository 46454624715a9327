import type { MasterListEntry } from '../types/master-list.js';

export interface Batch<T> {
  /** Position in `0..P-1`; also the merge order */
  index: number;
  entries: T[];
}

/**
 * Splits items into at most `parallelism` contiguous batches of
 * `ceil(n / P)` items. Empty trailing batches are not returned.
 */
export function partitionBatches<T>(items: readonly T[], parallelism: number): Batch<T>[] {
  const slots = Math.max(1, Math.floor(parallelism));
  if (items.length === 0) return [];

  const size = Math.ceil(items.length / slots);
  const batches: Batch<T>[] = [];
  for (let i = 0; i < slots; i++) {
    const entries = items.slice(i * size, (i + 1) * size);
    if (entries.length === 0) break;
    batches.push({ index: i, entries });
  }
  return batches;
}

/** A one-URL batch can ask for that URL; larger batches need the domain wildcard. */
export function batchUrlPattern(domain: string, entries: readonly MasterListEntry[]): string {
  const [only] = entries;
  if (entries.length === 1 && only) return only.original;
  return domainPattern(domain);
}

export function domainPattern(domain: string): string {
  return `${domain.replace(/\/+$/, '')}/*`;
}
