import { z } from 'zod';

const sizeSchema = z
  .union([z.number().nonnegative(), z.string().regex(/^\d+$/).transform(Number)])
  .default(0);

export const candidateListSchema = z.array(
  z.object({ original: z.string().min(1), size: sizeSchema }).passthrough(),
);

export type CandidateEntry = z.infer<typeof candidateListSchema>[number];

export type RankedEntry = CandidateEntry & { priority_score: number };

export interface DedupeOptions {
  /** Entries smaller than this many bytes are dropped first */
  minSize?: number;
}

export interface DedupeReport {
  input: number;
  afterSizeFilter: number;
  afterProtocolDedupe: number;
  afterContentDedupe: number;
  entries: RankedEntry[];
}

const NUMERIC_SUFFIX = /-\d+\/?$/;

/** http→https, `:80/` dropped, trailing slash dropped except on the site root. */
export function normalizeUrl(url: string): string {
  let normalized = url.replaceAll('http://', 'https://').replaceAll(':80/', '/');
  if (normalized.endsWith('/') && normalized.split('/').length - 1 > 3) {
    normalized = normalized.slice(0, -1);
  }
  return normalized;
}

/** Groups `/post-2`, `/post?x=1` and `/post#top` with `/post`. */
export function contentKey(url: string): string {
  const withoutSuffix = url.replace(NUMERIC_SUFFIX, '');
  return withoutSuffix.split('?')[0]?.split('#')[0] ?? withoutSuffix;
}

export function hasNumericSuffix(url: string): boolean {
  return NUMERIC_SUFFIX.test(url);
}

export function priorityScore(entry: CandidateEntry): number {
  const url = entry.original;
  const depth = url.split('/').slice(3).filter(Boolean).length;
  const sizeScore = entry.size / 1000;
  const depthScore = Math.max(0, 50 - depth * 5);
  const httpsBonus = url.startsWith('https://') ? 5 : 0;
  const encodingPenalty = url.split('%').length - 1;
  return sizeScore + depthScore + httpsBonus - encodingPenalty;
}

function groupBy(
  entries: readonly CandidateEntry[],
  keyOf: (url: string) => string,
  prefer: (candidate: CandidateEntry, current: CandidateEntry) => boolean,
): CandidateEntry[] {
  const groups = new Map<string, CandidateEntry>();
  for (const entry of entries) {
    const key = keyOf(entry.original);
    const current = groups.get(key);
    if (!current || prefer(entry, current)) {
      groups.set(key, entry);
    }
  }
  return [...groups.values()];
}

function preferHttpsThenSize(candidate: CandidateEntry, current: CandidateEntry): boolean {
  const candidateHttps = candidate.original.startsWith('https://');
  const currentHttps = current.original.startsWith('https://');
  if (candidateHttps !== currentHttps) return candidateHttps;
  return candidate.size > current.size;
}

function preferUnnumberedThenSize(candidate: CandidateEntry, current: CandidateEntry): boolean {
  const candidateNumbered = hasNumericSuffix(candidate.original);
  const currentNumbered = hasNumericSuffix(current.original);
  if (candidateNumbered !== currentNumbered) return !candidateNumbered;
  return candidate.size > current.size;
}

/**
 * Reduces raw captured URLs to one canonical entry per page: first across
 * protocol variants, then across content variants, then ranks by priority.
 */
export function dedupeMasterList(
  entries: readonly CandidateEntry[],
  options: DedupeOptions = {},
): DedupeReport {
  const minSize = options.minSize ?? 0;
  const sized = entries.filter((entry) => entry.size >= minSize);
  const protocolUnique = groupBy(sized, normalizeUrl, preferHttpsThenSize);
  const contentUnique = groupBy(protocolUnique, contentKey, preferUnnumberedThenSize);

  const ranked = contentUnique
    .map((entry) => ({ ...entry, priority_score: priorityScore(entry) }))
    .sort((a, b) => b.priority_score - a.priority_score);

  return {
    input: entries.length,
    afterSizeFilter: sized.length,
    afterProtocolDedupe: protocolUnique.length,
    afterContentDedupe: contentUnique.length,
    entries: ranked,
  };
}
