import { describe, it, expect } from 'vitest';
import { buildIndex } from '../../src/engine/indexer.js';
import { buildArchiveUrl, matchSnapshots, rankSnapshots } from '../../src/engine/matcher.js';
import type { Snapshot } from '../../src/types/snapshot.js';
import { cdxRow } from '../helpers/archive.js';

const TARGET = '20191115000000';
const ARCHIVE = 'https://web.archive.org/web';

function snapshot(url: string, daysDiff: number): Snapshot {
  return {
    archive_url: `${ARCHIVE}/20191115000000/${url}`,
    timestamp: '20191115000000',
    original_url: url,
    status_code: '200',
    size_bytes: 1,
    days_diff: daysDiff,
  };
}

describe('buildArchiveUrl', () => {
  it('should join base, timestamp and URL without escaping', () => {
    expect(buildArchiveUrl(`${ARCHIVE}/`, '20191110000000', 'https://a.com/x?q=1 2')).toBe(
      'https://web.archive.org/web/20191110000000/https://a.com/x?q=1 2',
    );
  });
});

describe('matchSnapshots', () => {
  it('should emit a snapshot for each matched master-list URL', () => {
    const { index } = buildIndex(
      [cdxRow('20191110000000', 'a.com/x', '6000'), cdxRow('20191201000000', 'a.com/x', '7000')],
      TARGET,
    );

    expect(matchSnapshots([{ original: 'a.com/x' }], index, ARCHIVE)).toEqual([
      {
        archive_url: 'https://web.archive.org/web/20191110000000/a.com/x',
        timestamp: '20191110000000',
        original_url: 'a.com/x',
        status_code: '200',
        size_bytes: 6000,
        days_diff: 5,
      },
    ]);
  });

  it('should omit URLs the archive has no capture for', () => {
    const { index } = buildIndex(
      [cdxRow('20191110000000', 'a.com/1'), cdxRow('20191112000000', 'a.com/3')],
      TARGET,
    );

    const snapshots = matchSnapshots(
      [{ original: 'a.com/1' }, { original: 'a.com/2' }, { original: 'a.com/3' }],
      index,
      ARCHIVE,
    );

    expect(snapshots.map((s) => s.original_url)).toEqual(['a.com/3', 'a.com/1']);
  });

  it('should emit a URL listed twice only once', () => {
    const { index } = buildIndex([cdxRow('20191110000000', 'a.com/1')], TARGET);

    const snapshots = matchSnapshots([{ original: 'a.com/1' }, { original: 'a.com/1' }], index, ARCHIVE);

    expect(snapshots).toHaveLength(1);
  });

  it('should return frozen records', () => {
    const { index } = buildIndex([cdxRow('20191110000000', 'a.com/1')], TARGET);

    const [first] = matchSnapshots([{ original: 'a.com/1' }], index, ARCHIVE);

    expect(Object.isFrozen(first)).toBe(true);
  });
});

describe('rankSnapshots', () => {
  it('should sort by days_diff and keep input order for ties', () => {
    const ranked = rankSnapshots([
      snapshot('c', 3),
      snapshot('a', 1),
      snapshot('d', 3),
      snapshot('b', 1),
      snapshot('e', 0),
    ]);

    expect(ranked.map((s) => s.original_url)).toEqual(['e', 'a', 'b', 'c', 'd']);
  });

  it('should not mutate its input', () => {
    const input = [snapshot('b', 2), snapshot('a', 1)];
    rankSnapshots(input);

    expect(input.map((s) => s.original_url)).toEqual(['b', 'a']);
  });
});
