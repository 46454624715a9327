import { describe, it, expect } from 'vitest';
import { batchUrlPattern, domainPattern, partitionBatches } from '../../src/engine/partition.js';

const range = (n: number) => Array.from({ length: n }, (_, i) => i);

describe('partitionBatches', () => {
  it('should cut ceil(n / P) sized contiguous batches', () => {
    const batches = partitionBatches(range(7), 3);

    expect(batches).toEqual([
      { index: 0, entries: [0, 1, 2] },
      { index: 1, entries: [3, 4, 5] },
      { index: 2, entries: [6] },
    ]);
  });

  it('should not return empty trailing batches', () => {
    const batches = partitionBatches(range(10), 8);

    expect(batches.map((b) => b.index)).toEqual([0, 1, 2, 3, 4]);
    expect(batches.every((b) => b.entries.length === 2)).toBe(true);
  });

  it('should preserve every item exactly once and in order', () => {
    const items = range(23);
    const batches = partitionBatches(items, 4);

    expect(batches.flatMap((b) => b.entries)).toEqual(items);
  });

  it('should treat parallelism below one as one batch', () => {
    expect(partitionBatches(range(3), 0)).toEqual([{ index: 0, entries: [0, 1, 2] }]);
  });

  it('should return nothing for an empty list', () => {
    expect(partitionBatches([], 8)).toEqual([]);
  });
});

describe('batchUrlPattern', () => {
  it('should query a lone URL directly', () => {
    expect(batchUrlPattern('a.com', [{ original: 'https://a.com/x' }])).toBe('https://a.com/x');
  });

  it('should use the domain wildcard for larger batches', () => {
    expect(batchUrlPattern('a.com', [{ original: 'https://a.com/x' }, { original: 'https://a.com/y' }])).toBe(
      'a.com/*',
    );
  });

  it('should not double the slash', () => {
    expect(domainPattern('a.com/')).toBe('a.com/*');
  });
});
