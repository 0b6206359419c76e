import { describe, expect, it } from 'vitest';
import { partition } from '../src/converter/partition.js';
import { pageIndices, rangeSize } from '../src/converter/types.js';

describe('partition', () => {
  it('gives the first total % parts ranges one extra page', () => {
    expect(partition(10, 3)).toEqual([
      { start: 0, end: 4 },
      { start: 4, end: 7 },
      { start: 7, end: 10 },
    ]);
  });

  it('returns no ranges for an empty document', () => {
    expect(partition(0, 4)).toEqual([]);
    expect(partition(-3, 2)).toEqual([]);
  });

  it('treats zero, negative and NaN parts as one range', () => {
    expect(partition(5, 0)).toEqual([{ start: 0, end: 5 }]);
    expect(partition(5, -2)).toEqual([{ start: 0, end: 5 }]);
    expect(partition(5, Number.NaN)).toEqual([{ start: 0, end: 5 }]);
  });

  it('never produces more ranges than pages', () => {
    expect(partition(3, 8)).toEqual([
      { start: 0, end: 1 },
      { start: 1, end: 2 },
      { start: 2, end: 3 },
    ]);
  });

  it('floors fractional part counts', () => {
    expect(partition(4, 2.9)).toEqual([
      { start: 0, end: 2 },
      { start: 2, end: 4 },
    ]);
  });

  it('covers every page exactly once with balanced, ascending ranges', () => {
    for (let total = 0; total <= 40; total += 1) {
      for (let parts = 1; parts <= 12; parts += 1) {
        const ranges = partition(total, parts);
        const covered = ranges.flatMap(pageIndices);
        expect(covered).toEqual(Array.from({ length: total }, (_, i) => i));

        const sizes = ranges.map(rangeSize);
        if (sizes.length > 0) {
          expect(Math.max(...sizes) - Math.min(...sizes)).toBeLessThanOrEqual(1);
          expect(Math.min(...sizes)).toBeGreaterThan(0);
        }
        expect(ranges.length).toBe(Math.min(total, parts));
      }
    }
  });

  it('is deterministic for the same inputs', () => {
    expect(partition(97, 7)).toEqual(partition(97, 7));
  });
});
