import { PageRange, PartitionInputError, rangeSize } from './types.js';

function normalizeParts(total: number, parts: number): number {
  const whole = Number.isNaN(parts) ? 1 : Math.floor(parts);
  return Math.max(1, Math.min(whole, total));
}

/**
 * Split `[0, total)` into at most `parts` contiguous ranges whose sizes differ
 * by at most one. The first `total % parts` ranges get the extra page.
 *
 * @example
 * partition(10, 3) // [{ start: 0, end: 4 }, { start: 4, end: 7 }, { start: 7, end: 10 }]
 */
export function partition(total: number, parts: number): PageRange[] {
  if (!Number.isFinite(total) || total <= 0) return [];

  const pages = Math.floor(total);
  const count = normalizeParts(pages, parts);
  const base = Math.floor(pages / count);
  const extra = pages % count;

  const ranges: PageRange[] = [];
  let start = 0;
  for (let i = 0; i < count; i += 1) {
    const size = base + (i < extra ? 1 : 0);
    ranges.push({ start, end: start + size });
    start += size;
  }

  assertCovers(ranges, pages, count);
  return ranges;
}

function assertCovers(ranges: readonly PageRange[], total: number, parts: number): void {
  let expected = 0;
  for (const range of ranges) {
    if (range.start !== expected || rangeSize(range) === 0) {
      throw new PartitionInputError(`Partition left a gap or empty range at page index ${expected}`, total, parts);
    }
    expected = range.end;
  }
  if (expected !== total) {
    throw new PartitionInputError(`Partition covered ${expected} of ${total} pages`, total, parts);
  }
}
