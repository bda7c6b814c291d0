import type { PaperRecord } from '../api/source';

/**
 * Oldest first; papers without a year go last. Array.prototype.sort is stable,
 * so equal years keep the order the source returned.
 */
export function sortByYear<T extends Pick<PaperRecord, 'year'>>(references: readonly T[]): T[] {
  const key = (r: T) => r.year ?? Number.POSITIVE_INFINITY;
  return [...references].sort((a, b) => {
    const ya = key(a);
    const yb = key(b);
    if (ya === yb) return 0;
    return ya < yb ? -1 : 1;
  });
}
