import type { ArxivEntry } from '../types';

/**
 * Accept an entry when it shares at least one category with the requested set
 * and was published within [startYear, endYear].
 */
export function acceptEntry(
  entry: Pick<ArxivEntry, 'categories' | 'year'>,
  categories: ReadonlySet<string>,
  startYear: number,
  endYear: number
): boolean {
  return entry.categories.some(category => categories.has(category))
    && startYear <= entry.year
    && entry.year <= endYear;
}
