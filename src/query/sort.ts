import type { ImageRecord } from '../types/index.js';
import type { SortClause, SortDirection } from '../expression/types.js';
import { resolveProperty } from '../expression/properties.js';

/**
 * A value a sort key can take; null means absent
 */
export type SortKey = string | number | boolean | Date | null;

export type ImageComparator = (a: ImageRecord, b: ImageRecord) => number;

function rank(value: Exclude<SortKey, null>): number {
  if (value instanceof Date) return 0;
  switch (typeof value) {
    case 'number':
      return 1;
    case 'boolean':
      return 2;
    default:
      return 3;
  }
}

/**
 * Order two present sort keys.
 *
 * Numbers compare numerically, dates chronologically, strings by code unit
 * and booleans false before true. Keys of different kinds order as
 * date, number, boolean, string.
 */
export function compareSortKeys(a: Exclude<SortKey, null>, b: Exclude<SortKey, null>): number {
  if (a instanceof Date && b instanceof Date) {
    return Math.sign(a.getTime() - b.getTime());
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return Math.sign(a - b);
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return a === b ? 0 : a ? 1 : -1;
  }
  return Math.sign(rank(a) - rank(b));
}

/**
 * Order two keys in the given direction. Absent keys go last either way.
 */
export function compareWithDirection(a: SortKey, b: SortKey, direction: SortDirection): number {
  if (a === null || b === null) {
    if (a === b) return 0;
    return a === null ? 1 : -1;
  }
  const order = compareSortKeys(a, b);
  return direction === 'desc' ? -order : order;
}

/**
 * Build a key reader for a property path, using the same resolution as
 * filter expressions.
 *
 * @throws ParseError if the path does not name a known property
 */
export function createKeyReader(
  path: readonly string[],
  position = 0,
  source = path.join('.')
): (image: ImageRecord) => SortKey {
  const { evaluate } = resolveProperty(path, position, source);
  return (image) => evaluate(image);
}

/**
 * Build a comparator for a sort clause.
 * @throws ParseError if the clause path does not name a known property
 */
export function createSortComparator(clause: SortClause, source?: string): ImageComparator {
  const readKey = createKeyReader(clause.path, clause.position, source);
  const direction = clause.direction;
  return (a, b) => compareWithDirection(readKey(a), readKey(b), direction);
}

/**
 * Return a sorted copy of the images. Ties keep their input order.
 */
export function sortImages<T extends ImageRecord>(
  images: readonly T[],
  readKey: (image: ImageRecord) => SortKey,
  direction: SortDirection
): T[] {
  return images
    .map((image, index) => ({ image, index, key: readKey(image) }))
    .sort((a, b) => compareWithDirection(a.key, b.key, direction) || a.index - b.index)
    .map((entry) => entry.image);
}
