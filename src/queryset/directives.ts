import { compareValues } from '../query/operators.js';
import type { RawRecord } from '../types.js';

export interface SortKey {
  readonly attribute: string;
  readonly descending: boolean;
}

/**
 * Pending work for a QuerySet. Always applied in the same order: sort, then
 * offset, then limit.
 */
export interface Directives {
  readonly sortKeys: readonly SortKey[];
  readonly offset: number | null;
  readonly limit: number | null;
}

export const NO_DIRECTIVES: Directives = Object.freeze({ sortKeys: Object.freeze([]), offset: null, limit: null });

/** `'age'` sorts ascending, `'-age'` descending. */
export function parseSortKey(key: string): SortKey {
  const descending = key.startsWith('-');
  const attribute = descending ? key.slice(1) : key;
  if (attribute.length === 0) {
    throw new TypeError(`Sort key ${JSON.stringify(key)} does not name an attribute`);
  }
  return { attribute, descending };
}

export function formatSortKey(key: SortKey): string {
  return key.descending ? `-${key.attribute}` : key.attribute;
}

// Missing values order before everything else.
function compareForSort(a: unknown, b: unknown): number {
  const aMissing = a === null || a === undefined;
  const bMissing = b === null || b === undefined;
  if (aMissing || bMissing) return aMissing === bMissing ? 0 : aMissing ? -1 : 1;
  return compareValues(a, b);
}

/**
 * Stable multi-key sort: keys are applied last to first, each pass a stable
 * sort, so the first key ends up most significant.
 */
export function sortRecords(records: readonly RawRecord[], sortKeys: readonly SortKey[]): RawRecord[] {
  const sorted = [...records];
  for (const { attribute, descending } of [...sortKeys].reverse()) {
    sorted.sort((a, b) => {
      const order = compareForSort(a[attribute], b[attribute]);
      return descending ? -order : order;
    });
  }
  return sorted;
}

export function applyDirectives(records: readonly RawRecord[], directives: Directives): RawRecord[] {
  let result = sortRecords(records, directives.sortKeys);
  if (directives.offset !== null) {
    result = result.slice(directives.offset);
  }
  if (directives.limit !== null) {
    result = result.slice(0, directives.limit);
  }
  return result;
}
