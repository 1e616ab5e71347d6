import { and, not, or, where } from '../src/query/builder.js';
import type { Query } from '../src/query/types.js';

export interface Person extends Record<string, unknown> {
  id: number;
  name: string;
  age: number;
  city?: string | null;
  active: boolean;
}

// Carol's city is null and dave.smith has none at all.
export const PEOPLE: readonly Person[] = [
  { id: 1, name: 'Alice', age: 30, city: 'Paris', active: true },
  { id: 2, name: 'bob', age: 25, city: 'Berlin', active: false },
  { id: 3, name: 'Carol', age: 35, city: null, active: true },
  { id: 4, name: 'dave.smith', age: 25, active: false },
  { id: 5, name: 'Eve', age: 41, city: 'paris', active: true },
];

export const ALL_IDS = [1, 2, 3, 4, 5];

export interface QueryCase {
  name: string;
  query: Query;
  ids: number[];
}

export const QUERY_CASES: readonly QueryCase[] = [
  { name: 'eq string', query: where('city').eq('Paris'), ids: [1] },
  { name: 'ne string', query: where('city').ne('Paris'), ids: [2, 3, 4, 5] },
  { name: 'eq null', query: where('city').eq(null), ids: [3, 4] },
  { name: 'ne null', query: where('city').ne(null), ids: [1, 2, 5] },
  { name: 'gt number', query: where('age').gt(30), ids: [3, 5] },
  { name: 'gte number', query: where('age').gte(30), ids: [1, 3, 5] },
  { name: 'lt number', query: where('age').lt(30), ids: [2, 4] },
  { name: 'lte number', query: where('age').lte(25), ids: [2, 4] },
  { name: 'in numbers', query: where('age').in([25, 41]), ids: [2, 4, 5] },
  { name: 'nin numbers', query: where('age').nin([25, 41]), ids: [1, 3] },
  { name: 'in with null', query: where('city').in(['Paris', null]), ids: [1, 3, 4] },
  { name: 'nin with null', query: where('city').nin(['Paris', null]), ids: [2, 5] },
  { name: 'contains', query: where('name').contains('o'), ids: [2, 3] },
  { name: 'icontains', query: where('name').icontains('A'), ids: [1, 3, 4] },
  { name: 'startswith', query: where('name').startswith('da'), ids: [4] },
  { name: 'endswith with regex metacharacter', query: where('name').endswith('.smith'), ids: [4] },
  { name: 'contains on nullable field', query: where('city').contains('ar'), ids: [1, 5] },
  { name: 'gt string', query: where('city').gt('M'), ids: [1, 5] },
  { name: 'eq boolean', query: where('active').eq(true), ids: [1, 3, 5] },
  { name: 'and merging one attribute', query: and(where('age').gte(25), where('age').lt(35)), ids: [1, 2, 4] },
  { name: 'and with clashing operators', query: and(where('age').gt(20), where('age').gt(26)), ids: [1, 3, 5] },
  { name: 'or', query: or(where('city').eq('Berlin'), where('age').gt(40)), ids: [2, 5] },
  { name: 'not leaf', query: not(where('city').eq('Paris')), ids: [2, 3, 4, 5] },
  {
    name: 'not over or',
    query: not(or(where('age').lt(30), where('active').eq(false))),
    ids: [1, 3, 5],
  },
  {
    name: 'nested not inside and',
    query: and(not(where('city').in(['Paris', 'paris'])), where('name').icontains('e')),
    ids: [4],
  },
];

export function sortedKeys(keys: readonly (string | number)[]): number[] {
  return keys.map(Number).sort((a, b) => a - b);
}
