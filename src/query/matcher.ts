import { applyOperator } from './operators.js';
import { assertNever } from './types.js';
import type { Query } from './types.js';

export type RecordLike = Readonly<Record<string, unknown>>;

/**
 * Evaluates a query against one record in process. A missing attribute
 * reads as null.
 */
export function matches(record: RecordLike, query: Query | null): boolean {
  if (query === null) return true;

  if (query.kind === 'raw') {
    const fieldValue = Object.prototype.hasOwnProperty.call(record, query.attribute)
      ? record[query.attribute]
      : null;
    return applyOperator(query.operator, fieldValue, query.argument);
  }

  const operator = query.operator;
  switch (operator) {
    case 'and':
      return query.nodes.every((node) => matches(record, node));
    case 'or':
      return query.nodes.some((node) => matches(record, node));
    case 'not':
      return !query.nodes.every((node) => matches(record, node));
    default:
      return assertNever(operator, 'Unknown QueryGroup operator');
  }
}

/** Returns a predicate bound to `query`, for use with Array#filter. */
export function matcherFor(query: Query | null): (record: RecordLike) => boolean {
  return (record) => matches(record, query);
}
