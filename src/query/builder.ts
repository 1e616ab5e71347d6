import { isDeepStrictEqual } from 'node:util';
import { InvalidQueryGroupError, MalformedQueryError } from '../errors.js';
import { isBoolOp, isOperatorName, isStringOperator } from './types.js';
import type { BoolOp, OperatorName, Query, QueryGroup, RawQuery } from './types.js';

/**
 * Builds a leaf predicate. Shape errors surface here rather than in a
 * translator, so every Query that exists is well formed.
 */
export function rawQuery(attribute: string, operator: OperatorName, argument: unknown): RawQuery {
  if (typeof attribute !== 'string' || attribute.length === 0) {
    throw new MalformedQueryError('RawQuery attribute must be a non-empty string');
  }
  if (!isOperatorName(operator)) {
    throw new MalformedQueryError(`Unknown operator ${JSON.stringify(operator)}`);
  }
  if ((operator === 'in' || operator === 'nin') && !Array.isArray(argument)) {
    throw new MalformedQueryError(`Operator "${operator}" needs an array argument`);
  }
  if (isStringOperator(operator) && typeof argument !== 'string') {
    throw new MalformedQueryError(`Operator "${operator}" needs a string argument`);
  }
  const node: RawQuery = {
    kind: 'raw',
    attribute,
    operator,
    argument: Array.isArray(argument) ? Object.freeze([...argument]) : argument,
  };
  return Object.freeze(node);
}

export function queryGroup(operator: BoolOp, nodes: readonly Query[]): QueryGroup {
  if (!isBoolOp(operator)) {
    throw new InvalidQueryGroupError(operator);
  }
  if (operator === 'not' && nodes.length !== 1) {
    throw new MalformedQueryError(`"not" takes exactly one node, got ${nodes.length}`);
  }
  if (nodes.length === 0) {
    throw new MalformedQueryError(`"${operator}" needs at least one node`);
  }
  const group: QueryGroup = { kind: 'group', operator, nodes: Object.freeze([...nodes]) };
  return Object.freeze(group);
}

export function and(...nodes: Query[]): QueryGroup {
  return queryGroup('and', nodes);
}

export function or(...nodes: Query[]): QueryGroup {
  return queryGroup('or', nodes);
}

export function not(node: Query): QueryGroup {
  return queryGroup('not', [node]);
}

/**
 * Fluent leaf construction: `where('age').gte(18)`.
 */
export class AttributeSelector {
  constructor(private readonly _attribute: string) {}

  eq(value: unknown): RawQuery { return rawQuery(this._attribute, 'eq', value); }
  ne(value: unknown): RawQuery { return rawQuery(this._attribute, 'ne', value); }
  gt(value: unknown): RawQuery { return rawQuery(this._attribute, 'gt', value); }
  gte(value: unknown): RawQuery { return rawQuery(this._attribute, 'gte', value); }
  lt(value: unknown): RawQuery { return rawQuery(this._attribute, 'lt', value); }
  lte(value: unknown): RawQuery { return rawQuery(this._attribute, 'lte', value); }
  in(values: readonly unknown[]): RawQuery { return rawQuery(this._attribute, 'in', values); }
  nin(values: readonly unknown[]): RawQuery { return rawQuery(this._attribute, 'nin', values); }
  contains(text: string): RawQuery { return rawQuery(this._attribute, 'contains', text); }
  icontains(text: string): RawQuery { return rawQuery(this._attribute, 'icontains', text); }
  startswith(text: string): RawQuery { return rawQuery(this._attribute, 'startswith', text); }
  endswith(text: string): RawQuery { return rawQuery(this._attribute, 'endswith', text); }
}

export function where(attribute: string): AttributeSelector {
  return new AttributeSelector(attribute);
}

/** Structural equality; identity plays no part. */
export function queryEquals(a: Query, b: Query): boolean {
  return isDeepStrictEqual(a, b);
}

/**
 * Canonical single-line rendering, e.g. `(age gte 18 and not(name eq "x"))`.
 */
export function describeQuery(query: Query | null): string {
  if (query === null) return '*';
  if (query.kind === 'raw') {
    const argument = query.argument instanceof Date ? query.argument.toISOString() : query.argument;
    return `${query.attribute} ${query.operator} ${JSON.stringify(argument) ?? 'undefined'}`;
  }
  if (query.operator === 'not') {
    return `not(${describeQuery(query.nodes[0] ?? null)})`;
  }
  return `(${query.nodes.map(describeQuery).join(` ${query.operator} `)})`;
}
