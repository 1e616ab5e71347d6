import type { estypes } from '@elastic/elasticsearch';
import { InvalidQueryGroupError, MalformedQueryError, UnsupportedOperatorError } from '../../errors.js';
import type { Query, QueryGroup, RangeOperator, RawQuery } from '../types.js';
import { escapeLucene } from './regex.js';

const BACKEND = 'search';

export type Scalar = string | number | boolean;

export interface RegexpClause {
  value: string;
  case_insensitive?: boolean;
}

/**
 * Filter document in the classic and/or/not filter DSL. Each leaf carries a
 * single attribute key.
 */
export type SearchFilter =
  | { and: SearchFilter[] }
  | { or: SearchFilter[] }
  | { not: SearchFilter }
  | { term: Record<string, Scalar> }
  | { terms: Record<string, Scalar[]> }
  | { range: Record<string, Partial<Record<RangeOperator, Scalar>>> }
  | { prefix: Record<string, string> }
  | { regexp: Record<string, RegexpClause> }
  | { missing: { field: string } };

// Pattern templates for the string operators that have no native leaf.
const STRING_PATTERNS = {
  contains: (escaped: string) => `.*${escaped}.*`,
  icontains: (escaped: string) => `.*${escaped}.*`,
  endswith: (escaped: string) => `.*${escaped}`,
} as const;

function toScalar(query: RawQuery, value: unknown): Scalar {
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (value instanceof Date) return value.toISOString();
  throw new UnsupportedOperatorError(
    query.operator,
    BACKEND,
    `Operator "${query.operator}" on "${query.attribute}" needs a scalar argument for the ${BACKEND} backend`,
  );
}

function isNullish(value: unknown): boolean {
  return value === null || value === undefined;
}

function equalityFilter(query: RawQuery): SearchFilter {
  if (isNullish(query.argument)) {
    return { missing: { field: query.attribute } };
  }
  return { term: { [query.attribute]: toScalar(query, query.argument) } };
}

function membershipFilter(query: RawQuery): SearchFilter {
  if (!Array.isArray(query.argument)) {
    throw new UnsupportedOperatorError(query.operator, BACKEND, `Operator "${query.operator}" needs an array argument`);
  }
  const values: unknown[] = query.argument;
  const scalars = values.filter((value) => !isNullish(value)).map((value) => toScalar(query, value));
  const terms: SearchFilter = { terms: { [query.attribute]: scalars } };
  if (scalars.length === values.length) return terms;
  const missing: SearchFilter = { missing: { field: query.attribute } };
  return scalars.length === 0 ? missing : { or: [terms, missing] };
}

function stringArgument(query: RawQuery): string {
  if (typeof query.argument !== 'string') {
    throw new UnsupportedOperatorError(query.operator, BACKEND, `Operator "${query.operator}" needs a string argument`);
  }
  return query.argument;
}

function compileLeaf(query: RawQuery): SearchFilter {
  const { attribute, operator } = query;
  switch (operator) {
    case 'eq':
      return equalityFilter(query);
    case 'ne':
      // Negation wraps the positive clause of this leaf only.
      return { not: equalityFilter(query) };
    case 'gt':
    case 'gte':
    case 'lt':
    case 'lte':
      return { range: { [attribute]: { [operator]: toScalar(query, query.argument) } } };
    case 'in':
      return membershipFilter(query);
    case 'nin':
      return { not: membershipFilter(query) };
    case 'startswith':
      return { prefix: { [attribute]: stringArgument(query) } };
    case 'contains':
    case 'endswith':
      return { regexp: { [attribute]: { value: STRING_PATTERNS[operator](escapeLucene(stringArgument(query))) } } };
    case 'icontains':
      return {
        regexp: {
          [attribute]: {
            value: STRING_PATTERNS.icontains(escapeLucene(stringArgument(query))),
            case_insensitive: true,
          },
        },
      };
    default: {
      const unknownOperator: never = operator;
      throw new UnsupportedOperatorError(String(unknownOperator), BACKEND);
    }
  }
}

function compileGroup(group: QueryGroup): SearchFilter {
  switch (group.operator) {
    case 'and':
      return { and: group.nodes.map(compileNode) };
    case 'or':
      return { or: group.nodes.map(compileNode) };
    case 'not': {
      const [child] = group.nodes;
      if (child === undefined) throw new MalformedQueryError('"not" takes exactly one node');
      return { not: compileNode(child) };
    }
    default: {
      const unknownOperator: never = group.operator;
      throw new InvalidQueryGroupError(unknownOperator);
    }
  }
}

function compileNode(query: Query): SearchFilter {
  return query.kind === 'raw' ? compileLeaf(query) : compileGroup(query);
}

/** Compiles a Query into the and/or/not filter DSL. */
export function translateSearchFilter(query: Query): SearchFilter {
  return compileNode(query);
}

function lower(filter: SearchFilter): estypes.QueryDslQueryContainer {
  if ('and' in filter) {
    return { bool: { filter: filter.and.map(lower) } };
  }
  if ('or' in filter) {
    return { bool: { should: filter.or.map(lower), minimum_should_match: 1 } };
  }
  if ('not' in filter) {
    return { bool: { must_not: [lower(filter.not)] } };
  }
  if ('term' in filter) {
    const term: Record<string, estypes.QueryDslTermQuery> = {};
    for (const [field, value] of Object.entries(filter.term)) {
      term[field] = { value };
    }
    return { term };
  }
  if ('terms' in filter) {
    const terms: estypes.QueryDslTermsQuery = {};
    for (const [field, values] of Object.entries(filter.terms)) {
      terms[field] = values;
    }
    return { terms };
  }
  if ('range' in filter) {
    return { range: filter.range };
  }
  if ('prefix' in filter) {
    return { prefix: filter.prefix };
  }
  if ('regexp' in filter) {
    return { regexp: filter.regexp };
  }
  return { bool: { must_not: [{ exists: { field: filter.missing.field } }] } };
}

/**
 * Lowers a filter document into the `bool` query form accepted by current
 * Elasticsearch releases. A null query matches every document.
 */
export function toSearchQuery(query: Query | null): estypes.QueryDslQueryContainer {
  if (query === null) return { match_all: {} };
  return { bool: { filter: [lower(translateSearchFilter(query))] } };
}
