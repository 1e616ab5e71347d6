import type { Document } from 'mongodb';
import { InvalidQueryGroupError, UnsupportedOperatorError } from '../../errors.js';
import type { Query, QueryGroup, RawQuery } from '../types.js';
import { escapeRegExp } from './regex.js';

const BACKEND = 'document';

function stringArgument(query: RawQuery): string {
  if (typeof query.argument !== 'string') {
    throw new UnsupportedOperatorError(query.operator, BACKEND, `Operator "${query.operator}" needs a string argument`);
  }
  return query.argument;
}

function listArgument(query: RawQuery): unknown[] {
  if (!Array.isArray(query.argument)) {
    throw new UnsupportedOperatorError(query.operator, BACKEND, `Operator "${query.operator}" needs an array argument`);
  }
  return [...query.argument];
}

function compileLeaf(query: RawQuery): Document {
  const { attribute, operator, argument } = query;
  switch (operator) {
    case 'eq':
    case 'ne':
    case 'gt':
    case 'gte':
    case 'lt':
    case 'lte':
      return { [attribute]: { [`$${operator}`]: argument } };
    case 'in':
    case 'nin':
      return { [attribute]: { [`$${operator}`]: listArgument(query) } };
    case 'contains':
      return { [attribute]: { $regex: new RegExp(escapeRegExp(stringArgument(query))) } };
    case 'icontains':
      return { [attribute]: { $regex: new RegExp(escapeRegExp(stringArgument(query)), 'i') } };
    case 'startswith':
      return { [attribute]: { $regex: new RegExp(`^${escapeRegExp(stringArgument(query))}`) } };
    case 'endswith':
      return { [attribute]: { $regex: new RegExp(`${escapeRegExp(stringArgument(query))}$`) } };
    default: {
      const unknownOperator: never = operator;
      throw new UnsupportedOperatorError(String(unknownOperator), BACKEND);
    }
  }
}

function isOperatorDict(value: unknown): value is Document {
  if (typeof value !== 'object' || value === null) return false;
  if (Array.isArray(value) || value instanceof RegExp || value instanceof Date) return false;
  const keys = Object.keys(value);
  return keys.length > 0 && keys.every((key) => key.startsWith('$'));
}

/**
 * Merges `clause` into `target` when every key either is new or names an
 * attribute whose operators do not collide. All-or-nothing: returns false
 * and leaves `target` untouched otherwise.
 */
function mergeClause(target: Document, clause: Document): boolean {
  for (const [key, value] of Object.entries(clause)) {
    if (!(key in target)) continue;
    if (key.startsWith('$')) return false;
    const existing: unknown = target[key];
    if (!isOperatorDict(existing) || !isOperatorDict(value)) return false;
    if (Object.keys(value).some((op) => op in existing)) return false;
  }
  for (const [key, value] of Object.entries(clause)) {
    const existing: unknown = target[key];
    target[key] = isOperatorDict(existing) ? { ...existing, ...value } : value;
  }
  return true;
}

function compileAnd(nodes: readonly Query[]): Document {
  const merged: Document = {};
  const overflow: Document[] = [];
  for (const node of nodes) {
    const clause = compileNode(node);
    if (!mergeClause(merged, clause)) overflow.push(clause);
  }
  if (overflow.length === 0) return merged;
  return { $and: [merged, ...overflow] };
}

function compileGroup(group: QueryGroup): Document {
  switch (group.operator) {
    case 'and':
      return compileAnd(group.nodes);
    case 'or':
      return { $or: group.nodes.map(compileNode) };
    case 'not':
      // MongoDB has no document-level $not; $nor over one clause negates it.
      return { $nor: group.nodes.map(compileNode) };
    default: {
      const unknownOperator: never = group.operator;
      throw new InvalidQueryGroupError(unknownOperator);
    }
  }
}

function compileNode(query: Query): Document {
  return query.kind === 'raw' ? compileLeaf(query) : compileGroup(query);
}

/**
 * Compiles a Query into a MongoDB filter document. Sibling leaves under an
 * AND share one object keyed by attribute; colliding operators fall back to
 * an explicit `$and`.
 */
export function translateDocumentQuery(query: Query | null): Document {
  if (query === null) return {};
  return compileNode(query);
}
