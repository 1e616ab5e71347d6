import { isDeepStrictEqual } from 'node:util';
import type { OperatorName } from './types.js';

export type Comparator = (fieldValue: unknown, argument: unknown) => boolean;

function normalize(value: unknown): unknown {
  return value === undefined ? null : value;
}

export function valuesEqual(a: unknown, b: unknown): boolean {
  return isDeepStrictEqual(normalize(a), normalize(b));
}

function typeLabel(value: unknown): string {
  if (value === null) return 'null';
  if (value instanceof Date) return 'Date';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Total order over numbers, strings and Dates. Operands of different kinds
 * (or of any other kind) are not order-comparable and raise a TypeError.
 */
export function compareValues(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() - b.getTime();
  }
  throw new TypeError(`Cannot order-compare ${typeLabel(a)} with ${typeLabel(b)}`);
}

// A missing field never satisfies a range predicate.
function range(test: (order: number) => boolean): Comparator {
  return (fieldValue, argument) => {
    if (fieldValue === null || fieldValue === undefined) return false;
    return test(compareValues(fieldValue, argument));
  };
}

function member(fieldValue: unknown, argument: unknown): boolean {
  if (!Array.isArray(argument)) {
    throw new TypeError(`Set operators need an array argument, got ${typeLabel(argument)}`);
  }
  return argument.some((candidate) => valuesEqual(fieldValue, candidate));
}

function text(test: (field: string, argument: string) => boolean): Comparator {
  return (fieldValue, argument) => {
    if (typeof fieldValue !== 'string' || typeof argument !== 'string') return false;
    return test(fieldValue, argument);
  };
}

/**
 * Reference semantics for every operator. The in-process matcher applies
 * these directly; each translator reproduces them in its backend's dialect.
 */
export const OPERATORS: Readonly<Record<OperatorName, Comparator>> = Object.freeze({
  eq: (fieldValue, argument) => valuesEqual(fieldValue, argument),
  ne: (fieldValue, argument) => !valuesEqual(fieldValue, argument),
  gt: range((order) => order > 0),
  gte: range((order) => order >= 0),
  lt: range((order) => order < 0),
  lte: range((order) => order <= 0),
  in: member,
  nin: (fieldValue, argument) => !member(fieldValue, argument),
  contains: text((field, arg) => field.includes(arg)),
  icontains: text((field, arg) => field.toLowerCase().includes(arg.toLowerCase())),
  startswith: text((field, arg) => field.startsWith(arg)),
  endswith: text((field, arg) => field.endsWith(arg)),
});

export function applyOperator(operator: OperatorName, fieldValue: unknown, argument: unknown): boolean {
  return OPERATORS[operator](fieldValue, argument);
}
