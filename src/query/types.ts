export const OPERATOR_NAMES = [
  'eq',
  'ne',
  'gt',
  'gte',
  'lt',
  'lte',
  'in',
  'nin',
  'contains',
  'icontains',
  'startswith',
  'endswith',
] as const;

export type OperatorName = (typeof OPERATOR_NAMES)[number];

export const EQUALITY_OPERATORS = ['eq', 'ne'] as const;
export const RANGE_OPERATORS = ['gt', 'gte', 'lt', 'lte'] as const;
export const SET_OPERATORS = ['in', 'nin'] as const;
export const STRING_OPERATORS = ['contains', 'icontains', 'endswith', 'startswith'] as const;
export const NEGATION_OPERATORS = ['ne', 'nin'] as const;

export type RangeOperator = (typeof RANGE_OPERATORS)[number];
export type StringOperator = (typeof STRING_OPERATORS)[number];

export const BOOL_OPERATORS = ['and', 'or', 'not'] as const;

export type BoolOp = (typeof BOOL_OPERATORS)[number];

/** Leaf predicate: `attribute <operator> argument`. */
export interface RawQuery {
  readonly kind: 'raw';
  readonly attribute: string;
  readonly operator: OperatorName;
  readonly argument: unknown;
}

export interface QueryGroup {
  readonly kind: 'group';
  readonly operator: BoolOp;
  readonly nodes: readonly Query[];
}

export type Query = RawQuery | QueryGroup;

export function isOperatorName(value: unknown): value is OperatorName {
  return OPERATOR_NAMES.some((name) => name === value);
}

export function isBoolOp(value: unknown): value is BoolOp {
  return BOOL_OPERATORS.some((name) => name === value);
}

export function isStringOperator(op: OperatorName): op is StringOperator {
  return STRING_OPERATORS.some((name) => name === op);
}

/**
 * Compile-time exhaustiveness guard for switches over the Query union and
 * its operator enums.
 */
export function assertNever(value: never, message: string): never {
  throw new TypeError(`${message}: ${String(value)}`);
}
