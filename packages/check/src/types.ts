/**
 * Expression descriptions consumed by argcheck and check
 */

/**
 * How an operand appeared in the checked expression:
 * - identifier: a bound name, reported as `name => value`
 * - literal: a constant, never reported
 * - expression: a compound form, reported through its free-variable bindings
 */
export type OperandKind = 'identifier' | 'literal' | 'expression';

export interface Operand<T = unknown> {
  readonly kind: OperandKind;
  readonly source: string;
  readonly value: T;
  readonly bindings?: Readonly<Record<string, unknown>>;
}

export interface Comparator {
  readonly symbol: string;
  compare(left: unknown, right: unknown): boolean;
}

export interface SimpleExpression {
  readonly kind: 'simple';
  readonly source: string;
  evaluate(): boolean;
}

/**
 * `a < b <= c`: holds when every adjacent pair compares true
 */
export interface ComparisonExpression {
  readonly kind: 'comparison';
  readonly operands: readonly Operand[];
  readonly operators: readonly Comparator[];
}

export interface CallExpression {
  readonly kind: 'call';
  readonly callee: string;
  readonly args: readonly Operand[];
  fn(...args: unknown[]): unknown;
}

export type CheckExpression = SimpleExpression | ComparisonExpression | CallExpression;

/**
 * Error class usable as a check error kind; classes taking no arguments qualify too
 */
export type ErrorConstructorLike = new (message: string) => Error;

/**
 * What to throw when a check fails:
 * - a string: the default kind with exactly that message
 * - an error class: that class with the generated (or given) message
 * - an error instance: thrown as is
 */
export type ErrorSpec = string | ErrorConstructorLike | Error;

/**
 * Why a check failed
 */
export interface CheckFailure {
  readonly message: string;
  /** Reported operand names and their values, in report order */
  readonly bindings: ReadonlyArray<readonly [name: string, value: unknown]>;
}
