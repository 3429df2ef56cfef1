/**
 * Builders for expression descriptions.
 *
 * The checked expression is described explicitly at the call site: each operand carries the
 * source text it was written as and its runtime value.
 *
 * @example
 * ```typescript
 * argcheck(expr.compare(expr.ref('low', low), '<=', expr.ref('high', high)));
 * argcheck(expr.call(isSorted, expr.ref('items', items)), DimensionMismatchError);
 * ```
 */

import { ArgumentError } from '@backstop/errors';

import {
  BUILTIN_COMPARATORS,
  comparator,
  isComparatorSymbol,
  type ComparatorSymbol,
} from './comparators.js';
import { formatValue } from './format.js';
import type {
  CallExpression,
  Comparator,
  ComparisonExpression,
  Operand,
  SimpleExpression,
} from './types.js';

type Primitive = number | bigint | boolean | null | undefined;

/**
 * Anything accepted where an operand is expected; primitives become literals
 */
export type OperandInput = Operand | Primitive;

function isOperand(value: unknown): value is Operand {
  return typeof value === 'object' && value !== null && 'kind' in value && 'source' in value;
}

function isComparator(value: unknown): value is Comparator {
  return typeof value === 'object' && value !== null && 'symbol' in value && 'compare' in value;
}

function toOperand(value: OperandInput): Operand {
  return isOperand(value) ? value : lit(value);
}

function toComparator(value: ComparatorSymbol | Comparator): Comparator {
  return typeof value === 'string' ? BUILTIN_COMPARATORS[value] : value;
}

/**
 * A bound name and its value
 */
export function ref<T>(name: string, value: T): Operand<T> {
  return { kind: 'identifier', source: name, value };
}

/**
 * A constant; its source defaults to the rendered value
 */
export function lit<T>(value: T, source: string = formatValue(value)): Operand<T> {
  return { kind: 'literal', source, value };
}

/**
 * A compound operand such as `items[0]` or `[x, y]`, reported through its free variables
 */
export function value<T>(
  source: string,
  operandValue: T,
  bindings: Record<string, unknown> = {}
): Operand<T> {
  return { kind: 'expression', source, value: operandValue, bindings };
}

/**
 * A plain boolean expression
 */
export function simple(source: string, result: boolean): SimpleExpression {
  return { kind: 'simple', source, evaluate: () => result };
}

/**
 * A boolean expression evaluated lazily, e.g. a block or a call to a returned closure
 */
export function thunk(source: string, evaluate: () => boolean): SimpleExpression {
  return { kind: 'simple', source, evaluate };
}

/**
 * A chain of comparisons: `compare(a, '<', b, '<=', c)`.
 * Operands and operators must alternate, starting and ending with an operand.
 */
export function compare(
  first: OperandInput,
  ...rest: Array<OperandInput | ComparatorSymbol | Comparator>
): ComparisonExpression {
  if (rest.length === 0 || rest.length % 2 !== 0) {
    throw new ArgumentError(
      `A comparison needs operands and operators in alternation, got ${rest.length + 1} items`
    );
  }

  const operands: Operand[] = [toOperand(first)];
  const operators: Comparator[] = [];

  for (let index = 0; index < rest.length; index += 2) {
    const operator = rest[index];
    const operand = rest[index + 1];

    if (typeof operator === 'string' && isComparatorSymbol(operator)) {
      operators.push(toComparator(operator));
    } else if (isComparator(operator)) {
      operators.push(operator);
    } else {
      throw new ArgumentError(`Expected a comparison operator at position ${index + 1}`);
    }

    if (typeof operand === 'string' || isComparator(operand)) {
      throw new ArgumentError(`Expected an operand at position ${index + 2}`);
    }
    operands.push(toOperand(operand));
  }

  return { kind: 'comparison', operands, operators };
}

/**
 * A predicate call; the callee is reported by the function's name
 */
export function call(fn: (...args: never[]) => unknown, ...args: OperandInput[]): CallExpression {
  return callNamed(fn.name || 'anonymous', fn, ...args);
}

/**
 * A predicate call with an explicit callee name, e.g. for methods or aliased imports
 */
export function callNamed(
  callee: string,
  fn: (...args: never[]) => unknown,
  ...args: OperandInput[]
): CallExpression {
  return { kind: 'call', callee, fn, args: args.map(toOperand) };
}

export const expr = {
  ref,
  lit,
  value,
  simple,
  thunk,
  compare,
  call,
  callNamed,
  op: comparator,
} as const;
