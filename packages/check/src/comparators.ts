/**
 * Built-in comparison operators for chained comparisons
 */

import { isDeepStrictEqual } from 'util';

import { ArgumentError } from '@backstop/errors';

import type { Comparator } from './types.js';

// Relative tolerance of ≈, matching the usual sqrt(eps) default
const APPROX_RTOL = Math.sqrt(Number.EPSILON);

type Ordered = number | bigint | string;

function toOrdered(value: unknown, symbol: string): Ordered {
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'string') {
    return value;
  }
  if (value instanceof Date) {
    return value.getTime();
  }
  throw new ArgumentError(`Cannot compare a value of type ${typeof value} with ${symbol}`);
}

function ordered(symbol: string, holds: (left: Ordered, right: Ordered) => boolean): Comparator {
  return {
    symbol,
    compare: (left, right) => {
      const l = toOrdered(left, symbol);
      const r = toOrdered(right, symbol);
      if ((typeof l === 'string') !== (typeof r === 'string')) {
        throw new ArgumentError(`Cannot compare a string with a number using ${symbol}`);
      }
      return holds(l, r);
    },
  };
}

/**
 * Structural equality; numbers compare with === so that 0 == -0 and NaN != NaN
 */
export function isEqual(left: unknown, right: unknown): boolean {
  if (typeof left === 'number' && typeof right === 'number') {
    return left === right;
  }
  return isDeepStrictEqual(left, right);
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(item => typeof item === 'number');
}

function norm(values: readonly number[]): number {
  return Math.sqrt(values.reduce((sum, item) => sum + item * item, 0));
}

/**
 * Approximate equality for numbers and numeric arrays; anything else falls back to isEqual
 */
export function isApprox(left: unknown, right: unknown, rtol = APPROX_RTOL): boolean {
  if (typeof left === 'number' && typeof right === 'number') {
    if (left === right) {
      return true;
    }
    if (!Number.isFinite(left) || !Number.isFinite(right)) {
      return false;
    }
    return Math.abs(left - right) <= rtol * Math.max(Math.abs(left), Math.abs(right));
  }

  if (isNumberArray(left) && isNumberArray(right)) {
    if (left.length !== right.length) {
      return false;
    }
    const difference = left.map((item, index) => item - (right[index] ?? 0));
    return norm(difference) <= rtol * Math.max(norm(left), norm(right));
  }

  return isEqual(left, right);
}

const approx: Comparator = { symbol: '≈', compare: (left, right) => isApprox(left, right) };

export const BUILTIN_COMPARATORS = {
  '<': ordered('<', (left, right) => left < right),
  '<=': ordered('<=', (left, right) => left <= right),
  '>': ordered('>', (left, right) => left > right),
  '>=': ordered('>=', (left, right) => left >= right),
  '==': { symbol: '==', compare: isEqual },
  '!=': { symbol: '!=', compare: (left, right) => !isEqual(left, right) },
  '===': { symbol: '===', compare: (left, right) => left === right },
  '!==': { symbol: '!==', compare: (left, right) => left !== right },
  '≈': approx,
  '~=': { ...approx, symbol: '~=' },
} satisfies Record<string, Comparator>;

export type ComparatorSymbol = keyof typeof BUILTIN_COMPARATORS;

export const isComparatorSymbol = (value: string): value is ComparatorSymbol =>
  Object.hasOwn(BUILTIN_COMPARATORS, value);

/**
 * Define a custom comparator, e.g. `comparator('≦', (a, b) => ...)`
 */
export function comparator(
  symbol: string,
  compare: (left: unknown, right: unknown) => boolean
): Comparator {
  return { symbol, compare };
}
