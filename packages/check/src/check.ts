/**
 * Precondition and invariant checks with descriptive failure messages
 */

import {
  ArgumentError,
  CheckError,
  type BackstopError,
  type BackstopErrorOptions,
} from '@backstop/errors';

import { evaluateCheck, renderFailure, type FailedCheck } from './describe.js';
import type { CheckExpression, ErrorSpec } from './types.js';

type DefaultErrorKind = new (message: string, options?: BackstopErrorOptions) => BackstopError;

/**
 * Build the error for a failed check.
 * An error instance is returned as is and a string is used verbatim as the message;
 * otherwise the message is generated from the failure unless one is given.
 */
export function buildCheckError(
  failed: FailedCheck,
  defaultKind: DefaultErrorKind,
  errorSpec?: ErrorSpec,
  message?: string
): Error {
  if (errorSpec instanceof Error) {
    return errorSpec;
  }

  if (typeof errorSpec === 'string') {
    return new defaultKind(errorSpec);
  }

  if (errorSpec !== undefined) {
    return new errorSpec(message ?? renderFailure(failed).message);
  }

  if (message !== undefined) {
    return new defaultKind(message);
  }

  const failure = renderFailure(failed);
  return new defaultKind(failure.message, {
    data: { bindings: Object.fromEntries(failure.bindings) },
  });
}

function runCheck(
  expression: CheckExpression,
  defaultKind: DefaultErrorKind,
  errorSpec?: ErrorSpec,
  message?: string
): void {
  const failed = evaluateCheck(expression);
  if (failed) {
    throw buildCheckError(failed, defaultKind, errorSpec, message);
  }
}

/**
 * Check a precondition on arguments; throws ArgumentError by default
 *
 * @example
 * ```typescript
 * argcheck(expr.compare(expr.ref('x', x), '<', expr.ref('y', y), '<', expr.ref('z', z)));
 * // ArgumentError: y < z must hold. Got
 * // y => 1.34
 * // z => -345.234
 * ```
 */
export function argcheck(
  expression: CheckExpression,
  errorSpec?: ErrorSpec,
  message?: string
): void {
  runCheck(expression, ArgumentError, errorSpec, message);
}

/**
 * Check a runtime invariant; throws CheckError by default
 */
export function check(expression: CheckExpression, errorSpec?: ErrorSpec, message?: string): void {
  runCheck(expression, CheckError, errorSpec, message);
}
