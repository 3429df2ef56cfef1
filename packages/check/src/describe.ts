/**
 * Evaluation of expression descriptions and failure messages
 */

import { ArgumentError } from '@backstop/errors';

import { formatValue } from './format.js';
import type { CheckExpression, CheckFailure, Operand } from './types.js';

/**
 * A check that evaluated false, before its message is rendered
 */
export interface FailedCheck {
  /** Source of the part that failed: the whole expression, or one link of a chain */
  readonly source: string;
  /** Source of the whole expression */
  readonly fullSource: string;
  /** Operands whose names and values the message reports */
  readonly operands: readonly Operand[];
}

function callSource(callee: string, args: readonly Operand[]): string {
  return `${callee}(${args.map(arg => arg.source).join(', ')})`;
}

function chainSource(expression: Extract<CheckExpression, { kind: 'comparison' }>): string {
  const parts = [expression.operands[0]?.source ?? ''];
  expression.operators.forEach((operator, index) => {
    parts.push(operator.symbol, expression.operands[index + 1]?.source ?? '');
  });
  return parts.join(' ');
}

function expectBoolean(result: unknown, source: string): boolean {
  if (typeof result !== 'boolean') {
    throw new ArgumentError(`${source} must evaluate to a boolean, got ${typeof result}`);
  }
  return result;
}

/**
 * Evaluate an expression description.
 * Chains stop at the first failing link. Errors thrown while evaluating propagate unchanged.
 *
 * @returns undefined when the expression holds
 */
export function evaluateCheck(expression: CheckExpression): FailedCheck | undefined {
  switch (expression.kind) {
    case 'simple': {
      const holds = expectBoolean(expression.evaluate(), expression.source);
      if (holds) {
        return undefined;
      }
      return { source: expression.source, fullSource: expression.source, operands: [] };
    }

    case 'comparison': {
      const { operands, operators } = expression;
      if (operands.length < 2 || operators.length !== operands.length - 1) {
        throw new ArgumentError(
          `Malformed comparison: ${operands.length} operands and ${operators.length} operators`
        );
      }

      for (const [index, operator] of operators.entries()) {
        const left = operands[index];
        const right = operands[index + 1];
        if (left === undefined || right === undefined) {
          break;
        }
        if (!operator.compare(left.value, right.value)) {
          return {
            source: `${left.source} ${operator.symbol} ${right.source}`,
            fullSource: chainSource(expression),
            operands: [left, right],
          };
        }
      }
      return undefined;
    }

    case 'call': {
      const source = callSource(expression.callee, expression.args);
      const holds = expectBoolean(expression.fn(...expression.args.map(arg => arg.value)), source);
      return holds ? undefined : { source, fullSource: source, operands: expression.args };
    }
  }
}

/**
 * Names and values reported for a set of operands; literals report nothing,
 * compound operands report their free variables, each name appears once
 */
export function reportedBindings(operands: readonly Operand[]): Array<[string, unknown]> {
  const bindings = new Map<string, unknown>();

  for (const operand of operands) {
    if (operand.kind === 'identifier') {
      if (!bindings.has(operand.source)) {
        bindings.set(operand.source, operand.value);
      }
    } else if (operand.kind === 'expression') {
      for (const [name, boundValue] of Object.entries(operand.bindings ?? {})) {
        if (!bindings.has(name)) {
          bindings.set(name, boundValue);
        }
      }
    }
  }

  return [...bindings];
}

/**
 * Render the failure message:
 *
 * ```text
 * y < z must hold. Got
 * y => 1.34
 * z => -345.234
 * ```
 *
 * If a value cannot be rendered the message falls back to the plain form for the whole
 * expression, without values.
 */
export function renderFailure(failed: FailedCheck): CheckFailure {
  const bindings = reportedBindings(failed.operands);

  try {
    if (bindings.length === 0) {
      return { message: `${failed.source} must hold.`, bindings };
    }
    const lines = bindings.map(([name, boundValue]) => `${name} => ${formatValue(boundValue)}`);
    return { message: [`${failed.source} must hold. Got`, ...lines].join('\n'), bindings };
  } catch {
    return { message: `${failed.fullSource} must hold.`, bindings: [] };
  }
}

/**
 * Evaluate an expression and describe why it failed
 *
 * @returns undefined when the expression holds
 */
export function describeFailure(expression: CheckExpression): CheckFailure | undefined {
  const failed = evaluateCheck(expression);
  return failed && renderFailure(failed);
}
