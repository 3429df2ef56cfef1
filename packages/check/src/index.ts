/**
 * @backstop/check - Argument and invariant checks with descriptive errors
 *
 * Features:
 * - Chained comparisons reporting only the failing link
 * - Predicate calls reporting each argument's name and value
 * - Default, string, class or instance error specs
 */

export type {
  OperandKind,
  Operand,
  Comparator,
  SimpleExpression,
  ComparisonExpression,
  CallExpression,
  CheckExpression,
  ErrorConstructorLike,
  ErrorSpec,
  CheckFailure,
} from './types.js';

export {
  BUILTIN_COMPARATORS,
  comparator,
  isApprox,
  isEqual,
  isComparatorSymbol,
  type ComparatorSymbol,
} from './comparators.js';

export {
  expr,
  ref,
  lit,
  value,
  simple,
  thunk,
  compare,
  call,
  callNamed,
  type OperandInput,
} from './expr.js';

export {
  evaluateCheck,
  renderFailure,
  reportedBindings,
  describeFailure,
  type FailedCheck,
} from './describe.js';

export { formatValue } from './format.js';

export { argcheck, check, buildCheckError } from './check.js';
