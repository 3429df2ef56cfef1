/**
 * @backstop/errors - Error kinds shared by the Backstop packages
 *
 * Features:
 * - Base error class with stable codes and categories
 * - Argument, dimension mismatch, check and configuration error kinds
 * - Helpers for normalizing and logging thrown values
 */

// Core error types and enums
export {
  ErrorCategory,
  BackstopError,
  type ErrorMetadata,
  type BackstopErrorOptions,
} from './types.js';

// Concrete error kinds
export { ArgumentError, DimensionMismatchError, CheckError, ConfigurationError } from './domain.js';

// Error utilities
export { isBackstopError, toError, wrapError, extractErrorInfo } from './utils.js';
