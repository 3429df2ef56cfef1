/**
 * Concrete error kinds raised by the retry and check packages
 */

import {
  BackstopError,
  ErrorCategory,
  type BackstopErrorOptions,
  type ErrorMetadata,
} from './types.js';

function buildMetadata(category: ErrorCategory, options: BackstopErrorOptions): ErrorMetadata {
  const metadata: ErrorMetadata = { category };

  if (options.cause !== undefined) {
    metadata.cause = options.cause;
  }
  if (options.data !== undefined) {
    metadata.data = options.data;
  }

  return metadata;
}

/**
 * An argument did not satisfy a precondition
 */
export class ArgumentError extends BackstopError {
  constructor(message: string, options: BackstopErrorOptions = {}) {
    super(
      message,
      options.code ?? 'ARGUMENT_ERROR',
      buildMetadata(ErrorCategory.VALIDATION, options)
    );
  }
}

/**
 * Arguments have incompatible shapes or lengths
 */
export class DimensionMismatchError extends BackstopError {
  constructor(message: string, options: BackstopErrorOptions = {}) {
    super(
      message,
      options.code ?? 'DIMENSION_MISMATCH',
      buildMetadata(ErrorCategory.VALIDATION, options)
    );
  }
}

/**
 * A runtime invariant did not hold
 */
export class CheckError extends BackstopError {
  constructor(message: string, options: BackstopErrorOptions = {}) {
    super(message, options.code ?? 'CHECK_FAILED', buildMetadata(ErrorCategory.INVARIANT, options));
  }
}

/**
 * Configuration errors (invalid backoff specs, invalid config files, etc.)
 */
export class ConfigurationError extends BackstopError {
  public readonly issues: readonly string[];

  constructor(message: string, options: BackstopErrorOptions & { issues?: string[] } = {}) {
    const { issues = [], ...rest } = options;
    const data = issues.length > 0 ? { ...rest.data, issues } : rest.data;

    super(
      message,
      rest.code ?? 'CONFIGURATION_ERROR',
      buildMetadata(ErrorCategory.CONFIGURATION, { ...rest, ...(data && { data }) })
    );
    this.issues = issues;
  }
}
