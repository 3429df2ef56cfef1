/**
 * Error types and base classes shared by the Backstop packages
 */

/**
 * Error categories for classification and logging
 */
export enum ErrorCategory {
  /** Invalid arguments passed to a function */
  VALIDATION = 'validation',
  /** Malformed configuration (backoff specs, config files, etc.) */
  CONFIGURATION = 'configuration',
  /** A runtime invariant that did not hold */
  INVARIANT = 'invariant',
  /** Unknown or uncategorized errors */
  UNKNOWN = 'unknown',
}

/**
 * Metadata carried by every Backstop error
 */
export interface ErrorMetadata {
  /** Error category for domain-specific handling */
  category: ErrorCategory;
  /** Original error that caused this error (error chaining) */
  cause?: unknown;
  /** Additional error-specific data */
  data?: Record<string, unknown>;
}

/**
 * Options accepted by the concrete error kinds
 */
export interface BackstopErrorOptions {
  code?: string;
  cause?: unknown;
  data?: Record<string, unknown>;
}

/**
 * Base error class with a stable code and a category
 */
export abstract class BackstopError extends Error {
  public readonly code: string;
  public readonly metadata: ErrorMetadata;

  constructor(message: string, code: string, metadata: ErrorMetadata) {
    super(message, metadata.cause !== undefined ? { cause: metadata.cause } : undefined);
    this.name = this.constructor.name;
    this.code = code;
    this.metadata = metadata;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  get category(): ErrorCategory {
    return this.metadata.category;
  }

  get data(): Record<string, unknown> | undefined {
    return this.metadata.data;
  }

  /**
   * Get formatted error information for logging
   */
  toLogFormat(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.metadata.category,
      ...(this.metadata.data && { data: this.metadata.data }),
      ...(this.metadata.cause !== undefined && { cause: describeCause(this.metadata.cause) }),
    };
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
