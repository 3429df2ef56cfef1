/**
 * Error helpers for logging and normalization
 */

import { BackstopError } from './types.js';

/**
 * Check whether a value is one of the Backstop error kinds
 */
export function isBackstopError(error: unknown): error is BackstopError {
  return error instanceof BackstopError;
}

/**
 * Normalize any thrown value into an Error, keeping Error instances as they are
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(typeof error === 'string' ? error : String(error), { cause: error });
}

/**
 * Wrap a thrown value in a new Error with a contextual message
 */
export function wrapError(error: unknown, message?: string): Error {
  const originalError = toError(error);
  if (!message) {
    return originalError;
  }
  return new Error(`${message}: ${originalError.message}`, { cause: originalError });
}

/**
 * Extract error information for logging
 */
export function extractErrorInfo(error: unknown): Record<string, unknown> {
  if (error instanceof BackstopError) {
    return error.toLogFormat();
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    error: String(error),
  };
}
