/**
 * Pre-built classify predicates
 */

import type { Classify, RetryState } from './types.js';

// Any class whose instances can be tested with instanceof
type ErrorClass = abstract new (...args: never[]) => unknown;

export class RetryConditions {
  /**
   * Retry every failure until the schedule runs out
   */
  static always(): Classify {
    return () => true;
  }

  /**
   * Never retry; the first failure propagates
   */
  static never(): Classify {
    return () => false;
  }

  /**
   * Retry when the predicate holds for the error
   */
  static when(predicate: (error: unknown, state: RetryState) => boolean): Classify {
    return (state, error) => predicate(error, state);
  }

  /**
   * Retry only errors that are instances of one of the given classes
   */
  static whenInstanceOf(...types: ErrorClass[]): Classify {
    return (_state, error) => types.some(type => error instanceof type);
  }

  /**
   * Retry only errors whose message matches
   */
  static matchingMessage(pattern: string | RegExp): Classify {
    return (_state, error) => {
      if (!(error instanceof Error)) {
        return false;
      }
      return typeof pattern === 'string' ? error.message === pattern : pattern.test(error.message);
    };
  }

  /**
   * Stop retrying once the given number of attempts have failed
   */
  static maxAttempts(maxAttempts: number): Classify {
    return state => state.attempt < maxAttempts;
  }

  /**
   * Substitute the propagated error while keeping the retry decision of `base`
   */
  static reclassify(
    mapper: (error: unknown, state: RetryState) => unknown,
    base: Classify = RetryConditions.always()
  ): Classify {
    return (state, error) => {
      const decision = base(state, error);
      const retry = typeof decision === 'boolean' ? decision : decision.retry;
      return { retry, error: mapper(error, state) };
    };
  }
}
