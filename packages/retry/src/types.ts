/**
 * Backoff and retry types
 */

import type { Logger } from '@backstop/logging';

/**
 * Parameters of an exponential backoff sequence. Delays are in milliseconds.
 */
export interface BackoffSpec {
  /** Number of delays in the sequence, and so the number of retries */
  readonly count: number;
  /** First delay, clamped to maxDelayMs and never jittered */
  readonly firstDelayMs: number;
  /** Ceiling for every delay; Infinity for unbounded growth */
  readonly maxDelayMs: number;
  /** Multiplier applied to the previous delay at each step */
  readonly factor: number;
  /** Fraction in [0, 1] of random perturbation mixed into each delay */
  readonly jitter: number;
}

/**
 * Uniform random draw in [0, 1)
 */
export type RandomSource = () => number;

/**
 * Creates the random source owned by one iteration of a backoff sequence
 */
export type RandomFactory = () => RandomSource;

export interface BackoffOptions {
  /** Seed for a reproducible sequence; each iteration restarts from this seed */
  seed?: number;
  /** Custom random source factory; takes precedence over seed */
  random?: RandomFactory;
}

/**
 * State passed to the classify predicate after a failed attempt
 */
export interface RetryState {
  /** 1-based number of the attempt that just failed */
  readonly attempt: number;
  /** Delay before the next attempt, or undefined when the schedule is exhausted */
  readonly nextDelayMs: number | undefined;
  /** Time since the first attempt started */
  readonly elapsedMs: number;
}

/**
 * Outcome of classify: a bare boolean keeps the original error,
 * an object may substitute the error that will be propagated
 */
export type RetryDecision = boolean | { readonly retry: boolean; readonly error?: unknown };

export type Classify = (state: RetryState, error: unknown) => RetryDecision;

/**
 * A backoff, a backoff spec, a restartable sequence of millisecond delays, or a
 * function returning a fresh sequence for each execution
 */
export type DelaySchedule =
  | Iterable<number>
  | (() => Iterable<number>)
  | Partial<BackoffSpec>;

export type Sleep = (ms: number) => Promise<void>;

export interface RetryPolicy {
  /** Delays between attempts; defaults to a single 50ms delay */
  delays?: DelaySchedule;
  /** Decides whether to retry and which error to propagate; defaults to always retry */
  classify?: Classify;
  /** Receives debug entries for retried failures and a warning for the final one */
  logger?: Logger;
  /** Wait function, replaceable in tests */
  sleep?: Sleep;
  /** Called before each wait */
  onRetry?: (state: RetryState, error: unknown) => void;
}
