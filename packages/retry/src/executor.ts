/**
 * Retry execution engine driven by a delay schedule and a classify predicate
 */

import { ConfigurationError, extractErrorInfo } from '@backstop/errors';

import { ExponentialBackoff } from './backoff.js';
import type {
  Classify,
  DelaySchedule,
  RetryDecision,
  RetryPolicy,
  RetryState,
  Sleep,
} from './types.js';

// Largest delay setTimeout accepts without firing immediately
const MAX_TIMER_MS = 2_147_483_647;

const defaultSleep: Sleep = async ms => {
  let remaining = ms;
  do {
    const chunk = Math.min(remaining, MAX_TIMER_MS);
    await new Promise<void>(resolve => setTimeout(resolve, chunk));
    remaining -= chunk;
  } while (remaining > 0);
};

const alwaysRetry: Classify = () => true;

type DelaySource = () => Iterator<number>;

function isDelayIterable(delays: DelaySchedule): delays is Iterable<number> {
  return typeof delays === 'object' && Symbol.iterator in delays;
}

function restartable(delays: Iterable<number>): DelaySource {
  const iterator: unknown = delays[Symbol.iterator]();
  if (iterator === delays) {
    throw new ConfigurationError(
      'Retry delays must be restartable: pass an array, an ExponentialBackoff, ' +
        'or a function returning a fresh iterable instead of an iterator',
      { code: 'ONE_SHOT_SCHEDULE' }
    );
  }
  return () => delays[Symbol.iterator]();
}

/**
 * Resolve a schedule into a source of fresh delay iterators, one per execution
 */
function toDelaySource(delays: DelaySchedule | undefined): DelaySource {
  if (delays === undefined) {
    return restartable(new ExponentialBackoff());
  }
  if (typeof delays === 'function') {
    const makeDelays = delays;
    return () => makeDelays()[Symbol.iterator]();
  }
  return restartable(isDelayIterable(delays) ? delays : new ExponentialBackoff(delays));
}

function normalizeDecision(
  decision: RetryDecision,
  error: unknown
): { retry: boolean; error: unknown } {
  if (typeof decision === 'boolean') {
    return { retry: decision, error };
  }
  return { retry: decision.retry, error: 'error' in decision ? decision.error : error };
}

/**
 * Execute operations with retry logic.
 *
 * Each call walks a fresh iteration of the delay schedule, so one-shot iterators are
 * rejected. After a failure the next delay is drawn and `classify` is consulted; the
 * effective error (the original, or the one classify substitutes) is thrown once the
 * schedule is exhausted or classify declines to retry.
 * A schedule of n delays therefore allows at most n + 1 attempts.
 */
export class RetryExecutor {
  private readonly delaySource: DelaySource;
  private readonly classify: Classify;
  private readonly sleep: Sleep;

  constructor(private readonly policy: RetryPolicy = {}) {
    // Invalid backoff specs and one-shot iterators fail here rather than on first use
    this.delaySource = toDelaySource(policy.delays);
    this.classify = policy.classify ?? alwaysRetry;
    this.sleep = policy.sleep ?? defaultSleep;
  }

  /**
   * Invoke the operation with the given arguments until it succeeds or retries run out
   */
  async execute<A extends unknown[], R>(
    operation: (...args: A) => R,
    ...args: A
  ): Promise<Awaited<R>> {
    const { logger, onRetry } = this.policy;
    const delays = this.delaySource();
    const startTime = Date.now();

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation(...args);
      } catch (error) {
        const next = delays.next();
        const state: RetryState = {
          attempt,
          nextDelayMs: next.done ? undefined : next.value,
          elapsedMs: Date.now() - startTime,
        };

        const decision = normalizeDecision(this.classify(state, error), error);
        const { nextDelayMs } = state;

        if (nextDelayMs === undefined || !decision.retry) {
          logger?.warn(`Giving up after ${attempt} attempt(s)`, {
            reason: decision.retry ? 'schedule_exhausted' : 'not_retryable',
            elapsedMs: state.elapsedMs,
            error: extractErrorInfo(decision.error),
          });
          throw decision.error;
        }

        logger?.debug(`Attempt ${attempt} failed, retrying in ${nextDelayMs}ms`, {
          attempt,
          delayMs: nextDelayMs,
          error: extractErrorInfo(error),
        });
        onRetry?.(state, error);

        await this.sleep(nextDelayMs);
      }
    }
  }

  /**
   * Wrap an operation so every call goes through this executor
   */
  wrap<A extends unknown[], R>(operation: (...args: A) => R): (...args: A) => Promise<Awaited<R>> {
    return (...args: A) => this.execute(operation, ...args);
  }
}

/**
 * Run an operation once under a retry policy
 *
 * @example
 * ```typescript
 * const body = await execute(fetchText, { delays: { count: 3, firstDelayMs: 100 } }, url);
 * ```
 */
export async function execute<A extends unknown[], R>(
  operation: (...args: A) => R,
  policy: RetryPolicy = {},
  ...args: A
): Promise<Awaited<R>> {
  return new RetryExecutor(policy).execute(operation, ...args);
}

/**
 * Return a function that calls `operation` under a retry policy, passing its arguments through
 */
export function retry<A extends unknown[], R>(
  operation: (...args: A) => R,
  policy: RetryPolicy = {}
): (...args: A) => Promise<Awaited<R>> {
  return new RetryExecutor(policy).wrap(operation);
}
