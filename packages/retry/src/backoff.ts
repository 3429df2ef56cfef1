/**
 * Exponential backoff sequence with a ceiling and multiplicative jitter
 */

import { ConfigurationError } from '@backstop/errors';
import { z } from 'zod';

import type { BackoffConfig } from './config.js';
import { createSeededRandom } from './random.js';
import type { BackoffOptions, BackoffSpec, RandomFactory, RandomSource } from './types.js';

export const DEFAULT_BACKOFF_SPEC: BackoffSpec = Object.freeze({
  count: 1,
  firstDelayMs: 50,
  maxDelayMs: 10_000,
  factor: 5,
  jitter: 0.1,
});

export const BackoffSpecSchema = z.object({
  count: z.number().int().min(0),
  firstDelayMs: z.number().positive().finite(),
  maxDelayMs: z.union([z.number().positive().finite(), z.literal(Infinity)]),
  factor: z.number().min(0).finite(),
  jitter: z.number().min(0).max(1),
});

/**
 * Merge a partial spec over the defaults and validate it
 * @throws ConfigurationError listing every invalid field
 */
export function validateBackoffSpec(spec: Partial<BackoffSpec>): BackoffSpec {
  const result = BackoffSpecSchema.safeParse({ ...DEFAULT_BACKOFF_SPEC, ...spec });

  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid backoff specification: ${issues.join('; ')}`, {
      code: 'INVALID_BACKOFF_SPEC',
      issues,
    });
  }

  return Object.freeze(result.data);
}

/**
 * Apply multiplicative jitter and clamp the result into (0, maxDelayMs]
 */
function jitterDelay(
  delay: number,
  jitter: number,
  maxDelayMs: number,
  random: RandomSource
): number {
  const jittered = jitter === 0 ? delay : delay * (1 + jitter * (2 * random() - 1));
  return Math.min(Math.max(jittered, Number.MIN_VALUE), maxDelayMs);
}

/**
 * Lazy, finite, restartable sequence of `count` delays in milliseconds.
 *
 * The first delay is `min(firstDelayMs, maxDelayMs)`. Each following delay is the previous
 * one times `factor`, capped at `maxDelayMs`, then scaled by `1 + jitter * (2U - 1)` for a
 * fresh uniform draw `U` and clamped back into `(0, maxDelayMs]`.
 *
 * Every iteration owns its own random source, so iterating twice yields two independent
 * sequences (or two identical ones when a seed is given).
 *
 * @example
 * ```typescript
 * const delays = new ExponentialBackoff({ count: 4, firstDelayMs: 100, factor: 2, jitter: 0 });
 * delays.toArray(); // [100, 200, 400, 800]
 * ```
 */
export class ExponentialBackoff implements Iterable<number> {
  readonly spec: BackoffSpec;
  private readonly randomFactory: RandomFactory;

  constructor(spec: Partial<BackoffSpec> = {}, options: BackoffOptions = {}) {
    this.spec = validateBackoffSpec(spec);

    const { seed, random } = options;
    if (random) {
      this.randomFactory = random;
    } else if (seed !== undefined) {
      this.randomFactory = () => createSeededRandom(seed);
    } else {
      this.randomFactory = () => Math.random;
    }
  }

  /**
   * Build a backoff from its configuration file form
   */
  static fromConfig(config: BackoffConfig, options: BackoffOptions = {}): ExponentialBackoff {
    return new ExponentialBackoff(
      {
        count: config.count,
        firstDelayMs: config.first_delay,
        maxDelayMs: config.max_delay,
        factor: config.factor,
        jitter: config.jitter,
      },
      options
    );
  }

  get length(): number {
    return this.spec.count;
  }

  *[Symbol.iterator](): Generator<number, void, undefined> {
    const { count, firstDelayMs, maxDelayMs, factor, jitter } = this.spec;
    const random = this.randomFactory();

    let delay = Math.min(firstDelayMs, maxDelayMs);
    for (let step = 0; step < count; step++) {
      if (step > 0) {
        delay = jitterDelay(Math.min(delay * factor, maxDelayMs), jitter, maxDelayMs, random);
      }
      yield delay;
    }
  }

  /**
   * Materialize one iteration of the sequence
   */
  toArray(): number[] {
    return [...this];
  }

  /**
   * Largest delay of one iteration, or undefined for an empty sequence
   */
  maximum(): number | undefined {
    let max: number | undefined;
    for (const delay of this) {
      if (max === undefined || delay > max) {
        max = delay;
      }
    }
    return max;
  }
}

/**
 * Start a fresh iteration of a backoff sequence. The iterator is one-shot: as retry
 * delays, pass `() => generate(spec)` rather than the iterator itself.
 */
export function generate(
  spec: Partial<BackoffSpec> = {},
  options: BackoffOptions = {}
): Generator<number, void, undefined> {
  return new ExponentialBackoff(spec, options)[Symbol.iterator]();
}
