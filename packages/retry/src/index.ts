/**
 * @backstop/retry - Exponential backoff and retry with error reclassification
 *
 * Features:
 * - Lazy, restartable backoff sequences with a ceiling and seeded jitter
 * - Retry executor driven by any delay schedule
 * - Classify predicates that decide whether to retry and which error to propagate
 * - YAML configuration for backoff and retry logging
 */

export type {
  BackoffSpec,
  BackoffOptions,
  RandomSource,
  RandomFactory,
  RetryState,
  RetryDecision,
  Classify,
  DelaySchedule,
  Sleep,
  RetryPolicy,
} from './types.js';

export {
  ExponentialBackoff,
  BackoffSpecSchema,
  DEFAULT_BACKOFF_SPEC,
  generate,
  validateBackoffSpec,
} from './backoff.js';

export { createSeededRandom } from './random.js';

export { RetryExecutor, execute, retry } from './executor.js';

export { RetryConditions } from './conditions.js';

export {
  BackoffConfigSchema,
  RetryConfigSchema,
  loadRetryConfig,
  createRetryPolicy,
  type BackoffConfig,
  type RetryConfig,
} from './config.js';
