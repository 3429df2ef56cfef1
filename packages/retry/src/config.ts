/**
 * File-facing retry configuration
 */

import {
  ConfigManager,
  ConfigUtils,
  LoggingConfigSchema,
  type ConfigOptions,
} from '@backstop/configuration';
import { LoggerFactory } from '@backstop/logging';
import { z } from 'zod';

import { ExponentialBackoff } from './backoff.js';
import type { BackoffOptions, RetryPolicy } from './types.js';

/**
 * Backoff section of a configuration file. Durations accept "50ms", "1.5s", "1m" or
 * plain milliseconds; max_delay also accepts "infinity".
 */
export const BackoffConfigSchema = z.object({
  count: z.number().int().min(0).default(1),
  first_delay: ConfigUtils.durationTransformer().default(50),
  max_delay: z
    .union([z.literal('infinity'), ConfigUtils.durationTransformer()])
    .transform(value => (value === 'infinity' ? Infinity : value))
    .default(10_000),
  factor: z.number().min(0).default(5),
  jitter: z.number().min(0).max(1).default(0.1),
});

export type BackoffConfig = z.infer<typeof BackoffConfigSchema>;

export const RetryConfigSchema = z.object({
  backoff: BackoffConfigSchema.default({}),
  logging: LoggingConfigSchema.optional(),
});

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

/**
 * Load and validate a retry configuration file
 */
export async function loadRetryConfig(
  configPath: string,
  options: ConfigOptions = {}
): Promise<RetryConfig> {
  return new ConfigManager(configPath, RetryConfigSchema, options).loadConfig();
}

/**
 * Build a retry policy from a validated configuration; overrides win over the file
 */
export function createRetryPolicy(
  config: RetryConfig,
  overrides: RetryPolicy = {},
  backoffOptions: BackoffOptions = {}
): RetryPolicy {
  const policy: RetryPolicy = {
    delays: ExponentialBackoff.fromConfig(config.backoff, backoffOptions),
  };

  if (config.logging) {
    policy.logger = LoggerFactory.fromConfig('retry', config.logging);
  }

  return { ...policy, ...overrides };
}
