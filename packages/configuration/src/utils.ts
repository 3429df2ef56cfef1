/**
 * Configuration parsing and transformation utilities
 */

import { toError } from '@backstop/errors';
import { z } from 'zod';

/**
 * Time units and their millisecond multipliers
 */
export const TIME_UNITS = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
} as const;

export type TimeUnit = keyof typeof TIME_UNITS;

const isTimeUnit = (unit: string): unit is TimeUnit => Object.hasOwn(TIME_UNITS, unit);

const DURATION_PATTERN = /^(\d+(?:\.\d+)?\s*[a-z]+\s*)+$/;

/**
 * Configuration parsing and transformation utilities
 */
export class ConfigUtils {
  /**
   * Parse a duration to milliseconds
   * @param duration Duration like "50ms", "1.5s", "1m30s", or a number of milliseconds
   * @returns Duration in milliseconds
   */
  static parseDuration(duration: string | number): number {
    if (typeof duration === 'number') {
      return duration;
    }

    const durationStr = duration.trim().toLowerCase();

    // Plain numbers are milliseconds
    if (/^\d+(?:\.\d+)?$/.test(durationStr)) {
      return parseFloat(durationStr);
    }

    if (!DURATION_PATTERN.test(durationStr)) {
      throw new Error(
        `Invalid duration format: ${duration}. Expected format like "50ms", "1.5s", "1m30s"`
      );
    }

    let totalMs = 0;
    const parts = durationStr.matchAll(/(\d+(?:\.\d+)?)\s*([a-z]+)/g);
    for (const [, valueStr = '', unit = ''] of parts) {
      if (!isTimeUnit(unit)) {
        const validUnits = Object.keys(TIME_UNITS).join(', ');
        throw new Error(`Invalid duration unit: ${unit}. Valid units: ${validUnits}`);
      }
      totalMs += parseFloat(valueStr) * TIME_UNITS[unit];
    }

    return totalMs;
  }

  /**
   * Create a Zod transformer for duration values
   * @returns Zod schema accepting a duration string or milliseconds and yielding milliseconds
   */
  static durationTransformer() {
    return z.union([z.string(), z.number()]).transform((value, ctx) => {
      try {
        return ConfigUtils.parseDuration(value);
      } catch (error) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: toError(error).message });
        return z.NEVER;
      }
    });
  }

  /**
   * Recursively substitute ${VAR} and ${VAR:-default} placeholders in strings
   */
  static processEnvVars(value: unknown): unknown {
    if (typeof value === 'string') {
      return ConfigUtils.substituteEnvVars(value);
    }

    if (Array.isArray(value)) {
      return value.map(item => ConfigUtils.processEnvVars(item));
    }

    if (ConfigUtils.isPlainObject(value)) {
      const result: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = ConfigUtils.processEnvVars(item);
      }
      return result;
    }

    return value;
  }

  /**
   * Substitute environment variables in a string
   * @param str String with environment variable placeholders
   * @returns String with variables substituted
   */
  static substituteEnvVars(str: string, env: NodeJS.ProcessEnv = process.env): string {
    return str.replace(/\$\{([^}]+)\}/g, (_match, varExpr: string) => {
      const [varName = '', defaultValue] = varExpr.split(':-');
      const envValue = env[varName.trim()];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue.trim();
      }

      throw new Error(`Required environment variable not set: ${varName.trim()}`);
    });
  }

  /**
   * Deep merge configuration objects; later sources win, undefined values are skipped
   */
  static mergeConfigs(
    target: Record<string, unknown>,
    ...sources: Record<string, unknown>[]
  ): Record<string, unknown> {
    const result: Record<string, unknown> = { ...target };

    for (const source of sources) {
      for (const [key, value] of Object.entries(source)) {
        if (value === undefined) {
          continue;
        }

        const existing = result[key];
        result[key] =
          ConfigUtils.isPlainObject(value) && ConfigUtils.isPlainObject(existing)
            ? ConfigUtils.mergeConfigs(existing, value)
            : value;
      }
    }

    return result;
  }

  static isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }
}
