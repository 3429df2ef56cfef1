/**
 * Standard configuration schemas shared by the Backstop packages
 */

import { z } from 'zod';

/**
 * Standard logging configuration schema
 */
export const LoggingConfigSchema = z.object({
  /** Log level */
  level: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']).default('INFO'),
  /** Log format */
  format: z.enum(['json', 'text']).default('text'),
  /** Whether to colorize text output */
  colors: z.boolean().optional(),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
