import { inspect } from 'util';

/**
 * Render a runtime value for a failure message: numbers as written, strings quoted
 */
export function formatValue(value: unknown): string {
  return inspect(value, { depth: 3, breakLength: Infinity, maxArrayLength: 20 });
}
