/**
 * Report parameter validation
 *
 * Menu prompts read one raw line each; these parsers turn that line into the
 * value a report needs or raise InvalidParameterError for the menu loop to
 * report.
 *
 * @module cli/lib/input
 */

import { z } from 'zod';
import { InvalidParameterError } from '../../core/types/errors.js';

/**
 * Optionally signed base-10 integer, surrounding whitespace ignored
 */
export const IntegerParameterSchema = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, 'Expected a whole number')
  .transform((value) => Number(value))
  .refine((value) => Number.isSafeInteger(value), 'Number out of range');

/**
 * Free-text parameter; compared exactly after trimming
 */
export const TextParameterSchema = z.string().trim();

/**
 * Menu choice: any integer, range checked by the menu itself
 */
export const MenuChoiceSchema = IntegerParameterSchema;

/**
 * Parse an integer parameter.
 *
 * @example
 * ```typescript
 * parseIntegerParameter(' 3 ', 'ward number'); // 3
 * parseIntegerParameter('north', 'ward number'); // throws "Invalid ward number entered."
 * ```
 */
export function parseIntegerParameter(input: string, parameter: string): number {
  const result = IntegerParameterSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidParameterError(parameter, input);
  }
  return result.data;
}

export function parseTextParameter(input: string): string {
  return TextParameterSchema.parse(input);
}

/**
 * Menu choice as a number, or null when the line is not an integer
 */
export function parseMenuChoice(input: string): number | null {
  const result = MenuChoiceSchema.safeParse(input);
  return result.success ? result.data : null;
}
