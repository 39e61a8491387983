/**
 * @module result-utilities
 * @description Bridges throwing validators into Result-returning ones
 * @since 2025-01-13
 */

import { Result } from "./result.mjs";
import { isValidationError, type ValidationError } from "./types.mjs";

/**
 * Runs a throwing validation and captures its failure as a Result
 *
 * @category Utilities
 * @since 2025-01-13
 *
 * @description
 * Returns `Result.ok(data)` when `fn` completes. A thrown `ValidationError` becomes
 * `Result.err`; anything else thrown is not a validation outcome and is rethrown.
 *
 * @example
 * ```typescript
 * const result = tryValidate(() => validate.positive(amount), amount);
 * if (!result.success) {
 *   console.log(result.error.message);
 * }
 * ```
 *
 * @param fn - Synchronous function that throws `ValidationError` on failure
 * @param data - Value to carry in the success branch
 * @returns Result with either `data` or the validation error
 */
export function tryValidate<T>(
  fn: () => void,
  data: T,
): Result<T, ValidationError> {
  try {
    fn();
    return Result.ok(data);
  } catch (error) {
    if (isValidationError(error)) {
      return Result.err(error);
    }
    throw error;
  }
}
