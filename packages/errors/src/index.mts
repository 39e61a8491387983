/**
 * @onecheck/errors
 *
 * Error classes for failed validations and the Result type used to report them
 * without throwing.
 */

// ============================================================================
// Error Types & Guards
// ============================================================================

export {
  ValueError,
  ValidationError,
  isValidationError,
  isValueError,
} from "./types.mjs";

// ============================================================================
// Result
// ============================================================================

export { Result } from "./result.mjs";

export { tryValidate } from "./result-utilities.mjs";
