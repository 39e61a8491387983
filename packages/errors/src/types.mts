/**
 * @module types
 * @description Error classes raised by the validators.
 * @since 2025-01-13
 *
 * @remarks
 * `ValidationError` extends `ValueError`, so code that already handles the broader
 * "bad value" category keeps catching validation failures. Like the tagged error types
 * of the functional error taxonomy, each validation error carries a readonly `tag` and
 * `recoverable`/`retryable` flags for pattern matching.
 *
 * @example
 * ```typescript
 * import { ValueError, isValidationError } from '@onecheck/errors';
 *
 * try {
 *   validate.positive(amount);
 * } catch (error) {
 *   if (isValidationError(error)) {
 *     return badRequest(error.message);
 *   }
 *   throw error;
 * }
 * ```
 *
 * @packageDocumentation
 */

/**
 * Raised when a value is unacceptable for reasons other than its static type.
 *
 * @category Error Types
 * @since 2025-01-13
 */
export class ValueError extends Error {
  constructor(message?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ValueError";

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised any time a validation check fails.
 *
 * @category Error Types
 * @since 2025-01-13
 *
 * @example
 * ```typescript
 * const error = new ValidationError("Value '0' must be positive (non-zero)");
 * error instanceof ValueError; // => true
 * error.tag;                   // => 'validation'
 * ```
 */
export class ValidationError extends ValueError {
  /** Discriminator for type narrowing */
  readonly tag = "validation" as const;
  /** Always true - the caller decides whether to recover */
  readonly recoverable = true as const;
  /** Always false - the same input fails the same way */
  readonly retryable = false as const;

  constructor(message?: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Type guard for ValidationError
 *
 * @category Type Guards
 * @since 2025-01-13
 *
 * @example
 * ```typescript
 * if (isValidationError(error)) {
 *   console.log(error.message);
 * }
 * ```
 */
export const isValidationError = (error: unknown): error is ValidationError =>
  error instanceof ValidationError;

/**
 * Type guard for ValueError, validation failures included.
 *
 * @category Type Guards
 * @since 2025-01-13
 */
export const isValueError = (error: unknown): error is ValueError =>
  error instanceof ValueError;
