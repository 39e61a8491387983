/**
 * @module result
 * @description Type-safe error handling without exceptions using the Result pattern.
 * A Result is either a success carrying data or a failure carrying an error, so the
 * failure path shows up in the function signature instead of hiding in a `throw`.
 *
 * @example
 * ```typescript
 * import { Result } from './result.mts';
 *
 * function half(n: number): Result<number, string> {
 *   return n % 2 === 0 ? Result.ok(n / 2) : Result.err(`${n} is odd`);
 * }
 *
 * Result.flatMap(half)(half(8)); // => { success: true, data: 2 }
 * Result.unwrapOr(0)(half(3));   // => 0
 * ```
 *
 * @category Core
 * @since 2025-07-03
 */

/**
 * Either a successful operation with data or a failure with an error.
 *
 * @template T - The type of the success value
 * @template E - The type of the error value (defaults to string)
 *
 * @category Types
 * @since 2025-07-03
 */
export type Result<T, E = string> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Result utility functions.
 * @description Transformations are curried so they read left to right when nested.
 *
 * @category Utilities
 * @since 2025-07-03
 */
export const Result = {
  /**
   * Creates a successful Result.
   *
   * @example
   * Result.ok(42); // => { success: true, data: 42 }
   */
  ok: <T, E = never>(data: T): Result<T, E> => ({ success: true, data }),

  /**
   * Creates a failed Result.
   *
   * @example
   * Result.err('not found'); // => { success: false, error: 'not found' }
   */
  err: <T = never, E = string>(error: E): Result<T, E> => ({
    success: false,
    error,
  }),

  /**
   * Transforms the data of a successful Result. Failures pass through unchanged.
   *
   * @example
   * Result.map((n: number) => n * 2)(Result.ok(5)); // => { success: true, data: 10 }
   */
  map:
    <T, U>(fn: (data: T) => U) =>
    <E,>(result: Result<T, E>): Result<U, E> =>
      result.success ? Result.ok(fn(result.data)) : result,

  /**
   * Chains an operation that itself returns a Result.
   * Short-circuits on the first failure.
   *
   * @example
   * const halve = (n: number) => n % 2 === 0 ? Result.ok(n / 2) : Result.err('odd');
   * Result.flatMap(halve)(Result.ok(10)); // => { success: true, data: 5 }
   * Result.flatMap(halve)(Result.ok(3));  // => { success: false, error: 'odd' }
   */
  flatMap:
    <T, U, E>(fn: (data: T) => Result<U, E>) =>
    (result: Result<T, E>): Result<U, E> =>
      result.success ? fn(result.data) : result,

  /**
   * Transforms the error of a failed Result. Successes pass through unchanged.
   *
   * @example
   * Result.mapError((e: Error) => e.message)(Result.err(new Error('boom')));
   * // => { success: false, error: 'boom' }
   */
  mapError:
    <E, F>(fn: (error: E) => F) =>
    <T,>(result: Result<T, E>): Result<T, F> =>
      result.success ? result : Result.err(fn(result.error)),

  /**
   * Extracts the data, or returns `defaultValue` for a failure.
   *
   * @example
   * Result.unwrapOr(0)(Result.err('nope')); // => 0
   */
  unwrapOr:
    <T,>(defaultValue: T) =>
    <E,>(result: Result<T, E>): T =>
      result.success ? result.data : defaultValue,

  /**
   * Type guard for the success branch.
   */
  isOk: <T, E>(result: Result<T, E>): result is { success: true; data: T } =>
    result.success,

  /**
   * Type guard for the failure branch.
   */
  isErr: <T, E>(result: Result<T, E>): result is { success: false; error: E } =>
    !result.success,
};
