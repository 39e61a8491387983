/**
 * @module validate
 * @description Throwing counterparts of the predicates. Each validator runs the
 * predicate of the same name and, when it answers `false`, throws a
 * `ValidationError` whose message names the value and the broken condition.
 * Every condition also has a `not` form with its own message.
 *
 * Validators return nothing on success. They never log, retry or recover; the
 * error goes straight to the caller.
 *
 * ### Decision Tree
 * - Want `false` instead of an exception? Use `@onecheck/predicates`.
 * - Want a `Result` instead of an exception? Use `check` from this package.
 * - Need the failure logged before it propagates? Wrap with `reportFailures`.
 *
 * @example
 * ```typescript
 * import { validate } from '@onecheck/validate';
 *
 * validate.positive(5);        // ok
 * validate.positive(0);        // throws: Value '0' must be positive (non-zero)
 * validate.neq(42, 42);        // throws: Value '42' must not be equal to '42'
 *
 * function load(id: string | undefined) {
 *   validate.notNone(id);
 *   return id.trim();          // id is string here
 * }
 * ```
 *
 * @category Core
 * @since 2025-07-03
 */

import type { InstanceOf, Numeric, RuntimeType } from "@onecheck/predicates";

import { ValidationError } from "@onecheck/errors";
import * as test from "@onecheck/predicates";

import { messages } from "./messages.mjs";

const fail = (message: string): never => {
  throw new ValidationError(message);
};

/**
 * Validates that a value is `null` or `undefined`.
 *
 * @throws {ValidationError} `Value '<value>' must be null or undefined`
 * @example
 * none(null); // ok
 * none('');   // throws: Value '' must be null or undefined
 */
export function none(value: unknown): asserts value is null | undefined {
  if (!test.none(value)) fail(messages.none(value));
}

/**
 * Validates that a value is present.
 *
 * @throws {ValidationError} `Value must not be null or undefined`
 * @example
 * notNone('');   // ok
 * notNone(null); // throws: Value must not be null or undefined
 */
export function notNone<T>(value: T): asserts value is NonNullable<T> {
  if (test.none(value)) fail(messages.notNone());
}

/**
 * Validates that a value's type is exactly `type`; subclasses fail.
 *
 * @throws {ValidationError} `Value '<value>' must be of type <T>, not <actual>`
 * @example
 * class TestError extends RangeError {}
 * const error = new TestError('Test');
 *
 * specificType(error, TestError);  // ok
 * specificType(error, RangeError);
 * // throws: Value 'TestError('Test')' must be of type RangeError, not TestError
 */
export function specificType<T extends RuntimeType>(
  value: unknown,
  type: T,
): asserts value is InstanceOf<T> {
  if (!test.specificType(value, type)) fail(messages.specificType(value, type));
}

/**
 * Validates that a value's type is not exactly `type`. Subclass instances pass.
 *
 * @throws {ValidationError} `Value '<value>' must not be of type <T>`
 */
export function notSpecificType(value: unknown, type: RuntimeType): void {
  if (test.specificType(value, type)) fail(messages.notSpecificType(value, type));
}

/**
 * Validates that a value is an instance of `type` or one of its subclasses.
 *
 * @throws {ValidationError} `Value '<value>' must be an instance of <T>, not a <actual>`
 * @example
 * instance(new TestError('Test'), RangeError); // ok
 * instance(1, String);
 * // throws: Value '1' must be an instance of String, not a Number
 */
export function instance<T extends RuntimeType>(
  value: unknown,
  type: T,
): asserts value is InstanceOf<T> {
  if (!test.instance(value, type)) fail(messages.instance(value, type));
}

/**
 * Validates that a value is not an instance of `type` nor of any subclass.
 *
 * @throws {ValidationError} `Value '<value>' must not be an instance of <T>`
 */
export function notInstance(value: unknown, type: RuntimeType): void {
  if (test.instance(value, type)) fail(messages.notInstance(value, type));
}

/**
 * @throws {ValidationError} `Value '<value>' must be zero`
 */
export function zero(value: Numeric): void {
  if (!test.zero(value)) fail(messages.zero(value));
}

/**
 * @throws {ValidationError} `Value '<value>' must not be zero`
 */
export function notZero(value: Numeric): void {
  if (test.zero(value)) fail(messages.notZero(value));
}

/**
 * Validates that a number is greater than zero.
 *
 * @throws {ValidationError} `Value '<value>' must be positive (non-zero)`
 * @example
 * positive(5); // ok
 * positive(0); // throws: Value '0' must be positive (non-zero)
 */
export function positive(value: Numeric): void {
  if (!test.positive(value)) fail(messages.positive(value));
}

/**
 * @throws {ValidationError} `Value '<value>' must not be positive`
 */
export function notPositive(value: Numeric): void {
  if (test.positive(value)) fail(messages.notPositive(value));
}

/**
 * Validates that a number is less than zero.
 *
 * @throws {ValidationError} `Value '<value>' must be negative (non-zero)`
 */
export function negative(value: Numeric): void {
  if (!test.negative(value)) fail(messages.negative(value));
}

/**
 * @throws {ValidationError} `Value '<value>' must not be negative`
 */
export function notNegative(value: Numeric): void {
  if (test.negative(value)) fail(messages.notNegative(value));
}

/**
 * Validates that `minimum <= value <= maximum`.
 *
 * @throws {ValidationError} `Value '<value>' must be between <min> and <max> (inclusive)`
 * @example
 * rangeInclusive(0, 0, 1); // ok
 * rangeInclusive(2, 0, 1); // throws: Value '2' must be between 0 and 1 (inclusive)
 */
export function rangeInclusive(
  value: Numeric,
  minimum: Numeric,
  maximum: Numeric,
): void {
  if (!test.rangeInclusive(value, minimum, maximum)) {
    fail(messages.rangeInclusive(value, minimum, maximum));
  }
}

/**
 * @throws {ValidationError} `Value '<value>' must not be between <min> and <max> (inclusive)`
 */
export function notRangeInclusive(
  value: Numeric,
  minimum: Numeric,
  maximum: Numeric,
): void {
  if (test.rangeInclusive(value, minimum, maximum)) {
    fail(messages.notRangeInclusive(value, minimum, maximum));
  }
}

/**
 * Validates that `minimum < value < maximum`.
 *
 * @throws {ValidationError} `Value '<value>' must be between <min> and <max> (non-inclusive)`
 */
export function rangeNonInclusive(
  value: Numeric,
  minimum: Numeric,
  maximum: Numeric,
): void {
  if (!test.rangeNonInclusive(value, minimum, maximum)) {
    fail(messages.rangeNonInclusive(value, minimum, maximum));
  }
}

/**
 * @throws {ValidationError} `Value '<value>' must not be between <min> and <max> (non-inclusive)`
 */
export function notRangeNonInclusive(
  value: Numeric,
  minimum: Numeric,
  maximum: Numeric,
): void {
  if (test.rangeNonInclusive(value, minimum, maximum)) {
    fail(messages.notRangeNonInclusive(value, minimum, maximum));
  }
}

/**
 * Validates that `first === second`.
 *
 * @throws {ValidationError} `Value '<first>' must be equal to '<second>'`
 */
export function eq<T>(first: T, second: T): void {
  if (!test.eq(first, second)) fail(messages.eq(first, second));
}

/**
 * Validates that `first !== second`.
 *
 * @throws {ValidationError} `Value '<first>' must not be equal to '<second>'`
 * @example
 * neq(42, -123.45); // ok
 * neq(42, 42);      // throws: Value '42' must not be equal to '42'
 */
export function neq<T>(first: T, second: T): void {
  if (test.eq(first, second)) fail(messages.neq(first, second));
}

/**
 * @throws {ValidationError} `Value '<first>' must be greater than '<second>'`
 */
export function gt(first: Numeric, second: Numeric): void {
  if (!test.gt(first, second)) fail(messages.gt(first, second));
}

/**
 * @throws {ValidationError} `Value '<first>' must not be greater than '<second>'`
 */
export function notGt(first: Numeric, second: Numeric): void {
  if (test.gt(first, second)) fail(messages.notGt(first, second));
}

/**
 * @throws {ValidationError} `Value '<first>' must be greater than or equal to '<second>'`
 */
export function gte(first: Numeric, second: Numeric): void {
  if (!test.gte(first, second)) fail(messages.gte(first, second));
}

/**
 * @throws {ValidationError} `Value '<first>' must not be greater than or equal to '<second>'`
 */
export function notGte(first: Numeric, second: Numeric): void {
  if (test.gte(first, second)) fail(messages.notGte(first, second));
}

/**
 * @throws {ValidationError} `Value '<first>' must be less than '<second>'`
 */
export function lt(first: Numeric, second: Numeric): void {
  if (!test.lt(first, second)) fail(messages.lt(first, second));
}

/**
 * @throws {ValidationError} `Value '<first>' must not be less than '<second>'`
 */
export function notLt(first: Numeric, second: Numeric): void {
  if (test.lt(first, second)) fail(messages.notLt(first, second));
}

/**
 * @throws {ValidationError} `Value '<first>' must be less than or equal to '<second>'`
 */
export function lte(first: Numeric, second: Numeric): void {
  if (!test.lte(first, second)) fail(messages.lte(first, second));
}

/**
 * @throws {ValidationError} `Value '<first>' must not be less than or equal to '<second>'`
 */
export function notLte(first: Numeric, second: Numeric): void {
  if (test.lte(first, second)) fail(messages.notLte(first, second));
}

export { specificType as type, notSpecificType as notType };
