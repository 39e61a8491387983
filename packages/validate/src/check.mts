/**
 * @module check
 * @description The validators again, reporting through `Result` instead of throwing.
 * `check.<name>(...)` returns `Result.ok(firstArgument)` when `validate.<name>(...)`
 * would return, and `Result.err(ValidationError)` with the same message when it would
 * throw. Errors that are not validation failures still propagate.
 *
 * @example
 * ```typescript
 * import { check } from '@onecheck/validate';
 * import { Result } from '@onecheck/errors';
 *
 * const amount = Result.flatMap((n: Numeric) => check.lte(n, 1000))(check.positive(250));
 * // => { success: true, data: 250 }
 *
 * check.positive(0);
 * // => { success: false, error: ValidationError("Value '0' must be positive (non-zero)") }
 * ```
 *
 * @category Core
 * @since 2025-07-03
 */

import type { Result, ValidationError } from "@onecheck/errors";

import { tryValidate } from "@onecheck/errors";

import * as validate from "./validate.mjs";

/**
 * A validator turned into a function returning `Result<first argument, ValidationError>`.
 */
export type Check<A extends [unknown, ...unknown[]]> = (
  ...args: A
) => Result<A[0], ValidationError>;

/**
 * Wraps a throwing validator so that it returns a Result.
 *
 * @example
 * const even = toCheck((n: number) => validate.zero(n % 2));
 * even(4); // => { success: true, data: 4 }
 */
export const toCheck =
  <A extends [unknown, ...unknown[]]>(validator: (...args: A) => void): Check<A> =>
  (...args) =>
    tryValidate(() => validator(...args), args[0]);

export const none = toCheck(validate.none);
export const notNone = toCheck(validate.notNone);
export const specificType = toCheck(validate.specificType);
export const notSpecificType = toCheck(validate.notSpecificType);
export const instance = toCheck(validate.instance);
export const notInstance = toCheck(validate.notInstance);
export const zero = toCheck(validate.zero);
export const notZero = toCheck(validate.notZero);
export const positive = toCheck(validate.positive);
export const notPositive = toCheck(validate.notPositive);
export const negative = toCheck(validate.negative);
export const notNegative = toCheck(validate.notNegative);
export const rangeInclusive = toCheck(validate.rangeInclusive);
export const notRangeInclusive = toCheck(validate.notRangeInclusive);
export const rangeNonInclusive = toCheck(validate.rangeNonInclusive);
export const notRangeNonInclusive = toCheck(validate.notRangeNonInclusive);
export const eq = toCheck(validate.eq);
export const neq = toCheck(validate.neq);
export const gt = toCheck(validate.gt);
export const notGt = toCheck(validate.notGt);
export const gte = toCheck(validate.gte);
export const notGte = toCheck(validate.notGte);
export const lt = toCheck(validate.lt);
export const notLt = toCheck(validate.notLt);
export const lte = toCheck(validate.lte);
export const notLte = toCheck(validate.notLte);

export { specificType as type, notSpecificType as notType };
