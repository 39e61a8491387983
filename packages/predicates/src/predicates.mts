/**
 * @module predicates
 * @description Boolean checks for scalar values, runtime types and pairwise numeric
 * comparisons. Every predicate is pure: it answers `true` or `false` for its inputs
 * and never throws, whatever those inputs are.
 *
 * ### For Dummies
 * - Each function here is a yes/no question about a value.
 * - Nothing is remembered between calls, so asking twice always gives the same answer.
 * - Want an exception instead of `false`? Use the matching function from `@onecheck/validate`.
 *
 * ### Decision Tree
 * - Missing value? `none(value)`.
 * - Exactly this class, subclasses excluded? `specificType(value, Type)`.
 * - This class or any subclass? `instance(value, Type)`.
 * - Sign of a number? `zero`, `positive`, `negative`.
 * - Between two bounds? `rangeInclusive` keeps the bounds, `rangeNonInclusive` drops them.
 * - Comparing two values? `eq`, `gt`, `gte`, `lt`, `lte`.
 *
 * ### NaN
 * Numeric predicates use plain IEEE comparison. Any ordered comparison with `NaN` is
 * `false`, so `zero(NaN)`, `positive(NaN)`, `negative(NaN)`, both ranges and all of
 * `gt`/`gte`/`lt`/`lte` answer `false` when `NaN` is involved, and `eq(NaN, NaN)` is
 * `false` as well.
 *
 * @example
 * ```typescript
 * import { Test } from '@onecheck/predicates';
 *
 * Test.none(null);                  // => true
 * Test.positive(0);                 // => false
 * Test.rangeInclusive(1, 0, 1);     // => true
 * Test.rangeNonInclusive(1, 0, 1);  // => false
 * Test.gte(0, 0);                   // => true
 * ```
 *
 * @category Core
 * @since 2025-07-03
 */

import type { InstanceOf, RuntimeType } from "./runtime-type.mjs";

import { isExactType, isInstanceOf } from "./runtime-type.mjs";

/**
 * Values the numeric predicates accept. `number` and `bigint` may be mixed.
 *
 * @category Types
 */
export type Numeric = number | bigint;

/**
 * Checks if a value is absent (`null` or `undefined`).
 *
 * @category Absence
 * @example
 * none(null);      // => true
 * none(undefined); // => true
 * none('');        // => false
 * none(0);         // => false
 *
 * @since 2025-07-03
 */
export const none = (value: unknown): value is null | undefined =>
  value === null || value === undefined;

/**
 * Checks if a value's runtime type is exactly `type`.
 * @description Subclass instances do not match their base class. See
 * {@link isExactType} for how primitives and null-prototype objects are treated.
 *
 * @category Types
 * @example
 * class Base {}
 * class Sub extends Base {}
 * const s = new Sub();
 *
 * specificType(s, Sub);  // => true
 * specificType(s, Base); // => false
 * specificType(1, Number); // => true
 *
 * @see instance - Also accepts subclasses
 * @since 2025-07-03
 */
export const specificType = <T extends RuntimeType>(
  value: unknown,
  type: T,
): value is InstanceOf<T> => isExactType(value, type);

/**
 * Checks if a value is an instance of `type` or of one of its subclasses.
 *
 * @category Types
 * @example
 * class Base {}
 * class Sub extends Base {}
 *
 * instance(new Sub(), Base); // => true
 * instance('text', String);  // => true
 * instance(null, Object);    // => false
 *
 * @see specificType - Rejects subclasses
 * @since 2025-07-03
 */
export const instance = <T extends RuntimeType>(
  value: unknown,
  type: T,
): value is InstanceOf<T> => isInstanceOf(value, type);

/**
 * Checks if a number is zero. `-0` and `0n` count as zero.
 *
 * @category Numeric
 * @example
 * zero(0);   // => true
 * zero(-0);  // => true
 * zero(0n);  // => true
 * zero(0.1); // => false
 *
 * @since 2025-07-03
 */
export const zero = (value: Numeric): boolean => value === 0 || value === 0n;

/**
 * Checks if a number is strictly greater than zero.
 *
 * @category Numeric
 * @example
 * positive(5);  // => true
 * positive(0);  // => false
 * positive(1n); // => true
 *
 * @since 2025-07-03
 */
export const positive = (value: Numeric): boolean => value > 0;

/**
 * Checks if a number is strictly less than zero.
 *
 * @category Numeric
 * @example
 * negative(-123.45); // => true
 * negative(0);       // => false
 *
 * @since 2025-07-03
 */
export const negative = (value: Numeric): boolean => value < 0;

/**
 * Checks if `minimum <= value <= maximum`.
 * @description Bounds are not checked for order; with `minimum > maximum` the answer
 * is simply `false`.
 *
 * @category Numeric
 * @example
 * rangeInclusive(0, 0, 1); // => true
 * rangeInclusive(1, 0, 1); // => true
 * rangeInclusive(2, 0, 1); // => false
 * rangeInclusive(0, 1, 0); // => false (inverted bounds)
 *
 * @see rangeNonInclusive - Excludes the bounds
 * @since 2025-07-03
 */
export const rangeInclusive = (
  value: Numeric,
  minimum: Numeric,
  maximum: Numeric,
): boolean => minimum <= value && value <= maximum;

/**
 * Checks if `minimum < value < maximum`.
 *
 * @category Numeric
 * @example
 * rangeNonInclusive(0.5, 0, 1); // => true
 * rangeNonInclusive(0, 0, 1);   // => false
 * rangeNonInclusive(1, 0, 1);   // => false
 *
 * @see rangeInclusive - Includes the bounds
 * @since 2025-07-03
 */
export const rangeNonInclusive = (
  value: Numeric,
  minimum: Numeric,
  maximum: Numeric,
): boolean => minimum < value && value < maximum;

/**
 * Checks if two values are strictly equal (`===`).
 * @description `0` and `-0` are equal, `NaN` equals nothing, and a `number` never
 * equals a `bigint`; both arguments must share a type.
 *
 * @category Comparison
 * @example
 * eq(42, 42);     // => true
 * eq('a', 'a');   // => true
 * eq(NaN, NaN);   // => false
 *
 * @since 2025-07-03
 */
export const eq = <T,>(first: T, second: T): boolean => first === second;

/**
 * Checks if `first > second`.
 *
 * @category Comparison
 * @example
 * gt(42, -123.45); // => true
 * gt(5, 5);        // => false
 * gt(2n, 1);       // => true
 */
export const gt = (first: Numeric, second: Numeric): boolean => first > second;

/**
 * Checks if `first >= second`.
 *
 * @category Comparison
 * @example
 * gte(0, 0); // => true
 */
export const gte = (first: Numeric, second: Numeric): boolean => first >= second;

/**
 * Checks if `first < second`.
 *
 * @category Comparison
 * @example
 * lt(-123.45, 42); // => true
 * lt(5, 5);        // => false
 */
export const lt = (first: Numeric, second: Numeric): boolean => first < second;

/**
 * Checks if `first <= second`.
 *
 * @category Comparison
 * @example
 * lte(0, 0); // => true
 */
export const lte = (first: Numeric, second: Numeric): boolean => first <= second;

/**
 * All predicates under one name.
 * @description `type` is an alias of `specificType`.
 *
 * @category Namespaces
 * @example
 * Test.type(new Date(), Date); // => true
 * Test.eq(42, 42);             // => true
 *
 * @since 2025-07-03
 */
export const Test = {
  none,
  type: specificType,
  specificType,
  instance,
  zero,
  positive,
  negative,
  rangeInclusive,
  rangeNonInclusive,
  eq,
  gt,
  gte,
  lt,
  lte,
} as const;
