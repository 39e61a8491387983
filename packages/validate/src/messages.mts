/**
 * @module messages
 * @description Failure messages, one per validator.
 * The shape is fixed: the rendered value comes first, then the condition it broke
 * in plain words. Callers and docs match on this text, so treat changes as breaking.
 */

import type { Numeric, RuntimeType } from "@onecheck/predicates";

import { renderType, renderTypeOf, renderValue } from "./render.mjs";

type Relation =
  | "equal to"
  | "greater than"
  | "greater than or equal to"
  | "less than"
  | "less than or equal to";

type Bounds = "inclusive" | "non-inclusive";

const subject = (value: unknown): string => `Value '${renderValue(value)}'`;

const must = (negated: boolean): string => (negated ? "must not be" : "must be");

const sign =
  (condition: string, qualifier = "") =>
  (negated: boolean) =>
  (value: Numeric): string =>
    `${subject(value)} ${must(negated)} ${condition}${negated ? "" : qualifier}`;

const range =
  (bounds: Bounds) =>
  (negated: boolean) =>
  (value: Numeric, minimum: Numeric, maximum: Numeric): string =>
    `${subject(value)} ${must(negated)} between ${renderValue(minimum)} and ${renderValue(maximum)} (${bounds})`;

const relation =
  (name: Relation) =>
  (negated: boolean) =>
  (first: unknown, second: unknown): string =>
    `${subject(first)} ${must(negated)} ${name} '${renderValue(second)}'`;

const zero = sign("zero");
const positive = sign("positive", " (non-zero)");
const negative = sign("negative", " (non-zero)");
const inclusive = range("inclusive");
const nonInclusive = range("non-inclusive");
const equal = relation("equal to");
const greater = relation("greater than");
const greaterOrEqual = relation("greater than or equal to");
const less = relation("less than");
const lessOrEqual = relation("less than or equal to");

export const messages = {
  none: (value: unknown) => `${subject(value)} must be null or undefined`,
  notNone: () => "Value must not be null or undefined",
  specificType: (value: unknown, type: RuntimeType) =>
    `${subject(value)} must be of type ${renderType(type)}, not ${renderTypeOf(value)}`,
  notSpecificType: (value: unknown, type: RuntimeType) =>
    `${subject(value)} must not be of type ${renderType(type)}`,
  instance: (value: unknown, type: RuntimeType) =>
    `${subject(value)} must be an instance of ${renderType(type)}, not a ${renderTypeOf(value)}`,
  notInstance: (value: unknown, type: RuntimeType) =>
    `${subject(value)} must not be an instance of ${renderType(type)}`,
  zero: zero(false),
  notZero: zero(true),
  positive: positive(false),
  notPositive: positive(true),
  negative: negative(false),
  notNegative: negative(true),
  rangeInclusive: inclusive(false),
  notRangeInclusive: inclusive(true),
  rangeNonInclusive: nonInclusive(false),
  notRangeNonInclusive: nonInclusive(true),
  eq: equal(false),
  neq: equal(true),
  gt: greater(false),
  notGt: greater(true),
  gte: greaterOrEqual(false),
  notGte: greaterOrEqual(true),
  lt: less(false),
  notLt: less(true),
  lte: lessOrEqual(false),
  notLte: lessOrEqual(true),
} as const;

export type MessageKey = keyof typeof messages;
