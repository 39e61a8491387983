/**
 * @onecheck/predicates - Pure boolean checks for scalar values and runtime types
 */

export * from "./predicates.mjs";
export * from "./runtime-type.mjs";
