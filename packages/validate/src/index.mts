/**
 * @onecheck/validate - Validators that throw, or return a Result, when a condition fails
 */

export * from "./validate.mjs";
export * as validate from "./validate.mjs";
export * as check from "./check.mjs";
export { toCheck, type Check } from "./check.mjs";
export { messages, type MessageKey } from "./messages.mjs";
export { renderType, renderValue } from "./render.mjs";
export { reportFailures, type ReportFailuresOptions } from "./reporting.mjs";

export { ValidationError, ValueError, isValidationError } from "@onecheck/errors";
