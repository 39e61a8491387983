/**
 * @module render
 * @description Turns values and types into the text used in failure messages.
 * Strings are shown as they are, because the messages already quote the value.
 * Errors are shown as `Name('message')` instead of their stack. Everything else
 * goes through `util.inspect` on a single line.
 */

import { inspect } from "node:util";

import type { RuntimeType } from "@onecheck/predicates";

import { isInstanceOf, runtimeTypeName, typeName } from "@onecheck/predicates";

const inspectOptions = {
  depth: 2,
  breakLength: Infinity,
  compact: true,
} as const;

/**
 * @example
 * renderValue('');                    // => ''
 * renderValue(42);                    // => '42'
 * renderValue(null);                  // => 'null'
 * renderValue(new RangeError('Test')); // => "RangeError('Test')"
 * renderValue({ a: [1, 2] });         // => '{ a: [ 1, 2 ] }'
 */
export const renderValue = (value: unknown): string => {
  if (typeof value === "string") return value;
  if (isInstanceOf(value, Error)) {
    return `${runtimeTypeName(value)}(${inspect(value.message)})`;
  }
  return inspect(value, inspectOptions);
};

export const renderType = (type: RuntimeType): string => typeName(type);

export { runtimeTypeName as renderTypeOf };
