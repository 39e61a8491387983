/**
 * @module runtime-type
 * @description Runtime type tags and the two ways of matching a value against one.
 * An exact match compares type tags directly; an instance match asks whether the
 * type's prototype sits anywhere on the value's prototype chain.
 *
 * ### Decision Tree
 * - Need "is this exactly a `Date`, not a subclass"? Use `isExactType`.
 * - Subclasses should count too? Use `isInstanceOf`.
 * - Building a message? `runtimeTypeName` gives the name of what the value actually is.
 *
 * @example
 * ```typescript
 * import { isExactType, isInstanceOf, runtimeTypeName } from './runtime-type.mts';
 *
 * class HttpError extends Error {}
 * const error = new HttpError('gone');
 *
 * isExactType(error, Error);   // => false
 * isInstanceOf(error, Error);  // => true
 * runtimeTypeName(error);      // => 'HttpError'
 * isExactType(42, Number);     // => true
 * ```
 *
 * @category Core
 * @since 2025-07-03
 */

/**
 * Any class or constructor function, abstract ones included.
 *
 * @category Types
 */
export type Constructor<T = unknown> = abstract new (...args: never[]) => T;

/**
 * The constructors JavaScript uses to tag its primitive values.
 * `BigInt` and `Symbol` cannot be called with `new`, so they are listed on their own.
 *
 * @category Types
 */
export type PrimitiveConstructor =
  | StringConstructor
  | NumberConstructor
  | BooleanConstructor
  | BigIntConstructor
  | SymbolConstructor;

/**
 * Anything that can be used as a runtime type tag.
 *
 * @category Types
 */
export type RuntimeType = Constructor | PrimitiveConstructor;

/* eslint-disable @typescript-eslint/no-wrapper-object-types */
/**
 * The static type of a value that matched `T`.
 * @description Primitive constructors map to their primitive or its wrapper object
 * (`Number` to `number | Number`), since `new Number(1)` matches `Number` as well.
 * Every other constructor maps to its instance type.
 *
 * @category Types
 * @example
 * type A = InstanceOf<NumberConstructor>; // number | Number
 * type B = InstanceOf<typeof URL>;        // URL
 */
export type InstanceOf<T extends RuntimeType> = T extends StringConstructor
  ? string | String
  : T extends NumberConstructor
    ? number | Number
    : T extends BooleanConstructor
      ? boolean | Boolean
      : T extends BigIntConstructor
        ? bigint | BigInt
        : T extends SymbolConstructor
          ? symbol | Symbol
          : T extends Constructor<infer I>
            ? I
            : never;
/* eslint-enable @typescript-eslint/no-wrapper-object-types */

const primitiveTypeOf = (value: unknown): PrimitiveConstructor | undefined => {
  switch (typeof value) {
    case "string":
      return String;
    case "number":
      return Number;
    case "boolean":
      return Boolean;
    case "bigint":
      return BigInt;
    case "symbol":
      return Symbol;
    default:
      return undefined;
  }
};

const isRuntimeType = (candidate: unknown): candidate is RuntimeType =>
  typeof candidate === "function";

// Proxies can throw from their getPrototypeOf trap; such values have no readable prototype.
const prototypeOf = (value: object): object | null | undefined => {
  try {
    const proto: unknown = Object.getPrototypeOf(value);
    return typeof proto === "object" || typeof proto === "function" ? proto : null;
  } catch {
    return undefined;
  }
};

const constructorOf = (proto: object): RuntimeType | undefined => {
  try {
    const ctor: unknown = Reflect.get(proto, "constructor");
    return isRuntimeType(ctor) && ctor.prototype === proto ? ctor : undefined;
  } catch {
    return undefined;
  }
};

const hasObjectPrototype = (
  type: RuntimeType,
): type is RuntimeType & { prototype: object } =>
  typeof type.prototype === "object" && type.prototype !== null;

/**
 * Returns the type tag of a value.
 * @description Primitives resolve through `typeof` to their constructor, objects to the
 * constructor of their prototype. A function whose prototype names no constructor
 * (a derived class, whose prototype is its base class) is a `Function`.
 * `null`, `undefined`, objects whose prototype is `null` and proxies whose prototype
 * cannot be read have no type tag.
 *
 * @category Introspection
 * @example
 * runtimeTypeOf('a');            // => String
 * runtimeTypeOf(new Map());      // => Map
 * runtimeTypeOf(null);           // => undefined
 * runtimeTypeOf(Object.create(null)); // => undefined
 * runtimeTypeOf(class extends Map {}); // => Function
 */
export const runtimeTypeOf = (value: unknown): RuntimeType | undefined => {
  if (value === null || value === undefined) return undefined;
  if (typeof value !== "object" && typeof value !== "function") {
    return primitiveTypeOf(value);
  }

  const proto = prototypeOf(value);
  if (proto === null || proto === undefined) return undefined;
  const ctor = typeof proto === "object" ? constructorOf(proto) : undefined;
  if (ctor === undefined && typeof value === "function") return Function;
  return ctor;
};

/**
 * Names the runtime type of a value, for messages.
 *
 * @category Introspection
 * @example
 * runtimeTypeName(42);                  // => 'Number'
 * runtimeTypeName(null);                // => 'null'
 * runtimeTypeName(Object.create(null)); // => '[Object: null prototype]'
 */
export const runtimeTypeName = (value: unknown): string => {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  const type = runtimeTypeOf(value);
  if (type === undefined) {
    return typeof value === "object" && prototypeOf(value) === null
      ? "[Object: null prototype]"
      : "Object";
  }
  return typeName(type);
};

/**
 * Names a type tag. Anonymous classes are shown as `<anonymous>`.
 *
 * @category Introspection
 */
export const typeName = (type: RuntimeType): string =>
  type.name === "" ? "<anonymous>" : type.name;

/**
 * Checks whether a value's type is exactly `type`.
 * @description Compares type tags directly, so a subclass instance does not match
 * its base class. Primitives match their own constructor only (`42` is exactly a
 * `Number`, but not an `Object`). Functions match their type tag, so every class,
 * derived ones included, is exactly a `Function`.
 *
 * @category Matching
 * @example
 * class Base {}
 * class Sub extends Base {}
 *
 * isExactType(new Sub(), Sub);  // => true
 * isExactType(new Sub(), Base); // => false
 * isExactType('x', String);     // => true
 * isExactType(null, Object);    // => false
 */
export const isExactType = <T extends RuntimeType>(
  value: unknown,
  type: T,
): value is InstanceOf<T> => {
  if (value === null || value === undefined) return false;
  if (typeof value !== "object" && typeof value !== "function") {
    return primitiveTypeOf(value) === type;
  }
  if (typeof value === "function") return runtimeTypeOf(value) === type;
  return hasObjectPrototype(type) && prototypeOf(value) === type.prototype;
};

/**
 * Checks whether a value is an instance of `type` or of any subtype of it.
 * @description Walks the prototype chain of `Object(value)` with `isPrototypeOf`, so
 * primitives are treated as instances of their wrapper type and of `Object`.
 * `Symbol.hasInstance` overrides are not consulted. A `type` without an object
 * prototype matches nothing, and neither does a proxy whose prototype cannot be read.
 *
 * @category Matching
 * @example
 * class Base {}
 * class Sub extends Base {}
 *
 * isInstanceOf(new Sub(), Base); // => true
 * isInstanceOf(42, Number);      // => true
 * isInstanceOf(42, Object);      // => true
 * isInstanceOf(undefined, Object); // => false
 */
export const isInstanceOf = <T extends RuntimeType>(
  value: unknown,
  type: T,
): value is InstanceOf<T> => {
  if (value === null || value === undefined) return false;
  if (!hasObjectPrototype(type)) return false;
  try {
    return Object.prototype.isPrototypeOf.call(type.prototype, Object(value));
  } catch {
    return false;
  }
};
