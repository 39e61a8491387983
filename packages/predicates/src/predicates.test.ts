import { describe, it, expect } from "vitest";
import {
  none,
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
  Test,
} from "./predicates.mjs";

class Base {}
class Sub extends Base {}

describe("predicates", () => {
  describe("none", () => {
    it("should accept null and undefined", () => {
      expect(none(null)).toBe(true);
      expect(none(undefined)).toBe(true);
    });

    it("should reject falsy values that are present", () => {
      expect(none("")).toBe(false);
      expect(none(0)).toBe(false);
      expect(none(false)).toBe(false);
      expect(none(NaN)).toBe(false);
    });
  });

  describe("specificType", () => {
    it("should match the exact class only", () => {
      const s = new Sub();
      expect(specificType(s, Sub)).toBe(true);
      expect(specificType(s, Base)).toBe(false);
      expect(specificType(new Base(), Base)).toBe(true);
    });

    it("should match primitives against their constructor", () => {
      expect(specificType("text", String)).toBe(true);
      expect(specificType(1.5, Number)).toBe(true);
      expect(specificType(true, Boolean)).toBe(true);
      expect(specificType(10n, BigInt)).toBe(true);
      expect(specificType(Symbol("s"), Symbol)).toBe(true);
      expect(specificType(1, String)).toBe(false);
      expect(specificType(1, Object)).toBe(false);
    });

    it("should not match missing values", () => {
      expect(specificType(null, Object)).toBe(false);
      expect(specificType(undefined, Object)).toBe(false);
    });

    it("should match class constructors against Function", () => {
      expect(specificType(Base, Function)).toBe(true);
      expect(specificType(Sub, Function)).toBe(true);
      expect(specificType(Sub, Base)).toBe(false);
    });

    it("should match boxed primitives against their wrapper", () => {
      const boxed: unknown = new String("x");
      expect(specificType(boxed, String)).toBe(true);
      if (instance(boxed, String)) {
        expect(typeof boxed === "string" ? boxed : boxed.valueOf()).toBe("x");
      } else {
        expect.unreachable();
      }
    });
  });

  describe("proxies without a readable prototype", () => {
    it("should answer false for a revoked proxy", () => {
      const { proxy, revoke } = Proxy.revocable({}, {});
      revoke();
      expect(() => specificType(proxy, Object)).not.toThrow();
      expect(specificType(proxy, Object)).toBe(false);
      expect(instance(proxy, Object)).toBe(false);
    });

    it("should answer false when the getPrototypeOf trap throws", () => {
      const proxy = new Proxy(
        {},
        {
          getPrototypeOf() {
            throw new Error("trap");
          },
        },
      );
      expect(specificType(proxy, Object)).toBe(false);
      expect(instance(proxy, Object)).toBe(false);
      expect(Test.type(proxy, Object)).toBe(false);
    });
  });

  describe("instance", () => {
    it("should accept subclasses", () => {
      const s = new Sub();
      expect(instance(s, Sub)).toBe(true);
      expect(instance(s, Base)).toBe(true);
      expect(instance(s, Object)).toBe(true);
      expect(instance(new Base(), Sub)).toBe(false);
    });

    it("should treat primitives as instances of their wrapper", () => {
      expect(instance(42, Number)).toBe(true);
      expect(instance(42, Object)).toBe(true);
      expect(instance("x", Number)).toBe(false);
    });

    it("should not treat a derived class constructor as an instance of its base", () => {
      expect(instance(Sub, Base)).toBe(false);
      expect(instance(Sub, Function)).toBe(true);
    });

    it("should work with built-in error hierarchies", () => {
      class TestError extends RangeError {}
      const error = new TestError("Test");
      expect(instance(error, Error)).toBe(true);
      expect(instance(error, TypeError)).toBe(false);
      expect(specificType(error, RangeError)).toBe(false);
    });
  });

  describe("zero / positive / negative", () => {
    it("should classify the sign of numbers", () => {
      expect(zero(0)).toBe(true);
      expect(zero(-0)).toBe(true);
      expect(zero(0n)).toBe(true);
      expect(zero(42)).toBe(false);

      expect(positive(5)).toBe(true);
      expect(positive(0)).toBe(false);
      expect(positive(-1n)).toBe(false);

      expect(negative(-123.45)).toBe(true);
      expect(negative(0)).toBe(false);
      expect(negative(-0)).toBe(false);
    });

    it("should answer false for NaN", () => {
      expect(zero(NaN)).toBe(false);
      expect(positive(NaN)).toBe(false);
      expect(negative(NaN)).toBe(false);
    });

    it("should handle infinities", () => {
      expect(positive(Infinity)).toBe(true);
      expect(negative(-Infinity)).toBe(true);
    });
  });

  describe("ranges", () => {
    it("should include the bounds for rangeInclusive", () => {
      expect(rangeInclusive(0, 0, 1)).toBe(true);
      expect(rangeInclusive(1, 0, 1)).toBe(true);
      expect(rangeInclusive(0.5, 0, 1)).toBe(true);
      expect(rangeInclusive(2, 0, 1)).toBe(false);
      expect(rangeInclusive(-1, 0, 1)).toBe(false);
    });

    it("should exclude the bounds for rangeNonInclusive", () => {
      expect(rangeNonInclusive(0.5, 0, 1)).toBe(true);
      expect(rangeNonInclusive(0, 0, 1)).toBe(false);
      expect(rangeNonInclusive(1, 0, 1)).toBe(false);
    });

    it("should answer false for inverted bounds without throwing", () => {
      expect(rangeInclusive(0.5, 1, 0)).toBe(false);
      expect(rangeNonInclusive(0.5, 1, 0)).toBe(false);
    });

    it("should accept a degenerate inclusive range", () => {
      expect(rangeInclusive(3, 3, 3)).toBe(true);
      expect(rangeNonInclusive(3, 3, 3)).toBe(false);
    });

    it("should answer false when NaN is involved", () => {
      expect(rangeInclusive(NaN, 0, 1)).toBe(false);
      expect(rangeInclusive(0.5, NaN, 1)).toBe(false);
      expect(rangeNonInclusive(NaN, 0, 1)).toBe(false);
    });

    it("should compare bigint and number operands", () => {
      expect(rangeInclusive(5n, 0, 10)).toBe(true);
      expect(rangeNonInclusive(10n, 0, 10)).toBe(false);
    });
  });

  describe("comparisons", () => {
    it("should compare equal values", () => {
      expect(eq(42, 42)).toBe(true);
      expect(eq(42, -123.45)).toBe(false);
      expect(eq(0, -0)).toBe(true);
      expect(eq(NaN, NaN)).toBe(false);
      expect(eq("a", "a")).toBe(true);
    });

    it("should order values", () => {
      expect(gt(42, -123.45)).toBe(true);
      expect(gt(5, 5)).toBe(false);
      expect(gte(0, 0)).toBe(true);
      expect(gte(-1, 0)).toBe(false);
      expect(lt(-123.45, 42)).toBe(true);
      expect(lt(5, 5)).toBe(false);
      expect(lte(0, 0)).toBe(true);
      expect(lte(1, 0)).toBe(false);
    });

    it("should answer false for every ordering against NaN", () => {
      expect(gt(NaN, 1)).toBe(false);
      expect(gte(NaN, 1)).toBe(false);
      expect(lt(NaN, 1)).toBe(false);
      expect(lte(NaN, 1)).toBe(false);
    });

    it("should order mixed bigint and number operands", () => {
      expect(gt(2n, 1)).toBe(true);
      expect(lte(1, 1n)).toBe(true);
    });
  });

  describe("Test namespace", () => {
    it("should expose type as an alias of specificType", () => {
      expect(Test.type).toBe(specificType);
      expect(Test.type(new Sub(), Base)).toBe(false);
      expect(Test.instance(new Sub(), Base)).toBe(true);
    });

    it("should give the same answer on repeated calls", () => {
      const inputs = [-1, 0, 1, NaN];
      const first = inputs.map((n) => [Test.zero(n), Test.positive(n), Test.negative(n)]);
      const second = inputs.map((n) => [Test.zero(n), Test.positive(n), Test.negative(n)]);
      expect(second).toEqual(first);
    });
  });
});
