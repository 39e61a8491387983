import { describe, it, expect, vi } from "vitest";

import { tryValidate } from "./result-utilities.mjs";
import { ValidationError } from "./types.mjs";

describe("Result Utilities", () => {
  describe("tryValidate()", () => {
    it("should return Result.ok with the given data when nothing is thrown", () => {
      const fn = vi.fn();
      const result = tryValidate(fn, 42);
      expect(fn).toHaveBeenCalledOnce();
      expect(result).toEqual({ success: true, data: 42 });
    });

    it("should capture a ValidationError as Result.err", () => {
      const error = new ValidationError("Value '0' must be positive (non-zero)");
      const result = tryValidate(() => {
        throw error;
      }, 0);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBe(error);
      }
    });

    it("should rethrow anything that is not a validation failure", () => {
      const boom = new TypeError("boom");
      expect(() =>
        tryValidate(() => {
          throw boom;
        }, 1),
      ).toThrow(boom);
    });
  });
});
