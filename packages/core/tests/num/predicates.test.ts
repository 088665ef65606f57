import { describe, it, expect } from "vitest";
import { areParallel3, areParallel3Robust } from "../../src/num/predicates.js";
import { createNumericContext } from "../../src/num/tolerance.js";
import { vec3, ZERO3 } from "../../src/num/vec3.js";

describe("predicates", () => {
  describe("areParallel3Robust", () => {
    it("should detect parallel vectors", () => {
      expect(areParallel3Robust(vec3(1, 2, 3), vec3(2, 4, 6))).toBe(true);
    });

    it("should detect anti-parallel vectors", () => {
      expect(areParallel3Robust(vec3(1, 0, 0), vec3(-1, 0, 0))).toBe(true);
      expect(areParallel3Robust(vec3(1, 2, 3), vec3(-3, -6, -9))).toBe(true);
    });

    it("should reject non-parallel vectors", () => {
      expect(areParallel3Robust(vec3(1, 2, 3), vec3(4, 5, 6))).toBe(false);
      expect(areParallel3Robust(vec3(1, 0, 0), vec3(0, 1, 0))).toBe(false);
    });

    it("should see a difference of one ulp", () => {
      // the ulp of doubles in [4, 8) is 4ε
      const b = vec3(2, 4, 6 + 4 * Number.EPSILON);
      expect(areParallel3Robust(vec3(1, 2, 3), b)).toBe(false);
    });

    it("should treat the zero vector as parallel to anything", () => {
      expect(areParallel3Robust(ZERO3, vec3(4, 5, 6))).toBe(true);
    });
  });

  describe("areParallel3", () => {
    it("should accept nearly parallel vectors", () => {
      const ctx = createNumericContext({ angle: 1e-6 });
      expect(areParallel3(vec3(1, 2, 3), vec3(2, 4, 6 + 1e-9), ctx)).toBe(true);
      expect(areParallel3(vec3(1, 2, 3), vec3(2, 4, 6 + 1e-3), ctx)).toBe(false);
    });

    it("should accept anti-parallel vectors", () => {
      const ctx = createNumericContext();
      expect(areParallel3(vec3(1, 2, 3), vec3(-2, -4, -6), ctx)).toBe(true);
    });

    it("should reject perpendicular vectors", () => {
      const ctx = createNumericContext();
      expect(areParallel3(vec3(1, 0, 0), vec3(0, 0, 1), ctx)).toBe(false);
    });
  });
});
