import { describe, it, expect } from "vitest";
import { formatSignificant } from "../src/encoding/number-format.js";

describe("formatSignificant", () => {
  describe("fixed notation", () => {
    it("should print integers without a decimal point", () => {
      expect(formatSignificant(10)).toBe("10");
      expect(formatSignificant(-32768)).toBe("-32768");
      expect(formatSignificant(123456789012345)).toBe("123456789012345");
    });

    it("should drop trailing zeros", () => {
      expect(formatSignificant(-2.5)).toBe("-2.5");
      expect(formatSignificant(0.0001)).toBe("0.0001");
    });

    it("should round to 15 significant digits", () => {
      expect(formatSignificant(0.1 + 0.2)).toBe("0.3");
      expect(formatSignificant(1 / 3)).toBe("0.333333333333333");
    });
  });

  describe("exponential notation", () => {
    it("should switch at an exponent of 15 and above", () => {
      expect(formatSignificant(1e20)).toBe("1e+20");
      expect(formatSignificant(1234567890123456)).toBe("1.23456789012346e+15");
    });

    it("should switch below an exponent of -4", () => {
      expect(formatSignificant(0.00001234)).toBe("1.234e-05");
    });
  });

  describe("special values", () => {
    it("should handle zero and non-finite values", () => {
      expect(formatSignificant(0)).toBe("0");
      expect(formatSignificant(-0)).toBe("-0");
      expect(formatSignificant(NaN)).toBe("nan");
      expect(formatSignificant(Infinity)).toBe("inf");
      expect(formatSignificant(-Infinity)).toBe("-inf");
    });
  });

  it("should honour a custom precision", () => {
    expect(formatSignificant(Math.PI, 6)).toBe("3.14159");
  });
});
