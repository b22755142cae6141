import { describe, expect, it } from "vitest";

import { ConfigurationError, InvalidMagnitudeError } from "../src/errors";
import { INT256_MAX, pow10, signed256, UINT256_MAX } from "../src/math";

describe("signed256", () => {
  it("passes through values up to int256 max", () => {
    expect(signed256(0n)).toBe(0n);
    expect(signed256(1_100_000_000_000_000_000n)).toBe(1_100_000_000_000_000_000n);
    expect(signed256(INT256_MAX)).toBe(INT256_MAX);
  });

  it("rejects the first value that would set the sign bit", () => {
    expect(() => signed256(INT256_MAX + 1n)).toThrow(InvalidMagnitudeError);
  });

  it("rejects uint256 max and anything that is not a uint256", () => {
    expect(() => signed256(UINT256_MAX)).toThrow(InvalidMagnitudeError);
    expect(() => signed256(UINT256_MAX + 1n)).toThrow(InvalidMagnitudeError);
    expect(() => signed256(-1n)).toThrow(InvalidMagnitudeError);
  });

  it("carries the offending value on the error", () => {
    try {
      signed256(INT256_MAX + 1n);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidMagnitudeError);
      if (err instanceof InvalidMagnitudeError) {
        expect(err.code).toBe(-32011);
        expect(err.data).toEqual({ value: (INT256_MAX + 1n).toString() });
        expect(err.name).toBe("InvalidMagnitudeError");
      }
    }
  });
});

describe("pow10", () => {
  it("computes exact powers", () => {
    expect(pow10(0)).toBe(1n);
    expect(pow10(10)).toBe(10_000_000_000n);
    expect(pow10(18)).toBe(10n ** 18n);
  });

  it("refuses negative or fractional exponents", () => {
    expect(() => pow10(-1)).toThrow(ConfigurationError);
    expect(() => pow10(1.5)).toThrow(ConfigurationError);
  });
});
