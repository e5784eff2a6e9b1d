import { describe, expect, it } from "vitest";
import { createTextMeasure, estimateTokens, normalizeText } from "../src/utils/text.js";
import { dot, isFiniteVector, l2Norm, l2Normalize } from "../src/utils/vector.js";

describe("text utils", () => {
  it("normalizes line endings and tabs", () => {
    expect(normalizeText("\tline 1\r\nline 2  ")).toBe("line 1\nline 2");
  });

  it("estimates tokens at four characters each, rounding up", () => {
    expect(estimateTokens("")).toBe(0);
    expect(estimateTokens("abcd")).toBe(1);
    expect(estimateTokens("abcde")).toBe(2);
  });

  it("measures in the configured unit", () => {
    expect(createTextMeasure("chars")("hello world")).toBe(11);
    expect(createTextMeasure("tokens")("hello world")).toBe(3);
  });
});

describe("vector utils", () => {
  it("normalizes to unit length", () => {
    const normalized = l2Normalize([3, 4]);
    expect(normalized).toEqual([0.6, 0.8]);
    expect(l2Norm(normalized ?? [])).toBeCloseTo(1, 12);
  });

  it("refuses to normalize a zero or non-finite vector", () => {
    expect(l2Normalize([0, 0, 0])).toBeNull();
    expect(l2Normalize([1, Number.NaN])).toBeNull();
  });

  it("computes dot products and detects non-finite components", () => {
    expect(dot([1, 2, 3], [4, 5, 6])).toBe(32);
    expect(isFiniteVector([0.6, 0.8])).toBe(true);
    expect(isFiniteVector([1, Number.POSITIVE_INFINITY])).toBe(false);
  });
});
