import { describe, expect, it } from "vitest";

import {
  assertDimensions,
  toPgVectorLiteral,
  toSimilarity,
} from "@utils/vector";

describe("toPgVectorLiteral", () => {
  it("formats a pgvector literal", () => {
    expect(toPgVectorLiteral([0.1, 2, -3])).toBe("[0.1,2,-3]");
  });

  it("rejects empty and non-finite vectors", () => {
    expect(() => toPgVectorLiteral([])).toThrow(
      "toPgVectorLiteral received an empty vector"
    );
    expect(() => toPgVectorLiteral([1, Number.NaN])).toThrow(
      "toPgVectorLiteral received a non-finite value"
    );
  });
});

describe("assertDimensions", () => {
  it("accepts a vector of the expected width", () => {
    expect(() => assertDimensions([1, 2, 3], 3)).not.toThrow();
  });

  it("reports the actual and expected width", () => {
    expect(() => assertDimensions([1, 2], 3)).toThrow(
      "Embedding has 2 dimensions, expected 3"
    );
  });
});

describe("toSimilarity", () => {
  it("accepts numbers and numeric strings", () => {
    expect(toSimilarity(0.5)).toBe(0.5);
    expect(toSimilarity("0.75")).toBe(0.75);
  });

  it("falls back to 0", () => {
    expect(toSimilarity(null)).toBe(0);
    expect(toSimilarity("n/a")).toBe(0);
  });
});
