import { describe, expect, it } from "vitest";
import { cosineDistance, parseVectorLiteral, similarityFromDistance, toVectorLiteral } from "../../src/storage/vector.js";

describe("cosineDistance", () => {
  it("is 0 for the same direction and 1 for orthogonal vectors", () => {
    expect(cosineDistance([1, 2, 3], [2, 4, 6])).toBe(0);
    expect(cosineDistance([1, 0], [0, 1])).toBe(1);
  });

  it("is 2 for opposite vectors", () => {
    expect(cosineDistance([1, 0], [-1, 0])).toBe(2);
  });

  it("treats a zero vector as orthogonal", () => {
    expect(cosineDistance([0, 0], [1, 1])).toBe(1);
  });

  it("throws on a length mismatch", () => {
    expect(() => cosineDistance([1, 2], [1, 2, 3])).toThrow(RangeError);
  });
});

it("maps distance to similarity", () => {
  expect(similarityFromDistance(0)).toBe(1);
  expect(similarityFromDistance(1)).toBe(0.5);
});

describe("vector literals", () => {
  it("formats the pgvector text form", () => {
    expect(toVectorLiteral([0.5, -1, 0.123456789])).toBe("[0.5,-1,0.12345679]");
  });

  it("parses the text form", () => {
    expect(parseVectorLiteral("[0.5, -1,2]")).toEqual([0.5, -1, 2]);
    expect(parseVectorLiteral("[]")).toEqual([]);
    expect(() => parseVectorLiteral("[a,b]")).toThrow(RangeError);
  });
});
