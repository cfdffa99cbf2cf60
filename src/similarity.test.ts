import { describe, expect, it } from "vitest";
import { prepareText } from "./normalizeText";
import { jaccardSimilarity, levenshteinSimilarity } from "./similarity";

describe("levenshteinSimilarity", () => {
  it("normalizes the distance by the longer text", () => {
    expect(
      levenshteinSimilarity(prepareText("colour"), prepareText("color"))
    ).toBeCloseTo(5 / 6, 12);
  });

  it("is one for two empty texts", () => {
    expect(levenshteinSimilarity(prepareText(""), prepareText(""))).toBe(1);
  });

  it("is zero when one text is empty", () => {
    expect(levenshteinSimilarity(prepareText("abc"), prepareText(""))).toBe(0);
  });
});

describe("jaccardSimilarity", () => {
  it("compares word sets", () => {
    expect(
      jaccardSimilarity(prepareText("the cat sat"), prepareText("the cat ran"))
    ).toBe(0.5);
  });

  it("ignores repeated words", () => {
    expect(
      jaccardSimilarity(prepareText("go go go"), prepareText("go"))
    ).toBe(1);
  });

  it("handles empty texts", () => {
    expect(jaccardSimilarity(prepareText(""), prepareText(""))).toBe(1);
    expect(jaccardSimilarity(prepareText("a"), prepareText(""))).toBe(0);
  });
});
