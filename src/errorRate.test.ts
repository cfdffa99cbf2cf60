import { describe, expect, it } from "vitest";
import { editDistance } from "./editDistance";
import { characterErrorRate, errorRate, wordErrorRate } from "./errorRate";
import { UndefinedMetricError } from "./errors";
import { prepareText } from "./normalizeText";

describe("wordErrorRate", () => {
  it("counts one deleted word out of five", () => {
    const result = wordErrorRate(
      prepareText("the weather is nice today"),
      prepareText("the weather nice today")
    );
    expect(result.rate).toBe(0.2);
    expect(result.alignment.deletions).toBe(1);
  });

  it("treats a misspelled single word as one substitution", () => {
    const result = wordErrorRate(prepareText("colour"), prepareText("color"));
    expect(result.rate).toBe(1);
    expect(result.alignment.substitutions).toBe(1);
  });

  it("is zero for identical texts", () => {
    const text = prepareText("Some words here");
    expect(wordErrorRate(text, text).rate).toBe(0);
  });

  it("is exactly one when the hypothesis is empty", () => {
    const result = wordErrorRate(prepareText("one two three"), prepareText(""));
    expect(result.rate).toBe(1);
  });

  it("can exceed one when insertions dominate", () => {
    const result = wordErrorRate(prepareText("a"), prepareText("b c d"));
    expect(result.rate).toBe(3);
  });

  it("throws for an empty reference", () => {
    expect(() => wordErrorRate(prepareText(" "), prepareText("hi"))).toThrow(
      UndefinedMetricError
    );
  });
});

describe("characterErrorRate", () => {
  it("counts the missing word and one space", () => {
    const result = characterErrorRate(
      prepareText("the weather is nice today"),
      prepareText("the weather nice today")
    );
    expect(result.alignment.referenceLength).toBe(25);
    expect(editDistance(result.alignment)).toBe(3);
    expect(result.rate).toBeCloseTo(0.12, 10);
  });

  it("counts one dropped letter out of six", () => {
    const result = characterErrorRate(
      prepareText("colour"),
      prepareText("color")
    );
    expect(result.rate).toBeCloseTo(1 / 6, 10);
  });

  it("is zero for composed and decomposed forms of the same text", () => {
    const composed = prepareText("caf\u00e9 au lait");
    const decomposed = prepareText("cafe\u0301 au lait");
    expect(characterErrorRate(composed, decomposed).rate).toBe(0);
    expect(wordErrorRate(composed, decomposed).rate).toBe(0);
  });

  it("throws for an empty reference", () => {
    expect(() => characterErrorRate(prepareText(""), prepareText(""))).toThrow(
      "character_error_rate is undefined: the reference is empty"
    );
  });
});

describe("errorRate", () => {
  it("divides the edit count by the reference length", () => {
    expect(
      errorRate({
        substitutions: 1,
        insertions: 1,
        deletions: 0,
        hits: 3,
        referenceLength: 4,
        hypothesisLength: 5,
      })
    ).toBe(0.5);
  });
});
