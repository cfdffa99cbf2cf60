import { describe, expect, it } from "vitest";
import { evaluateTranscript, type TranscriptInput } from "./evaluateTranscript";
import { defaultThresholds } from "./Metrics";
import { defaultNormalizationOptions } from "./normalizeText";
import type { LatencyEntry } from "./PerformanceData";

const input = (reference: string, hypothesis: string): TranscriptInput => ({
  name: "t1",
  gtPath: "texts/gt/reference.txt",
  hypPath: "texts/t1.txt",
  reference,
  hypothesis,
});

const latency = (entry: LatencyEntry) =>
  new Map<string, LatencyEntry>([["t1.txt", entry]]);

describe("evaluateTranscript", () => {
  it("evaluates latency and skips a missing rtf", () => {
    const record = evaluateTranscript(
      input("The weather is nice today", "the weather is nice today"),
      { thresholds: defaultThresholds, latency: latency({ latency_ms: 650 }) }
    );
    expect(record.metrics.latency_ms).toBe(650);
    expect(record.metrics).not.toHaveProperty("rtf");
    expect(record.evaluations).toEqual({
      tfidf_passed: true,
      wer_passed: true,
      cer_passed: true,
      latency_passed: true,
    });
    expect(record.totalMetrics).toBe(4);
    expect(record.passedMetrics).toBe(4);
    expect(record.overallPassed).toBe(true);
    expect(record.status).toBe("passed");
    expect(record.issues).toEqual([]);
  });

  it("gates on the remaining metrics when latency passes", () => {
    const record = evaluateTranscript(
      input("the weather is nice today", "the weather nice today"),
      { thresholds: defaultThresholds, latency: latency(650) }
    );
    expect(record.metrics.word_error_rate).toBe(0.2);
    expect(record.evaluations.latency_passed).toBe(true);
    expect(record.evaluations.wer_passed).toBe(false);
    expect(record.overallPassed).toBe(false);
    expect(record.status).toBe("failed");
  });

  it("evaluates rtf when present", () => {
    const record = evaluateTranscript(input("hello world", "hello world"), {
      thresholds: defaultThresholds,
      latency: latency({ latency_ms: 900, rtf: 0.5 }),
    });
    expect(record.metrics.rtf).toBe(0.5);
    expect(record.evaluations.rtf_passed).toBe(true);
    expect(record.evaluations.latency_passed).toBe(false);
    expect(record.totalMetrics).toBe(5);
    expect(record.passedMetrics).toBe(4);
  });

  it("evaluates latency when the rtf is null", () => {
    const record = evaluateTranscript(input("hello world", "hello world"), {
      thresholds: defaultThresholds,
      latency: latency({ latency_ms: 650, rtf: null }),
    });
    expect(record.metrics.latency_ms).toBe(650);
    expect(record.metrics).not.toHaveProperty("rtf");
    expect(record.evaluations.latency_passed).toBe(true);
    expect(record.evaluations).not.toHaveProperty("rtf_passed");
    expect(record.issues).toEqual([]);
  });

  it("flags missing performance data", () => {
    const record = evaluateTranscript(input("hello world", "hello world"), {
      thresholds: defaultThresholds,
    });
    expect(record.issues).toEqual([
      {
        code: "MISSING_PERFORMANCE_DATA",
        message: "No latency entry for t1.txt",
      },
    ]);
    expect(record.totalMetrics).toBe(3);
    expect(record.overallPassed).toBe(true);
  });

  it("reports undefined error rates for an empty reference", () => {
    const record = evaluateTranscript(input("", "hello"), {
      thresholds: defaultThresholds,
      latency: latency(100),
    });
    expect(record.metrics).not.toHaveProperty("word_error_rate");
    expect(record.metrics).not.toHaveProperty("character_error_rate");
    expect(record.metrics.tfidf_similarity).toBe(0);
    expect(record.issues.map((i) => i.metric)).toEqual([
      "word_error_rate",
      "character_error_rate",
    ]);
    expect(record.issues.every((i) => i.code === "UNDEFINED_METRIC")).toBe(
      true
    );
    expect(record.evaluations).toEqual({
      tfidf_passed: false,
      latency_passed: true,
    });
    expect(record.overallPassed).toBe(false);
  });

  it("reports a configuration error when no threshold applies", () => {
    const record = evaluateTranscript(input("a b", "a b"), { thresholds: {} });
    expect(record.status).toBe("configuration_error");
    expect(record.overallPassed).toBe(false);
    expect(record.issues.map((i) => i.code)).toEqual([
      "MISSING_PERFORMANCE_DATA",
      "NO_EVALUABLE_METRICS",
    ]);
  });

  it("applies the normalization options", () => {
    const record = evaluateTranscript(input("Hello, world.", "hello world"), {
      thresholds: defaultThresholds,
      normalization: { ...defaultNormalizationOptions, punctuation: ",." },
    });
    expect(record.metrics.word_error_rate).toBe(0);
    expect(record.metrics.character_error_rate).toBe(0);
  });

  it("attaches thresholds and transcriptor", () => {
    const transcriptor = { name: "asr", version: "1.2", environment: "test" };
    const record = evaluateTranscript(input("a", "a"), {
      thresholds: { word_error_rate: 0.3 },
      transcriptor,
    });
    expect(record.thresholds).toEqual({ wer_threshold: 0.3 });
    expect(record.transcriptor).toEqual(transcriptor);
    expect(record.name).toBe("t1");
    expect(record.gtPath).toBe("texts/gt/reference.txt");
  });

  it("produces identical records for identical input", () => {
    const run = () =>
      evaluateTranscript(
        input("the cat sat on the mat", "a cat was sitting on a mat"),
        { thresholds: defaultThresholds, latency: latency(650) }
      );
    expect(JSON.stringify(run())).toBe(JSON.stringify(run()));
  });
});
