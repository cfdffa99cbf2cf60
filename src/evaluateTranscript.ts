import { characterErrorRate, wordErrorRate } from "./errorRate";
import { MissingPerformanceDataError, UndefinedMetricError } from "./errors";
import { describeThresholds, evaluateMetrics } from "./evaluateMetrics";
import type {
  EvaluationIssue,
  EvaluationRecord,
  TranscriptorInfo,
} from "./EvaluationRecord";
import type { MetricName, MetricValues, ThresholdSet } from "./Metrics";
import {
  defaultNormalizationOptions,
  prepareText,
  type NormalizationOptions,
  type PreparedText,
} from "./normalizeText";
import { resolvePerformance, type LatencyMapping } from "./PerformanceData";
import { jaccardSimilarity, levenshteinSimilarity } from "./similarity";
import { tfidfSimilarity } from "./tfidfSimilarity";

export interface TranscriptInput {
  name: string;
  gtPath: string;
  hypPath: string;
  reference: string;
  hypothesis: string;
}

export interface EvaluationContext {
  thresholds: ThresholdSet;
  normalization?: NormalizationOptions;
  /** Absent when the run has no latency file. */
  latency?: LatencyMapping;
  transcriptor?: TranscriptorInfo;
}

type TextMetric = (reference: PreparedText, hypothesis: PreparedText) => number;

const textMetrics: [MetricName, TextMetric][] = [
  ["tfidf_similarity", (r, h) => tfidfSimilarity(r.words, h.words)],
  ["word_error_rate", (r, h) => wordErrorRate(r, h).rate],
  ["character_error_rate", (r, h) => characterErrorRate(r, h).rate],
  ["levenshtein_similarity", levenshteinSimilarity],
  ["jaccard_similarity", jaccardSimilarity],
];

export function computeTextMetrics(
  reference: PreparedText,
  hypothesis: PreparedText
) {
  const metrics: MetricValues = {};
  const issues: EvaluationIssue[] = [];
  for (const [name, compute] of textMetrics) {
    try {
      metrics[name] = compute(reference, hypothesis);
    } catch (error) {
      if (!(error instanceof UndefinedMetricError)) throw error;
      issues.push({
        code: "UNDEFINED_METRIC",
        message: error.message,
        metric: name,
      });
    }
  }
  return { metrics, issues };
}

export function evaluateTranscript(
  input: TranscriptInput,
  context: EvaluationContext
): EvaluationRecord {
  const normalization = context.normalization ?? defaultNormalizationOptions;
  const reference = prepareText(input.reference, normalization);
  const hypothesis = prepareText(input.hypothesis, normalization);
  const { metrics, issues } = computeTextMetrics(reference, hypothesis);

  try {
    const performance = resolvePerformance(input.hypPath, context.latency);
    metrics.latency_ms = performance.latencyMs;
    if (performance.rtf !== undefined) {
      metrics.rtf = performance.rtf;
    }
  } catch (error) {
    if (!(error instanceof MissingPerformanceDataError)) throw error;
    issues.push({ code: "MISSING_PERFORMANCE_DATA", message: error.message });
  }

  const evaluation = evaluateMetrics(metrics, context.thresholds);
  if (evaluation.status === "configuration_error") {
    issues.push({
      code: "NO_EVALUABLE_METRICS",
      message: "No metric has both a value and a threshold",
    });
  }

  return {
    name: input.name,
    gtPath: input.gtPath,
    hypPath: input.hypPath,
    metrics,
    ...evaluation,
    thresholds: describeThresholds(context.thresholds),
    ...(context.transcriptor ? { transcriptor: context.transcriptor } : {}),
    issues,
  };
}
