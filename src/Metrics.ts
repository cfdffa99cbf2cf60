export const metricNames = [
  "tfidf_similarity",
  "word_error_rate",
  "character_error_rate",
  "latency_ms",
  "rtf",
  "levenshtein_similarity",
  "jaccard_similarity",
] as const;
export type MetricName = (typeof metricNames)[number];

export type MetricDirection = "lower-is-better" | "higher-is-better";

export interface MetricDefinition {
  label: string;
  direction: MetricDirection;
  /** Key in the `evaluations` map of a report. */
  evaluationKey: string;
  /** Key in the `thresholds` map of a report. */
  thresholdKey: string;
  /** Environment variable holding the threshold. */
  setting: string;
}

export const metricDefinitions: Record<MetricName, MetricDefinition> = {
  tfidf_similarity: {
    label: "TF-IDF Similarity",
    direction: "higher-is-better",
    evaluationKey: "tfidf_passed",
    thresholdKey: "tfidf_threshold",
    setting: "TFIDF_THRESHOLD",
  },
  word_error_rate: {
    label: "Word Error Rate",
    direction: "lower-is-better",
    evaluationKey: "wer_passed",
    thresholdKey: "wer_threshold",
    setting: "WER_THRESHOLD",
  },
  character_error_rate: {
    label: "Character Error Rate",
    direction: "lower-is-better",
    evaluationKey: "cer_passed",
    thresholdKey: "cer_threshold",
    setting: "CER_THRESHOLD",
  },
  latency_ms: {
    label: "Latency (ms)",
    direction: "lower-is-better",
    evaluationKey: "latency_passed",
    thresholdKey: "latency_threshold_ms",
    setting: "LATENCY_THRESHOLD_MS",
  },
  rtf: {
    label: "Real-Time Factor",
    direction: "lower-is-better",
    evaluationKey: "rtf_passed",
    thresholdKey: "rtf_threshold",
    setting: "RTF_THRESHOLD",
  },
  levenshtein_similarity: {
    label: "Levenshtein Similarity",
    direction: "higher-is-better",
    evaluationKey: "levenshtein_passed",
    thresholdKey: "levenshtein_threshold",
    setting: "LEVENSHTEIN_THRESHOLD",
  },
  jaccard_similarity: {
    label: "Jaccard Similarity",
    direction: "higher-is-better",
    evaluationKey: "jaccard_passed",
    thresholdKey: "jaccard_threshold",
    setting: "JACCARD_THRESHOLD",
  },
};

export type MetricValues = Partial<Record<MetricName, number>>;
export type ThresholdSet = Readonly<Partial<Record<MetricName, number>>>;

export const defaultThresholds: ThresholdSet = Object.freeze({
  word_error_rate: 0.15,
  character_error_rate: 0.1,
  tfidf_similarity: 0.75,
  latency_ms: 800,
  rtf: 0.8,
});

export function passesThreshold(
  value: number,
  threshold: number,
  direction: MetricDirection
) {
  return direction === "lower-is-better"
    ? value <= threshold
    : value >= threshold;
}
