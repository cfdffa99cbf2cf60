import { alignSequences, editDistance, type AlignmentResult } from "./editDistance";
import { UndefinedMetricError } from "./errors";
import type { PreparedText } from "./normalizeText";

export interface ErrorRateResult {
  rate: number;
  alignment: AlignmentResult;
}

export function errorRate(alignment: AlignmentResult, metric = "error rate") {
  if (alignment.referenceLength === 0) {
    throw new UndefinedMetricError(metric, "the reference is empty");
  }
  return editDistance(alignment) / alignment.referenceLength;
}

export function wordErrorRate(
  reference: PreparedText,
  hypothesis: PreparedText
): ErrorRateResult {
  const alignment = alignSequences(reference.words, hypothesis.words);
  return { rate: errorRate(alignment, "word_error_rate"), alignment };
}

export function characterErrorRate(
  reference: PreparedText,
  hypothesis: PreparedText
): ErrorRateResult {
  const alignment = alignSequences(reference.characters, hypothesis.characters);
  return { rate: errorRate(alignment, "character_error_rate"), alignment };
}
