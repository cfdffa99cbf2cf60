import type { MetricsEvaluation } from "./EvaluationRecord";
import {
  metricDefinitions,
  metricNames,
  passesThreshold,
  type MetricValues,
  type ThresholdSet,
} from "./Metrics";

/**
 * Gates every metric that has both a value and a threshold. Metrics missing
 * either are left out of the counts. All evaluated metrics must pass.
 */
export function evaluateMetrics(
  metrics: MetricValues,
  thresholds: ThresholdSet
): MetricsEvaluation {
  const evaluations: Record<string, boolean> = {};
  let passedMetrics = 0;
  let totalMetrics = 0;
  for (const name of metricNames) {
    const value = metrics[name];
    const threshold = thresholds[name];
    if (value === undefined || threshold === undefined) continue;
    const { direction, evaluationKey } = metricDefinitions[name];
    const passed = passesThreshold(value, threshold, direction);
    evaluations[evaluationKey] = passed;
    totalMetrics++;
    if (passed) passedMetrics++;
  }
  if (totalMetrics === 0) {
    return {
      evaluations,
      passedMetrics,
      totalMetrics,
      overallPassed: false,
      status: "configuration_error",
    };
  }
  const overallPassed = passedMetrics === totalMetrics;
  return {
    evaluations,
    passedMetrics,
    totalMetrics,
    overallPassed,
    status: overallPassed ? "passed" : "failed",
  };
}

export function describeThresholds(thresholds: ThresholdSet) {
  const out: Record<string, number> = {};
  for (const name of metricNames) {
    const threshold = thresholds[name];
    if (threshold !== undefined) {
      out[metricDefinitions[name].thresholdKey] = threshold;
    }
  }
  return out;
}
