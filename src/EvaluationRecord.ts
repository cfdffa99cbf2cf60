import type { MetricName, MetricValues } from "./Metrics";

export type EvaluationStatus = "passed" | "failed" | "configuration_error";

export type EvaluationIssueCode =
  | "UNDEFINED_METRIC"
  | "MISSING_PERFORMANCE_DATA"
  | "NO_EVALUABLE_METRICS";

export interface EvaluationIssue {
  code: EvaluationIssueCode;
  message: string;
  metric?: MetricName;
}

export interface TranscriptorInfo {
  name: string;
  version: string;
  environment: string;
}

export interface MetricsEvaluation {
  evaluations: Record<string, boolean>;
  passedMetrics: number;
  totalMetrics: number;
  overallPassed: boolean;
  status: EvaluationStatus;
}

export interface EvaluationRecord extends MetricsEvaluation {
  name: string;
  gtPath: string;
  hypPath: string;
  metrics: MetricValues;
  thresholds: Record<string, number>;
  transcriptor?: TranscriptorInfo;
  issues: EvaluationIssue[];
}
