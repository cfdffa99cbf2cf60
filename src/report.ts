import { stringify } from "csv/sync";
import fs from "fs";
import type {
  EvaluationIssue,
  EvaluationRecord,
  TranscriptorInfo,
} from "./EvaluationRecord";
import { metricDefinitions, metricNames, type MetricValues } from "./Metrics";

export interface TranscriptFailure {
  name: string;
  hypPath: string;
  error: string;
}

export interface ReportEntry {
  name: string;
  gt_path: string;
  hyp_path: string;
  metrics: MetricValues;
  evaluations: Record<string, boolean>;
  thresholds: Record<string, number>;
  transcriptor?: TranscriptorInfo;
  passed_metrics: number;
  total_metrics: number;
  overall_passed: boolean;
  status: EvaluationRecord["status"];
  issues: EvaluationIssue[];
}

export interface Report {
  transcriptor: TranscriptorInfo;
  thresholds: Record<string, number>;
  results: ReportEntry[];
  errors: { name: string; hyp_path: string; error: string }[];
  all_passed: boolean;
}

export function toReportEntry(record: EvaluationRecord): ReportEntry {
  return {
    name: record.name,
    gt_path: record.gtPath,
    hyp_path: record.hypPath,
    metrics: { ...record.metrics },
    evaluations: { ...record.evaluations },
    thresholds: { ...record.thresholds },
    ...(record.transcriptor ? { transcriptor: record.transcriptor } : {}),
    passed_metrics: record.passedMetrics,
    total_metrics: record.totalMetrics,
    overall_passed: record.overallPassed,
    status: record.status,
    issues: record.issues.map((issue) => ({ ...issue })),
  };
}

export function allPassed(
  records: readonly EvaluationRecord[],
  failures: readonly TranscriptFailure[] = []
) {
  return (
    records.length > 0 &&
    failures.length === 0 &&
    records.every((record) => record.overallPassed)
  );
}

export function buildReport(
  records: readonly EvaluationRecord[],
  failures: readonly TranscriptFailure[],
  context: {
    transcriptor: TranscriptorInfo;
    thresholds: Record<string, number>;
  }
): Report {
  return {
    transcriptor: context.transcriptor,
    thresholds: context.thresholds,
    results: records.map(toReportEntry),
    errors: failures.map((f) => ({
      name: f.name,
      hyp_path: f.hypPath,
      error: f.error,
    })),
    all_passed: allPassed(records, failures),
  };
}

export function formatMetricValue(value: number | undefined) {
  return value === undefined ? "N/A" : value.toFixed(3);
}

/**
 * One line per metric that has a value, in report order.
 */
export function formatRecordLines(record: EvaluationRecord) {
  const lines: string[] = [];
  for (const name of metricNames) {
    const value = record.metrics[name];
    const { label, evaluationKey } = metricDefinitions[name];
    const passed = record.evaluations[evaluationKey];
    if (value === undefined && passed === undefined) continue;
    const verdict =
      passed === undefined ? "not evaluated" : passed ? "pass" : "FAIL";
    const text = formatMetricValue(value).padStart(10);
    lines.push(`${(label + ":").padEnd(24)}${text}  ${verdict}`);
  }
  for (const issue of record.issues) {
    lines.push(`! ${issue.message}`);
  }
  lines.push(
    `Overall: ${record.overallPassed ? "pass" : "FAIL"} (${
      record.passedMetrics
    }/${record.totalMetrics} metrics passed)`
  );
  return lines;
}

const summaryColumns = [
  "name",
  "status",
  ...metricNames,
  "passed_metrics",
  "total_metrics",
  "overall_passed",
];

export function formatSummaryCsv(records: readonly EvaluationRecord[]) {
  return stringify(
    records.map((record) => ({
      ...record.metrics,
      name: record.name,
      status: record.status,
      passed_metrics: record.passedMetrics,
      total_metrics: record.totalMetrics,
      overall_passed: record.overallPassed,
    })),
    {
      header: true,
      columns: summaryColumns,
      cast: { boolean: (value) => String(value) },
    }
  );
}

export function writeReport(path: string, report: Report) {
  fs.writeFileSync(path, JSON.stringify(report, null, 2) + "\n");
}

export function writeSummaryCsv(
  path: string,
  records: readonly EvaluationRecord[]
) {
  fs.writeFileSync(path, formatSummaryCsv(records));
}
