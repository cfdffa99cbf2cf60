export class ConfigurationError extends Error {
  name = "ConfigurationError";
  constructor(public setting: string, public rawValue: string) {
    super(`Invalid value for ${setting}: "${rawValue}"`);
  }
}

export class MissingReferenceError extends Error {
  name = "MissingReferenceError";
  constructor(public directory: string, public found: string[]) {
    super(
      found.length === 0
        ? `No ground truth found in ${directory}`
        : `Expected exactly one ground truth in ${directory}, found ${
            found.length
          }: ${found.join(", ")}`
    );
  }
}

export class NoTranscriptsError extends Error {
  name = "NoTranscriptsError";
  constructor(public directory: string) {
    super(`No transcripts found in ${directory}`);
  }
}

export class MissingPerformanceDataError extends Error {
  name = "MissingPerformanceDataError";
  constructor(public transcript: string) {
    super(`No latency entry for ${transcript}`);
  }
}

export class UndefinedMetricError extends Error {
  name = "UndefinedMetricError";
  constructor(public metric: string, reason: string) {
    super(`${metric} is undefined: ${reason}`);
  }
}
