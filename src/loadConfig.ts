import { ConfigurationError } from "./errors";
import type { TranscriptorInfo } from "./EvaluationRecord";
import {
  defaultThresholds,
  metricDefinitions,
  metricNames,
  type MetricName,
  type ThresholdSet,
} from "./Metrics";
import {
  defaultNormalizationOptions,
  type NormalizationOptions,
} from "./normalizeText";

export interface EvaluationConfig {
  thresholds: ThresholdSet;
  normalization: NormalizationOptions;
  transcriptor: TranscriptorInfo;
}

type Env = Record<string, string | undefined>;

const disabledValues = new Set(["off", "none", "disabled"]);

/**
 * Returns `undefined` when the threshold is switched off.
 */
export function parseThreshold(
  setting: string,
  raw: string | undefined,
  fallback: number | undefined
) {
  const value = raw?.trim();
  if (!value) {
    return fallback;
  }
  if (disabledValues.has(value.toLowerCase())) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(setting, value);
  }
  return parsed;
}

export function parseFlag(
  setting: string,
  raw: string | undefined,
  fallback: boolean
) {
  const value = raw?.trim().toLowerCase();
  if (!value) {
    return fallback;
  }
  if (["1", "true", "yes", "on"].includes(value)) return true;
  if (["0", "false", "no", "off"].includes(value)) return false;
  throw new ConfigurationError(setting, value);
}

function withFallback<T>(
  read: () => T,
  fallback: T,
  log: (message: string) => void
) {
  try {
    return read();
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    log(`${error.message}, falling back to default ${String(fallback)}.`);
    return fallback;
  }
}

/**
 * Reads the run configuration once. Unparseable values are reported
 * through `log` and replaced by their defaults.
 */
export function loadConfig(
  env: Env = process.env,
  { log }: { log: (message: string) => void } = { log: () => {} }
): EvaluationConfig {
  const thresholds: Partial<Record<MetricName, number>> = {};
  for (const name of metricNames) {
    const { setting } = metricDefinitions[name];
    const fallback = defaultThresholds[name];
    const threshold = withFallback(
      () => parseThreshold(setting, env[setting], fallback),
      fallback,
      log
    );
    if (threshold !== undefined) {
      thresholds[name] = threshold;
    }
  }

  const punctuation = env.STRIP_PUNCTUATION ?? "";
  const normalization: NormalizationOptions = {
    ...defaultNormalizationOptions,
    ...(punctuation.trim().toLowerCase() === "all"
      ? { stripAllPunctuation: true }
      : { punctuation }),
    foldAccents: withFallback(
      () =>
        parseFlag(
          "FOLD_ACCENTS",
          env.FOLD_ACCENTS,
          defaultNormalizationOptions.foldAccents
        ),
      defaultNormalizationOptions.foldAccents,
      log
    ),
  };

  return {
    thresholds: Object.freeze(thresholds),
    normalization,
    transcriptor: {
      name: env.TRANSCRIPTOR_NAME || "unknown",
      version: env.TRANSCRIPTOR_VERSION || "unknown",
      environment: env.TRANSCRIPTOR_ENVIRONMENT || "unknown",
    },
  };
}
