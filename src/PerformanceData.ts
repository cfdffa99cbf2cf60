import { basename, extname } from "path";
import { z } from "zod";
import { MissingPerformanceDataError } from "./errors";

export const LatencyEntrySchema = z.union([
  z.number().nonnegative(),
  z.object({
    latency_ms: z.number().nonnegative(),
    rtf: z.number().nonnegative().nullish(),
  }),
]);
export type LatencyEntry = z.infer<typeof LatencyEntrySchema>;

export type LatencyMapping = ReadonlyMap<string, LatencyEntry>;

export type LatencyMetadata =
  | { kind: "numeric"; latencyMs: number }
  | { kind: "detailed"; latencyMs: number; rtf?: number };

export interface PerformanceRecord {
  latencyMs: number;
  rtf?: number;
}

export function toLatencyMetadata(entry: LatencyEntry): LatencyMetadata {
  if (typeof entry === "number") {
    return { kind: "numeric", latencyMs: entry };
  }
  return entry.rtf == null
    ? { kind: "detailed", latencyMs: entry.latency_ms }
    : { kind: "detailed", latencyMs: entry.latency_ms, rtf: entry.rtf };
}

export function toPerformanceRecord(
  metadata: LatencyMetadata
): PerformanceRecord {
  switch (metadata.kind) {
    case "numeric":
      return { latencyMs: metadata.latencyMs };
    case "detailed":
      return metadata.rtf === undefined
        ? { latencyMs: metadata.latencyMs }
        : { latencyMs: metadata.latencyMs, rtf: metadata.rtf };
  }
}

/**
 * Validates each entry of a parsed latency file. Invalid entries are
 * reported through `log` and left out.
 */
export function parseLatencyMapping(
  raw: unknown,
  { log }: { log: (message: string) => void }
): LatencyMapping {
  const mapping = new Map<string, LatencyEntry>();
  const parsed = z.record(z.string(), z.unknown()).safeParse(raw);
  if (!parsed.success) {
    log("Latency mapping must be a JSON object; ignoring it");
    return mapping;
  }
  for (const [key, value] of Object.entries(parsed.data)) {
    const entry = LatencyEntrySchema.safeParse(value);
    if (entry.success) {
      mapping.set(key, entry.data);
    } else {
      const reason = describeIssues(entry.error);
      log(`Ignoring invalid latency entry for ${key}: ${reason}`);
    }
  }
  return mapping;
}

function describeIssues(error: z.ZodError) {
  return error.issues
    .map((issue) =>
      issue.path.length
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message
    )
    .join("; ");
}

/**
 * Looks `fileName` up by its full name, then by its name without extension.
 */
export function resolvePerformance(
  fileName: string,
  mapping: LatencyMapping | undefined
): PerformanceRecord {
  const name = basename(fileName);
  const stem = basename(name, extname(name));
  const entry = mapping?.get(name) ?? mapping?.get(stem);
  if (entry === undefined) {
    throw new MissingPerformanceDataError(name);
  }
  return toPerformanceRecord(toLatencyMetadata(entry));
}
