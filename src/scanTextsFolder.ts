import fs, { type Dirent } from "fs";
import { basename, extname, join } from "path";
import { MissingReferenceError, NoTranscriptsError } from "./errors";
import { parseLatencyMapping, type LatencyMapping } from "./PerformanceData";

export interface TranscriptFile {
  name: string;
  path: string;
}

export interface TextsFolder {
  groundTruthPath: string;
  transcripts: TranscriptFile[];
}

const isTextFile = (entry: Dirent) =>
  entry.isFile() && extname(entry.name).toLowerCase() === ".txt";

function listTextFiles(dir: string) {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter(isTextFile)
    .map((entry) => entry.name)
    .sort();
}

/**
 * Expects `<dir>/gt/` to hold exactly one ground truth and every other
 * `<dir>/*.txt` to be a transcript.
 */
export function scanTextsFolder(dir: string): TextsFolder {
  const gtDir = join(dir, "gt");
  const groundTruths = listTextFiles(gtDir);
  if (groundTruths.length !== 1) {
    throw new MissingReferenceError(gtDir, groundTruths);
  }
  const transcripts = listTextFiles(dir).map((fileName) => ({
    name: basename(fileName, extname(fileName)),
    path: join(dir, fileName),
  }));
  if (transcripts.length === 0) {
    throw new NoTranscriptsError(dir);
  }
  return { groundTruthPath: join(gtDir, groundTruths[0]), transcripts };
}

export function readTextFile(path: string) {
  return fs.readFileSync(path, "utf8").trim();
}

/**
 * Reads `<dir>/latency.json`. Returns `undefined` when the file is absent or
 * is not valid JSON.
 */
export function readLatencyMapping(
  dir: string,
  { log }: { log: (message: string) => void }
): LatencyMapping | undefined {
  const path = join(dir, "latency.json");
  if (!fs.existsSync(path)) {
    log(`No latency file at ${path}`);
    return undefined;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(path, "utf8"));
  } catch (error) {
    if (!(error instanceof SyntaxError)) throw error;
    log(`Could not parse ${path}: ${error.message}`);
    return undefined;
  }
  return parseLatencyMapping(raw, { log });
}
