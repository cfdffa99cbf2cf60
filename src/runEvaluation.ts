import { evaluateTranscript } from "./evaluateTranscript";
import type { EvaluationRecord } from "./EvaluationRecord";
import type { EvaluationConfig } from "./loadConfig";
import { allPassed, type TranscriptFailure } from "./report";
import {
  readLatencyMapping,
  readTextFile,
  scanTextsFolder,
} from "./scanTextsFolder";

export interface EvaluationRun {
  groundTruthPath: string;
  records: EvaluationRecord[];
  failures: TranscriptFailure[];
  allPassed: boolean;
}

/**
 * Evaluates every transcript of `dir` against its single ground truth.
 * Discovery errors abort the run; a transcript that cannot be read is
 * recorded as a failure and the others still get evaluated.
 */
export function runEvaluation(
  dir: string,
  config: EvaluationConfig,
  {
    log,
    onRecord,
  }: {
    log: (message: string) => void;
    onRecord?: (record: EvaluationRecord) => void;
  }
): EvaluationRun {
  const { groundTruthPath, transcripts } = scanTextsFolder(dir);
  log(`Ground truth: ${groundTruthPath}`);
  log(`Transcripts: ${transcripts.length}`);
  const reference = readTextFile(groundTruthPath);
  const latency = readLatencyMapping(dir, { log });

  const records: EvaluationRecord[] = [];
  const failures: TranscriptFailure[] = [];
  for (const transcript of transcripts) {
    let hypothesis: string;
    try {
      hypothesis = readTextFile(transcript.path);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log(`Could not read ${transcript.path}: ${message}`);
      failures.push({
        name: transcript.name,
        hypPath: transcript.path,
        error: message,
      });
      continue;
    }
    const record = evaluateTranscript(
      {
        name: transcript.name,
        gtPath: groundTruthPath,
        hypPath: transcript.path,
        reference,
        hypothesis,
      },
      { ...config, latency }
    );
    records.push(record);
    onRecord?.(record);
  }

  return {
    groundTruthPath,
    records,
    failures,
    allPassed: allPassed(records, failures),
  };
}
