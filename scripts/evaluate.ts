import "dotenv/config";
import { basename, join } from "path";
import { createLogger } from "../src/createLogger";
import { describeThresholds } from "../src/evaluateMetrics";
import { getTextsDir } from "../src/getTextsDir";
import { loadConfig } from "../src/loadConfig";
import {
  buildReport,
  formatRecordLines,
  writeReport,
  writeSummaryCsv,
} from "../src/report";
import { runEvaluation } from "../src/runEvaluation";

const logger = createLogger("evaluate");
const textsDir = getTextsDir();
const config = loadConfig(process.env, { log: (m) => logger.warn(m) });
const thresholds = describeThresholds(config.thresholds);
const { transcriptor } = config;

logger.box(
  [
    "TRANSCRIPTION QUALITY METRICS REPORT",
    "",
    `Transcriptor: ${transcriptor.name} ${transcriptor.version} (${transcriptor.environment})`,
    ...Object.entries(thresholds).map(([key, value]) => `${key}: ${value}`),
  ].join("\n")
);

try {
  const run = runEvaluation(textsDir, config, {
    log: (m) => logger.info(m),
    onRecord: (record) => {
      const title = `${record.name} (${basename(record.hypPath)})`;
      const body = formatRecordLines(record).join("\n");
      if (record.overallPassed) {
        logger.success(`${title}\n${body}`);
      } else {
        logger.fail(`${title}\n${body}`);
      }
    },
  });

  const reportPath = process.env.REPORT_PATH || join(textsDir, "report.json");
  writeReport(
    reportPath,
    buildReport(run.records, run.failures, {
      transcriptor,
      thresholds,
    })
  );
  logger.info(`Report written to ${reportPath}`);

  if (process.env.SUMMARY_PATH) {
    writeSummaryCsv(process.env.SUMMARY_PATH, run.records);
    logger.info(`Summary written to ${process.env.SUMMARY_PATH}`);
  }

  const passed = run.records.filter((r) => r.overallPassed).length;
  const total = run.records.length + run.failures.length;
  if (run.allPassed) {
    logger.success(`All ${total} transcripts passed`);
  } else {
    logger.fail(`${passed} of ${total} transcripts passed`);
  }
  process.exitCode = run.allPassed ? 0 : 1;
} catch (error) {
  logger.error(error);
  process.exitCode = 1;
}
