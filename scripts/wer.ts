import "dotenv/config";
import fs from "fs";
import { createLogger } from "../src/createLogger";
import { editDistance } from "../src/editDistance";
import { characterErrorRate, wordErrorRate } from "../src/errorRate";
import { loadConfig } from "../src/loadConfig";
import { prepareText } from "../src/normalizeText";
import { tfidfSimilarity } from "../src/tfidfSimilarity";

const logger = createLogger("wer");
const [referencePath, hypothesisPath] = process.argv.slice(2);
if (!referencePath || !hypothesisPath) {
  throw new Error("Usage: wer <reference.txt> <hypothesis.txt>");
}

const { normalization } = loadConfig(process.env, {
  log: (m) => logger.warn(m),
});
const a = prepareText(fs.readFileSync(referencePath, "utf8"), normalization);
const b = prepareText(fs.readFileSync(hypothesisPath, "utf8"), normalization);

logger.info("Reference words:", a.words.length);
logger.info("Hypothesis words:", b.words.length);

const wer = wordErrorRate(a, b);
const cer = characterErrorRate(a, b);
console.table([
  { metric: "WER", value: wer.rate, ...wer.alignment },
  { metric: "CER", value: cer.rate, ...cer.alignment },
]);
logger.info("Word edits:", editDistance(wer.alignment));
logger.info("TF-IDF similarity:", tfidfSimilarity(a.words, b.words));
