import { consola, LogLevels, type ConsolaInstance } from "consola";

export function createLogger(
  tag: string,
  level = process.env.LOG_LEVEL
): ConsolaInstance {
  const logger = consola.withTag(tag);
  const resolved = Object.entries(LogLevels).find(
    ([name]) => name === level?.toLowerCase()
  );
  if (resolved) {
    logger.level = resolved[1];
  }
  return logger;
}
