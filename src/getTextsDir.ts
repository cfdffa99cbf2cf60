export function getTextsDir() {
  return process.argv[2] || process.env.TEXTS_DIR || "texts";
}
