import { alignSequences, editDistance } from "./editDistance";
import type { PreparedText } from "./normalizeText";

/**
 * 1 - characterDistance / longerLength, over the normalized texts.
 */
export function levenshteinSimilarity(a: PreparedText, b: PreparedText) {
  const maxLength = Math.max(a.characters.length, b.characters.length);
  if (maxLength === 0) {
    return 1;
  }
  const distance = editDistance(alignSequences(a.characters, b.characters));
  return 1 - distance / maxLength;
}

export function jaccardSimilarity(a: PreparedText, b: PreparedText) {
  const left = new Set(a.words);
  const right = new Set(b.words);
  if (left.size === 0 && right.size === 0) {
    return 1;
  }
  if (left.size === 0 || right.size === 0) {
    return 0;
  }
  let intersection = 0;
  for (const word of left) {
    if (right.has(word)) intersection++;
  }
  return intersection / (left.size + right.size - intersection);
}
