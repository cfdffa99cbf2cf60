export interface NormalizationOptions {
  /** Characters deleted before tokenization. Whitespace is ignored. */
  punctuation: string;
  /** Delete every Unicode punctuation and symbol character instead. */
  stripAllPunctuation: boolean;
  /** Decompose to NFKD and drop combining marks ("café" → "cafe"). */
  foldAccents: boolean;
}

export const defaultNormalizationOptions: NormalizationOptions = {
  punctuation: "",
  stripAllPunctuation: false,
  foldAccents: false,
};

export interface PreparedText {
  readonly text: string;
  readonly words: readonly string[];
  /** Code points of `text`. Spaces are kept. */
  readonly characters: readonly string[];
}

export function normalizeText(
  text: string,
  options: NormalizationOptions = defaultNormalizationOptions
) {
  let result = text.toLowerCase().normalize("NFC");
  if (options.foldAccents) {
    result = result.normalize("NFKD").replace(/\p{M}+/gu, "");
  }
  if (options.stripAllPunctuation) {
    result = result.replace(/[\p{P}\p{S}]/gu, "");
  } else if (options.punctuation) {
    const strip = new Set(
      Array.from(options.punctuation).filter((c) => !/\s/.test(c))
    );
    result = Array.from(result)
      .filter((c) => !strip.has(c))
      .join("");
  }
  return result.replace(/\s+/g, " ").trim();
}

export function toWords(normalized: string) {
  return normalized.split(" ").filter((w) => w.length > 0);
}

export function prepareText(
  text: string,
  options: NormalizationOptions = defaultNormalizationOptions
): PreparedText {
  const normalized = normalizeText(text, options);
  return Object.freeze({
    text: normalized,
    words: Object.freeze(toWords(normalized)),
    characters: Object.freeze(Array.from(normalized)),
  });
}
