export type TermVector = ReadonlyMap<string, number>;

function countTerms(tokens: readonly string[]) {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

/**
 * Smoothed inverse document frequency: ln((1 + N) / (1 + df)) + 1.
 */
export function inverseDocumentFrequency(
  corpus: readonly (readonly string[])[]
) {
  const documentFrequency = new Map<string, number>();
  for (const document of corpus) {
    for (const term of new Set(document)) {
      documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
    }
  }
  const n = corpus.length;
  return (term: string) =>
    Math.log((1 + n) / (1 + (documentFrequency.get(term) ?? 0))) + 1;
}

/**
 * Raw term counts weighted by the smoothed idf of `corpus`, which defaults
 * to the documents themselves.
 */
export function tfidfVectors(
  documents: readonly (readonly string[])[],
  corpus: readonly (readonly string[])[] = documents
): TermVector[] {
  const idf = inverseDocumentFrequency(corpus);
  return documents.map((tokens) => {
    const vector = new Map<string, number>();
    for (const [term, count] of countTerms(tokens)) {
      vector.set(term, count * idf(term));
    }
    return vector;
  });
}

function squaredNorm(vector: TermVector) {
  let sum = 0;
  for (const term of [...vector.keys()].sort()) {
    const weight = vector.get(term) ?? 0;
    sum += weight * weight;
  }
  return sum;
}

export function cosineSimilarity(a: TermVector, b: TermVector) {
  const normProduct = squaredNorm(a) * squaredNorm(b);
  if (normProduct === 0) {
    return 0;
  }
  let dot = 0;
  for (const term of [...a.keys()].filter((t) => b.has(t)).sort()) {
    dot += (a.get(term) ?? 0) * (b.get(term) ?? 0);
  }
  return Math.min(1, Math.max(0, dot / Math.sqrt(normProduct)));
}

export function tfidfSimilarity(
  reference: readonly string[],
  hypothesis: readonly string[],
  corpus?: readonly (readonly string[])[]
) {
  const [a, b] = tfidfVectors([reference, hypothesis], corpus);
  return cosineSimilarity(a, b);
}
