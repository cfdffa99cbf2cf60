export interface AlignmentResult {
  substitutions: number;
  insertions: number;
  deletions: number;
  hits: number;
  referenceLength: number;
  hypothesisLength: number;
}

/**
 * Counts the substitutions, insertions and deletions of a minimal unit-cost
 * alignment turning `reference` into `hypothesis`.
 *
 * Only two rows of the dynamic-programming table are kept; each cell carries
 * its cost and the operation counts of the path that reached it. When
 * several moves reach a cell at the same cost, the diagonal move (match or
 * substitution) wins, then deletion, then insertion.
 */
export function alignSequences<T>(
  reference: readonly T[],
  hypothesis: readonly T[],
  equals: (a: T, b: T) => boolean = (a, b) => a === b
): AlignmentResult {
  const m = reference.length;
  const n = hypothesis.length;
  const width = n + 1;

  let prev = createRow(width);
  let curr = createRow(width);
  for (let j = 0; j <= n; j++) {
    prev.cost[j] = j;
    prev.ins[j] = j;
  }

  for (let i = 1; i <= m; i++) {
    curr.cost[0] = i;
    curr.sub[0] = 0;
    curr.ins[0] = 0;
    curr.del[0] = i;
    for (let j = 1; j <= n; j++) {
      const mismatch = equals(reference[i - 1], hypothesis[j - 1]) ? 0 : 1;
      const diagonal = prev.cost[j - 1] + mismatch;
      const deletion = prev.cost[j] + 1;
      const insertion = curr.cost[j - 1] + 1;
      if (diagonal <= deletion && diagonal <= insertion) {
        curr.cost[j] = diagonal;
        curr.sub[j] = prev.sub[j - 1] + mismatch;
        curr.ins[j] = prev.ins[j - 1];
        curr.del[j] = prev.del[j - 1];
      } else if (deletion <= insertion) {
        curr.cost[j] = deletion;
        curr.sub[j] = prev.sub[j];
        curr.ins[j] = prev.ins[j];
        curr.del[j] = prev.del[j] + 1;
      } else {
        curr.cost[j] = insertion;
        curr.sub[j] = curr.sub[j - 1];
        curr.ins[j] = curr.ins[j - 1] + 1;
        curr.del[j] = curr.del[j - 1];
      }
    }
    [prev, curr] = [curr, prev];
  }

  const substitutions = prev.sub[n];
  const insertions = prev.ins[n];
  const deletions = prev.del[n];
  return {
    substitutions,
    insertions,
    deletions,
    hits: m - substitutions - deletions,
    referenceLength: m,
    hypothesisLength: n,
  };
}

export function editDistance(alignment: AlignmentResult) {
  return alignment.substitutions + alignment.insertions + alignment.deletions;
}

function createRow(width: number) {
  return {
    cost: new Uint32Array(width),
    sub: new Uint32Array(width),
    ins: new Uint32Array(width),
    del: new Uint32Array(width),
  };
}
