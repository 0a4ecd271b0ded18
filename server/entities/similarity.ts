/**
 * String Similarity
 *
 * Normalized Indel similarity used to match free-text names against canonical
 * entity names: 2 * LCS(a, b) / (|a| + |b|) on lower-cased input.
 * Symmetric, in [0, 1], and 1.0 for two empty strings.
 */

/**
 * Length of the longest common subsequence.
 * Dynamic programming over two rolling rows.
 */
export function longestCommonSubsequence(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  if (m === 0 || n === 0) return 0;

  let prev = new Array<number>(n + 1).fill(0);
  let curr = new Array<number>(n + 1).fill(0);

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      curr[j] = a[i - 1] === b[j - 1] ? prev[j - 1] + 1 : Math.max(prev[j], curr[j - 1]);
    }
    [prev, curr] = [curr, prev];
    curr.fill(0);
  }

  return prev[n];
}

export function similarityRatio(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  const total = left.length + right.length;
  if (total === 0) return 1;
  return (2 * longestCommonSubsequence(left, right)) / total;
}

/**
 * Best ratio of `name` against any of the given labels (canonical name first,
 * then alternates). 0 when there are no labels.
 */
export function bestSimilarity(name: string, labels: string[]): number {
  let best = 0;
  for (const label of labels) {
    const score = similarityRatio(name, label);
    if (score > best) best = score;
  }
  return best;
}
