// ─── Indel distance ─────────────────────────────────────────────────────────
// Edit distance allowing only insertions and deletions: len(a) + len(b) - 2 * LCS.

function longestCommonSubsequence(a: string, b: string): number {
  const n = b.length;
  let prev = new Array<number>(n + 1).fill(0);
  let curr = new Array<number>(n + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    curr[0] = 0;
    for (let j = 1; j <= n; j++) {
      if (a[i - 1] === b[j - 1]) {
        curr[j] = (prev[j - 1] ?? 0) + 1;
      } else {
        curr[j] = Math.max(prev[j] ?? 0, curr[j - 1] ?? 0);
      }
    }
    [prev, curr] = [curr, prev];
  }

  return prev[n] ?? 0;
}

export function indelDistance(a: string, b: string): number {
  return a.length + b.length - 2 * longestCommonSubsequence(a, b);
}

/**
 * Similarity ratio on a 0-100 scale, rounded to an integer.
 * "nic claxton" vs "nicolas claxton" -> 85.
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 100;
  return Math.round(100 * (1 - indelDistance(a, b) / total));
}
