/**
 * Fuzzy string similarity
 *
 * Ratio on a 0-100 scale derived from the insertion/deletion edit distance:
 *
 *   ratio = round(100 * (|a| + |b| - indel(a, b)) / (|a| + |b|))
 *
 * which equals 2 * LCS(a, b) / (|a| + |b|). Identical strings score 100,
 * strings with no characters in common score 0.
 */

/**
 * Similarity ratio between two strings (0-100)
 *
 * Inputs are compared as given; callers normalize first. Either side empty
 * scores 0.
 *
 * @example
 * ```typescript
 * similarityRatio('kitten', 'sitting');  // 62
 * ```
 */
export function similarityRatio(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) {
    return 0;
  }
  if (a === b) {
    return 100;
  }

  const total = a.length + b.length;
  return Math.round((200 * longestCommonSubsequence(a, b)) / total);
}

/**
 * Length of the longest common subsequence, two-row dynamic programming
 */
function longestCommonSubsequence(a: string, b: string): number {
  let previous = new Array<number>(b.length + 1).fill(0);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      if (a.charAt(i - 1) === b.charAt(j - 1)) {
        current[j] = previous[j - 1] + 1;
      } else {
        current[j] = Math.max(previous[j], current[j - 1]);
      }
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length];
}
