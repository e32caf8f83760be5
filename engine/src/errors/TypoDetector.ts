/**
 * Typo Detection
 *
 * String similarity used to suggest a correction when a flow document
 * names something unknown (a node type, a top-level field).
 *
 * @module errors
 */

/**
 * Minimum number of single-character edits turning `a` into `b`
 */
export function levenshteinDistance(a: string, b: string): number {
  let previous = Array.from({ length: a.length + 1 }, (_, j) => j);

  for (let i = 1; i <= b.length; i++) {
    const current = [i];
    for (let j = 1; j <= a.length; j++) {
      const substitution = previous[j - 1] + (b[i - 1] === a[j - 1] ? 0 : 1);
      current[j] = Math.min(substitution, current[j - 1] + 1, previous[j] + 1);
    }
    previous = current;
  }

  return previous[a.length];
}

/**
 * Case-insensitive similarity in [0, 1]; 1 means identical
 */
export function similarityScore(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - levenshteinDistance(a.toLowerCase(), b.toLowerCase()) / longest;
}

/**
 * Best candidate scoring strictly above `threshold`, if any
 */
export function findClosestMatch(
  input: string,
  candidates: readonly string[],
  threshold: number = 0.6
): string | undefined {
  let bestMatch: string | undefined;
  let bestScore = threshold;

  for (const candidate of candidates) {
    const score = similarityScore(input, candidate);
    if (score > bestScore) {
      bestScore = score;
      bestMatch = candidate;
    }
  }

  return bestMatch;
}

/**
 * Up to `maxResults` candidates scoring at least `threshold`, best first
 */
export function findMatches(
  input: string,
  candidates: readonly string[],
  maxResults: number = 3,
  threshold: number = 0.5
): string[] {
  return candidates
    .map((candidate) => ({ candidate, score: similarityScore(input, candidate) }))
    .filter((match) => match.score >= threshold)
    .sort((a, b) => b.score - a.score)
    .slice(0, maxResults)
    .map((match) => match.candidate);
}
