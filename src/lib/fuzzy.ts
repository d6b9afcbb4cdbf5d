/**
 * Title similarity using Levenshtein edit distance
 */

export type Confidence = 'exact' | 'high' | 'medium' | 'low';

/**
 * Edit distance between two strings, compared by code point
 */
export function levenshteinDistance(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);

  if (left.length === 0) return right.length;
  if (right.length === 0) return left.length;

  // Two rolling rows of the distance matrix
  let previous = Array.from({ length: right.length + 1 }, (_, j) => j);
  let current = new Array<number>(right.length + 1).fill(0);

  for (let i = 1; i <= left.length; i++) {
    current[0] = i;
    for (let j = 1; j <= right.length; j++) {
      const substitution = previous[j - 1] + (left[i - 1] === right[j - 1] ? 0 : 1);
      current[j] = Math.min(
        substitution,
        current[j - 1] + 1, // insertion
        previous[j] + 1     // deletion
      );
    }
    [previous, current] = [current, previous];
  }

  return previous[right.length];
}

/**
 * Rough label for a title distance
 */
export function getConfidence(distance: number): Confidence {
  if (distance === 0) return 'exact';
  if (distance <= 2) return 'high';
  if (distance <= 5) return 'medium';
  return 'low';
}
