/**
 * Length of the longest suffix of `typed` that is also a prefix of
 * `suggestion`, i.e. how much of the suggestion repeats what the user
 * already wrote. Overlaps shorter than `minOverlap` count as none, so a
 * continuation that merely starts with the last typed character keeps it.
 */
export function typedOverlap(
  typed: string,
  suggestion: string,
  minOverlap = 1,
): number {
  const max = Math.min(typed.length, suggestion.length);
  for (let length = max; length >= Math.max(minOverlap, 1); length--) {
    if (typed.endsWith(suggestion.slice(0, length))) {
      return length;
    }
  }
  return 0;
}

/** The part of `suggestion` still left to insert after what was typed. */
export function computeRemainder(
  typed: string,
  suggestion: string,
  minOverlap = 1,
): string {
  return suggestion.slice(typedOverlap(typed, suggestion, minOverlap));
}
