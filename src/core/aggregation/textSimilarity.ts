const SIMILARITY_THRESHOLD = 0.6;

const CONTRADICTION_PAIRS: ReadonlyArray<readonly [string, string]> = [
  ['yes', 'no'],
  ['always', 'never'],
  ['must', 'must not'],
];

function wordSet(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/\s+/)
      .filter((word) => word.length > 0),
  );
}

/** Jaccard similarity of the lower-cased whitespace word sets. Two empty texts score 0. */
export function jaccardSimilarity(a: string, b: string): number {
  const left = wordSet(a);
  const right = wordSet(b);
  const union = new Set([...left, ...right]);
  if (union.size === 0) return 0;

  let intersection = 0;
  for (const word of left) {
    if (right.has(word)) intersection += 1;
  }
  return intersection / union.size;
}

export function isSimilar(a: string, b: string): boolean {
  return jaccardSimilarity(a, b) > SIMILARITY_THRESHOLD;
}

/**
 * Cheap lexical contradiction check: plain substring matches, so "know"
 * counts as "no". Direction matters: `a` carries the affirmative term.
 */
export function isConflicting(a: string, b: string): boolean {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  return CONTRADICTION_PAIRS.some(
    ([affirmative, negative]) => left.includes(affirmative) && right.includes(negative),
  );
}
