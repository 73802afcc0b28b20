/**
 * Lower-case, drop punctuation and collapse whitespace
 */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .trim()
    .replace(/[^\p{L}\p{M}\p{N}_\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

function tokenSet(normalized: string): Set<string> {
  return new Set(normalized.split(' ').filter((token) => token.length > 0));
}

/**
 * Jaccard index of the two texts' distinct word sets.
 * Inputs are expected to be normalized already; 0 when either is empty.
 */
export function similarity(first: string, second: string): number {
  const firstTokens = tokenSet(first);
  const secondTokens = tokenSet(second);
  if (firstTokens.size === 0 || secondTokens.size === 0) {
    return 0;
  }

  let intersection = 0;
  for (const token of firstTokens) {
    if (secondTokens.has(token)) {
      intersection++;
    }
  }
  const union = firstTokens.size + secondTokens.size - intersection;
  return intersection / union;
}

export function passesThreshold(score: number, threshold: number): boolean {
  return score >= threshold;
}
