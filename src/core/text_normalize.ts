// Punctuation that separates words; replaced by a space rather than removed.
const PUNCT_RE = /["'`.,:;()[\]{}<>~^\-_/\\]/g;

/**
 * Canonical form for every keyword comparison: NFKC, lowercase, punctuation
 * to spaces, whitespace collapsed.
 */
export function normalizeText(input: string): string {
  return input
    .normalize('NFKC')
    .toLowerCase()
    .replace(PUNCT_RE, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Counts how many of the (already normalized) keywords occur in `normalized`.
 */
export function countKeywordHits(normalized: string, keywords: readonly string[]): number {
  if (!normalized) return 0;
  let hits = 0;
  for (const kw of keywords) {
    if (kw && normalized.includes(kw)) hits += 1;
  }
  return hits;
}
