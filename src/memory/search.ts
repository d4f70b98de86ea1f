/**
 * Keyword ranking for memory queries.
 * Tokens are lower-cased with stop words dropped, scored by term overlap.
 */

const STOP_WORDS = new Set([
  'the', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for',
  'of', 'with', 'by', 'from', 'is', 'was', 'are', 'were', 'be', 'been',
  'it', 'its', 'my', 'your', 'our', 'their', 'this', 'that', 'these', 'those',
  'into', 'about', 'all', 'any',
]);

/** Minimum length of the shorter token for a prefix match. */
const MIN_PREFIX = 3;

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(token => token.length > 1 && !STOP_WORDS.has(token));
}

export function tokensMatch(a: string, b: string): boolean {
  if (a === b) return true;
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  return shorter.length >= MIN_PREFIX && longer.startsWith(shorter);
}

/**
 * Fraction of distinct query tokens found in the document tokens.
 * An empty query matches everything with score 1.
 */
export function scoreTokens(queryTokens: string[], documentTokens: string[]): number {
  const unique = [...new Set(queryTokens)];
  if (unique.length === 0) return 1;

  const docSet = new Set(documentTokens);
  let matched = 0;
  for (const q of unique) {
    if (docSet.has(q)) {
      matched++;
      continue;
    }
    for (const d of docSet) {
      if (tokensMatch(q, d)) {
        matched++;
        break;
      }
    }
  }
  return matched / unique.length;
}

/** Text searched for an entry: its key and its value as text. */
export function documentText(key: string, value: unknown): string {
  return `${key} ${typeof value === 'string' ? value : JSON.stringify(value)}`;
}
