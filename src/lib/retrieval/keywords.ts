/**
 * Keyword Extraction
 *
 * Turns reviewer feedback into a handful of search terms so the next
 * retrieval pass can pull different snippets.
 */

import stopwordList from "./stopwords.json";

const STOPWORDS = new Set<string>(stopwordList);

const TOKEN_RE = /[A-Za-z0-9+#\-_/]{3,}/g;

export function tokenize(text: string): string[] {
  return (text.match(TOKEN_RE) ?? []).map((t) => t.toLowerCase());
}

function scoreToken(token: string): number {
  let score = token.length;
  if (/\d/.test(token)) score += 2;
  if (/[+#_/-]/.test(token)) score += 1.5;
  return score;
}

/**
 * Top-N unique, non-stopword tokens across the given texts.
 * Longer tokens and tokens with digits or symbols (2fa, ios, reset_password)
 * rank first; ties keep their order of appearance.
 */
export function extractKeywords(texts: string[], keep = 10): string[] {
  const seen = new Set<string>();
  const scored: Array<{ token: string; score: number }> = [];

  for (const text of texts) {
    for (const token of tokenize(text)) {
      if (STOPWORDS.has(token) || seen.has(token)) continue;
      seen.add(token);
      scored.push({ token, score: scoreToken(token) });
    }
  }

  return scored
    .sort((a, b) => b.score - a.score)
    .slice(0, keep)
    .map((s) => s.token);
}
