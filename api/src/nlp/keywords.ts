import { clean, tfidf, tokenize } from "./tfidf.js";

/**
 * The `max` highest-weighted terms of a single-document TF-IDF model. Equal
 * weights keep first-occurrence order.
 */
export function keywords(text: string, max: number): string[] {
  if (max <= 0) {
    return [];
  }

  const tokens = tokenize(clean(text));
  if (tokens.length === 0) {
    return [];
  }

  const { terms, rows } = tfidf([tokens]);
  const weights = rows[0];

  return terms
    .map((term, column) => ({ term, weight: weights[column] }))
    .sort((a, b) => b.weight - a.weight)
    .slice(0, max)
    .map(({ term }) => term);
}
