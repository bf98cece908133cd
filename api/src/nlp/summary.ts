import type { LanguageModel } from "./model.js";
import { clean, tfidf, tokenize } from "./tfidf.js";

/**
 * Extractive summary: the `max` sentences with the highest TF-IDF row sums,
 * put back in document order and joined with a space. Documents with at
 * most `max` sentences are returned whole.
 */
export function summarize(text: string, max: number, model: Pick<LanguageModel, "splitSentences">): string {
  if (max <= 0) {
    return "";
  }

  const sentences = model
    .splitSentences(clean(text))
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

  if (sentences.length <= max) {
    return sentences.join(" ");
  }

  const { rows } = tfidf(sentences.map(tokenize));
  const scores = rows.map((row) => row.reduce((sum, w) => sum + w, 0));

  const chosen = scores
    .map((score, position) => ({ score, position }))
    .sort((a, b) => b.score - a.score || a.position - b.position)
    .slice(0, max)
    .map(({ position }) => position)
    .sort((a, b) => a - b);

  return chosen.map((position) => sentences[position]).join(" ");
}
