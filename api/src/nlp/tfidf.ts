import stopWordList from "./stop-words.json" with { type: "json" };

const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

const WORD = /\p{L}{2,}/gu;

/** Collapses whitespace runs to a single space and trims. */
export function clean(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Lowercase alphabetic tokens of two or more letters, English stop words
 * removed.
 */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  for (const match of text.toLowerCase().matchAll(WORD)) {
    if (!STOP_WORDS.has(match[0])) {
      tokens.push(match[0]);
    }
  }
  return tokens;
}

export interface TfidfMatrix {
  /** Vocabulary in order of first occurrence across the documents. */
  terms: string[];
  /** One L2-normalized row per document, indexed like `terms`. */
  rows: number[][];
}

/**
 * Raw-count term frequency times smooth inverse document frequency
 * (`ln((1 + n) / (1 + df)) + 1`). Rows of documents without tokens stay zero.
 */
export function tfidf(documents: string[][]): TfidfMatrix {
  const index = new Map<string, number>();
  const terms: string[] = [];

  for (const tokens of documents) {
    for (const token of tokens) {
      if (!index.has(token)) {
        index.set(token, terms.length);
        terms.push(token);
      }
    }
  }

  const documentFrequency = new Array<number>(terms.length).fill(0);
  const counts = documents.map((tokens) => {
    const row = new Array<number>(terms.length).fill(0);
    for (const token of tokens) {
      const column = index.get(token);
      if (column !== undefined) row[column] += 1;
    }
    row.forEach((count, column) => {
      if (count > 0) documentFrequency[column] += 1;
    });
    return row;
  });

  const n = documents.length;
  const idf = documentFrequency.map((df) => Math.log((1 + n) / (1 + df)) + 1);

  const rows = counts.map((row) => {
    const weighted = row.map((count, column) => count * idf[column]);
    const norm = Math.sqrt(weighted.reduce((sum, w) => sum + w * w, 0));
    return norm > 0 ? weighted.map((w) => w / norm) : weighted;
  });

  return { terms, rows };
}
