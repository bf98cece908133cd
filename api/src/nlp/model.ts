import type nlp from "compromise";

export type EntityLabel = "PERSON" | "ORG" | "GPE";

export interface Entity {
  text: string;
  label: EntityLabel;
}

/**
 * Sentence splitting and named-entity tagging over one shared model.
 */
export interface LanguageModel {
  splitSentences(text: string): string[];
  tagEntities(text: string): Entity[];
}

type Compromise = typeof nlp;

interface Mention extends Entity {
  start: number;
}

const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

function readMentions(json: unknown, label: EntityLabel): Mention[] {
  if (!Array.isArray(json)) {
    return [];
  }

  const mentions: Mention[] = [];
  for (const item of json) {
    if (typeof item !== "object" || item === null) continue;
    const text: unknown = Reflect.get(item, "text");
    const offset: unknown = Reflect.get(item, "offset");
    if (typeof text !== "string") continue;

    const stripped = text.replace(EDGE_PUNCTUATION, "");
    if (!stripped) continue;

    const start: unknown = typeof offset === "object" && offset !== null ? Reflect.get(offset, "start") : undefined;
    mentions.push({ text: stripped, label, start: typeof start === "number" ? start : Number.MAX_SAFE_INTEGER });
  }
  return mentions;
}

export function createCompromiseModel(compromise: Compromise): LanguageModel {
  return {
    splitSentences(text) {
      if (!text.trim()) return [];
      const sentences: unknown = compromise(text).sentences().out("array");
      if (!Array.isArray(sentences)) return [];
      return sentences
        .filter((s): s is string => typeof s === "string")
        .map((s) => s.trim())
        .filter((s) => s.length > 0);
    },

    tagEntities(text) {
      if (!text.trim()) return [];
      const doc = compromise(text);
      const mentions = [
        ...readMentions(doc.people().json({ offset: true }), "PERSON"),
        ...readMentions(doc.organizations().json({ offset: true }), "ORG"),
        ...readMentions(doc.places().json({ offset: true }), "GPE"),
      ];
      // Array.prototype.sort is stable, so equal offsets keep label order.
      return mentions.sort((a, b) => a.start - b.start).map(({ text: mention, label }) => ({ text: mention, label }));
    },
  };
}

let modelPromise: Promise<LanguageModel> | null = null;

/**
 * Loads compromise on first use and hands every caller the same model. A
 * failed load is not cached.
 */
export function loadLanguageModel(): Promise<LanguageModel> {
  if (!modelPromise) {
    modelPromise = import("compromise")
      .then(({ default: compromise }) => createCompromiseModel(compromise))
      .catch((err: unknown) => {
        modelPromise = null;
        throw err;
      });
  }
  return modelPromise;
}
