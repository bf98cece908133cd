import type { MetadataOptions } from "../config.js";
import { keywords } from "./keywords.js";
import { clean } from "./tfidf.js";
import type { Entity, LanguageModel } from "./model.js";
import { sections } from "./sections.js";
import { summarize } from "./summary.js";

export interface Analysis {
  keywords: string[];
  summary: string;
  sections: string[];
  entities: Entity[];
}

export type AnalysisLimits = Pick<MetadataOptions, "maxKeywords" | "maxSummarySentences">;

/** Entity mentions over the whitespace-normalized text, in mention order. */
export function entities(text: string, model: Pick<LanguageModel, "tagEntities">): Entity[] {
  const cleaned = clean(text);
  return cleaned ? model.tagEntities(cleaned) : [];
}

export function analyze(text: string, limits: AnalysisLimits, model: LanguageModel): Analysis {
  return {
    keywords: keywords(text, limits.maxKeywords),
    summary: summarize(text, limits.maxSummarySentences, model),
    sections: sections(text),
    entities: entities(text, model),
  };
}

export { clean, tokenize, tfidf, type TfidfMatrix } from "./tfidf.js";
export { keywords } from "./keywords.js";
export { summarize } from "./summary.js";
export { sections, toTitleCase } from "./sections.js";
export { detectLanguage, UNKNOWN_LANGUAGE, type LanguageDetector } from "./language.js";
export { createCompromiseModel, loadLanguageModel, type Entity, type EntityLabel, type LanguageModel } from "./model.js";
