import { detect } from "tinyld";
import type { Logger } from "../logger.js";

export type LanguageDetector = (text: string) => string;

export const UNKNOWN_LANGUAGE = "unknown";

const ISO_639_1 = /^[a-z]{2}$/;

/**
 * ISO 639-1 code of the text's language, or "unknown" when the text is
 * empty or the detector gives nothing usable.
 */
export function detectLanguage(text: string, logger: Logger, detector: LanguageDetector = detect): string {
  if (!text.trim()) {
    return UNKNOWN_LANGUAGE;
  }

  try {
    const code = detector(text).trim().toLowerCase();
    return ISO_639_1.test(code) ? code : UNKNOWN_LANGUAGE;
  } catch (err) {
    logger.warn({ err }, "language detection failed");
    return UNKNOWN_LANGUAGE;
  }
}
