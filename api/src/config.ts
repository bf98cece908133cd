import { ConfigError, type ErrorDetail } from "./errors.js";

export interface MetadataOptions {
  /** Upper bound on returned keywords. */
  maxKeywords: number;
  /** Upper bound on sentences in the extractive summary. */
  maxSummarySentences: number;
  wordsPerMinute: number;
  /** Titles longer than this are cut and suffixed with an ellipsis. */
  titleMaxWords: number;
  /** A PDF text layer shorter than this (trimmed) is treated as scanned. */
  ocrMinTextLength: number;
  ocrDpi: number;
  /** Wall-clock limit for one OCR run; 0 disables the limit. */
  ocrTimeoutMs: number;
}

export const DEFAULT_OPTIONS: Readonly<MetadataOptions> = Object.freeze({
  maxKeywords: 10,
  maxSummarySentences: 3,
  wordsPerMinute: 200,
  titleMaxWords: 20,
  ocrMinTextLength: 100,
  ocrDpi: 300,
  ocrTimeoutMs: 120_000,
});

type OptionKey = keyof MetadataOptions;

const ENV_VARS: Record<OptionKey, string> = {
  maxKeywords: "DOCMETA_MAX_KEYWORDS",
  maxSummarySentences: "DOCMETA_MAX_SUMMARY_SENTENCES",
  wordsPerMinute: "DOCMETA_WORDS_PER_MINUTE",
  titleMaxWords: "DOCMETA_TITLE_MAX_WORDS",
  ocrMinTextLength: "DOCMETA_OCR_MIN_TEXT_LENGTH",
  ocrDpi: "DOCMETA_OCR_DPI",
  ocrTimeoutMs: "DOCMETA_OCR_TIMEOUT_MS",
};

// Counts may be zero; rates and resolutions may not.
const MINIMUMS: Record<OptionKey, number> = {
  maxKeywords: 0,
  maxSummarySentences: 0,
  wordsPerMinute: 1,
  titleMaxWords: 1,
  ocrMinTextLength: 0,
  ocrDpi: 1,
  ocrTimeoutMs: 0,
};

const OPTION_KEYS: readonly OptionKey[] = [
  "maxKeywords",
  "maxSummarySentences",
  "wordsPerMinute",
  "titleMaxWords",
  "ocrMinTextLength",
  "ocrDpi",
  "ocrTimeoutMs",
];

/**
 * Every problem with the given options, or an empty array when they are
 * usable.
 */
export function validateOptions(options: Partial<Record<OptionKey, unknown>>): ErrorDetail[] {
  const errors: ErrorDetail[] = [];

  for (const key of OPTION_KEYS) {
    const problem = checkOption(key, options[key]);
    if (problem) {
      errors.push({ field: key, message: problem });
    }
  }

  return errors;
}

function checkOption(key: OptionKey, value: unknown): string | null {
  if (value === undefined) return null;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    return "must be an integer";
  }
  if (value < MINIMUMS[key]) {
    return `must be at least ${MINIMUMS[key]}`;
  }
  return null;
}

/**
 * Reads option overrides from DOCMETA_* variables. Values that are not
 * integers are passed through as NaN so validation reports them.
 */
export function optionsFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<MetadataOptions> {
  const overrides: Partial<MetadataOptions> = {};

  for (const key of OPTION_KEYS) {
    const raw = (env[ENV_VARS[key]] || "").trim();
    if (!raw) continue;
    overrides[key] = /^-?\d+$/.test(raw) ? Number.parseInt(raw, 10) : Number.NaN;
  }

  return overrides;
}

export function describeEnvErrors(env: NodeJS.ProcessEnv = process.env): string[] {
  const overrides = optionsFromEnv(env);
  const errors: string[] = [];

  for (const key of OPTION_KEYS) {
    const problem = checkOption(key, overrides[key]);
    if (problem) {
      errors.push(`${ENV_VARS[key]} ${problem}`);
    }
  }

  return errors;
}

/**
 * Merges defaults, environment and explicit overrides (in that order of
 * precedence, lowest first) and rejects the result if any value is invalid.
 *
 * @throws ConfigError
 */
export function resolveOptions(
  overrides: Partial<MetadataOptions> = {},
  env: NodeJS.ProcessEnv = process.env,
): MetadataOptions {
  const merged: MetadataOptions = { ...DEFAULT_OPTIONS, ...optionsFromEnv(env) };
  for (const key of OPTION_KEYS) {
    const value = overrides[key];
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  const errors = validateOptions(merged);
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }

  return merged;
}
