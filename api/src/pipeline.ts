export {
  generateMetadata,
  defaultMetadataDeps,
  countWords,
  readingTimeMinutes,
  deriveTitle,
  type MetadataRecord,
  type MetadataDeps,
} from "./services/metadata.js";
export {
  DEFAULT_OPTIONS,
  resolveOptions,
  validateOptions,
  optionsFromEnv,
  describeEnvErrors,
  type MetadataOptions,
} from "./config.js";
export { detectFormat, fileTypeFor, sniffFormat, type DocumentFormat, type DocumentInput } from "./doctype.js";
export {
  extract,
  shouldUseOcr,
  TesseractOcrEngine,
  type ExtractedContent,
  type OcrEngine,
  type OcrRequest,
} from "./extractors/index.js";
export {
  analyze,
  keywords,
  summarize,
  sections,
  entities,
  detectLanguage,
  loadLanguageModel,
  type Analysis,
  type Entity,
  type LanguageModel,
} from "./nlp/index.js";
export { AppError, ConfigError, BadRequestError, isAppError, type ErrorDetail } from "./errors.js";
export { createLogger, logger, type Logger } from "./logger.js";
