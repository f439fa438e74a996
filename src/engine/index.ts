/**
 * Translation engine - batch translation of English text files
 *
 * Extract → translate (cached, per-item errors) → CSV report
 *
 * @module engine
 */

// Types
export type {
  SourceLanguage,
  TargetLanguage,
  LanguageChoice,
  TranslationRequest,
  TranslationResult,
} from './types/common.js';
export type {
  FileFormat,
  ExtractOptions,
  BatchInput,
  BatchOptions,
  BatchReport,
  BatchOutcome,
} from './types/batch.js';
export {
  LANGUAGE_CHOICES,
  SOURCE_LANGUAGE,
  isTargetLanguage,
  getLanguageLabel,
} from './types/common.js';

// Errors
export {
  TranslatorError,
  InputParseError,
  EmptyQueryError,
  TranslationItemError,
  UnsupportedFormatError,
  UnsupportedLanguageError,
  ProviderTimeoutError,
  ConfigurationError,
  isTranslatorError,
  toErrorMessage,
  type ErrorCode,
} from './errors.js';

// Interfaces
export type {
  ITranslationProvider,
  ProviderConfig,
  TranslateOptions,
} from './interfaces/translation-provider.js';

// Providers
export { OpenAIProvider, type ChatCompletionsClient } from './providers/openai.js';
export { LibreTranslateProvider } from './providers/libretranslate.js';

// Prompts
export { TRANSLATOR_SYSTEM_PROMPT, createTranslatorPrompt } from './prompts/system/translator.js';

// Cache
export { TtlCache, type TtlCacheOptions } from './cache/ttl-cache.js';

// Extraction
export {
  detectFileFormat,
  isSupportedFormat,
  decodeUpload,
  splitLines,
  findTextColumn,
  extractCsvCandidates,
  extractCandidates,
} from './extract/line-extractor.js';

// Translator
export {
  ItemTranslator,
  formatItemError,
  DEFAULT_CACHE_TTL_MS,
  DEFAULT_TIMEOUT_MS,
  type ItemTranslatorOptions,
  type ItemTranslatorStats,
} from './translator/item-translator.js';

// Pipeline
export { runBatch } from './pipeline/batch-pipeline.js';

// Report
export {
  REPORT_HEADER,
  serializeReport,
  reportFileName,
  translationFileName,
  formatTimestamp,
} from './report/csv-report.js';
