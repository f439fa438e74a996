/**
 * Engine error types
 */

export type ErrorCode =
  | 'INPUT_PARSE'
  | 'EMPTY_QUERY'
  | 'TRANSLATION_ITEM'
  | 'UNSUPPORTED_FORMAT'
  | 'UNSUPPORTED_LANGUAGE'
  | 'PROVIDER_TIMEOUT'
  | 'CONFIGURATION';

export class TranslatorError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TranslatorError';
  }
}

/**
 * Uploaded bytes could not be read in the declared format.
 * Aborts the whole batch.
 */
export class InputParseError extends TranslatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'INPUT_PARSE', options);
    this.name = 'InputParseError';
  }
}

/**
 * Single translation asked for whitespace only
 */
export class EmptyQueryError extends TranslatorError {
  constructor(message = 'Please enter some English text to translate.') {
    super(message, 'EMPTY_QUERY');
    this.name = 'EmptyQueryError';
  }
}

export class TranslationItemError extends TranslatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'TRANSLATION_ITEM', options);
    this.name = 'TranslationItemError';
  }
}

export class UnsupportedFormatError extends TranslatorError {
  constructor(extension: string) {
    super(`Unsupported file format: .${extension} (expected .txt or .csv)`, 'UNSUPPORTED_FORMAT');
    this.name = 'UnsupportedFormatError';
  }
}

export class UnsupportedLanguageError extends TranslatorError {
  constructor(code: string) {
    super(`Unsupported target language: ${code}`, 'UNSUPPORTED_LANGUAGE');
    this.name = 'UnsupportedLanguageError';
  }
}

export class ProviderTimeoutError extends TranslatorError {
  constructor(timeoutMs: number) {
    super(`Translation provider did not answer within ${timeoutMs}ms`, 'PROVIDER_TIMEOUT');
    this.name = 'ProviderTimeoutError';
  }
}

export class ConfigurationError extends TranslatorError {
  constructor(message: string) {
    super(message, 'CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

export function isTranslatorError(error: unknown): error is TranslatorError {
  return error instanceof TranslatorError;
}

/**
 * Message text for anything caught
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}
