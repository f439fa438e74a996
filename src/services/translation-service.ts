/**
 * Translation Service - connects the HTTP layer to the engine
 */

import {
  ItemTranslator,
  EmptyQueryError,
  ProviderTimeoutError,
  TranslationItemError,
  UnsupportedLanguageError,
  detectFileFormat,
  getLanguageLabel,
  isTargetLanguage,
  reportFileName,
  runBatch,
  serializeReport,
  toErrorMessage,
  type BatchReport,
  type FileFormat,
  type TargetLanguage,
  type TranslationRequest,
} from '../engine/index.js';

export interface TextTranslation {
  sourceText: string;
  targetLanguage: TargetLanguage;
  targetLabel: string;
  translatedText: string;
}

export interface FileTranslationRequest {
  buffer: Buffer;
  filename: string;
  target: TargetLanguage;
  hasHeader?: boolean;
}

export type FileTranslation =
  | {
      status: 'completed';
      format: FileFormat;
      parsedCount: number;
      failedCount: number;
      results: BatchReport;
      filename: string;
      csv: Buffer;
    }
  | {
      status: 'empty';
      format: FileFormat;
      parsedCount: number;
    };

export interface TranslationServiceOptions {
  batchConcurrency?: number;
  now?: () => Date;
}

export function parseTargetLanguage(value: unknown): TargetLanguage {
  if (!isTargetLanguage(value)) {
    throw new UnsupportedLanguageError(String(value));
  }
  return value;
}

/**
 * Translation Service
 * Single-text translations and file batches over one ItemTranslator
 */
export class TranslationService {
  private translator: ItemTranslator;
  private batchConcurrency: number;
  private now: () => Date;

  constructor(translator: ItemTranslator, options: TranslationServiceOptions = {}) {
    this.translator = translator;
    this.batchConcurrency = options.batchConcurrency ?? 1;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Translate one piece of text typed by the user.
   * Whitespace-only input is rejected before the provider is called.
   */
  async translateText(request: TranslationRequest): Promise<TextTranslation> {
    const sourceText = request.sourceText.trim();
    const target = request.targetLanguage;
    if (!sourceText) {
      throw new EmptyQueryError();
    }

    try {
      const translatedText = await this.translator.translate(sourceText, target);
      return {
        sourceText,
        targetLanguage: target,
        targetLabel: getLanguageLabel(target),
        translatedText,
      };
    } catch (error) {
      if (error instanceof UnsupportedLanguageError || error instanceof ProviderTimeoutError) throw error;
      throw new TranslationItemError(toErrorMessage(error), { cause: error });
    }
  }

  /**
   * Translate every line of an uploaded .txt or .csv file
   */
  async translateFile(request: FileTranslationRequest): Promise<FileTranslation> {
    const format = detectFileFormat(request.filename);

    const outcome = await runBatch(
      {
        buffer: request.buffer,
        format,
        targetLanguage: request.target,
        hasHeader: request.hasHeader,
      },
      this.translator,
      { concurrency: this.batchConcurrency }
    );

    console.log(`[Batch] Parsed ${outcome.parsedCount} lines from ${request.filename}`);

    if (outcome.status === 'empty') {
      return { status: 'empty', format, parsedCount: outcome.parsedCount };
    }

    return {
      status: 'completed',
      format,
      parsedCount: outcome.parsedCount,
      failedCount: outcome.results.filter(r => !r.succeeded).length,
      results: outcome.results,
      filename: reportFileName(request.target, this.now()),
      csv: serializeReport(outcome.results),
    };
  }

  getStatus(): { provider: string; cacheTtlSeconds: number } {
    return {
      provider: this.translator.providerName,
      cacheTtlSeconds: Math.round(this.translator.cacheTtlMs / 1000),
    };
  }
}
