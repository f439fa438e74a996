/**
 * Translation Provider interface - abstraction over translation back ends
 */

import type { SourceLanguage, TargetLanguage } from '../types/common.js';

export interface TranslateOptions {
  sourceLanguage: SourceLanguage;
  targetLanguage: TargetLanguage;
  signal?: AbortSignal;
}

export interface ITranslationProvider {
  readonly name: string;

  /**
   * Translate one piece of text. Any failure is thrown as-is.
   */
  translate(text: string, options: TranslateOptions): Promise<string>;

  /**
   * Check if the provider is reachable and configured
   */
  isAvailable(): Promise<boolean>;
}

export interface ProviderConfig {
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  timeout?: number;
}
