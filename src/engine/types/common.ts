/**
 * Common types used across the translation engine
 */

export type SourceLanguage = 'en';

export type TargetLanguage =
  | 'fr' // French
  | 'es' // Spanish
  | 'de'; // German

export interface LanguageChoice {
  label: string;
  code: TargetLanguage;
}

/**
 * Picker choices, in display order
 */
export const LANGUAGE_CHOICES: readonly LanguageChoice[] = [
  { label: 'French', code: 'fr' },
  { label: 'Spanish', code: 'es' },
  { label: 'German', code: 'de' },
];

export const SOURCE_LANGUAGE: SourceLanguage = 'en';

export function isTargetLanguage(value: unknown): value is TargetLanguage {
  return LANGUAGE_CHOICES.some(choice => choice.code === value);
}

export function getLanguageLabel(code: TargetLanguage): string {
  const choice = LANGUAGE_CHOICES.find(c => c.code === code);
  return choice ? choice.label : code;
}

export interface TranslationRequest {
  sourceText: string;
  targetLanguage: TargetLanguage;
}

export interface TranslationResult {
  originalText: string;
  translatedText: string; // Holds the error marker when the item failed
  targetLanguage: TargetLanguage;
  succeeded: boolean;
  errorDetail?: string;
}
