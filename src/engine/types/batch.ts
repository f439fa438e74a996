/**
 * Types for batch (file) translation
 */

import type { TargetLanguage, TranslationResult } from './common.js';

export type FileFormat = 'txt' | 'csv';

export interface ExtractOptions {
  /**
   * Treat the first CSV row as a header even when it has no `text` column.
   * Ignored for plain text.
   */
  hasHeader?: boolean;
}

export interface BatchInput extends ExtractOptions {
  buffer: Buffer;
  format: FileFormat;
  targetLanguage: TargetLanguage;
}

export interface BatchOptions {
  concurrency?: number;
  onProgress?: (done: number, total: number) => void;
}

export type BatchReport = TranslationResult[];

export type BatchOutcome =
  | {
      status: 'completed';
      parsedCount: number; // Candidates extracted, blank ones included
      results: BatchReport;
    }
  | {
      status: 'empty';
      parsedCount: number;
    };
