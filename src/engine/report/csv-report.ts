/**
 * CSV report for batch results
 */

import { stringify } from 'csv-stringify/sync';
import type { BatchReport } from '../types/batch.js';
import type { TargetLanguage } from '../types/common.js';

export const REPORT_HEADER = ['original_en', 'translated', 'target_lang'] as const;

/**
 * Serialize results to UTF-8 CSV bytes (RFC 4180 quoting, CRLF rows)
 */
export function serializeReport(results: BatchReport): Buffer {
  const rows = results.map(r => [r.originalText, r.translatedText, r.targetLanguage]);

  const csv = stringify([[...REPORT_HEADER], ...rows], {
    record_delimiter: 'windows',
    quoted_match: /[\r\n]/,
  });

  return Buffer.from(csv, 'utf-8');
}

/**
 * YYYYMMDD_HHMMSS in local time
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function reportFileName(target: TargetLanguage, date: Date = new Date()): string {
  return `translations_${formatTimestamp(date)}_${target}.csv`;
}

export function translationFileName(target: TargetLanguage, date: Date = new Date()): string {
  return `translation_${formatTimestamp(date)}_${target}.txt`;
}
