import { describe, it, expect } from 'vitest';
import {
  formatTimestamp,
  reportFileName,
  serializeReport,
  translationFileName,
} from './csv-report.js';
import type { TranslationResult } from '../types/common.js';

const ok = (originalText: string, translatedText: string): TranslationResult => ({
  originalText,
  translatedText,
  targetLanguage: 'es',
  succeeded: true,
});

describe('serializeReport', () => {
  it('writes the fixed header and one row per result', () => {
    const csv = serializeReport([ok('Hello', 'Hola'), ok('World', 'Mundo')]).toString('utf-8');

    expect(csv).toBe('original_en,translated,target_lang\r\nHello,Hola,es\r\nWorld,Mundo,es\r\n');
  });

  it('writes only the header for an empty report', () => {
    expect(serializeReport([]).toString('utf-8')).toBe('original_en,translated,target_lang\r\n');
  });

  it('quotes fields holding delimiters or quotes', () => {
    const csv = serializeReport([ok('He said "hi", then left', 'Dijo "hola", y se fue')]).toString('utf-8');

    expect(csv.split('\r\n')[1]).toBe('"He said ""hi"", then left","Dijo ""hola"", y se fue",es');
  });

  it('quotes fields holding line breaks', () => {
    const csv = serializeReport([ok('line one\nline two', 'uno\ndos')]).toString('utf-8');

    expect(csv).toBe('original_en,translated,target_lang\r\n"line one\nline two","uno\ndos",es\r\n');
  });

  it('keeps error markers as plain cells', () => {
    const failed: TranslationResult = {
      originalText: 'Broken',
      translatedText: '[ERROR: timeout]',
      targetLanguage: 'fr',
      succeeded: false,
      errorDetail: 'timeout',
    };

    expect(serializeReport([failed]).toString('utf-8')).toBe(
      'original_en,translated,target_lang\r\nBroken,[ERROR: timeout],fr\r\n'
    );
  });

  it('encodes UTF-8 and is byte-for-byte repeatable', () => {
    const report = [ok('Good morning', 'Buenos días'), ok('Thanks', '¡Gracias!')];

    const first = serializeReport(report);
    const second = serializeReport(report);

    expect(first.equals(second)).toBe(true);
    expect(first.includes(Buffer.from('Buenos días', 'utf-8'))).toBe(true);
  });
});

describe('file names', () => {
  const date = new Date(2024, 0, 5, 9, 3, 7);

  it('formats local time as YYYYMMDD_HHMMSS', () => {
    expect(formatTimestamp(date)).toBe('20240105_090307');
  });

  it('names batch reports and single translations', () => {
    expect(reportFileName('fr', date)).toBe('translations_20240105_090307_fr.csv');
    expect(translationFileName('de', date)).toBe('translation_20240105_090307_de.txt');
  });
});
