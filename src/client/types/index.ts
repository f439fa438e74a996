/**
 * Client-side types mirroring the API payloads
 */

export type TargetLanguage = 'fr' | 'es' | 'de';

export interface LanguageChoice {
  label: string;
  code: TargetLanguage;
}

export interface SystemStatus {
  version: string;
  ready: boolean;
  translation: {
    provider: string;
    cacheTtlSeconds: number;
    configured: boolean;
  };
  config: {
    valid: boolean;
    errors: string[];
  };
}

export interface HistoryEntry {
  id: string;
  sourceText: string;
  targetLanguage: TargetLanguage;
  targetLabel: string;
  translatedText: string;
  createdAt: string;
}

export interface TranslateResponse {
  entry: HistoryEntry;
}

export type BatchResponse =
  | {
      status: 'completed';
      parsedCount: number;
      failedCount: number;
      filename: string;
      blob: Blob;
    }
  | {
      status: 'empty';
      parsedCount: number;
      message: string;
    };

export interface DownloadedFile {
  filename: string;
  blob: Blob;
}
