/**
 * Lingo Batch - API Client
 * Typed fetch wrapper for REST API communication
 */

import type {
  SystemStatus,
  LanguageChoice,
  HistoryEntry,
  TargetLanguage,
  TranslateResponse,
  BatchResponse,
  DownloadedFile,
} from '../types/index.js';

// === API Error ===

export class ApiError extends Error {
  constructor(
    message: string,
    public status: number,
    public data?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

// === Session ===

const SESSION_HEADER = 'X-Session-Id';
const SESSION_STORAGE_KEY = 'lingo-batch-session';

function getSessionId(): string | null {
  return sessionStorage.getItem(SESSION_STORAGE_KEY);
}

function rememberSession(response: Response): void {
  const id = response.headers.get(SESSION_HEADER);
  if (id && id !== getSessionId()) {
    sessionStorage.setItem(SESSION_STORAGE_KEY, id);
  }
}

function sessionHeaders(): Record<string, string> {
  const id = getSessionId();
  return id ? { [SESSION_HEADER]: id } : {};
}

// === Fetch Helpers ===

function readErrorMessage(data: unknown, status: number): string {
  if (typeof data === 'object' && data !== null && 'error' in data && typeof data.error === 'string') {
    return data.error;
  }
  return `HTTP ${status}`;
}

async function request(url: string, options?: RequestInit): Promise<Response> {
  const response = await fetch(url, {
    ...options,
    headers: {
      ...sessionHeaders(),
      ...options?.headers,
    },
  });

  rememberSession(response);

  if (!response.ok) {
    const data: unknown = await response.json().catch(() => ({}));
    throw new ApiError(readErrorMessage(data, response.status), response.status, data);
  }

  return response;
}

async function fetchJson<T>(url: string, options?: RequestInit): Promise<T> {
  const response = await request(url, {
    ...options,
    headers: {
      'Content-Type': 'application/json',
      ...options?.headers,
    },
  });
  return response.json();
}

/**
 * File name from a Content-Disposition header
 */
export function parseFilename(header: string | null, fallback: string): string {
  if (!header) return fallback;
  const match = /filename\*?=(?:UTF-8'')?"?([^";]+)"?/i.exec(header);
  return match ? decodeURIComponent(match[1]) : fallback;
}

// === API Client ===

export const api = {
  // === System ===

  async getStatus(): Promise<SystemStatus> {
    return fetchJson('/api/status');
  },

  async getLanguages(): Promise<LanguageChoice[]> {
    return fetchJson('/api/languages');
  },

  // === Translation ===

  async translate(text: string, target: TargetLanguage): Promise<TranslateResponse> {
    return fetchJson('/api/translate', {
      method: 'POST',
      body: JSON.stringify({ text, target }),
    });
  },

  async translateFile(
    file: File,
    target: TargetLanguage,
    hasHeader: boolean
  ): Promise<BatchResponse> {
    const formData = new FormData();
    formData.append('file', file);
    formData.append('target', target);
    formData.append('hasHeader', String(hasHeader));

    const response = await request('/api/batch', {
      method: 'POST',
      body: formData,
    });

    const contentType = response.headers.get('Content-Type') ?? '';
    if (contentType.includes('application/json')) {
      return response.json();
    }

    return {
      status: 'completed',
      parsedCount: Number(response.headers.get('X-Parsed-Count') ?? 0),
      failedCount: Number(response.headers.get('X-Failed-Count') ?? 0),
      filename: parseFilename(response.headers.get('Content-Disposition'), `translations_${target}.csv`),
      blob: await response.blob(),
    };
  },

  // === History ===

  async getHistory(): Promise<HistoryEntry[]> {
    return fetchJson('/api/history');
  },

  async clearHistory(): Promise<{ success: boolean }> {
    return fetchJson('/api/history', {
      method: 'DELETE',
    });
  },

  async downloadHistoryEntry(id: string): Promise<DownloadedFile> {
    const response = await request(`/api/history/${encodeURIComponent(id)}/download`);
    return {
      filename: parseFilename(response.headers.get('Content-Disposition'), `translated_${id}.txt`),
      blob: await response.blob(),
    };
  },
};
