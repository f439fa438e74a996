/**
 * Session history store using @preact/signals
 */

import { signal, computed } from '@preact/signals';
import type { HistoryEntry } from '../types/index.js';
import { api } from '../api/client.js';

// Newest first, as the server returns it
export const historyEntries = signal<HistoryEntry[]>([]);
export const historyLoading = signal(false);
export const historyError = signal<string | null>(null);

export const historyCount = computed(() => historyEntries.value.length);

function messageOf(error: unknown, fallback: string): string {
  return error instanceof Error && error.message ? error.message : fallback;
}

export async function loadHistory(): Promise<void> {
  historyLoading.value = true;
  historyError.value = null;

  try {
    historyEntries.value = await api.getHistory();
  } catch (error) {
    historyError.value = messageOf(error, 'Failed to load history');
    console.error('Failed to load history:', error);
  } finally {
    historyLoading.value = false;
  }
}

export function addHistoryEntry(entry: HistoryEntry): void {
  historyEntries.value = [entry, ...historyEntries.value];
}

export async function clearHistory(): Promise<void> {
  try {
    await api.clearHistory();
    historyEntries.value = [];
  } catch (error) {
    historyError.value = messageOf(error, 'Failed to clear history');
    console.error('Failed to clear history:', error);
  }
}
