import { useEffect } from 'preact/hooks';
import { api } from '../api/client.js';
import {
  historyEntries,
  historyCount,
  historyError,
  historyLoading,
  loadHistory,
  clearHistory,
} from '../store/history.js';
import { formatTime, saveBlob } from '../utils/download.js';
import { Button, Card, Notice } from './ui/index.js';

export function HistoryList() {
  useEffect(() => {
    void loadHistory();
  }, []);

  const handleDownload = async (id: string) => {
    try {
      const file = await api.downloadHistoryEntry(id);
      saveBlob(file.blob, file.filename);
    } catch (err) {
      historyError.value = err instanceof Error ? err.message : 'Download failed';
    }
  };

  return (
    <section class="section">
      <h2>🕘 History (this session)</h2>

      {historyError.value && <Notice kind="error">{historyError.value}</Notice>}

      {historyCount.value === 0 ? (
        <p class="small">{historyLoading.value ? 'Loading…' : 'No translations yet. Add one above to see it here.'}</p>
      ) : (
        <>
          <Button variant="ghost" size="sm" onClick={() => void clearHistory()}>
            Clear history
          </Button>
          {historyEntries.value.map((entry, i) => (
            <Card key={entry.id}>
              <p>
                <strong>{i + 1}.</strong> → <strong>{entry.targetLabel}</strong>
                <br />
                <em>{formatTime(entry.createdAt)}</em>
              </p>
              <pre class="codebox">{entry.translatedText}</pre>
              <Button variant="secondary" size="sm" onClick={() => handleDownload(entry.id)}>
                Download
              </Button>
            </Card>
          ))}
        </>
      )}
    </section>
  );
}
