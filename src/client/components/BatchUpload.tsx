import { useState } from 'preact/hooks';
import type { LanguageChoice, TargetLanguage } from '../types/index.js';
import { api } from '../api/client.js';
import { saveBlob } from '../utils/download.js';
import { Button, Notice, Select } from './ui/index.js';

interface BatchUploadProps {
  languages: LanguageChoice[];
}

interface BatchSummary {
  parsedCount: number;
  failedCount: number;
  filename: string;
  blob: Blob;
}

export function BatchUpload({ languages }: BatchUploadProps) {
  const [file, setFile] = useState<File | null>(null);
  const [target, setTarget] = useState<TargetLanguage>('fr');
  const [hasHeader, setHasHeader] = useState(false);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [warning, setWarning] = useState<string | null>(null);
  const [summary, setSummary] = useState<BatchSummary | null>(null);

  const handleSubmit = async () => {
    if (!file) return;

    setLoading(true);
    setError(null);
    setWarning(null);
    setSummary(null);
    try {
      const response = await api.translateFile(file, target, hasHeader);
      if (response.status === 'empty') {
        setWarning(response.message);
      } else {
        setSummary(response);
      }
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Batch translation failed');
    } finally {
      setLoading(false);
    }
  };

  const isCsv = file?.name.toLowerCase().endsWith('.csv') ?? false;

  return (
    <section class="section">
      <h2>📦 Batch translate (English → chosen language)</h2>
      <p class="small">
        Upload a <code>.txt</code> (one line per entry) or <code>.csv</code> (a <code>text</code> column, or
        the first column).
      </p>

      <div class="form-row">
        <div class="form-group">
          <input
            type="file"
            accept=".txt,.csv"
            onChange={(e) => setFile(e.currentTarget.files?.[0] ?? null)}
          />
        </div>
        <Select
          id="batch-target-language"
          label="Target language for batch"
          value={target}
          options={languages.map((l) => ({ value: l.code, label: l.label }))}
          onChange={(e) => {
            const code = languages.find((l) => l.code === e.currentTarget.value)?.code;
            if (code) setTarget(code);
          }}
        />
      </div>

      {isCsv && (
        <label class="checkbox">
          <input
            type="checkbox"
            checked={hasHeader}
            onChange={(e) => setHasHeader(e.currentTarget.checked)}
          />
          First row is a header
        </label>
      )}

      <Button onClick={handleSubmit} loading={loading} disabled={!file}>
        🚀 Translate file
      </Button>

      {error && <Notice kind="error">{error}</Notice>}
      {warning && <Notice kind="warning">{warning}</Notice>}

      {summary && (
        <>
          <Notice kind="info">
            Parsed {summary.parsedCount} lines.
            {summary.failedCount > 0 && ` ${summary.failedCount} failed (marked in the report).`}
          </Notice>
          <Button variant="secondary" size="full" onClick={() => saveBlob(summary.blob, summary.filename)}>
            ⬇️ Download CSV with translations
          </Button>
        </>
      )}
    </section>
  );
}
