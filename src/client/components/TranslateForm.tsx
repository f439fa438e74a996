import { useState } from 'preact/hooks';
import type { LanguageChoice, TargetLanguage, HistoryEntry } from '../types/index.js';
import { api } from '../api/client.js';
import { addHistoryEntry } from '../store/history.js';
import { saveBlob } from '../utils/download.js';
import { Button, Card, Notice, Select, TextArea } from './ui/index.js';

interface TranslateFormProps {
  languages: LanguageChoice[];
}

export function TranslateForm({ languages }: TranslateFormProps) {
  const [text, setText] = useState('');
  const [target, setTarget] = useState<TargetLanguage>('fr');
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [result, setResult] = useState<HistoryEntry | null>(null);

  const handleTranslate = async () => {
    if (!text.trim()) {
      setError('Please enter some English text to translate.');
      return;
    }

    setLoading(true);
    setError(null);
    try {
      const { entry } = await api.translate(text, target);
      setResult(entry);
      addHistoryEntry(entry);
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Translation failed');
    } finally {
      setLoading(false);
    }
  };

  const handleDownload = async () => {
    if (!result) return;
    try {
      const file = await api.downloadHistoryEntry(result.id);
      saveBlob(file.blob, file.filename);
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Download failed');
    }
  };

  return (
    <section class="section">
      <h2>✍️ Enter English text</h2>
      <TextArea
        id="source-text"
        rows={6}
        placeholder="Type or paste English text here..."
        value={text}
        onInput={(e) => setText(e.currentTarget.value)}
      />

      <div class="form-row">
        <Select
          id="target-language"
          label="🎯 Target language"
          value={target}
          options={languages.map((l) => ({ value: l.code, label: l.label }))}
          onChange={(e) => {
            const code = languages.find((l) => l.code === e.currentTarget.value)?.code;
            if (code) setTarget(code);
          }}
        />
        <Button onClick={handleTranslate} loading={loading}>
          🔁 Translate
        </Button>
      </div>

      {error && <Notice kind="error">{error}</Notice>}

      {result && (
        <Card title="✅ Translation">
          <p>
            <strong>Target:</strong> {result.targetLabel}
          </p>
          <pre class="codebox">{result.translatedText}</pre>
          <Button variant="secondary" size="full" onClick={handleDownload}>
            ⬇️ Download translated text (.txt)
          </Button>
        </Card>
      )}
    </section>
  );
}
