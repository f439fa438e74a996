import { useEffect, useState } from 'preact/hooks';
import { api } from './api/client.js';
import type { LanguageChoice, SystemStatus } from './types/index.js';
import { Header } from './components/Header.js';
import { TranslateForm } from './components/TranslateForm.js';
import { BatchUpload } from './components/BatchUpload.js';
import { HistoryList } from './components/HistoryList.js';
import { Notice } from './components/ui/index.js';

type AppStatus = 'loading' | 'ready' | 'error';

export function App() {
  const [status, setStatus] = useState<AppStatus>('loading');
  const [systemStatus, setSystemStatus] = useState<SystemStatus | null>(null);
  const [languages, setLanguages] = useState<LanguageChoice[]>([]);

  useEffect(() => {
    const load = async () => {
      try {
        const [statusResponse, languageList] = await Promise.all([api.getStatus(), api.getLanguages()]);
        setSystemStatus(statusResponse);
        setLanguages(languageList);
        setStatus('ready');
      } catch (error) {
        console.error('Failed to load status:', error);
        setStatus('error');
      }
    };

    void load();
  }, []);

  return (
    <>
      <Header status={status} systemStatus={systemStatus} />
      <main class="container">
        {status === 'error' && <Notice kind="error">Could not reach the translation server.</Notice>}
        {status === 'ready' && (
          <>
            <TranslateForm languages={languages} />
            <BatchUpload languages={languages} />
            <HistoryList />
          </>
        )}
      </main>
    </>
  );
}
