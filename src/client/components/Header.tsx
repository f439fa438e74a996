import type { SystemStatus } from '../types/index.js';

interface HeaderProps {
  status: 'loading' | 'ready' | 'error';
  systemStatus: SystemStatus | null;
}

export function Header({ status, systemStatus }: HeaderProps) {
  const getStatusText = () => {
    if (status === 'loading') return 'Checking…';
    if (status === 'error') return 'Server unreachable';
    if (systemStatus?.ready) return `Connected · ${systemStatus.translation.provider}`;
    return 'Provider not configured';
  };

  return (
    <header>
      <div class="header-content">
        <div class="logo">
          <h1>🌍 Language Translator</h1>
          <p class="small">
            Translate English text into <strong>French</strong>, <strong>Spanish</strong>, or{' '}
            <strong>German</strong>.
          </p>
        </div>
        <span class={`status-pill status-${status}`}>{getStatusText()}</span>
      </div>
    </header>
  );
}
