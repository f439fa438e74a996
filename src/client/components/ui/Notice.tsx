import type { ComponentChildren } from 'preact';

export type NoticeKind = 'info' | 'warning' | 'error' | 'success';

interface NoticeProps {
  kind?: NoticeKind;
  children: ComponentChildren;
}

const icons: Record<NoticeKind, string> = {
  info: 'ℹ️',
  warning: '⚠️',
  error: '❌',
  success: '✅',
};

export function Notice({ kind = 'info', children }: NoticeProps) {
  return (
    <div class={`notice notice-${kind}`} role={kind === 'error' ? 'alert' : 'status'}>
      <span class="notice-icon">{icons[kind]}</span>
      <span>{children}</span>
    </div>
  );
}
