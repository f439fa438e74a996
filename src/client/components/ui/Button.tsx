import type { ComponentChildren, JSX } from 'preact';

export type ButtonVariant = 'primary' | 'secondary' | 'ghost';
export type ButtonSize = 'sm' | 'md' | 'full';

interface ButtonProps extends Omit<JSX.ButtonHTMLAttributes<HTMLButtonElement>, 'size'> {
  variant?: ButtonVariant;
  size?: ButtonSize;
  loading?: boolean;
  children: ComponentChildren;
}

export function Button({
  variant = 'primary',
  size,
  loading = false,
  disabled,
  className = '',
  children,
  ...props
}: ButtonProps) {
  const classes = [
    'btn',
    `btn-${variant}`,
    size === 'sm' && 'btn-sm',
    size === 'full' && 'btn-full',
    className,
  ]
    .filter(Boolean)
    .join(' ');

  return (
    <button class={classes} disabled={disabled || loading} {...props}>
      {loading ? <span class="spinner" /> : children}
    </button>
  );
}
