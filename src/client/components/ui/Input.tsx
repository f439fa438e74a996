import type { JSX } from 'preact';

interface TextAreaProps extends JSX.TextareaHTMLAttributes<HTMLTextAreaElement> {
  label?: string;
}

export function TextArea({ label, id, className = '', ...props }: TextAreaProps) {
  return (
    <div class="form-group">
      {label && (
        <label class="form-label" for={id}>
          {label}
        </label>
      )}
      <textarea id={id} class={`form-textarea ${className}`} {...props} />
    </div>
  );
}

interface SelectProps extends JSX.SelectHTMLAttributes<HTMLSelectElement> {
  label?: string;
  options: { value: string; label: string }[];
}

export function Select({ label, id, options, className = '', ...props }: SelectProps) {
  return (
    <div class="form-group">
      {label && (
        <label class="form-label" for={id}>
          {label}
        </label>
      )}
      <select id={id} class={`form-select ${className}`} {...props}>
        {options.map((opt) => (
          <option key={opt.value} value={opt.value}>
            {opt.label}
          </option>
        ))}
      </select>
    </div>
  );
}
