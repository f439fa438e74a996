// UI Components - Re-exports

export { Button } from './Button.js';
export type { ButtonVariant, ButtonSize } from './Button.js';

export { Card } from './Card.js';

export { TextArea, Select } from './Input.js';

export { Notice } from './Notice.js';
export type { NoticeKind } from './Notice.js';
