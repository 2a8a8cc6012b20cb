export * from './types.js';
export * from './api-types.js';

import { DEFAULT_SESSION_TITLE, DERIVED_TITLE_LENGTH, MAX_SESSION_TITLE_LENGTH } from './api-types.js';

// Title normalisation for explicitly supplied titles
export function normalizeSessionTitle(title: string | undefined): string {
  const trimmed = title?.trim() ?? '';
  if (!trimmed) return DEFAULT_SESSION_TITLE;
  return trimmed.slice(0, MAX_SESSION_TITLE_LENGTH);
}

// Title for a session started implicitly by its first message
export function deriveSessionTitle(firstMessage: string): string {
  const collapsed = firstMessage.replace(/\s+/g, ' ').trim();
  if (!collapsed) return DEFAULT_SESSION_TITLE;
  return collapsed.length > DERIVED_TITLE_LENGTH
    ? collapsed.slice(0, DERIVED_TITLE_LENGTH) + '...'
    : collapsed;
}
