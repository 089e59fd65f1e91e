import { deprecate } from 'node:util';

import { Conversation } from './conversation';

/**
 * @deprecated Use `Conversation` instead. Behaves identically; the first
 * construction emits a `DeprecationWarning` (code `CHATLAB_DEP_SESSION`).
 */
export const Session = deprecate(
  Conversation,
  'Session is deprecated. Use `Conversation` instead.',
  'CHATLAB_DEP_SESSION',
);

/** @deprecated Use `Conversation` instead. */
export type Session = Conversation;
