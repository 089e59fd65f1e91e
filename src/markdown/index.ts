import type { Conversation } from '../conversation';
import type { ConversationEnvironment } from '../environment';
import { getRoleFromLabel, getRoleLabel, LABEL_TO_ROLE, ROLE_LABELS } from '../roles';
import type { ToMarkdownOptions, Transcript } from '../types';
import { normalizeLineEndings } from '../utilities/line-endings';
import { fromMarkdown, MarkdownParseError, toMarkdown } from '../utilities/markdown';

export type { ToMarkdownOptions } from '../types';

export {
  fromMarkdown,
  getRoleFromLabel,
  getRoleLabel,
  LABEL_TO_ROLE,
  MarkdownParseError,
  ROLE_LABELS,
  toMarkdown,
};

/**
 * Exports a transcript to Markdown with normalized line endings.
 */
export function exportMarkdown(
  transcript: Transcript,
  options: ToMarkdownOptions = {},
): string {
  return normalizeLineEndings(toMarkdown(transcript, options));
}

/**
 * Converts a Conversation's transcript to Markdown.
 */
export function conversationToMarkdown(
  conversation: Conversation,
  options?: ToMarkdownOptions,
): string {
  return toMarkdown(conversation.transcript, options);
}

/**
 * Parses Markdown into a transcript, normalizing line endings first.
 */
export function importMarkdown(
  markdown: string,
  environment?: Partial<ConversationEnvironment>,
): Transcript {
  return fromMarkdown(normalizeLineEndings(markdown), environment);
}
