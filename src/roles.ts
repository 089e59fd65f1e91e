import { messageRoleSchema } from './schemas';
import type { MessageRole } from './types';
import { hasOwnProperty } from './utilities/type-helpers';

/**
 * Maps message roles to human-readable display labels.
 *
 * @example
 * ```ts
 * ROLE_LABELS['function-call']; // 'Function Call'
 * ROLE_LABELS.assistant;        // 'Assistant'
 * ```
 */
export const ROLE_LABELS: Record<MessageRole, string> = {
  system: 'System',
  user: 'User',
  assistant: 'Assistant',
  'function-call': 'Function Call',
  'function-result': 'Function Result',
  narration: 'Narration',
};

/**
 * Maps display labels back to message roles.
 */
export const LABEL_TO_ROLE: Record<string, MessageRole> = {
  System: 'system',
  User: 'user',
  Assistant: 'assistant',
  'Function Call': 'function-call',
  'Function Result': 'function-result',
  Narration: 'narration',
};

/**
 * Legacy role names and the canonical role each stands for.
 */
export const ROLE_ALIASES: Record<string, MessageRole> = {
  human: 'user',
  ai: 'assistant',
  function: 'function-result',
  function_call: 'function-call',
  function_result: 'function-result',
  narrate: 'narration',
};

export function getRoleLabel(role: MessageRole): string {
  return ROLE_LABELS[role];
}

/**
 * Gets the message role from a display label, or undefined if the label is not recognized.
 */
export function getRoleFromLabel(label: string): MessageRole | undefined {
  return hasOwnProperty(LABEL_TO_ROLE, label) ? LABEL_TO_ROLE[label] : undefined;
}

/**
 * Resolves a canonical or legacy role name to its canonical role.
 *
 * @example
 * ```ts
 * normalizeRole('human');     // 'user'
 * normalizeRole('assistant'); // 'assistant'
 * normalizeRole('robot');     // undefined
 * ```
 */
export function normalizeRole(name: string): MessageRole | undefined {
  const canonical = messageRoleSchema.safeParse(name);
  if (canonical.success) return canonical.data;
  return hasOwnProperty(ROLE_ALIASES, name) ? ROLE_ALIASES[name] : undefined;
}
