import type { Message, MessageRole, Transcript } from '../types';

/**
 * Returns the message at the specified position, or undefined.
 */
export function getMessageAtPosition(
  transcript: Transcript,
  position: number,
): Message | undefined {
  return transcript.messages[position];
}

/**
 * Finds a message by its unique identifier.
 */
export function getMessageById(transcript: Transcript, id: string): Message | undefined {
  return transcript.messages.find((m) => m.id === id);
}

/**
 * Filters messages using a custom predicate function.
 */
export function searchMessages(
  transcript: Transcript,
  predicate: (m: Message) => boolean,
): Message[] {
  return transcript.messages.filter(predicate);
}

/**
 * Returns the most recent message, optionally restricted to a role.
 */
export function getLastMessage(
  transcript: Transcript,
  role?: MessageRole,
): Message | undefined {
  for (let i = transcript.messages.length - 1; i >= 0; i--) {
    const message = transcript.messages[i];
    if (message && (role === undefined || message.role === role)) return message;
  }
  return undefined;
}

/**
 * Counts messages in total and by role.
 */
export function computeTranscriptStatistics(transcript: Transcript): {
  total: number;
  byRole: Partial<Record<MessageRole, number>>;
} {
  const byRole: Partial<Record<MessageRole, number>> = {};
  for (const message of transcript.messages) {
    byRole[message.role] = (byRole[message.role] ?? 0) + 1;
  }
  return { total: transcript.messages.length, byRole };
}
