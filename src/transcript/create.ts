import {
  type ConversationEnvironment,
  resolveConversationEnvironment,
} from '../environment';
import type { JSONValue, Transcript } from '../types';
import { deepFreeze } from '../utilities';

/**
 * Creates a new empty transcript with timestamps set to the current time.
 */
export function createTranscript(
  options?: {
    id?: string;
    metadata?: Record<string, JSONValue>;
  },
  environment?: Partial<ConversationEnvironment>,
): Transcript {
  const resolved = resolveConversationEnvironment(environment);
  const now = resolved.now();
  const transcript: Transcript = {
    id: options?.id ?? resolved.randomId(),
    metadata: structuredClone(options?.metadata ?? {}),
    messages: [],
    createdAt: now,
    updatedAt: now,
  };
  return deepFreeze(transcript);
}
