import {
  type ConversationEnvironment,
  resolveConversationEnvironment,
} from '../environment';
import { createInvalidInputError, createValidationError } from '../errors';
import { messageInputSchema } from '../schemas';
import type { Message, MessageInput, MessageJSON, MessageRole } from '../types';
import { deepFreeze } from './type-helpers';

const TEXT_ROLES: ReadonlySet<MessageRole> = new Set([
  'system',
  'user',
  'assistant',
  'narration',
]);

/**
 * Creates an immutable Message with an id and timestamp from the environment.
 * Text roles require non-blank content; function roles require their payload.
 * Nested objects are copied before freezing so callers keep ownership of theirs.
 */
export function createMessage(
  input: MessageInput,
  environment?: Partial<ConversationEnvironment>,
): Message {
  const parsed = messageInputSchema.safeParse(input);
  if (!parsed.success) {
    throw createValidationError(`invalid ${input.role} message`, {
      issues: parsed.error.issues,
    });
  }

  const valid = parsed.data;
  if (TEXT_ROLES.has(valid.role) && valid.content.trim() === '') {
    throw createInvalidInputError(`${valid.role} message content must not be empty`, {
      role: valid.role,
    });
  }

  const resolved = resolveConversationEnvironment(environment);
  const message: Message = {
    id: resolved.randomId(),
    role: valid.role,
    content: valid.content,
    createdAt: resolved.now(),
    metadata: structuredClone(valid.metadata ?? {}),
    functionCall: valid.functionCall ? structuredClone(valid.functionCall) : undefined,
    functionResult: valid.functionResult
      ? structuredClone(valid.functionResult)
      : undefined,
  };

  return deepFreeze(message);
}

/**
 * Rebuilds an immutable Message from its JSON form, keeping its id and timestamp.
 */
export function messageFromJSON(json: MessageJSON): Message {
  const message: Message = {
    id: json.id,
    role: json.role,
    content: json.content,
    createdAt: json.createdAt,
    metadata: structuredClone(json.metadata),
    functionCall: json.functionCall ? structuredClone(json.functionCall) : undefined,
    functionResult: json.functionResult ? structuredClone(json.functionResult) : undefined,
  };
  return deepFreeze(message);
}

/**
 * Converts an immutable Message to a mutable JSON representation.
 * Creates deep copies of all nested objects; absent payloads are omitted.
 */
export function messageToJSON(message: Message): MessageJSON {
  const json: MessageJSON = {
    id: message.id,
    role: message.role,
    content: message.content,
    createdAt: message.createdAt,
    metadata: structuredClone({ ...message.metadata }),
  };
  if (message.functionCall) {
    json.functionCall = structuredClone({ ...message.functionCall });
  }
  if (message.functionResult) {
    json.functionResult = structuredClone({ ...message.functionResult });
  }
  return json;
}
