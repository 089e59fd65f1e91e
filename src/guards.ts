import {
  functionCallSchema,
  functionResultSchema,
  jsonValueSchema,
  messageInputSchema,
  messageRoleSchema,
  messageSchema,
  transcriptSchema,
} from './schemas';
import type {
  FunctionCall,
  FunctionResult,
  JSONValue,
  Message,
  MessageInput,
  MessageRole,
  Transcript,
} from './types';

type SchemaGuard = {
  safeParse: (value: unknown) => { success: boolean };
};

function isSchema<T>(schema: SchemaGuard, value: unknown): value is T {
  return schema.safeParse(value).success;
}

export function isFunctionCall(value: unknown): value is FunctionCall {
  return isSchema(functionCallSchema, value);
}

export function isFunctionResult(value: unknown): value is FunctionResult {
  return isSchema(functionResultSchema, value);
}

export function isJSONValue(value: unknown): value is JSONValue {
  return isSchema(jsonValueSchema, value);
}

export function isMessage(value: unknown): value is Message {
  return isSchema(messageSchema, value);
}

export function isMessageInput(value: unknown): value is MessageInput {
  return isSchema(messageInputSchema, value);
}

export function isMessageRole(value: unknown): value is MessageRole {
  return isSchema(messageRoleSchema, value);
}

export function isTranscript(value: unknown): value is Transcript {
  return isSchema(transcriptSchema, value);
}
