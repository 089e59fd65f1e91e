import { z } from 'zod';

import type {
  FunctionCall,
  FunctionResult,
  JSONValue,
  Message,
  MessageInput,
  MessageRole,
  Transcript,
} from './types';

/**
 * Zod schema for JSON-serializable values.
 */
export const jsonValueSchema: z.ZodType<JSONValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ]),
) satisfies z.ZodType<JSONValue>;

/**
 * Zod schema for canonical message roles.
 */
export const messageRoleSchema = z.enum([
  'system',
  'user',
  'assistant',
  'function-call',
  'function-result',
  'narration',
]) satisfies z.ZodType<MessageRole>;

/**
 * Function names as accepted by the OpenAI tools API.
 */
export const functionNameSchema = z
  .string()
  .regex(/^[a-zA-Z0-9_-]{1,64}$/, 'function names are 1-64 letters, digits, _ or -');

export const functionCallSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  arguments: jsonValueSchema,
}) satisfies z.ZodType<FunctionCall>;

export const functionResultSchema = z.object({
  callId: z.string().min(1),
  name: z.string().min(1),
  outcome: z.enum(['success', 'error']),
  value: jsonValueSchema,
}) satisfies z.ZodType<FunctionResult>;

type PayloadShape = {
  role: MessageRole;
  functionCall?: unknown;
  functionResult?: unknown;
};

/**
 * `functionCall` belongs to function-call messages and `functionResult` to
 * function-result messages, and nowhere else.
 */
function hasMatchingPayload(value: PayloadShape): boolean {
  const isCall = value.role === 'function-call';
  const isResult = value.role === 'function-result';
  return (
    isCall === (value.functionCall !== undefined) &&
    isResult === (value.functionResult !== undefined)
  );
}

const payloadMessage = {
  message: 'functionCall must accompany function-call messages and functionResult must accompany function-result messages',
};

/**
 * Zod schema for message input payloads.
 */
export const messageInputSchema = z
  .object({
    role: messageRoleSchema,
    content: z.string(),
    metadata: z.record(z.string(), jsonValueSchema).optional(),
    functionCall: functionCallSchema.optional(),
    functionResult: functionResultSchema.optional(),
  })
  .refine(hasMatchingPayload, payloadMessage) satisfies z.ZodType<MessageInput>;

/**
 * Zod schema for messages.
 */
export const messageSchema = z
  .object({
    id: z.string().min(1),
    role: messageRoleSchema,
    content: z.string(),
    createdAt: z.string(),
    metadata: z.record(z.string(), jsonValueSchema),
    functionCall: functionCallSchema.optional(),
    functionResult: functionResultSchema.optional(),
  })
  .refine(hasMatchingPayload, payloadMessage) satisfies z.ZodType<Message>;

/**
 * Zod schema for serialized transcripts.
 */
export const transcriptSchema = z.object({
  id: z.string().min(1),
  metadata: z.record(z.string(), jsonValueSchema),
  messages: z.array(messageSchema),
  createdAt: z.string(),
  updatedAt: z.string(),
}) satisfies z.ZodType<Transcript>;

/**
 * Scalar conversation settings. Collaborators (client, registry, display) are
 * checked by the type system, not here.
 */
export const conversationSettingsSchema = z.object({
  id: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxRounds: z.number().int().min(1).optional(),
});

export type ConversationSettings = z.infer<typeof conversationSettingsSchema>;
