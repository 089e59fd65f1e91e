import type { ConversationEnvironment } from './environment';
import { resolveConversationEnvironment } from './environment';
import { createInvalidInputError } from './errors';
import type {
  FunctionCall,
  FunctionOutcome,
  JSONValue,
  Message,
  MessageRole,
} from './types';
import { createMessage, stringifyValue, toJSONValue } from './utilities';

export interface MessageOptions {
  metadata?: Record<string, JSONValue>;
}

export interface FunctionCallOptions extends MessageOptions {
  /** Identifier the result will reference. Generated when omitted. */
  callId?: string;
  /** Text the model sent alongside the call. */
  content?: string;
}

export interface FunctionResultOptions extends MessageOptions {
  outcome?: FunctionOutcome;
}

type TextRole = Extract<MessageRole, 'system' | 'user' | 'assistant' | 'narration'>;

/**
 * Builds a text message for the given role. The named helpers below are thin
 * wrappers over this.
 */
export function textMessage(
  role: TextRole,
  content: string,
  options?: MessageOptions,
  environment?: Partial<ConversationEnvironment>,
): Message {
  return createMessage({ role, content, metadata: options?.metadata }, environment);
}

/**
 * Instructions for the model.
 */
export function system(
  content: string,
  options?: MessageOptions,
  environment?: Partial<ConversationEnvironment>,
): Message {
  return textMessage('system', content, options, environment);
}

export function user(
  content: string,
  options?: MessageOptions,
  environment?: Partial<ConversationEnvironment>,
): Message {
  return textMessage('user', content, options, environment);
}

export function assistant(
  content: string,
  options?: MessageOptions,
  environment?: Partial<ConversationEnvironment>,
): Message {
  return textMessage('assistant', content, options, environment);
}

/** Alias of `user`. */
export const human = user;

/** Alias of `assistant`. */
export const ai = assistant;

/**
 * Stage directions from the notebook author. Sent to the model as system text
 * but kept distinct in the transcript and its displays.
 */
export function narrate(
  content: string,
  options?: MessageOptions,
  environment?: Partial<ConversationEnvironment>,
): Message {
  return textMessage('narration', content, options, environment);
}

/**
 * A function call made by the assistant.
 *
 * @example
 * ```ts
 * const call = assistantFunctionCall('add', { a: 2, b: 2 });
 * const result = functionResult(call, 4);
 * ```
 */
export function assistantFunctionCall(
  name: string,
  args: JSONValue = {},
  options?: FunctionCallOptions,
  environment?: Partial<ConversationEnvironment>,
): Message {
  const resolved = resolveConversationEnvironment(environment);
  return createMessage(
    {
      role: 'function-call',
      content: options?.content ?? '',
      metadata: options?.metadata,
      functionCall: { id: options?.callId ?? resolved.randomId(), name, arguments: args },
    },
    resolved,
  );
}

/**
 * The value a function returned, answering an earlier call. Pass the call (or
 * its message) to link the two, or a function name together with `callId`.
 * Strings are sent to the model verbatim and other values as JSON.
 */
export function functionResult(
  call: Message | FunctionCall,
  value: unknown,
  options?: FunctionResultOptions,
  environment?: Partial<ConversationEnvironment>,
): Message;
export function functionResult(
  name: string,
  value: unknown,
  options: FunctionResultOptions & { callId: string },
  environment?: Partial<ConversationEnvironment>,
): Message;
export function functionResult(
  call: Message | FunctionCall | string,
  value: unknown,
  options?: FunctionResultOptions & { callId?: string },
  environment?: Partial<ConversationEnvironment>,
): Message {
  const { name, callId } = resolveCallReference(call, options?.callId);
  const json = toJSONValue(value);

  return createMessage(
    {
      role: 'function-result',
      content: stringifyValue(json),
      metadata: options?.metadata,
      functionResult: {
        callId,
        name,
        outcome: options?.outcome ?? 'success',
        value: json,
      },
    },
    environment,
  );
}

function resolveCallReference(
  call: Message | FunctionCall | string,
  callId: string | undefined,
): { name: string; callId: string } {
  if (typeof call === 'string') {
    if (!callId) {
      throw createInvalidInputError('functionResult needs a callId when given a name', {
        name: call,
      });
    }
    return { name: call, callId };
  }

  const functionCall = 'role' in call ? call.functionCall : call;
  if (!functionCall) {
    throw createInvalidInputError('functionResult needs a function-call message', {
      role: 'role' in call ? call.role : undefined,
    });
  }
  return { name: functionCall.name, callId: functionCall.id };
}
