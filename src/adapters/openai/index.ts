import OpenAI from 'openai';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';

import { resolveConversationEnvironment } from '../../environment';
import type { ConversationEnvironment } from '../../environment';
import { createRemoteFailureError } from '../../errors';
import type { Logger } from '../../logger';
import type {
  FunctionCall,
  FunctionDefinition,
  Message,
  ModelClient,
  ModelReply,
  ModelRequest,
} from '../../types';
import { parseArguments } from '../../utilities';

/**
 * The subset of a Chat Completions response this adapter reads.
 */
export interface ChatCompletionResult {
  choices: ReadonlyArray<{
    message: {
      content: string | null;
      tool_calls?: ReadonlyArray<{
        id: string;
        function: { name: string; arguments: string };
      }>;
    };
  }>;
}

/**
 * The part of the OpenAI SDK client this adapter calls. An `OpenAI` instance
 * satisfies it; tests pass a stub.
 */
export interface ChatCompletionsAPI {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): PromiseLike<ChatCompletionResult>;
    };
  };
}

/**
 * Converts a function call to the OpenAI tool call format.
 */
function toOpenAIToolCall(functionCall: Readonly<FunctionCall>): ChatCompletionMessageToolCall {
  return {
    id: functionCall.id,
    type: 'function',
    function: {
      name: functionCall.name,
      arguments:
        typeof functionCall.arguments === 'string'
          ? functionCall.arguments
          : JSON.stringify(functionCall.arguments),
    },
  };
}

/**
 * Converts a single message to OpenAI format.
 */
function convertMessage(message: Message): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
    case 'narration':
      return { role: 'system', content: message.content };

    case 'user':
      return { role: 'user', content: message.content };

    case 'assistant':
      return { role: 'assistant', content: message.content };

    case 'function-call':
      return {
        role: 'assistant',
        content: message.content === '' ? null : message.content,
        ...(message.functionCall
          ? { tool_calls: [toOpenAIToolCall(message.functionCall)] }
          : {}),
      };

    case 'function-result':
      return {
        role: 'tool',
        content: message.content,
        tool_call_id: message.functionResult?.callId ?? '',
      };
  }
}

/**
 * Converts a transcript to Chat Completions API messages.
 * Narration is sent as system text; function calls and results become
 * assistant `tool_calls` and `tool` messages. A call that never got a result
 * (the submission that issued it failed) is left out, since the API requires
 * every tool call to be answered; any text sent with it is kept.
 *
 * @example
 * ```ts
 * import { toOpenAIMessages } from 'chatlab/openai';
 *
 * const response = await openai.chat.completions.create({
 *   model: 'gpt-4o-mini',
 *   messages: toOpenAIMessages(conversation.messages),
 * });
 * ```
 */
export function toOpenAIMessages(
  messages: ReadonlyArray<Message>,
): ChatCompletionMessageParam[] {
  const answered = new Set<string>();
  for (const message of messages) {
    if (message.functionResult) answered.add(message.functionResult.callId);
  }

  return messages.flatMap((message): ChatCompletionMessageParam[] => {
    if (message.functionCall && !answered.has(message.functionCall.id)) {
      return message.content === '' ? [] : [{ role: 'assistant', content: message.content }];
    }
    return [convertMessage(message)];
  });
}

/**
 * Converts function declarations to OpenAI tools.
 */
export function toOpenAITools(
  functions: ReadonlyArray<FunctionDefinition>,
): ChatCompletionTool[] {
  return functions.map((fn) => ({
    type: 'function',
    function: {
      name: fn.name,
      ...(fn.description ? { description: fn.description } : {}),
      parameters: fn.parameters,
    },
  }));
}

/**
 * Reads a model reply out of a Chat Completions response.
 * Only the first tool call is honoured; the conversation resolves one call per round.
 */
export function fromOpenAIResponse(
  response: ChatCompletionResult,
  logger?: Logger,
): ModelReply {
  const choice = response.choices[0];
  if (!choice) {
    throw createRemoteFailureError('model returned no choices');
  }

  const [toolCall, ...dropped] = choice.message.tool_calls ?? [];
  if (toolCall) {
    if (dropped.length > 0) {
      logger?.warn(
        { dropped: dropped.map((call) => call.function.name) },
        'model issued parallel tool calls; only the first is resolved',
      );
    }
    return {
      type: 'function-call',
      callId: toolCall.id,
      name: toolCall.function.name,
      arguments: parseArguments(toolCall.function.arguments),
      content: choice.message.content ?? undefined,
    };
  }

  const content = choice.message.content ?? '';
  if (content.trim() === '') {
    throw createRemoteFailureError('model returned an empty reply');
  }
  return { type: 'text', content };
}

export interface OpenAIChatClientOptions {
  /** Pre-built SDK client (or a stand-in). When omitted one is created from apiKey/baseURL. */
  client?: ChatCompletionsAPI;
  apiKey?: string | undefined;
  baseURL?: string | undefined;
  maxTokens?: number | undefined;
  environment?: Partial<ConversationEnvironment> | undefined;
}

/**
 * A `ModelClient` backed by the OpenAI Chat Completions API.
 * Retries are whatever the SDK does; this client does not add its own.
 */
export class OpenAIChatClient implements ModelClient {
  private readonly client: ChatCompletionsAPI;
  private readonly maxTokens: number | undefined;
  private readonly logger: Logger;

  constructor(options: OpenAIChatClientOptions = {}) {
    this.client =
      options.client ?? new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
    this.maxTokens = options.maxTokens;
    this.logger = resolveConversationEnvironment(options.environment).logger.child({
      client: 'openai',
    });
  }

  async complete(request: ModelRequest): Promise<ModelReply> {
    const params: ChatCompletionCreateParamsNonStreaming = {
      model: request.model,
      messages: toOpenAIMessages(request.messages),
    };
    if (request.temperature !== undefined) {
      params.temperature = request.temperature;
    }
    if (this.maxTokens !== undefined) {
      params.max_tokens = this.maxTokens;
    }
    if (request.functions.length > 0) {
      params.tools = toOpenAITools(request.functions);
    }

    this.logger.debug(
      { model: request.model, messages: params.messages.length, tools: params.tools?.length ?? 0 },
      'chat completion request',
    );

    let response: ChatCompletionResult;
    try {
      response = await this.client.chat.completions.create(params);
    } catch (error) {
      throw createRemoteFailureError('chat completion request failed', error);
    }

    return fromOpenAIResponse(response, this.logger);
  }
}
