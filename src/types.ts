export type JSONPrimitive = string | number | boolean | null;
export type JSONValue = JSONPrimitive | JSONValue[] | { [key: string]: JSONValue };

/**
 * Canonical message roles. Legacy names (`human`, `ai`, `function`, `narrate`)
 * are accepted by `normalizeRole` and map onto these.
 */
export type MessageRole =
  | 'system'
  | 'user'
  | 'assistant'
  | 'function-call'
  | 'function-result'
  | 'narration';

/**
 * A function call directive issued by the model.
 */
export interface FunctionCall {
  id: string;
  name: string;
  arguments: JSONValue;
}

export type FunctionOutcome = 'success' | 'error';

/**
 * The result of resolving a function call. `name` repeats the name of the
 * function that produced it so results can be matched by name as well as by `callId`.
 */
export interface FunctionResult {
  callId: string;
  name: string;
  outcome: FunctionOutcome;
  value: JSONValue;
}

export interface MessageInput {
  role: MessageRole;
  content: string;
  metadata?: Record<string, JSONValue> | undefined;
  functionCall?: FunctionCall | undefined;
  functionResult?: FunctionResult | undefined;
}

export interface Message {
  readonly id: string;
  readonly role: MessageRole;
  readonly content: string;
  readonly createdAt: string;
  readonly metadata: Readonly<Record<string, JSONValue>>;
  readonly functionCall?: Readonly<FunctionCall> | undefined;
  readonly functionResult?: Readonly<FunctionResult> | undefined;
}

export interface MessageJSON {
  id: string;
  role: MessageRole;
  content: string;
  createdAt: string;
  metadata: Record<string, JSONValue>;
  functionCall?: FunctionCall | undefined;
  functionResult?: FunctionResult | undefined;
}

/**
 * An append-only, immutable message log.
 */
export interface Transcript {
  readonly id: string;
  readonly metadata: Readonly<Record<string, JSONValue>>;
  readonly messages: ReadonlyArray<Message>;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export interface TranscriptJSON {
  id: string;
  metadata: Record<string, JSONValue>;
  messages: MessageJSON[];
  createdAt: string;
  updatedAt: string;
}

/**
 * A function declaration as forwarded to the model. `parameters` is JSON Schema.
 */
export interface FunctionDefinition {
  name: string;
  description?: string | undefined;
  parameters: Record<string, unknown>;
}

export interface ModelRequest {
  model: string;
  temperature?: number | undefined;
  messages: ReadonlyArray<Message>;
  functions: ReadonlyArray<FunctionDefinition>;
}

export interface TextReply {
  type: 'text';
  content: string;
}

export interface FunctionCallReply {
  type: 'function-call';
  callId?: string | undefined;
  name: string;
  arguments: JSONValue;
  /** Text the model sent alongside the call, if any. */
  content?: string | undefined;
}

export type ModelReply = TextReply | FunctionCallReply;

/**
 * The remote side of a conversation. Implementations turn the transcript into
 * a provider request and the provider's answer into a `ModelReply`.
 */
export interface ModelClient {
  complete(request: ModelRequest): Promise<ModelReply>;
}

/**
 * Formats a single message for presentation.
 */
export interface DisplayAdapter {
  render(message: Message): string;
}

export type ResolutionState =
  | 'idle'
  | 'awaiting-model-reply'
  | 'resolving-function-call'
  | 'terminal'
  | 'failed';

export interface ToMarkdownOptions {
  /** Emit YAML frontmatter and message ids so the output can be parsed back losslessly. */
  includeMetadata?: boolean;
}
