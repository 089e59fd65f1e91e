import { OpenAIChatClient } from './adapters/openai';
import { type ChatlabConfig, loadConfig } from './config';
import { Markdown, MarkdownDisplay } from './display/markdown';
import {
  type ConversationEnvironment,
  resolveConversationEnvironment,
} from './environment';
import {
  createInvalidInputError,
  createLockedError,
  createMisconfigurationError,
  createRemoteFailureError,
  createRoundLimitExceededError,
  createValidationError,
  isChatlabError,
  toError,
} from './errors';
import { isMessage } from './guards';
import type { Logger } from './logger';
import { assistant, assistantFunctionCall, functionResult, user } from './messaging';
import {
  type FunctionImplementation,
  FunctionRegistry,
  type FunctionSpec,
  isRecoverableResolutionError,
  type ParameterSchema,
} from './registry';
import { type ConversationSettings, conversationSettingsSchema } from './schemas';
import {
  appendMessages,
  createTranscript,
  deserializeTranscript,
  serializeTranscript,
} from './transcript';
import type {
  DisplayAdapter,
  FunctionCall,
  FunctionCallReply,
  JSONValue,
  Message,
  ModelClient,
  ModelReply,
  ResolutionState,
  Transcript,
  TranscriptJSON,
} from './types';

export interface ConversationOptions extends ConversationSettings {
  /** Remote model. Defaults to an `OpenAIChatClient` built from configuration on first use. */
  client?: ModelClient;
  /** Functions the model may call. Without one, a function call from the model is a misconfiguration. */
  registry?: FunctionRegistry;
  /** Formats messages for `render()`. Defaults to `MarkdownDisplay`. */
  display?: DisplayAdapter;
  environment?: Partial<ConversationEnvironment>;
  /** Defaults for model, round limit and the OpenAI client. Read from the environment when omitted. */
  config?: ChatlabConfig;
  metadata?: Record<string, JSONValue>;
}

/**
 * Dispatched by a Conversation for every message appended to it.
 */
export class ConversationMessageEvent extends Event {
  readonly message: Message;

  constructor(message: Message) {
    super('message');
    this.message = message;
  }
}

function isMessageList(value: unknown): value is ReadonlyArray<Message> {
  return Array.isArray(value);
}

function isConversationOptions(value: unknown): value is ConversationOptions {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !('role' in value)
  );
}

/**
 * Accepts either `(...messages)` or `(messages, options)`.
 */
function partitionConversationArgs(
  args: ReadonlyArray<Message | ReadonlyArray<Message> | ConversationOptions | undefined>,
): { seed: Message[]; options: ConversationOptions } {
  const [first, second] = args;
  if (!isMessageList(first)) {
    return { seed: toSeed(args), options: {} };
  }
  if (second !== undefined && !isConversationOptions(second)) {
    throw createInvalidInputError('the second argument of a Conversation must be its options', {
      received: isMessage(second) ? 'message' : typeof second,
    });
  }
  return { seed: toSeed(first), options: second ?? {} };
}

function toSeed(candidates: ReadonlyArray<unknown>): Message[] {
  const seed: Message[] = [];
  for (const candidate of candidates) {
    if (!isMessage(candidate)) {
      throw createInvalidInputError('a Conversation is seeded with messages only', {
        received: typeof candidate,
      });
    }
    seed.push(candidate);
  }
  return seed;
}

/**
 * An append-only chat transcript bound to a model.
 *
 * `submit` appends the user's text, asks the model for a reply, runs any
 * function the model calls through the registry and feeds the result back,
 * until the model answers in text.
 *
 * @example
 * ```ts
 * const conversation = new Conversation(system('You are terse.'));
 * const reply = await conversation.submit('2+2?');
 * console.log(reply.content); // '4'
 * ```
 */
export class Conversation extends EventTarget {
  readonly model: string;
  readonly temperature: number | undefined;
  readonly maxRounds: number;

  private transcriptState: Transcript;
  private modelClient: ModelClient | undefined;
  private functionRegistry: FunctionRegistry | undefined;
  private readonly displayAdapter: DisplayAdapter;
  private readonly environment: ConversationEnvironment;
  private readonly config: ChatlabConfig;
  private readonly logger: Logger;
  private resolutionState: ResolutionState = 'idle';
  private submitting = false;

  constructor(...seed: Message[]);
  constructor(seed: ReadonlyArray<Message>, options?: ConversationOptions);
  constructor(
    ...args: Array<Message | ReadonlyArray<Message> | ConversationOptions | undefined>
  ) {
    super();
    const { seed, options } = partitionConversationArgs(args);

    const settings = conversationSettingsSchema.safeParse({
      id: options.id,
      model: options.model,
      temperature: options.temperature,
      maxRounds: options.maxRounds,
    });
    if (!settings.success) {
      throw createValidationError('invalid conversation options', {
        issues: settings.error.issues,
      });
    }

    this.config = options.config ?? loadConfig();
    this.environment = resolveConversationEnvironment(options.environment);
    this.model = settings.data.model ?? this.config.model;
    this.temperature = settings.data.temperature;
    this.maxRounds = settings.data.maxRounds ?? this.config.maxRounds;
    this.modelClient = options.client;
    this.functionRegistry = options.registry;
    this.displayAdapter = options.display ?? new MarkdownDisplay();

    const empty = createTranscript(
      { id: settings.data.id, metadata: options.metadata },
      this.environment,
    );
    this.transcriptState = appendMessages(empty, seed, this.environment);
    this.logger = this.environment.logger.child({ conversationId: this.id });
  }

  /**
   * Rebuilds a conversation from `toJSON()` output.
   */
  static fromJSON(
    json: unknown,
    options: Omit<ConversationOptions, 'id' | 'metadata'> = {},
  ): Conversation {
    const transcript = deserializeTranscript(json);
    return new Conversation(transcript.messages, {
      ...options,
      id: transcript.id,
      metadata: { ...transcript.metadata },
    });
  }

  get id(): string {
    return this.transcriptState.id;
  }

  /**
   * The messages so far, oldest first.
   */
  get messages(): ReadonlyArray<Message> {
    return this.transcriptState.messages;
  }

  get transcript(): Transcript {
    return this.transcriptState;
  }

  get registry(): FunctionRegistry | undefined {
    return this.functionRegistry;
  }

  /**
   * Where the current (or last) submission is in the resolution loop.
   */
  get state(): ResolutionState {
    return this.resolutionState;
  }

  /**
   * Appends messages without contacting the model.
   */
  append(...messages: Message[]): this {
    this.commit(messages);
    return this;
  }

  /**
   * Registers a function the model may call, creating a registry on first use.
   */
  register<Schema extends ParameterSchema>(
    name: string,
    spec: FunctionSpec<Schema>,
    implementation: FunctionImplementation<Schema>,
  ): this {
    this.functionRegistry ??= new FunctionRegistry({
      timeoutMs: this.config.functionTimeoutMs,
      environment: this.environment,
    });
    this.functionRegistry.register(name, spec, implementation);
    return this;
  }

  /**
   * Subscribes to appended messages. Returns an unsubscribe function.
   */
  subscribe(listener: (message: Message) => void): () => void {
    const handler = (event: Event) => {
      if (event instanceof ConversationMessageEvent) listener(event.message);
    };
    this.addEventListener('message', handler);
    return () => this.removeEventListener('message', handler);
  }

  /**
   * Appends `text` as a user message and runs the resolution loop until the
   * model replies in text. Returns the assistant message.
   *
   * Messages appended before a failure stay in the transcript.
   *
   * @throws {ChatlabError} `error:locked` while another submission is in progress,
   * `error:misconfiguration` when the model calls a function and no registry is attached,
   * `error:round-limit-exceeded` after `maxRounds` model requests without a text reply,
   * `error:remote-failure` when the client fails, and `error:function-timeout`.
   */
  async submit(text: string): Promise<Message> {
    if (this.submitting) {
      throw createLockedError(this.id);
    }
    this.submitting = true;

    try {
      return await this.runResolutionLoop(text);
    } catch (error) {
      this.transition('failed', { error: toError(error).message });
      throw error;
    } finally {
      this.submitting = false;
    }
  }

  /**
   * Formats every message with the display adapter.
   */
  render(): string[] {
    return this.messages.map((message) => this.displayAdapter.render(message));
  }

  /**
   * The rendered transcript as a single Markdown document.
   */
  display(): Markdown {
    return new Markdown(this.render().join('\n\n'));
  }

  toJSON(): TranscriptJSON {
    return serializeTranscript(this.transcriptState);
  }

  private async runResolutionLoop(text: string): Promise<Message> {
    this.commit([user(text, undefined, this.environment)]);

    for (let round = 1; round <= this.maxRounds; round++) {
      this.transition('awaiting-model-reply', { round });
      const reply = await this.requestReply();

      if (reply.type === 'text') {
        const message = assistant(reply.content, undefined, this.environment);
        this.commit([message]);
        this.transition('terminal', { round });
        return message;
      }

      this.transition('resolving-function-call', { round, name: reply.name });
      await this.resolveFunctionCall(reply);
    }

    throw createRoundLimitExceededError(this.maxRounds);
  }

  private async requestReply(): Promise<ModelReply> {
    const client = this.resolveClient();
    let reply: ModelReply;
    try {
      reply = await client.complete({
        model: this.model,
        temperature: this.temperature,
        messages: this.messages,
        functions: this.functionRegistry?.definitions() ?? [],
      });
    } catch (error) {
      if (isChatlabError(error)) throw error;
      throw createRemoteFailureError('model request failed', error);
    }

    if (reply.type === 'text' && reply.content.trim() === '') {
      throw createRemoteFailureError('model returned an empty reply');
    }
    return reply;
  }

  private async resolveFunctionCall(reply: FunctionCallReply): Promise<void> {
    const call: FunctionCall = {
      id: this.freshCallId(reply.callId),
      name: reply.name,
      arguments: reply.arguments,
    };
    this.commit([
      assistantFunctionCall(
        call.name,
        call.arguments,
        { callId: call.id, content: reply.content },
        this.environment,
      ),
    ]);

    const registry = this.functionRegistry;
    if (!registry) {
      throw createMisconfigurationError(
        `model called ${call.name} but no function registry is attached`,
        { name: call.name },
      );
    }

    let result: Message;
    try {
      result = await registry.resolve(call);
    } catch (error) {
      if (!isRecoverableResolutionError(error)) throw error;
      const failure = toError(error);
      this.logger.warn({ name: call.name, err: failure }, 'function call failed; reporting to model');
      result = functionResult(
        call,
        `Error: ${failure.message}`,
        { outcome: 'error' },
        this.environment,
      );
    }
    this.commit([result]);
  }

  /**
   * Provider call ids are kept unless the transcript already has one with that id.
   */
  private freshCallId(callId: string | undefined): string {
    if (callId && !this.messages.some((m) => m.functionCall?.id === callId)) {
      return callId;
    }
    return this.environment.randomId();
  }

  private resolveClient(): ModelClient {
    if (this.modelClient) return this.modelClient;
    try {
      this.modelClient = new OpenAIChatClient({
        apiKey: this.config.apiKey,
        baseURL: this.config.baseURL,
        environment: this.environment,
      });
    } catch (error) {
      throw createMisconfigurationError(
        'no model client was given and the OpenAI client could not be created',
        undefined,
        error,
      );
    }
    return this.modelClient;
  }

  private commit(messages: ReadonlyArray<Message>): void {
    this.transcriptState = appendMessages(this.transcriptState, messages, this.environment);
    for (const message of messages) {
      this.dispatchEvent(new ConversationMessageEvent(message));
    }
  }

  private transition(next: ResolutionState, detail: Record<string, unknown>): void {
    this.logger.debug({ from: this.resolutionState, to: next, ...detail }, 'resolution state');
    this.resolutionState = next;
  }
}
