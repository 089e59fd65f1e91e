/**
 * Error codes for chatlab errors (kebab-case with `error:` prefix).
 */
export type ChatlabErrorCode =
  | 'error:misconfiguration'
  | 'error:unknown-function'
  | 'error:invalid-arguments'
  | 'error:function-execution'
  | 'error:function-timeout'
  | 'error:round-limit-exceeded'
  | 'error:remote-failure'
  | 'error:locked'
  | 'error:invalid-input'
  | 'error:invalid-function-reference'
  | 'error:validation'
  | 'error:serialization'
  | 'error:integrity';

/**
 * Base error class for all chatlab errors.
 *
 * Provides structured error information with error codes, context data,
 * and cause chains for better debugging.
 */
export class ChatlabError extends Error {
  /** Structured error code */
  readonly code: ChatlabErrorCode;

  /** Additional context data */
  readonly context?: Record<string, unknown> | undefined;

  /** Underlying cause (if any) */
  override readonly cause?: Error | undefined;

  constructor(
    code: ChatlabErrorCode,
    message: string,
    options?: {
      context?: Record<string, unknown> | undefined;
      cause?: Error | undefined;
    },
  ) {
    super(message);
    this.name = 'ChatlabError';
    this.code = code;
    this.context = options?.context;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ChatlabError);
    }
  }

  /**
   * Formats the error as a detailed string with code and context.
   */
  toDetailedString(): string {
    const parts = [`[${this.code}] ${this.message}`];

    if (this.context && Object.keys(this.context).length > 0) {
      parts.push(`Context: ${JSON.stringify(this.context, null, 2)}`);
    }

    if (this.cause) {
      parts.push(`Caused by: ${this.cause.message}`);
    }

    return parts.join('\n');
  }
}

/**
 * Thrown by a registered function to abort the conversation instead of
 * reporting the failure back to the model.
 */
export class FatalFunctionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FatalFunctionError';
  }
}

/**
 * Narrows an unknown value to a ChatlabError, optionally of a specific code.
 */
export function isChatlabError(
  value: unknown,
  code?: ChatlabErrorCode,
): value is ChatlabError {
  return value instanceof ChatlabError && (code === undefined || value.code === code);
}

/**
 * Coerces a thrown value into an Error so it can be attached as a cause.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * A conversation is missing a collaborator it needs: a model client, or a
 * registry for a function the model called.
 */
export function createMisconfigurationError(
  message: string,
  context?: Record<string, unknown>,
  cause?: unknown,
): ChatlabError {
  return new ChatlabError('error:misconfiguration', message, {
    context,
    cause: cause === undefined ? undefined : toError(cause),
  });
}

export function createUnknownFunctionError(name: string): ChatlabError {
  return new ChatlabError('error:unknown-function', `function ${name} is not registered`, {
    context: { name },
  });
}

/**
 * Arguments were not valid JSON or failed the function's parameter schema.
 */
export function createInvalidArgumentsError(
  name: string,
  message: string,
  context?: Record<string, unknown>,
): ChatlabError {
  return new ChatlabError(
    'error:invalid-arguments',
    `invalid arguments for ${name}: ${message}`,
    { context: { name, ...context } },
  );
}

/**
 * A registered function threw while running.
 */
export function createFunctionExecutionError(name: string, cause: unknown): ChatlabError {
  const error = toError(cause);
  return new ChatlabError('error:function-execution', `${name} failed: ${error.message}`, {
    context: { name },
    cause: error,
  });
}

export function createFunctionTimeoutError(name: string, timeoutMs: number): ChatlabError {
  return new ChatlabError(
    'error:function-timeout',
    `${name} did not finish within ${timeoutMs}ms`,
    { context: { name, timeoutMs } },
  );
}

/**
 * The resolution loop asked the model `maxRounds` times without a text reply.
 */
export function createRoundLimitExceededError(maxRounds: number): ChatlabError {
  return new ChatlabError(
    'error:round-limit-exceeded',
    `no text reply after ${maxRounds} rounds of function calls`,
    { context: { maxRounds } },
  );
}

/**
 * The model client failed. Not retried.
 */
export function createRemoteFailureError(
  message: string,
  cause?: unknown,
): ChatlabError {
  return new ChatlabError('error:remote-failure', message, {
    cause: cause === undefined ? undefined : toError(cause),
  });
}

/**
 * Thrown when a conversation is already waiting on a submission.
 */
export function createLockedError(conversationId: string): ChatlabError {
  return new ChatlabError(
    'error:locked',
    `conversation ${conversationId} is locked (a submission is already in progress)`,
    { context: { conversationId } },
  );
}

/**
 * Creates an invalid input error.
 * Thrown when message input data is invalid.
 */
export function createInvalidInputError(
  message: string,
  context?: Record<string, unknown>,
): ChatlabError {
  return new ChatlabError('error:invalid-input', message, { context });
}

/**
 * Thrown when a function result references a function call that is not in the transcript.
 */
export function createInvalidFunctionReferenceError(callId: string): ChatlabError {
  return new ChatlabError(
    'error:invalid-function-reference',
    `function result references non-existent function call: ${callId}`,
    { context: { callId } },
  );
}

/**
 * Creates a validation error.
 * Thrown when data validation fails (e.g., Zod schema validation).
 */
export function createValidationError(
  message: string,
  context?: Record<string, unknown>,
  cause?: Error,
): ChatlabError {
  return new ChatlabError('error:validation', message, { context, cause });
}

/**
 * Creates a serialization error.
 * Thrown when JSON serialization/deserialization fails.
 */
export function createSerializationError(message: string, cause?: Error): ChatlabError {
  return new ChatlabError('error:serialization', message, { cause });
}

/**
 * Creates an integrity error.
 * Thrown when transcript invariants are violated.
 */
export function createIntegrityError(
  message: string,
  context?: Record<string, unknown>,
): ChatlabError {
  return new ChatlabError('error:integrity', message, { context });
}
