import { z } from 'zod';

import type { ConversationEnvironment } from './environment';
import { resolveConversationEnvironment } from './environment';
import {
  createFunctionExecutionError,
  createFunctionTimeoutError,
  createInvalidArgumentsError,
  createInvalidInputError,
  createUnknownFunctionError,
  FatalFunctionError,
  isChatlabError,
} from './errors';
import { functionResult } from './messaging';
import { functionNameSchema } from './schemas';
import type { FunctionCall, FunctionDefinition, JSONValue, Message } from './types';
import { parseArguments, toJSONValue } from './utilities';

/**
 * Parameters are described with a zod schema that parses to an object.
 */
export type ParameterSchema = z.ZodType<Record<string, unknown>>;

export interface FunctionSpec<Schema extends ParameterSchema> {
  description?: string;
  parameters: Schema;
}

export type FunctionImplementation<Schema extends ParameterSchema> = (
  args: z.output<Schema>,
) => unknown;

interface RegisteredFunction {
  definition: FunctionDefinition;
  invoke(args: JSONValue): Promise<JSONValue>;
}

export interface FunctionRegistryOptions {
  /** Abort a function that runs longer than this. The timeout is fatal to the submission. */
  timeoutMs?: number | undefined;
  environment?: Partial<ConversationEnvironment> | undefined;
}

/**
 * Resolution failures the model can be told about and recover from.
 */
export const RECOVERABLE_RESOLUTION_CODES = [
  'error:unknown-function',
  'error:invalid-arguments',
  'error:function-execution',
] as const;

export function isRecoverableResolutionError(error: unknown): boolean {
  return RECOVERABLE_RESOLUTION_CODES.some((code) => isChatlabError(error, code));
}

/**
 * Holds the functions a model may call, their JSON Schema declarations, and
 * runs them on request.
 *
 * @example
 * ```ts
 * const registry = new FunctionRegistry();
 * registry.register(
 *   'add',
 *   { description: 'Add two numbers', parameters: z.object({ a: z.number(), b: z.number() }) },
 *   ({ a, b }) => a + b,
 * );
 * ```
 */
export class FunctionRegistry {
  private readonly functions = new Map<string, RegisteredFunction>();
  private readonly timeoutMs: number | undefined;
  private readonly environment: ConversationEnvironment;

  constructor(options?: FunctionRegistryOptions) {
    this.timeoutMs = options?.timeoutMs;
    this.environment = resolveConversationEnvironment(options?.environment);
  }

  register<Schema extends ParameterSchema>(
    name: string,
    spec: FunctionSpec<Schema>,
    implementation: FunctionImplementation<Schema>,
  ): this {
    const validName = functionNameSchema.safeParse(name);
    if (!validName.success) {
      throw createInvalidInputError(`invalid function name: ${name}`, {
        issues: validName.error.issues,
      });
    }
    if (this.functions.has(name)) {
      throw createInvalidInputError(`function ${name} is already registered`, { name });
    }

    const { $schema: _dialect, ...parameters } = z.toJSONSchema(spec.parameters);

    this.functions.set(name, {
      definition: { name, description: spec.description, parameters },
      invoke: async (args) => {
        const parsed = spec.parameters.safeParse(args);
        if (!parsed.success) {
          throw createInvalidArgumentsError(name, z.prettifyError(parsed.error), {
            issues: parsed.error.issues,
          });
        }
        const value = await this.run(name, () => implementation(parsed.data));
        try {
          return toJSONValue(value);
        } catch (error) {
          throw createFunctionExecutionError(name, error);
        }
      },
    });
    this.environment.logger.debug({ name }, 'function registered');
    return this;
  }

  has(name: string): boolean {
    return this.functions.has(name);
  }

  names(): string[] {
    return Array.from(this.functions.keys());
  }

  get size(): number {
    return this.functions.size;
  }

  /**
   * Declarations for the model, in registration order.
   */
  definitions(): FunctionDefinition[] {
    return Array.from(this.functions.values()).map((fn) => fn.definition);
  }

  /**
   * Runs a function directly and returns its JSON-converted value.
   * Arguments given as a string are parsed as JSON first.
   */
  async call(name: string, args: JSONValue = {}): Promise<JSONValue> {
    const fn = this.functions.get(name);
    if (!fn) {
      throw createUnknownFunctionError(name);
    }

    let input = args;
    if (typeof args === 'string') {
      input = parseArguments(args);
      if (typeof input === 'string') {
        throw createInvalidArgumentsError(name, 'arguments are not valid JSON', {
          arguments: args,
        });
      }
    }

    return fn.invoke(input);
  }

  /**
   * Resolves a function call into a function-result message.
   * Failures are thrown; the caller decides which ones to report to the model.
   */
  async resolve(call: Readonly<FunctionCall>): Promise<Message> {
    const value = await this.call(call.name, call.arguments);
    return functionResult(call, value, undefined, this.environment);
  }

  private async run(name: string, task: () => unknown): Promise<unknown> {
    const execution = Promise.resolve()
      .then(task)
      .catch((error: unknown) => {
        if (error instanceof FatalFunctionError) throw error;
        throw createFunctionExecutionError(name, error);
      });

    if (this.timeoutMs === undefined) return execution;

    const timeoutMs = this.timeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(createFunctionTimeoutError(name, timeoutMs)), timeoutMs);
    });

    try {
      return await Promise.race([execution, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
