import type { FunctionCall, FunctionResult, Message } from '../types';

/**
 * Represents a function call paired with its optional result.
 */
export interface FunctionCallPair {
  call: Readonly<FunctionCall>;
  result?: Readonly<FunctionResult> | undefined;
}

/**
 * Pairs function calls with their corresponding results, preserving the order
 * of the calls.
 *
 * @example
 * ```ts
 * const pairs = pairFunctionCallsWithResults(conversation.messages);
 * // pairs: [{ call: FunctionCall, result?: FunctionResult }, ...]
 * ```
 */
export function pairFunctionCallsWithResults(
  messages: ReadonlyArray<Message>,
): FunctionCallPair[] {
  const results = new Map<string, Readonly<FunctionResult>>();

  for (const message of messages) {
    if (message.functionResult) {
      results.set(message.functionResult.callId, message.functionResult);
    }
  }

  const pairs: FunctionCallPair[] = [];
  for (const message of messages) {
    if (message.functionCall) {
      pairs.push({
        call: message.functionCall,
        result: results.get(message.functionCall.id),
      });
    }
  }

  return pairs;
}
