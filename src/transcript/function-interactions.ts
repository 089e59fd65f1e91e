import type { FunctionCall, Transcript } from '../types';
import { type FunctionCallPair, pairFunctionCallsWithResults } from '../utilities';

/**
 * Returns function calls that have no corresponding result yet.
 */
export function getPendingFunctionCalls(transcript: Transcript): Readonly<FunctionCall>[] {
  const completed = new Set<string>();
  for (const message of transcript.messages) {
    if (message.functionResult) completed.add(message.functionResult.callId);
  }

  return transcript.messages.flatMap((message) =>
    message.functionCall && !completed.has(message.functionCall.id)
      ? [message.functionCall]
      : [],
  );
}

/**
 * Returns function calls paired with their optional results in call order.
 */
export function getFunctionInteractions(transcript: Transcript): FunctionCallPair[] {
  return pairFunctionCallsWithResults(transcript.messages);
}
