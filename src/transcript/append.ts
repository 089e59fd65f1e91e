import {
  type ConversationEnvironment,
  resolveConversationEnvironment,
} from '../environment';
import type { Message, Transcript } from '../types';
import {
  assertFunctionReference,
  buildFunctionCallIndex,
  type FunctionCallIndex,
  registerFunctionCall,
} from './function-tracking';

/**
 * Appends messages to a transcript, returning a new transcript.
 * Function results must reference a function call that precedes them, and
 * function call ids must be unique.
 */
export function appendMessages(
  transcript: Transcript,
  messages: ReadonlyArray<Message>,
  environment?: Partial<ConversationEnvironment>,
): Transcript {
  if (messages.length === 0) return transcript;

  const resolved = resolveConversationEnvironment(environment);

  messages.reduce<FunctionCallIndex>((index, message) => {
    if (message.functionResult) {
      assertFunctionReference(index, message.functionResult.callId);
    }
    return message.functionCall ? registerFunctionCall(index, message.functionCall) : index;
  }, buildFunctionCallIndex(transcript.messages));

  return Object.freeze({
    ...transcript,
    messages: Object.freeze([...transcript.messages, ...messages]),
    updatedAt: resolved.now(),
  });
}
