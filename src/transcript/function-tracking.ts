import { createIntegrityError, createInvalidFunctionReferenceError } from '../errors';
import type { FunctionCall, Message } from '../types';

/**
 * Function call ids mapped to the called function's name.
 */
export type FunctionCallIndex = Map<string, { name: string }>;

/**
 * Builds an index of every function call in the messages.
 */
export const buildFunctionCallIndex = (
  messages: ReadonlyArray<Message>,
): FunctionCallIndex =>
  messages.reduce((index, message) => {
    if (message.functionCall) {
      index.set(message.functionCall.id, { name: message.functionCall.name });
    }
    return index;
  }, new Map<string, { name: string }>());

/**
 * Registers a new function call, returning a new index.
 * Throws an integrity error if the id is already taken.
 */
export const registerFunctionCall = (
  index: FunctionCallIndex,
  functionCall: Readonly<FunctionCall>,
): FunctionCallIndex => {
  if (index.has(functionCall.id)) {
    throw createIntegrityError('duplicate functionCall.id in transcript', {
      callId: functionCall.id,
    });
  }
  const next = new Map(index);
  next.set(functionCall.id, { name: functionCall.name });
  return next;
};

/**
 * Throws if the given call id does not exist in the index.
 */
export const assertFunctionReference = (index: FunctionCallIndex, callId: string): void => {
  if (!index.has(callId)) {
    throw createInvalidFunctionReferenceError(callId);
  }
};
