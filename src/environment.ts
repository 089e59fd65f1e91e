import { randomUUID } from 'node:crypto';

import { createLogger, type Logger } from './logger';

/**
 * Environment functions for conversation operations.
 * Allows dependency injection for testing and custom ID generation.
 */
export interface ConversationEnvironment {
  now: () => string;
  randomId: () => string;
  logger: Logger;
}

let sharedLogger: Logger | undefined;

function defaultLogger(): Logger {
  sharedLogger ??= createLogger();
  return sharedLogger;
}

/**
 * Default environment using Date.toISOString(), randomUUID() and the shared pino logger.
 */
export const defaultConversationEnvironment: Omit<ConversationEnvironment, 'logger'> = {
  now: () => new Date().toISOString(),
  randomId: () => randomUUID(),
};

/**
 * Merges a partial environment with defaults.
 */
export function resolveConversationEnvironment(
  environment?: Partial<ConversationEnvironment>,
): ConversationEnvironment {
  return {
    now: environment?.now ?? defaultConversationEnvironment.now,
    randomId: environment?.randomId ?? defaultConversationEnvironment.randomId,
    logger: environment?.logger ?? defaultLogger(),
  };
}
