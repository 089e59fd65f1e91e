// Types
export type {
  DisplayAdapter,
  FunctionCall,
  FunctionCallReply,
  FunctionDefinition,
  FunctionOutcome,
  FunctionResult,
  JSONPrimitive,
  JSONValue,
  Message,
  MessageInput,
  MessageJSON,
  MessageRole,
  ModelClient,
  ModelReply,
  ModelRequest,
  ResolutionState,
  TextReply,
  ToMarkdownOptions,
  Transcript,
  TranscriptJSON,
} from './types';

// Messaging
export type {
  FunctionCallOptions,
  FunctionResultOptions,
  MessageOptions,
} from './messaging';
export {
  ai,
  assistant,
  assistantFunctionCall,
  functionResult,
  human,
  narrate,
  system,
  textMessage,
  user,
} from './messaging';

// Conversation
export type { ConversationOptions } from './conversation';
export { Conversation, ConversationMessageEvent } from './conversation';
export { Session } from './session';

// Function registry
export type {
  FunctionImplementation,
  FunctionRegistryOptions,
  FunctionSpec,
  ParameterSchema,
} from './registry';
export {
  FunctionRegistry,
  isRecoverableResolutionError,
  RECOVERABLE_RESOLUTION_CODES,
} from './registry';

// Display
export { formatMessageBody, Markdown, MarkdownDisplay, TerminalDisplay } from './display';

// Transcript (functional core)
export type { IntegrityIssue, IntegrityIssueCode } from './transcript';
export {
  appendMessages,
  assertTranscriptIntegrity,
  computeTranscriptStatistics,
  createTranscript,
  deserializeTranscript,
  getFunctionInteractions,
  getLastMessage,
  getMessageAtPosition,
  getMessageById,
  getPendingFunctionCalls,
  searchMessages,
  serializeTranscript,
  validateTranscriptIntegrity,
} from './transcript';

// Roles
export {
  getRoleFromLabel,
  getRoleLabel,
  LABEL_TO_ROLE,
  normalizeRole,
  ROLE_ALIASES,
  ROLE_LABELS,
} from './roles';

// Schemas
export type { ConversationSettings } from './schemas';
export {
  conversationSettingsSchema,
  functionCallSchema,
  functionNameSchema,
  functionResultSchema,
  jsonValueSchema,
  messageInputSchema,
  messageRoleSchema,
  messageSchema,
  transcriptSchema,
} from './schemas';

// Type guards
export {
  isFunctionCall,
  isFunctionResult,
  isJSONValue,
  isMessage,
  isMessageInput,
  isMessageRole,
  isTranscript,
} from './guards';

// Errors
export type { ChatlabErrorCode } from './errors';
export {
  ChatlabError,
  createFunctionExecutionError,
  createFunctionTimeoutError,
  createIntegrityError,
  createInvalidArgumentsError,
  createInvalidFunctionReferenceError,
  createInvalidInputError,
  createLockedError,
  createMisconfigurationError,
  createRemoteFailureError,
  createRoundLimitExceededError,
  createSerializationError,
  createUnknownFunctionError,
  createValidationError,
  FatalFunctionError,
  isChatlabError,
} from './errors';

// Models
export * as models from './models';
export { DEFAULT_MODEL } from './models';

// Configuration, environment, logging
export type { ChatlabConfig } from './config';
export { configSchema, DEFAULT_MAX_ROUNDS, loadConfig } from './config';
export type { ConversationEnvironment } from './environment';
export {
  defaultConversationEnvironment,
  resolveConversationEnvironment,
} from './environment';
export type { Logger } from './logger';
export { createLogger, createNoopLogger } from './logger';

// Message helpers
export type { FunctionCallPair } from './utilities';
export {
  createMessage,
  messageFromJSON,
  messageToJSON,
  pairFunctionCallsWithResults,
  parseArguments,
  stringifyValue,
  toJSONValue,
} from './utilities';
