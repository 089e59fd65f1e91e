// Create
export { createTranscript } from './create';

// Append
export { appendMessages } from './append';

// Query
export {
  computeTranscriptStatistics,
  getLastMessage,
  getMessageAtPosition,
  getMessageById,
  searchMessages,
} from './query';

// Function interactions
export { getFunctionInteractions, getPendingFunctionCalls } from './function-interactions';

// Integrity
export type { IntegrityIssue, IntegrityIssueCode } from './integrity';
export { assertTranscriptIntegrity, validateTranscriptIntegrity } from './integrity';

// Serialization
export { deserializeTranscript, serializeTranscript } from './serialization';
