// Content and argument conversion
export { parseArguments, stringifyValue, toJSONValue } from './content';

// Message utilities
export { createMessage, messageFromJSON, messageToJSON } from './message';

// Function call pairing
export type { FunctionCallPair } from './function-calls';
export { pairFunctionCallsWithResults } from './function-calls';

// Line endings
export { normalizeLineEndings } from './line-endings';

// Type helpers
export { deepFreeze, hasOwnProperty } from './type-helpers';
