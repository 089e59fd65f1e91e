import { jsonValueSchema } from '../schemas';
import type { JSONValue } from '../types';

/**
 * Converts a function's return value into a JSON value.
 * `undefined` (and anything JSON.stringify drops) becomes `null`.
 * Throws for values JSON cannot represent, such as BigInt or cycles.
 */
export function toJSONValue(value: unknown): JSONValue {
  if (value === undefined) return null;
  const text = JSON.stringify(value);
  if (text === undefined) return null;
  const reparsed: unknown = JSON.parse(text);
  return jsonValueSchema.parse(reparsed);
}

/**
 * Text form of a JSON value as sent to the model: strings verbatim, the rest as JSON.
 */
export function stringifyValue(value: JSONValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Parses function-call arguments the model sent as a JSON string.
 * Returns the original string when it is not valid JSON.
 */
export function parseArguments(raw: string): JSONValue {
  if (raw.trim() === '') return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    const result = jsonValueSchema.safeParse(parsed);
    return result.success ? result.data : raw;
  } catch {
    return raw;
  }
}
