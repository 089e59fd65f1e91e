import { z } from 'zod';

import { createValidationError } from './errors';
import { DEFAULT_MODEL } from './models';

export const DEFAULT_MAX_ROUNDS = 8;

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value));

/**
 * Environment variables read by `loadConfig`.
 */
export const configSchema = z.object({
  OPENAI_API_KEY: optionalText,
  OPENAI_BASE_URL: optionalText.pipe(z.string().url().optional()),
  CHATLAB_MODEL: optionalText,
  CHATLAB_MAX_ROUNDS: optionalText.pipe(z.coerce.number<string>().int().min(1).optional()),
  CHATLAB_FUNCTION_TIMEOUT_MS: optionalText.pipe(z.coerce.number<string>().int().min(1).optional()),
});

export interface ChatlabConfig {
  apiKey?: string | undefined;
  baseURL?: string | undefined;
  model: string;
  maxRounds: number;
  functionTimeoutMs?: number | undefined;
}

/**
 * Reads configuration from environment variables, falling back to defaults.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): ChatlabConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw createValidationError('invalid chatlab configuration', {
      issues: parsed.error.issues,
    });
  }

  const values = parsed.data;
  return {
    apiKey: values.OPENAI_API_KEY,
    baseURL: values.OPENAI_BASE_URL,
    model: values.CHATLAB_MODEL ?? DEFAULT_MODEL,
    maxRounds: values.CHATLAB_MAX_ROUNDS ?? DEFAULT_MAX_ROUNDS,
    functionTimeoutMs: values.CHATLAB_FUNCTION_TIMEOUT_MS,
  };
}
