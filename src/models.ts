/**
 * Chat model names accepted by the OpenAI Chat Completions API.
 */
export const GPT_4O = 'gpt-4o';
export const GPT_4O_MINI = 'gpt-4o-mini';
export const GPT_4_TURBO = 'gpt-4-turbo';
export const GPT_3_5_TURBO = 'gpt-3.5-turbo';

export const DEFAULT_MODEL = GPT_4O_MINI;

export const MODELS = [GPT_4O, GPT_4O_MINI, GPT_4_TURBO, GPT_3_5_TURBO] as const;

export type KnownModel = (typeof MODELS)[number];
