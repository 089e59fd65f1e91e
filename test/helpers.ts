import type { ChatlabConfig } from '../src/config';
import type { ConversationEnvironment } from '../src/environment';
import { type ChatlabErrorCode, type ChatlabError, isChatlabError } from '../src/errors';
import { createNoopLogger } from '../src/logger';
import type { ModelClient, ModelReply, ModelRequest } from '../src/types';

export const FIXED_NOW = '2024-01-01T00:00:00.000Z';

/**
 * Fixed clock, counting ids (`id-1`, `id-2`, ...) and a silent logger.
 */
export function createTestEnvironment(): ConversationEnvironment {
  let counter = 0;
  return {
    now: () => FIXED_NOW,
    randomId: () => `id-${++counter}`,
    logger: createNoopLogger(),
  };
}

export const testConfig: ChatlabConfig = {
  model: 'gpt-4o-mini',
  maxRounds: 4,
};

type Script = ReadonlyArray<ModelReply | Error> | ((round: number) => ModelReply);

/**
 * A model client that replays scripted replies and records every request.
 */
export class ScriptedClient implements ModelClient {
  readonly requests: ModelRequest[] = [];
  private readonly script: Script;

  constructor(script: Script) {
    this.script = script;
  }

  async complete(request: ModelRequest): Promise<ModelReply> {
    this.requests.push(request);
    const round = this.requests.length;
    if (typeof this.script === 'function') return this.script(round);

    const next = this.script[round - 1];
    if (next === undefined) throw new Error(`no scripted reply for round ${round}`);
    if (next instanceof Error) throw next;
    return next;
  }
}

/**
 * Runs `action` and returns the ChatlabError it throws (or rejects with).
 */
export async function captureChatlabError(
  action: Promise<unknown> | (() => unknown),
  code: ChatlabErrorCode,
): Promise<ChatlabError> {
  let caught: unknown;
  try {
    await (typeof action === 'function' ? action() : action);
  } catch (error) {
    caught = error;
  }
  if (!isChatlabError(caught)) {
    throw new Error(`expected a ChatlabError, got ${String(caught)}`);
  }
  if (caught.code !== code) {
    throw new Error(`expected ${code}, got ${caught.code}: ${caught.message}`);
  }
  return caught;
}
