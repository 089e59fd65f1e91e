import type { Logger } from 'pino';
import pino from 'pino';

export type { Logger } from 'pino';

/**
 * Creates the library logger. JSON to stdout; level from `CHATLAB_LOG_LEVEL`.
 * Silent under Vitest or `NODE_ENV=test`.
 */
export function createLogger(bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env['VITEST'] === 'true';
  const nodeEnv = process.env['NODE_ENV'] ?? 'development';
  const level = process.env['CHATLAB_LOG_LEVEL'] ?? 'info';

  return pino({
    level,
    enabled: !(isVitest || nodeEnv === 'test'),
    base: { ...bindings, lib: 'chatlab' },
    messageKey: 'msg',
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/**
 * For tests: keeps the Logger type, emits nothing.
 */
export function createNoopLogger(): Logger {
  return pino({ enabled: false });
}
