import chalk, { type ChalkInstance } from 'chalk';

import { getRoleLabel } from '../roles';
import type { DisplayAdapter, Message, MessageRole } from '../types';

const ROLE_STYLES: Record<MessageRole, (c: ChalkInstance) => ChalkInstance> = {
  system: (c) => c.magenta,
  user: (c) => c.cyan.bold,
  assistant: (c) => c.green.bold,
  'function-call': (c) => c.yellow,
  'function-result': (c) => c.yellow,
  narration: (c) => c.gray.italic,
};

/**
 * One entry per message with a coloured role label, for REPLs and scripts.
 * Continuation lines of multi-line content are indented under the label.
 * Pass `new Chalk({ level: 0 })` to get plain text.
 */
export class TerminalDisplay implements DisplayAdapter {
  private readonly chalk: ChalkInstance;

  constructor(options?: { chalk?: ChalkInstance }) {
    this.chalk = options?.chalk ?? chalk;
  }

  render(message: Message): string {
    const label = ROLE_STYLES[message.role](this.chalk)(getRoleLabel(message.role));
    return `${label}: ${this.body(message).replace(/\n/g, '\n  ')}`;
  }

  private body(message: Message): string {
    if (message.functionCall) {
      const args = message.functionCall.arguments;
      return `${message.functionCall.name}(${typeof args === 'string' ? args : JSON.stringify(args)})`;
    }
    if (message.functionResult) {
      const { name, outcome } = message.functionResult;
      return outcome === 'error'
        ? this.chalk.red(`${name} failed: ${message.content}`)
        : `${name} returned ${message.content}`;
    }
    return message.content;
  }
}
