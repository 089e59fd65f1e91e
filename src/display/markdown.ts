import { getRoleLabel } from '../roles';
import type { DisplayAdapter, Message } from '../types';

/**
 * A Markdown document for hosts that render Markdown (notebook front ends,
 * terminals with a Markdown renderer). Text can be appended as it streams in.
 */
export class Markdown {
  private chunks: string[] = [];

  constructor(text: string = '') {
    if (text) this.chunks.push(text);
  }

  get text(): string {
    return this.chunks.join('');
  }

  append(chunk: string): this {
    this.chunks.push(chunk);
    return this;
  }

  toString(): string {
    return this.text;
  }
}

function fence(body: string, language: string = ''): string {
  const longestRun = Math.max(2, ...Array.from(body.matchAll(/`+/g), (m) => m[0].length));
  const ticks = '`'.repeat(longestRun + 1);
  return `${ticks}${language}\n${body}\n${ticks}`;
}

/**
 * Formats a message body as Markdown, without the role header.
 * Function calls show the name and a JSON block of the arguments; results show
 * the name and the returned text in a fenced block.
 */
export function formatMessageBody(message: Message): string {
  if (message.functionCall) {
    const call = message.functionCall;
    const args =
      typeof call.arguments === 'string'
        ? call.arguments
        : JSON.stringify(call.arguments, null, 2);
    const parts = message.content ? [message.content] : [];
    parts.push(`\`${call.name}\``, fence(args, 'json'));
    return parts.join('\n\n');
  }

  if (message.functionResult) {
    const result = message.functionResult;
    const heading =
      result.outcome === 'error' ? `\`${result.name}\` failed` : `\`${result.name}\``;
    return `${heading}\n\n${fence(message.content)}`;
  }

  return message.content;
}

/**
 * Renders each message as a `### Role` section.
 *
 * @example
 * ```ts
 * new MarkdownDisplay().render(user('Hello')); // '### User\n\nHello'
 * ```
 */
export class MarkdownDisplay implements DisplayAdapter {
  render(message: Message): string {
    return `### ${getRoleLabel(message.role)}\n\n${formatMessageBody(message)}`;
  }
}
