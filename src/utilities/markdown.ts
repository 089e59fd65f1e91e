import matter from 'gray-matter';
import { z } from 'zod';

import { MarkdownDisplay } from '../display/markdown';
import {
  type ConversationEnvironment,
  resolveConversationEnvironment,
} from '../environment';
import { getRoleFromLabel, getRoleLabel } from '../roles';
import {
  functionCallSchema,
  functionResultSchema,
  jsonValueSchema,
  transcriptSchema,
} from '../schemas';
import type {
  FunctionCall,
  FunctionResult,
  JSONValue,
  Message,
  MessageRole,
  ToMarkdownOptions,
  Transcript,
} from '../types';
import { deepFreeze } from './type-helpers';

/**
 * Error thrown when markdown parsing fails.
 */
export class MarkdownParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MarkdownParseError';
  }
}

// YAML turns unquoted ISO timestamps into Dates; accept both.
const timestampSchema = z.union([
  z.string(),
  z.date().transform((date) => date.toISOString()),
]);

const messageFrontmatterSchema = z.object({
  createdAt: timestampSchema,
  metadata: z.record(z.string(), jsonValueSchema).default({}),
  content: z.string().optional(),
  functionCall: functionCallSchema.optional(),
  functionResult: functionResultSchema.optional(),
});

const transcriptFrontmatterSchema = z.object({
  id: z.string().min(1),
  createdAt: timestampSchema,
  updatedAt: timestampSchema,
  metadata: z.record(z.string(), jsonValueSchema).default({}),
  messages: z.record(z.string(), messageFrontmatterSchema).default({}),
});

interface MessageFrontmatter {
  createdAt: string;
  metadata: Record<string, JSONValue>;
  content?: string;
  functionCall?: FunctionCall;
  functionResult?: FunctionResult;
}

/**
 * Converts a transcript to Markdown.
 *
 * By default, outputs human-readable Markdown: each message as a `### Role`
 * section formatted by `MarkdownDisplay`.
 *
 * With `includeMetadata: true` the output round-trips through `fromMarkdown`:
 * - YAML frontmatter holds transcript metadata and per-message data keyed by id
 * - headers carry the message id: `### Role (msg-id)`
 * - section bodies hold the raw message content; content with leading or
 *   trailing whitespace is also kept verbatim in the frontmatter
 */
export function toMarkdown(transcript: Transcript, options: ToMarkdownOptions = {}): string {
  const { includeMetadata = false } = options;

  if (includeMetadata) {
    return toMarkdownWithMetadata(transcript);
  }

  const display = new MarkdownDisplay();
  return transcript.messages.map((message) => display.render(message)).join('\n\n');
}

function toMarkdownWithMetadata(transcript: Transcript): string {
  const messages: Record<string, MessageFrontmatter> = {};
  const sections: string[] = [];

  for (const message of transcript.messages) {
    const meta: MessageFrontmatter = {
      createdAt: message.createdAt,
      metadata: structuredClone({ ...message.metadata }),
    };
    if (message.content !== message.content.trim()) {
      meta.content = message.content;
    }
    if (message.functionCall) {
      meta.functionCall = structuredClone({ ...message.functionCall });
    }
    if (message.functionResult) {
      meta.functionResult = structuredClone({ ...message.functionResult });
    }
    messages[message.id] = meta;

    sections.push(`### ${getRoleLabel(message.role)} (${message.id})\n\n${message.content}`);
  }

  return matter.stringify(sections.join('\n\n'), {
    id: transcript.id,
    createdAt: transcript.createdAt,
    updatedAt: transcript.updatedAt,
    metadata: structuredClone({ ...transcript.metadata }),
    messages,
  });
}

function resolveRole(label: string): MessageRole {
  const role = getRoleFromLabel(label);
  if (!role) {
    throw new MarkdownParseError(`Unknown role: ${label}`);
  }
  return role;
}

/**
 * Parses Markdown back into a transcript.
 *
 * - With frontmatter (from `toMarkdown(..., { includeMetadata: true })`) ids,
 *   timestamps, metadata and function payloads are restored exactly.
 * - Without frontmatter, ids and timestamps come from the environment.
 *   Function calls and results cannot be recovered from plain sections and
 *   are rejected.
 *
 * @throws {MarkdownParseError} If the markdown format is invalid (e.g., unknown role)
 */
export function fromMarkdown(
  markdown: string,
  environment?: Partial<ConversationEnvironment>,
): Transcript {
  const trimmed = markdown.trim();

  if (trimmed.startsWith('---')) {
    return parseMarkdownWithMetadata(trimmed);
  }

  return parseMarkdownSimple(trimmed, environment);
}

function parseMarkdownWithMetadata(trimmed: string): Transcript {
  let parsed: matter.GrayMatterFile<string>;
  try {
    parsed = matter(trimmed);
  } catch {
    throw new MarkdownParseError('Invalid frontmatter: failed to parse YAML');
  }

  const frontmatter = transcriptFrontmatterSchema.safeParse(parsed.data);
  if (!frontmatter.success) {
    throw new MarkdownParseError(
      `Invalid frontmatter: ${z.prettifyError(frontmatter.error)}`,
    );
  }

  const data = frontmatter.data;
  const body = parsed.content.trim();
  const messages: Message[] = [];
  const messagePattern =
    /^### ([\w\s]+) \(([^)]+)\)(?:\n\n([\s\S]*?))?(?=\n\n### |\n*(?![\s\S]))/gm;

  for (const match of body.matchAll(messagePattern)) {
    const [, label = '', messageId = '', contentBody = ''] = match;
    const role = resolveRole(label);

    const meta = data.messages[messageId];
    if (!meta) {
      throw new MarkdownParseError(`Missing metadata for message: ${messageId}`);
    }

    messages.push({
      id: messageId,
      role,
      content: meta.content ?? contentBody.trim(),
      createdAt: meta.createdAt,
      metadata: meta.metadata,
      functionCall: meta.functionCall,
      functionResult: meta.functionResult,
    });
  }

  const transcript = transcriptSchema.safeParse({
    id: data.id,
    metadata: data.metadata,
    messages,
    createdAt: data.createdAt,
    updatedAt: data.updatedAt,
  });
  if (!transcript.success) {
    throw new MarkdownParseError(`Invalid message data: ${z.prettifyError(transcript.error)}`);
  }

  return deepFreeze(transcript.data);
}

function parseMarkdownSimple(
  body: string,
  environment?: Partial<ConversationEnvironment>,
): Transcript {
  const resolved = resolveConversationEnvironment(environment);
  const now = resolved.now();
  const messages: Message[] = [];
  const messagePattern = /^### ([^\n]+)\n\n([\s\S]*?)(?=\n\n### |\n*(?![\s\S]))/gm;

  for (const match of body.matchAll(messagePattern)) {
    const [, label = '', contentBody = ''] = match;
    const role = resolveRole(label);
    if (role === 'function-call' || role === 'function-result') {
      throw new MarkdownParseError(`${label} sections need frontmatter metadata to be parsed`);
    }

    messages.push({
      id: resolved.randomId(),
      role,
      content: contentBody.trim(),
      createdAt: now,
      metadata: {},
    });
  }

  return deepFreeze({
    id: resolved.randomId(),
    metadata: {},
    messages,
    createdAt: now,
    updatedAt: now,
  });
}
