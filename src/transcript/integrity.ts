import { createIntegrityError } from '../errors';
import type { Transcript } from '../types';

export type IntegrityIssueCode =
  | 'integrity:duplicate-message-id'
  | 'integrity:orphan-function-result'
  | 'integrity:function-result-before-call'
  | 'integrity:duplicate-function-call'
  | 'integrity:function-name-mismatch';

export interface IntegrityIssue {
  code: IntegrityIssueCode;
  message: string;
  data?: Record<string, unknown> | undefined;
}

/**
 * Validates transcript invariants and returns a list of issues.
 */
export function validateTranscriptIntegrity(transcript: Transcript): IntegrityIssue[] {
  const issues: IntegrityIssue[] = [];
  const seenIds = new Set<string>();
  const calls = new Map<string, { position: number; name: string }>();

  transcript.messages.forEach((message, index) => {
    if (seenIds.has(message.id)) {
      issues.push({
        code: 'integrity:duplicate-message-id',
        message: `duplicate message id: ${message.id}`,
        data: { id: message.id, position: index },
      });
    } else {
      seenIds.add(message.id);
    }

    if (message.functionCall) {
      if (calls.has(message.functionCall.id)) {
        issues.push({
          code: 'integrity:duplicate-function-call',
          message: `duplicate functionCall.id ${message.functionCall.id}`,
          data: { callId: message.functionCall.id, messageId: message.id },
        });
      } else {
        calls.set(message.functionCall.id, {
          position: index,
          name: message.functionCall.name,
        });
      }
    }
  });

  transcript.messages.forEach((message, index) => {
    const result = message.functionResult;
    if (!result) return;

    const call = calls.get(result.callId);
    if (!call) {
      issues.push({
        code: 'integrity:orphan-function-result',
        message: `function result references missing function call ${result.callId}`,
        data: { callId: result.callId, messageId: message.id },
      });
    } else if (call.position >= index) {
      issues.push({
        code: 'integrity:function-result-before-call',
        message: `function result ${result.callId} occurs before its call`,
        data: { callId: result.callId, messageId: message.id },
      });
    } else if (call.name !== result.name) {
      issues.push({
        code: 'integrity:function-name-mismatch',
        message: `function result ${result.callId} names ${result.name} but the call named ${call.name}`,
        data: { callId: result.callId, expected: call.name, actual: result.name },
      });
    }
  });

  return issues;
}

/**
 * Throws an integrity error if the transcript fails validation.
 */
export function assertTranscriptIntegrity(transcript: Transcript): void {
  const issues = validateTranscriptIntegrity(transcript);
  if (issues.length === 0) return;

  throw createIntegrityError('transcript integrity check failed', { issues });
}
