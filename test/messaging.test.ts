import { describe, expect, test } from 'vitest';

import {
  ai,
  assistant,
  assistantFunctionCall,
  functionResult,
  human,
  narrate,
  system,
  textMessage,
  user,
} from '../src/messaging';
import { captureChatlabError, createTestEnvironment, FIXED_NOW } from './helpers';

describe('messaging', () => {
  test('each helper tags its role', () => {
    expect(system('s').role).toBe('system');
    expect(user('u').role).toBe('user');
    expect(assistant('a').role).toBe('assistant');
    expect(narrate('n').role).toBe('narration');
  });

  test('legacy aliases produce the same role', () => {
    expect(human('hi').role).toBe(user('hi').role);
    expect(ai('hi').role).toBe(assistant('hi').role);
  });

  test('ids and timestamps come from the environment', () => {
    const message = textMessage('user', 'hello', undefined, createTestEnvironment());

    expect(message).toEqual({
      id: 'id-1',
      role: 'user',
      content: 'hello',
      createdAt: FIXED_NOW,
      metadata: {},
      functionCall: undefined,
      functionResult: undefined,
    });
  });

  test('rejects blank content', async () => {
    const error = await captureChatlabError(() => user('   '), 'error:invalid-input');
    expect(error.message).toBe('user message content must not be empty');
  });

  test('messages and their metadata are frozen copies', () => {
    const metadata = { tags: ['a'] };
    const message = system('s', { metadata });
    metadata.tags.push('b');

    expect(message.metadata).toEqual({ tags: ['a'] });
    expect(Object.isFrozen(message)).toBe(true);
    expect(Object.isFrozen(message.metadata)).toBe(true);
  });

  test('assistantFunctionCall', () => {
    const message = assistantFunctionCall('add', { a: 2, b: 2 }, { callId: 'call-1' });

    expect(message.role).toBe('function-call');
    expect(message.content).toBe('');
    expect(message.functionCall).toEqual({
      id: 'call-1',
      name: 'add',
      arguments: { a: 2, b: 2 },
    });
  });

  test('assistantFunctionCall generates a call id', () => {
    const message = assistantFunctionCall('now', undefined, undefined, createTestEnvironment());

    expect(message.functionCall).toEqual({ id: 'id-1', name: 'now', arguments: {} });
    expect(message.id).toBe('id-2');
  });

  test('functionResult links to its call', () => {
    const call = assistantFunctionCall('add', { a: 2, b: 2 }, { callId: 'call-1' });
    const result = functionResult(call, 4);

    expect(result.role).toBe('function-result');
    expect(result.content).toBe('4');
    expect(result.functionResult).toEqual({
      callId: 'call-1',
      name: 'add',
      outcome: 'success',
      value: 4,
    });
  });

  test('functionResult serialises values', () => {
    const call = { id: 'call-1', name: 'lookup', arguments: {} };

    expect(functionResult(call, 'plain text').content).toBe('plain text');
    expect(functionResult(call, { hits: [1, 2] }).content).toBe('{"hits":[1,2]}');
    expect(functionResult(call, undefined).functionResult?.value).toBeNull();
  });

  test('functionResult by name and call id', () => {
    const result = functionResult('add', 4, { callId: 'call-9', outcome: 'error' });
    expect(result.functionResult).toEqual({
      callId: 'call-9',
      name: 'add',
      outcome: 'error',
      value: 4,
    });
  });

  test('functionResult needs a function call', async () => {
    const error = await captureChatlabError(
      () => functionResult(user('hi'), 1),
      'error:invalid-input',
    );
    expect(error.message).toBe('functionResult needs a function-call message');
  });
});
