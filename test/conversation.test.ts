import { describe, expect, test } from 'vitest';
import { z } from 'zod';

import { Conversation } from '../src/conversation';
import { FatalFunctionError } from '../src/errors';
import { assistant, system, user } from '../src/messaging';
import { FunctionRegistry } from '../src/registry';
import { deserializeTranscript } from '../src/transcript';
import type { JSONValue, Message, ModelClient, ModelReply } from '../src/types';
import {
  captureChatlabError,
  createTestEnvironment,
  FIXED_NOW,
  ScriptedClient,
  testConfig,
} from './helpers';

const addParameters = z.object({ a: z.number(), b: z.number() });

function createAddRegistry(environment = createTestEnvironment()): FunctionRegistry {
  return new FunctionRegistry({ environment }).register(
    'add',
    { description: 'Add two numbers', parameters: addParameters },
    ({ a, b }) => a + b,
  );
}

function callAdd(args: { a: JSONValue; b: JSONValue }, callId?: string): ModelReply {
  return { type: 'function-call', callId, name: 'add', arguments: { a: args.a, b: args.b } };
}

describe('Conversation', () => {
  test('seeds with messages and exposes settings', () => {
    const environment = createTestEnvironment();
    const seed = system('You are terse.', undefined, environment);
    const conversation = new Conversation([seed], {
      config: testConfig,
      environment,
      temperature: 0.2,
    });

    expect(conversation.messages).toEqual([seed]);
    expect(conversation.model).toBe('gpt-4o-mini');
    expect(conversation.maxRounds).toBe(4);
    expect(conversation.temperature).toBe(0.2);
    expect(conversation.state).toBe('idle');
    expect(conversation.registry).toBeUndefined();
  });

  test('accepts seed messages as rest arguments', () => {
    const conversation = new Conversation(system('one'), user('two'));
    expect(conversation.messages.map((m) => m.role)).toEqual(['system', 'user']);
  });

  test('rejects a message after a seed list', async () => {
    const error = await captureChatlabError(
      () => Reflect.construct(Conversation, [[user('a')], user('b')]),
      'error:invalid-input',
    );
    expect(error.message).toBe('the second argument of a Conversation must be its options');
  });

  test('settings override configuration', () => {
    const conversation = new Conversation([], {
      config: { model: 'gpt-4o', maxRounds: 2 },
      model: 'gpt-4-turbo',
    });
    expect(conversation.model).toBe('gpt-4-turbo');
    expect(conversation.maxRounds).toBe(2);
  });

  test('rejects invalid settings', async () => {
    const error = await captureChatlabError(
      () => new Conversation([], { config: testConfig, temperature: 5 }),
      'error:validation',
    );
    expect(error.message).toBe('invalid conversation options');
  });

  test('plain text reply', async () => {
    const environment = createTestEnvironment();
    const client = new ScriptedClient([{ type: 'text', content: '4' }]);
    const conversation = new Conversation([system('You are terse.', undefined, environment)], {
      client,
      config: testConfig,
      environment,
    });

    const reply = await conversation.submit('2+2?');

    expect(reply.role).toBe('assistant');
    expect(reply.content).toBe('4');
    expect(conversation.messages.map((m) => [m.role, m.content])).toEqual([
      ['system', 'You are terse.'],
      ['user', '2+2?'],
      ['assistant', '4'],
    ]);
    expect(conversation.messages[2]).toBe(reply);
    expect(conversation.state).toBe('terminal');
    expect(client.requests).toHaveLength(1);
    expect(client.requests[0]?.messages.map((m) => m.role)).toEqual(['system', 'user']);
    expect(client.requests[0]?.functions).toEqual([]);
  });

  test('appends the user message before contacting the model', async () => {
    let seen = -1;
    const client: ModelClient = {
      complete: async (request) => {
        seen = request.messages.length;
        return { type: 'text', content: 'ok' };
      },
    };
    const conversation = new Conversation([system('a'), user('b')], {
      client,
      config: testConfig,
    });

    expect(conversation.messages).toHaveLength(2);
    await conversation.submit('c');
    expect(seen).toBe(3);
  });

  test('resolves a function call and feeds the result back', async () => {
    const environment = createTestEnvironment();
    const client = new ScriptedClient([
      callAdd({ a: 2, b: 2 }, 'call_1'),
      { type: 'text', content: 'The answer is 4' },
    ]);
    const conversation = new Conversation([system('You are terse.', undefined, environment)], {
      client,
      registry: createAddRegistry(environment),
      config: testConfig,
      environment,
    });

    const reply = await conversation.submit('2+2?');

    expect(reply.content).toBe('The answer is 4');
    expect(conversation.messages.map((m) => m.role)).toEqual([
      'system',
      'user',
      'function-call',
      'function-result',
      'assistant',
    ]);

    const [, , call, result] = conversation.messages;
    expect(call?.functionCall).toEqual({ id: 'call_1', name: 'add', arguments: { a: 2, b: 2 } });
    expect(call?.content).toBe('');
    expect(result?.content).toBe('4');
    expect(result?.functionResult).toEqual({
      callId: 'call_1',
      name: 'add',
      outcome: 'success',
      value: 4,
    });

    expect(client.requests).toHaveLength(2);
    expect(client.requests[1]?.messages).toHaveLength(4);
    expect(client.requests[0]?.functions.map((fn) => fn.name)).toEqual(['add']);
    expect(client.requests[0]?.functions[0]?.parameters).toMatchObject({
      type: 'object',
      required: ['a', 'b'],
    });
  });

  test('fails when the model calls a function and no registry is attached', async () => {
    const client = new ScriptedClient([
      { type: 'function-call', callId: 'call_1', name: 'mystery', arguments: {} },
    ]);
    const conversation = new Conversation([system('You are terse.')], {
      client,
      config: testConfig,
    });

    const error = await captureChatlabError(
      conversation.submit('who?'),
      'error:misconfiguration',
    );

    expect(error.message).toBe('model called mystery but no function registry is attached');
    expect(conversation.messages.map((m) => m.role)).toEqual([
      'system',
      'user',
      'function-call',
    ]);
    expect(conversation.state).toBe('failed');
  });

  test('stops after the configured number of rounds', async () => {
    const client = new ScriptedClient(() => callAdd({ a: 1, b: 1 }));
    const conversation = new Conversation([], {
      client,
      registry: createAddRegistry(),
      config: testConfig,
      maxRounds: 3,
    });

    const error = await captureChatlabError(
      conversation.submit('loop'),
      'error:round-limit-exceeded',
    );

    expect(error.message).toBe('no text reply after 3 rounds of function calls');
    expect(client.requests).toHaveLength(3);
    expect(conversation.messages.map((m) => m.role)).toEqual([
      'user',
      'function-call',
      'function-result',
      'function-call',
      'function-result',
      'function-call',
      'function-result',
    ]);
  });

  test('generates a call id when the model omits one or repeats one', async () => {
    const environment = createTestEnvironment();
    const client = new ScriptedClient([
      callAdd({ a: 1, b: 2 }, 'call_1'),
      callAdd({ a: 3, b: 4 }, 'call_1'),
      { type: 'text', content: 'done' },
    ]);
    const conversation = new Conversation([], {
      client,
      registry: createAddRegistry(environment),
      config: testConfig,
      environment,
    });

    await conversation.submit('sum twice');

    const ids = conversation.messages.flatMap((m) => (m.functionCall ? [m.functionCall.id] : []));
    expect(ids[0]).toBe('call_1');
    expect(ids[1]).not.toBe('call_1');
    expect(ids[1]).toMatch(/^id-\d+$/);
  });

  describe('recoverable function failures', () => {
    async function submitWith(call: ModelReply, registry: FunctionRegistry): Promise<Message[]> {
      const client = new ScriptedClient([call, { type: 'text', content: 'sorry' }]);
      const conversation = new Conversation([], { client, registry, config: testConfig });
      await conversation.submit('go');
      expect(client.requests).toHaveLength(2);
      return [...conversation.messages];
    }

    test('unknown function becomes an error result', async () => {
      const messages = await submitWith(
        { type: 'function-call', callId: 'call_1', name: 'mystery', arguments: {} },
        createAddRegistry(),
      );

      expect(messages[2]?.functionResult).toEqual({
        callId: 'call_1',
        name: 'mystery',
        outcome: 'error',
        value: 'Error: function mystery is not registered',
      });
      expect(messages[2]?.content).toBe('Error: function mystery is not registered');
      expect(messages[3]?.content).toBe('sorry');
    });

    test('invalid arguments become an error result', async () => {
      const messages = await submitWith(callAdd({ a: 'two', b: 2 }, 'call_1'), createAddRegistry());

      expect(messages[2]?.functionResult?.outcome).toBe('error');
      expect(messages[2]?.content).toMatch(/^Error: invalid arguments for add: /);
    });

    test('a throwing implementation becomes an error result', async () => {
      const registry = new FunctionRegistry().register(
        'explode',
        { parameters: z.object({}) },
        () => {
          throw new Error('boom');
        },
      );
      const messages = await submitWith(
        { type: 'function-call', callId: 'call_1', name: 'explode', arguments: {} },
        registry,
      );

      expect(messages[2]?.content).toBe('Error: explode failed: boom');
      expect(messages[2]?.functionResult?.outcome).toBe('error');
    });

    test('library errors thrown by an implementation become error results', async () => {
      const registry = new FunctionRegistry().register(
        'load',
        { parameters: z.object({}) },
        () => deserializeTranscript({ nope: true }),
      );
      const messages = await submitWith(
        { type: 'function-call', callId: 'call_1', name: 'load', arguments: {} },
        registry,
      );

      expect(messages[2]?.functionResult?.outcome).toBe('error');
      expect(messages[2]?.content).toMatch(/^Error: load failed: failed to deserialize transcript: /);
      expect(messages[3]?.content).toBe('sorry');
    });
  });

  test('a fatal function error surfaces to the caller', async () => {
    const client = new ScriptedClient([
      { type: 'function-call', callId: 'call_1', name: 'halt', arguments: {} },
    ]);
    const conversation = new Conversation([], { client, config: testConfig }).register(
      'halt',
      { parameters: z.object({}) },
      () => {
        throw new FatalFunctionError('stop');
      },
    );

    await expect(conversation.submit('go')).rejects.toThrow(FatalFunctionError);
    expect(conversation.messages.map((m) => m.role)).toEqual(['user', 'function-call']);
  });

  test('a function timeout surfaces to the caller', async () => {
    const client = new ScriptedClient([
      { type: 'function-call', callId: 'call_1', name: 'slow', arguments: {} },
    ]);
    const conversation = new Conversation([], {
      client,
      config: { ...testConfig, functionTimeoutMs: 10 },
    }).register('slow', { parameters: z.object({}) }, () => new Promise<never>(() => {}));

    const error = await captureChatlabError(conversation.submit('go'), 'error:function-timeout');
    expect(error.message).toBe('slow did not finish within 10ms');
  });

  test('client failures surface as remote failures', async () => {
    const client = new ScriptedClient([new Error('socket hang up')]);
    const conversation = new Conversation([], { client, config: testConfig });

    const error = await captureChatlabError(conversation.submit('hi'), 'error:remote-failure');

    expect(error.message).toBe('model request failed');
    expect(error.cause?.message).toBe('socket hang up');
    expect(conversation.messages.map((m) => m.role)).toEqual(['user']);
  });

  test('an empty text reply is a remote failure', async () => {
    const client = new ScriptedClient([{ type: 'text', content: '  ' }]);
    const conversation = new Conversation([], { client, config: testConfig });

    const error = await captureChatlabError(conversation.submit('hi'), 'error:remote-failure');
    expect(error.message).toBe('model returned an empty reply');
  });

  test('a second submit while one is in flight is rejected', async () => {
    let release: (reply: ModelReply) => void = () => {};
    const client: ModelClient = {
      complete: () =>
        new Promise<ModelReply>((resolve) => {
          release = resolve;
        }),
    };
    const conversation = new Conversation([], { client, config: testConfig });

    const first = conversation.submit('one');
    await captureChatlabError(conversation.submit('two'), 'error:locked');
    expect(conversation.state).toBe('awaiting-model-reply');

    release({ type: 'text', content: 'done' });
    await first;

    expect(conversation.messages.map((m) => m.content)).toEqual(['one', 'done']);
  });

  test('the lock is released after a failure', async () => {
    const client = new ScriptedClient([new Error('down'), { type: 'text', content: 'up' }]);
    const conversation = new Conversation([], { client, config: testConfig });

    await captureChatlabError(conversation.submit('first'), 'error:remote-failure');
    const reply = await conversation.submit('second');

    expect(reply.content).toBe('up');
  });

  test('render is idempotent', () => {
    const conversation = new Conversation([system('You are terse.'), user('2+2?')], {
      config: testConfig,
    });

    const first = conversation.render();
    expect(conversation.render()).toEqual(first);
    expect(first).toEqual(['### System\n\nYou are terse.', '### User\n\n2+2?']);
    expect(conversation.display().text).toBe(first.join('\n\n'));
  });

  test('uses a custom display adapter', () => {
    const conversation = new Conversation([user('hi')], {
      config: testConfig,
      display: { render: (message) => `${message.role}> ${message.content}` },
    });

    expect(conversation.render()).toEqual(['user> hi']);
  });

  test('dispatches a message event for every append', async () => {
    const client = new ScriptedClient([{ type: 'text', content: '4' }]);
    const conversation = new Conversation([], { client, config: testConfig });
    const roles: string[] = [];
    const unsubscribe = conversation.subscribe((message) => roles.push(message.role));

    await conversation.submit('2+2?');
    unsubscribe();
    conversation.append(assistant('ignored'));

    expect(roles).toEqual(['user', 'assistant']);
    expect(conversation.messages).toHaveLength(3);
  });

  test('round-trips through JSON', async () => {
    const environment = createTestEnvironment();
    const client = new ScriptedClient([
      callAdd({ a: 2, b: 2 }, 'call_1'),
      { type: 'text', content: 'The answer is 4' },
    ]);
    const conversation = new Conversation([], {
      client,
      registry: createAddRegistry(environment),
      config: testConfig,
      environment,
      metadata: { topic: 'arithmetic' },
    });
    await conversation.submit('2+2?');

    const json: unknown = JSON.parse(JSON.stringify(conversation.toJSON()));
    const restored = Conversation.fromJSON(json, { config: testConfig, environment });

    expect(restored.id).toBe(conversation.id);
    expect(restored.transcript.metadata).toEqual({ topic: 'arithmetic' });
    expect(restored.messages).toEqual(conversation.messages);
    expect(restored.messages[0]?.createdAt).toBe(FIXED_NOW);
  });
});
