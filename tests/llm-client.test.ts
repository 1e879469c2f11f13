import test from 'node:test';
import assert from 'node:assert/strict';
import { loadConfig } from '../src/config';
import { EmptyReplyError } from '../src/errors';
import { LLMClient, toChatReply } from '../src/llm/llm-base';
import { ScriptedBackend, PARIS, textResponse, toolCallResponse } from './fakes';

const config = loadConfig({ OPENAI_API_KEY: 'test-key', OPENAI_MODEL: 'test-model' });

test('tool call replies carry calls and no content', () => {
  const reply = toChatReply(toolCallResponse({ id: 'call_1', name: 'get_weather', args: PARIS }));
  assert.deepEqual(reply, {
    kind: 'tool_calls',
    calls: [{ id: 'call_1', name: 'get_weather', arguments: '{"latitude":48.8566,"longitude":2.3522}' }]
  });
});

test('text replies carry content and no calls', () => {
  assert.deepEqual(toChatReply(textResponse('Hello.')), { kind: 'text', content: 'Hello.' });
  assert.deepEqual(toChatReply({ choices: [{ message: { content: '', tool_calls: [] } }] }), {
    kind: 'text',
    content: ''
  });
});

test('tool calls win over content sent alongside them', () => {
  const reply = toChatReply({
    choices: [
      {
        message: {
          content: 'Let me check.',
          tool_calls: [{ id: 'call_1', function: { name: 'get_weather', arguments: '{}' } }]
        }
      }
    ]
  });
  assert.equal(reply.kind, 'tool_calls');
});

test('replies without content or calls are rejected', () => {
  assert.throws(() => toChatReply({ choices: [] }), EmptyReplyError);
  assert.throws(() => toChatReply({ choices: [{ message: { content: null } }] }), EmptyReplyError);
});

test('complete sends model, messages and tools', async () => {
  const backend = new ScriptedBackend([textResponse('ok')]);
  const llm = new LLMClient(config, backend);
  const tools = [
    {
      type: 'function' as const,
      function: { name: 'noop', description: 'does nothing', parameters: { type: 'object', properties: {} } }
    }
  ];

  await llm.complete([{ role: 'user', content: 'hi' }], tools);

  assert.deepEqual(backend.requests, [
    { model: 'test-model', messages: [{ role: 'user', content: 'hi' }], tools }
  ]);
});

test('complete omits tools when none are given', async () => {
  const backend = new ScriptedBackend([textResponse('ok')]);
  await new LLMClient(config, backend).complete([{ role: 'user', content: 'hi' }]);
  assert.equal('tools' in (backend.requests[0] ?? {}), false);
});

test('backend failures propagate unchanged', async () => {
  const failure = new Error('503 upstream');
  const backend = new ScriptedBackend([failure]);
  await assert.rejects(new LLMClient(config, backend).complete([{ role: 'user', content: 'hi' }]), failure);
});
