import test from 'node:test';
import assert from 'node:assert/strict';
import { ScriptedChatModel, noSleep } from '../../../tests/support/fakes.js';
import { PipelineError } from '../../core/errors.js';
import { LlmError } from '../../core/llm-client.js';
import { PromptBuilder } from './prompt-builder.js';
import { TableSelector } from './table-selector.js';

const tables = ['orders', 'users'];

function selectorFor(model: ScriptedChatModel, maxTables = 10) {
  return new TableSelector(model, new PromptBuilder(), { maxTables, sleep: noSleep });
}

test('select sends the table list and returns the parsed names', async () => {
  const model = new ScriptedChatModel(['users']);
  const selected = await selectorFor(model).select('Show me all active users', tables);

  assert.deepEqual(selected, ['users']);
  const request = model.requests[0];
  assert.equal(request.maxTokens, 500);
  assert.equal(request.temperature, 0);
  const prompt = request.messages[request.messages.length - 1].content;
  assert.ok(prompt.includes('AVAILABLE TABLES:\n- orders\n- users'));
  assert.ok(prompt.includes('"Show me all active users"'));
});

test('select places recent history between the system prompt and the question', async () => {
  const model = new ScriptedChatModel(['orders']);
  const history = Array.from({ length: 12 }, (_, index) => ({
    role: index % 2 === 0 ? ('user' as const) : ('assistant' as const),
    content: `message ${index}`
  }));

  await selectorFor(model).select('And their orders?', tables, history);

  const messages = model.requests[0].messages;
  assert.equal(messages.length, 12);
  assert.equal(messages[0].role, 'system');
  assert.equal(messages[1].content, 'message 2');
  assert.equal(messages[10].content, 'message 11');
});

test('rate limits are retried until the model answers', async () => {
  const model = new ScriptedChatModel([
    new LlmError('Too many requests', 'rate_limit', 429),
    new LlmError('Too many requests', 'rate_limit', 429),
    'users'
  ]);

  assert.deepEqual(await selectorFor(model).select('Show me all active users', tables), ['users']);
  assert.equal(model.calls, 3);
});

test('a permanent API error aborts with LLM_UNAVAILABLE', async () => {
  const model = new ScriptedChatModel([new LlmError('Invalid API key', 'api', 401)]);

  await assert.rejects(selectorFor(model).select('Show me all active users', tables), (error) => {
    assert.ok(error instanceof PipelineError);
    assert.equal(error.code, 'LLM_UNAVAILABLE');
    return true;
  });
  assert.equal(model.calls, 1);
});

test('three empty answers fail with rephrasing suggestions', async () => {
  const model = new ScriptedChatModel(['']);

  await assert.rejects(selectorFor(model).select('???', tables), (error) => {
    assert.ok(error instanceof PipelineError);
    assert.equal(error.code, 'TABLE_SELECTION_FAILED');
    assert.ok(error.message.includes('"Show me all active users"'));
    return true;
  });
  assert.equal(model.calls, 3);
});

test('answers naming no known table are retried', async () => {
  const model = new ScriptedChatModel(['invoices', 'orders']);
  assert.deepEqual(await selectorFor(model).select('Latest orders', tables), ['orders']);
  assert.equal(model.calls, 2);
});

test('the selection is capped at maxTables', async () => {
  const model = new ScriptedChatModel(['orders, users']);
  assert.deepEqual(await selectorFor(model, 1).select('Everything', tables), ['orders']);
});

test('an empty schema is a configuration error', async () => {
  const model = new ScriptedChatModel(['users']);
  await assert.rejects(selectorFor(model).select('Anything', []), (error) => {
    assert.ok(error instanceof PipelineError);
    assert.equal(error.code, 'CONFIGURATION');
    return true;
  });
  assert.equal(model.calls, 0);
});
