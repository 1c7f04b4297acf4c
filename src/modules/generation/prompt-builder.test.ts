import test from 'node:test';
import assert from 'node:assert/strict';
import { MAX_CONTEXT_MESSAGES, PromptBuilder } from './prompt-builder.js';

test('the system message names the target dialect', () => {
  const [postgres] = new PromptBuilder().buildMessages('Show me all active users');
  assert.equal(
    postgres.content,
    'You are a PostgreSQL expert who translates analytics questions into safe, read-only SQL. ' +
      'Follow the instructions in each request exactly.'
  );

  const [mysql] = new PromptBuilder('mysql').buildMessages('Show me all active users');
  assert.equal(mysql.role, 'system');
  assert.ok(mysql.content.startsWith('You are a MySQL expert '));
});

test('the SQL prompt asks for a query in the target dialect', () => {
  const prompt = new PromptBuilder('mysql').buildSqlGenerationPrompt({
    question: 'How many orders?',
    schemaText: 'Table: orders',
    examples: []
  });
  assert.ok(prompt.startsWith('Write a MySQL query that answers the question using only the schema below.'));
});

test('only the most recent history is kept between the system message and the prompt', () => {
  const history = Array.from({ length: MAX_CONTEXT_MESSAGES + 2 }, (_, index) => ({
    role: index % 2 === 0 ? ('user' as const) : ('assistant' as const),
    content: `message ${index}`
  }));
  const messages = new PromptBuilder().buildMessages('next question', history);

  assert.equal(messages.length, MAX_CONTEXT_MESSAGES + 2);
  assert.equal(messages[1].content, 'message 2');
  assert.deepEqual(messages[messages.length - 1], { role: 'user', content: 'next question' });
});
