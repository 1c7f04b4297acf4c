import test from 'node:test';
import assert from 'node:assert/strict';
import { LlmError, isTransientLlmError } from './llm-client.js';
import { withRetry } from './retry.js';

test('withRetry recovers after two rate-limit errors in exactly three calls', async () => {
  let calls = 0;
  const delays: number[] = [];

  const result = await withRetry(
    async () => {
      calls += 1;
      if (calls <= 2) throw new LlmError('slow down', 'rate_limit', 429);
      return 'users';
    },
    {
      initialDelayMs: 100,
      shouldRetry: isTransientLlmError,
      sleep: async (ms) => {
        delays.push(ms);
      }
    }
  );

  assert.equal(result, 'users');
  assert.equal(calls, 3);
  assert.deepEqual(delays, [100, 200]);
});

test('withRetry rethrows the last error once attempts run out', async () => {
  let calls = 0;
  const failure = new LlmError('down', 'connection');

  await assert.rejects(
    withRetry(
      async () => {
        calls += 1;
        throw failure;
      },
      { maxAttempts: 3, sleep: async () => {} }
    ),
    (error) => error === failure
  );
  assert.equal(calls, 3);
});

test('withRetry does not retry errors the predicate rejects', async () => {
  let calls = 0;
  await assert.rejects(
    withRetry(
      async () => {
        calls += 1;
        throw new LlmError('bad key', 'api', 401);
      },
      { shouldRetry: isTransientLlmError, sleep: async () => {} }
    ),
    /bad key/
  );
  assert.equal(calls, 1);
});

test('withRetry caps the delay at maxDelayMs', async () => {
  const delays: number[] = [];
  await assert.rejects(
    withRetry(
      async () => {
        throw new Error('nope');
      },
      {
        maxAttempts: 4,
        initialDelayMs: 400,
        maxDelayMs: 1000,
        sleep: async (ms) => {
          delays.push(ms);
        }
      }
    )
  );
  assert.deepEqual(delays, [400, 800, 1000]);
});

test('onRetry sees each failed attempt number', async () => {
  const seen: number[] = [];
  let calls = 0;
  await withRetry(
    async () => {
      calls += 1;
      if (calls < 3) throw new Error('again');
      return calls;
    },
    { sleep: async () => {}, onRetry: (_error, attempt) => seen.push(attempt) }
  );
  assert.deepEqual(seen, [1, 2]);
});
