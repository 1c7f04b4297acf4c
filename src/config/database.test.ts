import test from 'node:test';
import assert from 'node:assert/strict';
import { withTransaction } from './database.js';

class RecordingClient {
  readonly statements: string[] = [];
  released = false;

  constructor(private readonly failing: string[] = []) {}

  async query(text: string): Promise<unknown> {
    this.statements.push(text);
    if (this.failing.includes(text)) throw new Error(`${text} failed: connection reset`);
    return { rows: [] };
  }

  release(): void {
    this.released = true;
  }
}

test('withTransaction commits when the work succeeds', async () => {
  const client = new RecordingClient();
  const result = await withTransaction({ connect: async () => client }, async (tx) => {
    await tx.query('UPDATE attempts SET status = 1');
    return 'done';
  });

  assert.equal(result, 'done');
  assert.deepEqual(client.statements, ['BEGIN', 'UPDATE attempts SET status = 1', 'COMMIT']);
  assert.equal(client.released, true);
});

test('a failed rollback does not replace the error from the work', async () => {
  const client = new RecordingClient(['ROLLBACK']);

  await assert.rejects(
    withTransaction({ connect: async () => client }, async () => {
      throw new Error('duplicate manifest');
    }),
    { message: 'duplicate manifest' }
  );
  assert.deepEqual(client.statements, ['BEGIN', 'ROLLBACK']);
  assert.equal(client.released, true);
});
