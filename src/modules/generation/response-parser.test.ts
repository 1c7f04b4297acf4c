import test from 'node:test';
import assert from 'node:assert/strict';
import { extractSql, findDangerousKeyword, looksLikeQuestion, parseTableNames, stripFences } from './response-parser.js';

const tables = ['orders', 'users', 'asset_driver', 'asset_truck'];

test('parseTableNames reads a comma-separated answer', () => {
  assert.deepEqual(parseTableNames('users, orders', tables), ['users', 'orders']);
});

test('parseTableNames strips fences, list markers and bold text, and drops repeats', () => {
  const response = '```\n1. **Users**\n2. orders\n3. users\n```';
  assert.deepEqual(parseTableNames(response, tables), ['users', 'orders']);
});

test('parseTableNames finds names inside prose', () => {
  assert.deepEqual(parseTableNames('I would use the orders table joined with users.', tables), ['orders', 'users']);
  assert.deepEqual(parseTableNames('asset_driver (drivers), asset_truck', tables), ['asset_driver', 'asset_truck']);
});

test('parseTableNames ignores names that are not in the schema', () => {
  assert.deepEqual(parseTableNames('customers, invoices', tables), []);
});

test('stripFences returns the fenced body or the text as is', () => {
  assert.equal(stripFences('```sql\nSELECT 1\n```'), 'SELECT 1\n');
  assert.equal(stripFences('SELECT 1'), 'SELECT 1');
});

test('extractSql unwraps a fenced statement and adds the semicolon', () => {
  assert.equal(extractSql('```sql\nSELECT * FROM users\n```'), 'SELECT * FROM users;');
});

test('extractSql skips leading prose and keeps only the first statement', () => {
  assert.equal(
    extractSql('Here is the query:\nSELECT id FROM users WHERE active = true; SELECT 2;'),
    'SELECT id FROM users WHERE active = true;'
  );
});

test('extractSql accepts WITH and rejects text without a query', () => {
  assert.equal(
    extractSql('WITH recent AS (SELECT 1) SELECT * FROM recent'),
    'WITH recent AS (SELECT 1) SELECT * FROM recent;'
  );
  assert.equal(extractSql('Which user do you mean?'), null);
  assert.equal(extractSql('DELETE FROM users;'), null);
  assert.equal(extractSql('   '), null);
});

test('extractSql rejects prose that opens with a query keyword', () => {
  assert.equal(extractSql('Select which Olof you mean: the driver or the customer?'), null);
  assert.equal(extractSql('With several drivers named Olof, which one do you mean?'), null);
  assert.equal(extractSql('With several drivers named Olof'), null);
  assert.equal(
    extractSql("SELECT id FROM users WHERE note = 'why?'"),
    "SELECT id FROM users WHERE note = 'why?';"
  );
  assert.equal(
    extractSql('WITH RECURSIVE t(n) AS (SELECT 1) SELECT * FROM t'),
    'WITH RECURSIVE t(n) AS (SELECT 1) SELECT * FROM t;'
  );
});

test('looksLikeQuestion spots question marks and clarifying phrases', () => {
  assert.equal(looksLikeQuestion('Which user do you mean?'), true);
  assert.equal(looksLikeQuestion('Could you tell me the date range'), true);
  assert.equal(looksLikeQuestion('I cannot help with that.'), false);
  assert.equal(looksLikeQuestion(''), false);
});

test('findDangerousKeyword flags write statements but not look-alike columns', () => {
  assert.equal(findDangerousKeyword('SELECT deleted, created_at, updated_by FROM t;'), null);
  assert.equal(findDangerousKeyword("SELECT * FROM t WHERE note = 'DROP TABLE x';"), null);
  assert.equal(findDangerousKeyword('DELETE FROM users;'), 'DELETE');
  assert.equal(findDangerousKeyword('SELECT 1; drop table users;'), 'DROP');
  assert.equal(findDangerousKeyword('WITH gone AS (DELETE FROM users RETURNING id) SELECT * FROM gone;'), 'DELETE');
});
