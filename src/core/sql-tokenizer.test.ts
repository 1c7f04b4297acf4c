import test from 'node:test';
import assert from 'node:assert/strict';
import { splitStatements, tokenize, truncateAtFirstStatement } from './sql-tokenizer.js';

test('tokenize keeps string literals and comments whole', () => {
  const tokens = tokenize("SELECT 'DROP TABLE t; --' -- DELETE\nFROM t");
  const kinds = tokens.filter((token) => token.kind !== 'whitespace').map((token) => [token.kind, token.text]);

  assert.deepEqual(kinds, [
    ['word', 'SELECT'],
    ['string', "'DROP TABLE t; --'"],
    ['comment', '-- DELETE'],
    ['word', 'FROM'],
    ['word', 't']
  ]);
});

test('tokenize handles doubled quotes, quoted identifiers and dollar quoting', () => {
  const tokens = tokenize(`SELECT 'it''s', "odd;name", $body$ ; $body$, $1`);
  const significant = tokens.filter((token) => token.kind !== 'whitespace').map((token) => token.text);

  assert.deepEqual(significant, ['SELECT', "'it''s'", ',', '"odd;name"', ',', '$body$ ; $body$', ',', '$', '1']);
});

test('tokenize treats nested block comments as one comment', () => {
  const tokens = tokenize('/* outer /* inner */ still comment */SELECT');
  assert.equal(tokens[0].kind, 'comment');
  assert.equal(tokens[0].text, '/* outer /* inner */ still comment */');
  assert.equal(tokens[1].text, 'SELECT');
});

test('splitStatements ignores separators inside literals and drops empty statements', () => {
  const statements = splitStatements("SELECT ';' FROM t;  ; -- trailing\n");
  assert.equal(statements.length, 1);
  assert.equal(statements[0].text, "SELECT ';' FROM t");
});

test('splitStatements finds a second statement', () => {
  const statements = splitStatements('SELECT * FROM t; DROP TABLE t;');
  assert.deepEqual(
    statements.map((statement) => statement.text),
    ['SELECT * FROM t', 'DROP TABLE t']
  );
});

test('truncateAtFirstStatement cuts after the first top-level semicolon', () => {
  assert.equal(truncateAtFirstStatement("SELECT 'a;b' FROM t; SELECT 2;"), "SELECT 'a;b' FROM t;");
  assert.equal(truncateAtFirstStatement('SELECT 1'), 'SELECT 1');
});
