import test from 'node:test';
import assert from 'node:assert/strict';
import { cosineSimilarity } from './similarity.js';

test('identical vectors score 1 and orthogonal vectors 0', () => {
  assert.equal(cosineSimilarity([3, 4], [3, 4]), 1);
  assert.equal(cosineSimilarity([1, 0], [0, 1]), 0);
  assert.equal(cosineSimilarity([1, 0], [-1, 0]), -1);
});

test('similarity is symmetric', () => {
  const a = [0.2, 0.7, 0.1];
  const b = [0.5, 0.1, 0.4];
  assert.equal(cosineSimilarity(a, b), cosineSimilarity(b, a));
});

test('a zero vector scores 0', () => {
  assert.equal(cosineSimilarity([0, 0], [1, 2]), 0);
});

test('vectors of different lengths are rejected', () => {
  assert.throws(() => cosineSimilarity([1, 2], [1, 2, 3]), RangeError);
});
