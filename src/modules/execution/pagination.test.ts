import test from 'node:test';
import assert from 'node:assert/strict';
import { PipelineError } from '../../core/errors.js';
import type { ResultsManifest } from '../attempts/types.js';
import { computePageCount, readResultsPage } from './pagination.js';

function manifestWith(totalRows: number): ResultsManifest {
  return {
    attemptId: 'attempt-1',
    columns: ['id'],
    rows: Array.from({ length: totalRows }, (_, index) => [index]),
    totalRows,
    pageSize: 500,
    pageCount: computePageCount(totalRows, 500),
    createdAt: new Date('2024-01-01T00:00:00Z')
  };
}

test('computePageCount rounds up and gives zero pages for no rows', () => {
  assert.equal(computePageCount(1234, 500), 3);
  assert.equal(computePageCount(1000, 500), 2);
  assert.equal(computePageCount(1, 500), 1);
  assert.equal(computePageCount(0, 500), 0);
  assert.throws(() => computePageCount(10, 0), RangeError);
});

test('readResultsPage slices the requested page', () => {
  const manifest = manifestWith(1234);

  const first = readResultsPage(manifest, 1);
  assert.equal(first.rows.length, 500);
  assert.deepEqual(first.rows[0], [0]);

  const last = readResultsPage(manifest, 3);
  assert.equal(last.rows.length, 234);
  assert.deepEqual(last.rows[0], [1000]);
  assert.equal(last.pageCount, 3);
  assert.equal(last.totalRows, 1234);
});

test('pages past the end are rejected', () => {
  assert.throws(
    () => readResultsPage(manifestWith(1234), 4),
    (error) => {
      assert.ok(error instanceof PipelineError);
      assert.equal(error.code, 'INVALID_REQUEST');
      assert.equal(error.message, 'Page 4 is out of range; valid pages are 1 to 3');
      return true;
    }
  );
  assert.throws(() => readResultsPage(manifestWith(10), 0), PipelineError);
  assert.throws(() => readResultsPage(manifestWith(10), 1.5), PipelineError);
});

test('an empty result has an empty first page and nothing after it', () => {
  const empty = manifestWith(0);
  assert.deepEqual(readResultsPage(empty, 1).rows, []);
  assert.equal(readResultsPage(empty, 1).pageCount, 0);
  assert.throws(
    () => readResultsPage(empty, 2),
    (error) => error instanceof PipelineError && error.message === 'Page 2 is out of range; valid pages are 1 to 1'
  );
});
