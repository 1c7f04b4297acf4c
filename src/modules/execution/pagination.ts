import { PipelineError } from '../../core/errors.js';
import type { ResultsManifest } from '../attempts/types.js';

export const DEFAULT_PAGE_SIZE = 500;

/** An empty result has zero pages. */
export function computePageCount(totalRows: number, pageSize = DEFAULT_PAGE_SIZE): number {
  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new RangeError(`Page size must be a positive integer, got ${pageSize}`);
  }
  return Math.ceil(Math.max(0, totalRows) / pageSize);
}

export interface ResultsPage {
  page: number;
  pageSize: number;
  pageCount: number;
  totalRows: number;
  columns: string[];
  rows: unknown[][];
}

/**
 * Slice one 1-based page out of stored results. Page 1 of an empty result is
 * an empty page; anything past the last page is rejected.
 */
export function readResultsPage(manifest: ResultsManifest, page: number): ResultsPage {
  const lastPage = Math.max(1, manifest.pageCount);
  if (!Number.isInteger(page) || page < 1 || page > lastPage) {
    throw new PipelineError(
      `Page ${page} is out of range; valid pages are 1 to ${lastPage}`,
      'INVALID_REQUEST'
    );
  }

  const offset = (page - 1) * manifest.pageSize;
  return {
    page,
    pageSize: manifest.pageSize,
    pageCount: manifest.pageCount,
    totalRows: manifest.totalRows,
    columns: manifest.columns,
    rows: manifest.rows.slice(offset, offset + manifest.pageSize)
  };
}
