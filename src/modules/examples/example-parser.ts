import path from 'node:path';
import type { Example } from './types.js';

const FENCED_BLOCK = /```[a-zA-Z]*[^\S\n]*\n?([\s\S]*?)```/;
const TITLE_TAG = /^--\s*Title:\s*(.+)$/im;
const DESCRIPTION_PATTERNS = [
  /--\s*Description:\s*(.+)/i,
  /--\s*Question:\s*(.+)/i,
  /\/\*\s*Description:\s*([\s\S]+?)\*\//i
];
const SQL_START = /^\s*(SELECT|WITH)\b/i;

export function titleFromFilename(filename: string): string {
  const stem = path.basename(filename, path.extname(filename));
  return stem
    .split(/[_\-\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

interface TitleMatch {
  title: string;
  /** Index of the line holding a free-text title, which is not part of the SQL. */
  proseLine?: number;
}

function findTitle(lines: string[], filename: string): TitleMatch {
  const firstIndex = lines.findIndex((line) => line.trim().length > 0);
  const first = firstIndex === -1 ? '' : lines[firstIndex].trim();

  const tagged = TITLE_TAG.exec(lines.join('\n'));
  if (first && tagged && first.startsWith('--')) {
    return { title: tagged[1].trim() };
  }

  const isSqlOrMarkup = !first || first.startsWith('--') || first.startsWith('/*') || first.startsWith('```') || SQL_START.test(first);
  if (!isSqlOrMarkup) {
    return { title: first.replace(/^#+\s*/, ''), proseLine: firstIndex };
  }

  if (tagged) return { title: tagged[1].trim() };
  return { title: titleFromFilename(filename) };
}

function findDescription(content: string): string | undefined {
  for (const pattern of DESCRIPTION_PATTERNS) {
    const match = pattern.exec(content);
    const text = match?.[1].trim();
    if (text) return text;
  }
  return undefined;
}

/**
 * Parse one knowledge-base file. Returns null when the file holds no SQL.
 */
export function parseExampleFile(filename: string, content: string): Omit<Example, 'embedding'> | null {
  const lines = content.split(/\r?\n/);
  const { title, proseLine } = findTitle(lines, filename);
  const description = findDescription(content);

  const fenced = FENCED_BLOCK.exec(content);
  let sql: string;
  if (fenced) {
    sql = fenced[1];
  } else {
    sql = lines.filter((_line, index) => index !== proseLine).join('\n');
  }

  sql = sql.trim();
  if (!sql) return null;
  if (!sql.endsWith(';')) sql = `${sql};`;

  return { filename, title, description, sql };
}

/** Text that represents an example when it is embedded. */
export function embeddingText(example: Pick<Example, 'title' | 'description' | 'sql'>): string {
  return `${example.title}\n${example.description ?? ''}\n${example.sql}`;
}
