/**
 * Minimal SQL lexer. It does not parse: it only separates literals, quoted
 * identifiers and comments from the words and punctuation around them, so
 * keyword checks never fire on text inside a string or a comment.
 */

export type SqlTokenKind =
  | 'word'
  | 'quoted_identifier'
  | 'string'
  | 'number'
  | 'comment'
  | 'whitespace'
  | 'punctuation';

export interface SqlToken {
  kind: SqlTokenKind;
  text: string;
  start: number;
  end: number;
}

export interface SqlStatement {
  text: string;
  tokens: SqlToken[];
}

const WORD_START = /[A-Za-z_]/;
const WORD_PART = /[A-Za-z0-9_$]/;
const DIGIT = /[0-9]/;
const WHITESPACE = /\s/;
const DOLLAR_TAG = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/;

function readQuoted(sql: string, start: number, quote: string): number {
  let index = start + 1;
  while (index < sql.length) {
    if (sql[index] === quote) {
      // doubled quote is an escaped quote
      if (sql[index + 1] === quote) {
        index += 2;
        continue;
      }
      return index + 1;
    }
    index++;
  }
  return sql.length;
}

function readBlockComment(sql: string, start: number): number {
  let depth = 0;
  let index = start;
  while (index < sql.length) {
    if (sql.startsWith('/*', index)) {
      depth++;
      index += 2;
    } else if (sql.startsWith('*/', index)) {
      depth--;
      index += 2;
      if (depth === 0) return index;
    } else {
      index++;
    }
  }
  return sql.length;
}

export function tokenize(sql: string): SqlToken[] {
  const tokens: SqlToken[] = [];
  let index = 0;

  const push = (kind: SqlTokenKind, end: number) => {
    tokens.push({ kind, text: sql.slice(index, end), start: index, end });
    index = end;
  };

  while (index < sql.length) {
    const char = sql[index];

    if (WHITESPACE.test(char)) {
      let end = index + 1;
      while (end < sql.length && WHITESPACE.test(sql[end])) end++;
      push('whitespace', end);
    } else if (sql.startsWith('--', index)) {
      const newline = sql.indexOf('\n', index);
      push('comment', newline === -1 ? sql.length : newline);
    } else if (sql.startsWith('/*', index)) {
      push('comment', readBlockComment(sql, index));
    } else if (char === "'") {
      push('string', readQuoted(sql, index, "'"));
    } else if (char === '"' || char === '`') {
      push('quoted_identifier', readQuoted(sql, index, char));
    } else if (char === '$') {
      const tag = DOLLAR_TAG.exec(sql.slice(index));
      if (tag) {
        const close = sql.indexOf(tag[0], index + tag[0].length);
        push('string', close === -1 ? sql.length : close + tag[0].length);
      } else {
        push('punctuation', index + 1);
      }
    } else if (WORD_START.test(char)) {
      let end = index + 1;
      while (end < sql.length && WORD_PART.test(sql[end])) end++;
      push('word', end);
    } else if (DIGIT.test(char)) {
      let end = index + 1;
      while (end < sql.length && /[0-9.eE]/.test(sql[end])) end++;
      push('number', end);
    } else {
      push('punctuation', index + 1);
    }
  }

  return tokens;
}

export function isSignificant(token: SqlToken): boolean {
  return token.kind !== 'whitespace' && token.kind !== 'comment';
}

export function isKeyword(token: SqlToken | undefined, ...keywords: string[]): boolean {
  return token?.kind === 'word' && keywords.includes(token.text.toUpperCase());
}

/**
 * Split on top-level `;`. Statements holding nothing but whitespace or
 * comments are dropped.
 */
export function splitStatements(sql: string): SqlStatement[] {
  const statements: SqlStatement[] = [];
  let current: SqlToken[] = [];

  const flush = () => {
    if (current.some(isSignificant)) {
      const first = current[0];
      const last = current[current.length - 1];
      statements.push({ text: sql.slice(first.start, last.end).trim(), tokens: current });
    }
    current = [];
  };

  for (const token of tokenize(sql)) {
    if (token.kind === 'punctuation' && token.text === ';') {
      flush();
    } else {
      current.push(token);
    }
  }
  flush();

  return statements;
}

/**
 * Text up to and including the first statement terminator, or the whole input
 * when there is none.
 */
export function truncateAtFirstStatement(sql: string): string {
  const terminator = tokenize(sql).find((token) => token.kind === 'punctuation' && token.text === ';');
  return terminator ? sql.slice(0, terminator.end) : sql;
}
