/**
 * Best-effort readers for free-text model output. Models wrap answers in
 * markdown, prose and numbered lists no matter what the prompt says; these
 * helpers recover the useful part and reject the rest.
 */
import { isKeyword, isSignificant, tokenize, truncateAtFirstStatement } from '../../core/sql-tokenizer.js';

const FENCE = /```[a-zA-Z]*[^\S\n]*\n?([\s\S]*?)```/;
const SQL_START = /^\s*(SELECT|WITH)\b/i;
const LIST_MARKER = /^\s*(?:[-*•]|\d+[.)])\s+/;
const EDGE_NOISE = /^[\s"'“”‘’(\[{<:]+|[\s"'“”‘’)\]}>:.!?]+$/g;

const DANGEROUS_KEYWORDS = ['INSERT', 'UPDATE', 'DELETE', 'DROP', 'CREATE', 'ALTER', 'TRUNCATE'];
const DANGEROUS_FOLLOWERS = [
  'TABLE',
  'INTO',
  'FROM',
  'SET',
  'DATABASE',
  'SCHEMA',
  'INDEX',
  'VIEW',
  'TRIGGER',
  'FUNCTION',
  'PROCEDURE'
];

const CLARIFYING_PHRASES =
  /\b(could you|can you|would you|please (?:clarify|specify|provide|confirm)|do you mean|did you mean|which (?:one|of)|what do you mean)\b/i;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function stripFences(text: string): string {
  const fenced = FENCE.exec(text);
  if (fenced) return fenced[1];
  return text.replace(/```[a-zA-Z]*/g, '');
}

/**
 * Table names mentioned in a selection response, restricted to `validNames`,
 * returned in their canonical spelling, first mention first, without repeats.
 */
export function parseTableNames(response: string, validNames: readonly string[]): string[] {
  const canonical = new Map<string, string>();
  for (const name of validNames) {
    const key = name.toLowerCase();
    if (!canonical.has(key)) canonical.set(key, name);
  }

  const cleaned = response
    .replace(/```[a-zA-Z]*/g, ' ')
    .replace(/\*\*/g, '')
    .replace(/`/g, '')
    .replace(/\b(SELECT|FROM)\b/gi, ' ');

  const pieces = /[,\n;]/.test(cleaned) ? cleaned.split(/[,\n;]+/) : cleaned.split(/\s+/);
  const found: string[] = [];

  for (const piece of pieces) {
    const candidate = piece.replace(LIST_MARKER, '').replace(EDGE_NOISE, '').trim();
    if (!candidate) continue;

    const exact = canonical.get(candidate.toLowerCase());
    if (exact) {
      found.push(exact);
      continue;
    }

    const embedded: Array<{ name: string; index: number }> = [];
    for (const name of canonical.values()) {
      const match = new RegExp(`(?:^|[^A-Za-z0-9_])${escapeRegExp(name)}(?![A-Za-z0-9_])`, 'i').exec(candidate);
      if (match) embedded.push({ name, index: match.index });
    }
    embedded.sort((a, b) => a.index - b.index);
    found.push(...embedded.map((entry) => entry.name));
  }

  return [...new Set(found)];
}

/**
 * The first SELECT/WITH statement in a response, terminated with `;`, or null
 * when the response holds no such statement.
 */
export function extractSql(response: string): string | null {
  const body = stripFences(response).trim();
  if (!body) return null;

  let start: string | null = null;
  if (SQL_START.test(body)) {
    start = body;
  } else {
    const lines = body.split(/\r?\n/);
    const index = lines.findIndex((line) => SQL_START.test(line));
    if (index !== -1) start = lines.slice(index).join('\n');
  }
  if (start === null) return null;

  const statement = truncateAtFirstStatement(start.trim()).trim();
  if (!statement || statement === ';') return null;
  if (!hasStatementShape(statement)) return null;
  return statement.endsWith(';') ? statement : `${statement};`;
}

/**
 * Rejects prose that merely opens with "Select" or "With": a `?` outside
 * literals, or a WITH that is not followed by `name [(columns)] AS`.
 */
function hasStatementShape(statement: string): boolean {
  const tokens = tokenize(statement).filter(isSignificant);
  if (tokens.some((token) => token.kind === 'punctuation' && token.text === '?')) return false;
  if (!isKeyword(tokens[0], 'WITH')) return true;

  let index = isKeyword(tokens[1], 'RECURSIVE') ? 2 : 1;
  const name = tokens[index];
  if (!name || (name.kind !== 'word' && name.kind !== 'quoted_identifier')) return false;
  index++;

  if (tokens[index]?.kind === 'punctuation' && tokens[index].text === '(') {
    let depth = 0;
    for (; index < tokens.length; index++) {
      const token = tokens[index];
      if (token.kind !== 'punctuation') continue;
      if (token.text === '(') depth++;
      else if (token.text === ')' && --depth === 0) break;
    }
    index++;
  }
  return isKeyword(tokens[index], 'AS');
}

export function looksLikeQuestion(text: string): boolean {
  const trimmed = text.trim();
  if (!trimmed) return false;
  return trimmed.includes('?') || CLARIFYING_PHRASES.test(trimmed);
}

/**
 * First data- or schema-changing keyword in use, or null. A keyword counts
 * when it opens a statement or is followed by the object it acts on, so
 * column names such as `created_at` or `deleted` never match.
 */
export function findDangerousKeyword(sql: string): string | null {
  const tokens = tokenize(sql).filter(isSignificant);
  let statementStart = true;

  for (let index = 0; index < tokens.length; index++) {
    const token = tokens[index];
    if (token.kind === 'punctuation' && token.text === ';') {
      statementStart = true;
      continue;
    }

    if (isKeyword(token, ...DANGEROUS_KEYWORDS)) {
      const next = tokens[index + 1];
      const followedByTarget =
        isKeyword(next, ...DANGEROUS_FOLLOWERS) || (next?.kind === 'punctuation' && next.text === '(');
      if (statementStart || followedByTarget) return token.text.toUpperCase();
    }
    statementStart = false;
  }

  return null;
}
