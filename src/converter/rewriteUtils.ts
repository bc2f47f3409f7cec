import { DiagnosticsLedger } from './ledger';
import { SourceMask } from './sourceMask';
import { lineIndentOf } from './blockScanner';
import { TargetDialect } from '../types/sql';

export interface RewriteContext {
  target: TargetDialect;
  ledger: DiagnosticsLedger;
  mask: SourceMask;
}

export interface TextEdit {
  start: number;
  end: number;
  text: string;
}

/**
 * Replaces every match of a global pattern. `render` receives the match and
 * the text being rewritten; returning `match[0]` keeps the match.
 */
export function replaceMatches(
  sql: string,
  pattern: RegExp,
  render: (match: RegExpMatchArray, sql: string) => string
): string {
  let result = '';
  let last = 0;

  for (const match of sql.matchAll(pattern)) {
    const start = match.index ?? 0;
    result += sql.slice(last, start) + render(match, sql);
    last = start + match[0].length;
  }

  return result + sql.slice(last);
}

// Applies non-overlapping edits; offsets refer to the original text
export function applyEdits(sql: string, edits: TextEdit[]): string {
  return [...edits]
    .sort((a, b) => b.start - a.start || b.end - a.end)
    .reduce((text, edit) => text.slice(0, edit.start) + edit.text + text.slice(edit.end), sql);
}

/**
 * Turns `sql.slice(start, end)` into masked line comments, optionally
 * preceded by a note. Code that followed on the same line moves to the
 * next line so it stays live.
 */
export function commentOut(mask: SourceMask, sql: string, start: number, end: number, note?: string): string {
  const indent = lineIndentOf(sql, start);
  const lines = sql
    .slice(start, end)
    .split('\n')
    .map((line, index) => (index === 0 ? `-- ${line}` : line.replace(/^(\s*)/, '$1-- ')));

  const commented = note ? [`-- ${note}`, ...lines].join(`\n${indent}`) : lines.join('\n');
  const trailing = /^[ \t]*[^\s]/.test(sql.slice(end).split('\n')[0]) ? `\n${indent}` : '';

  return mask.protect(commented) + trailing;
}

// Re-indents a multi-line fragment so its first line starts at `indent`
export function reindent(text: string, indent: string): string {
  const lines = text.replace(/^\s*\n/, '').replace(/\s+$/, '').split('\n');
  const widths = lines
    .filter(line => line.trim().length > 0)
    .map(line => (/^[ \t]*/.exec(line) ?? [''])[0].length);
  const common = widths.length > 0 ? Math.min(...widths) : 0;

  return lines.map(line => (line.trim() ? indent + line.slice(common) : '')).join('\n');
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// True when `expression` is one literal, a number or a plain name
export function isSimpleValue(expression: string): boolean {
  return /^(?:\u0000\d+\u0000|-?\d+(?:\.\d+)?|[\w$#]+(?:\.[\w$#]+)?)$/.test(expression.trim());
}

// First match of a global pattern, or undefined
export function firstMatch(sql: string, pattern: RegExp): RegExpMatchArray | undefined {
  for (const match of sql.matchAll(pattern)) {
    return match;
  }
  return undefined;
}

// Indentation of the first non-blank line of a block body
export function bodyIndent(body: string, fallback = '  '): string {
  const line = body.split('\n').find(candidate => candidate.trim().length > 0 && /^[ \t]/.test(candidate));
  return line ? (/^[ \t]*/.exec(line) ?? [fallback])[0] : fallback;
}
