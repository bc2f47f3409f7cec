// Structural scanning over masked source text (see SourceMask)

export interface WordToken {
  text: string;
  upper: string;
  start: number;
  end: number;
}

export interface BlockSpan {
  beginStart: number;
  beginEnd: number;
  // Start of the closing END keyword
  endStart: number;
  // Just past `END [label];`
  closeEnd: number;
  depth: number;
  exceptionStart?: number;
  exceptionEnd?: number;
}

export interface StatementSpan {
  text: string;
  start: number;
  end: number;
}

const WORD = /(?<![\w$#])[A-Za-z_][\w$#]*/g;

// END followed by one of these closes a control statement, not a block
const COMPOUND_ENDINGS = new Set(['IF', 'LOOP', 'WHILE', 'REPEAT', 'FOR']);

export function tokenize(masked: string): WordToken[] {
  const tokens: WordToken[] = [];
  for (const match of masked.matchAll(WORD)) {
    const start = match.index ?? 0;
    tokens.push({
      text: match[0],
      upper: match[0].toUpperCase(),
      start,
      end: start + match[0].length
    });
  }
  return tokens;
}

interface OpenFrame {
  kind: 'block' | 'case';
  token: WordToken;
  depth: number;
  exception?: WordToken;
}

/**
 * Finds every BEGIN ... END block, innermost first, together with the
 * position of its own EXCEPTION section when it has one.
 */
export function findBlocks(masked: string): BlockSpan[] {
  const tokens = tokenize(masked);
  const blocks: BlockSpan[] = [];
  const stack: OpenFrame[] = [];
  let blockDepth = 0;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];

    switch (token.upper) {
      case 'BEGIN':
        stack.push({ kind: 'block', token, depth: blockDepth });
        blockDepth++;
        break;

      case 'CASE':
        stack.push({ kind: 'case', token, depth: blockDepth });
        break;

      case 'EXCEPTION': {
        const top = stack[stack.length - 1];
        if (top && top.kind === 'block' && !top.exception && startsStatement(masked, token.start)) {
          top.exception = token;
        }
        break;
      }

      case 'END': {
        const next = tokens[i + 1];
        const adjacent = next !== undefined && /^\s*$/.test(masked.slice(token.end, next.start));
        const follower = adjacent ? next.upper : '';

        if (COMPOUND_ENDINGS.has(follower)) {
          i++;
          break;
        }
        if (follower === 'CASE') {
          i++;
        }

        const frame = stack.pop();
        if (!frame || frame.kind === 'case') {
          break;
        }
        blockDepth--;

        const tail = /^\s*(?:[A-Za-z_][\w$#]*\s*)?;/.exec(masked.slice(token.end));
        const span: BlockSpan = {
          beginStart: frame.token.start,
          beginEnd: frame.token.end,
          endStart: token.start,
          closeEnd: tail ? token.end + tail[0].length : token.end,
          depth: frame.depth
        };
        if (frame.exception) {
          span.exceptionStart = frame.exception.start;
          span.exceptionEnd = frame.exception.end;
        }
        blocks.push(span);
        break;
      }
    }
  }

  return blocks;
}

// True after `;` or BEGIN, so `e_bad EXCEPTION;` declarations never open a section
function startsStatement(masked: string, offset: number): boolean {
  const before = masked.slice(0, offset).replace(/(?:\s|\u0000\d+\u0000)+$/, '');
  return before.endsWith(';') || /\bBEGIN$/i.test(before);
}

// Index of the parenthesis closing the one at `openIndex`, or -1
export function findMatchingParen(text: string, openIndex: number): number {
  let depth = 0;
  for (let i = openIndex; i < text.length; i++) {
    if (text[i] === '(') depth++;
    if (text[i] === ')') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

export function splitTopLevel(text: string, separator = ','): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';

  for (const char of text) {
    if (char === '(') depth++;
    if (char === ')') depth--;

    if (char === separator && depth === 0) {
      parts.push(current);
      current = '';
      continue;
    }
    current += char;
  }

  if (current.trim()) {
    parts.push(current);
  }
  return parts;
}

// Splits at semicolons outside parentheses; each span includes its `;`
export function splitStatements(masked: string): StatementSpan[] {
  const statements: StatementSpan[] = [];
  let depth = 0;
  let start = 0;

  for (let i = 0; i < masked.length; i++) {
    const char = masked[i];
    if (char === '(') depth++;
    if (char === ')') depth--;

    if (char === ';' && depth === 0) {
      statements.push({ text: masked.slice(start, i + 1), start, end: i + 1 });
      start = i + 1;
    }
  }

  if (masked.slice(start).trim()) {
    statements.push({ text: masked.slice(start), start, end: masked.length });
  }
  return statements;
}

export function lineIndentOf(text: string, offset: number): string {
  const lineStart = text.lastIndexOf('\n', offset - 1) + 1;
  const match = /^[ \t]*/.exec(text.slice(lineStart));
  return match ? match[0] : '';
}
