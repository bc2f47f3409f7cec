const PLACEHOLDER = /\u0000(\d+)\u0000/g;

const Q_QUOTE_CLOSERS: Record<string, string> = {
  '[': ']',
  '{': '}',
  '(': ')',
  '<': '>'
};

/**
 * Hides string literals, quoted identifiers and comments behind opaque
 * placeholders so that keyword patterns only ever see code.
 *
 * Placeholders are `\u0000<n>\u0000`; they contain no word or whitespace
 * characters, so `\b`, `\w+` and `\s+` never match across them.
 */
export class SourceMask {
  private readonly fragments: string[] = [];

  mask(sql: string): string {
    let out = '';
    let i = 0;

    while (i < sql.length) {
      const char = sql[i];
      const next = sql[i + 1] ?? '';

      // Line comment, newline stays in the code
      if (char === '-' && next === '-') {
        const end = sql.indexOf('\n', i);
        const stop = end === -1 ? sql.length : end;
        out += this.store(sql.slice(i, stop));
        i = stop;
        continue;
      }

      // Block comment
      if (char === '/' && next === '*') {
        const end = sql.indexOf('*/', i + 2);
        const stop = end === -1 ? sql.length : end + 2;
        out += this.store(sql.slice(i, stop));
        i = stop;
        continue;
      }

      // Alternative quoting: q'[...]', Q'{...}', q'!...!'
      if ((char === 'q' || char === 'Q') && next === "'" && !isWordChar(sql[i - 1])) {
        const open = sql[i + 2];
        if (open !== undefined) {
          const close = Q_QUOTE_CLOSERS[open] ?? open;
          const end = sql.indexOf(`${close}'`, i + 3);
          const stop = end === -1 ? sql.length : end + 2;
          out += this.store(sql.slice(i, stop));
          i = stop;
          continue;
        }
      }

      if (char === "'" || char === '"' || char === '`') {
        const stop = findQuoteEnd(sql, i, char);
        out += this.store(sql.slice(i, stop));
        i = stop;
        continue;
      }

      out += char;
      i++;
    }

    return out;
  }

  // Registers generated text so later passes treat it as opaque
  protect(fragment: string): string {
    return this.store(fragment);
  }

  unmask(sql: string): string {
    let result = sql;
    // Protected fragments may wrap earlier placeholders
    for (let pass = 0; pass <= this.fragments.length && containsPlaceholder(result); pass++) {
      result = result.replace(PLACEHOLDER, (match, index: string) => this.fragments[Number(index)] ?? match);
    }
    return result;
  }

  private store(text: string): string {
    this.fragments.push(text);
    return `\u0000${this.fragments.length - 1}\u0000`;
  }
}

function isWordChar(char: string | undefined): boolean {
  return char !== undefined && /[\w$#]/.test(char);
}

// Index just past the closing quote; doubled quotes are escapes
function findQuoteEnd(sql: string, start: number, quote: string): number {
  let i = start + 1;
  while (i < sql.length) {
    if (sql[i] === quote) {
      if (sql[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return sql.length;
}

export function containsPlaceholder(sql: string): boolean {
  return /\u0000\d+\u0000/.test(sql);
}
