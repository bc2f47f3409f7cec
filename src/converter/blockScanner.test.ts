import { describe, it, expect } from 'vitest';
import { findBlocks, findMatchingParen, lineIndentOf, splitStatements, splitTopLevel, tokenize } from './blockScanner';

describe('tokenize', () => {
  it('returns words with their offsets', () => {
    expect(tokenize('END IF;')).toEqual([
      { text: 'END', upper: 'END', start: 0, end: 3 },
      { text: 'IF', upper: 'IF', start: 4, end: 6 }
    ]);
  });
});

describe('findBlocks', () => {
  it('returns nested blocks innermost first', () => {
    const sql = 'BEGIN\n  BEGIN\n    NULL;\n  END;\nEND;';

    expect(findBlocks(sql)).toEqual([
      { beginStart: 8, beginEnd: 13, endStart: 26, closeEnd: 30, depth: 1 },
      { beginStart: 0, beginEnd: 5, endStart: 31, closeEnd: 35, depth: 0 }
    ]);
  });

  it('records the block-level exception section', () => {
    const sql = 'BEGIN x := 1; EXCEPTION WHEN OTHERS THEN NULL; END;';
    const [block] = findBlocks(sql);

    expect(block.exceptionStart).toBe(sql.indexOf('EXCEPTION'));
    expect(block.exceptionEnd).toBe(sql.indexOf('EXCEPTION') + 'EXCEPTION'.length);
  });

  it('ignores exception declarations', () => {
    const sql = 'DECLARE e EXCEPTION; BEGIN NULL; END;';

    expect(findBlocks(sql)[0].exceptionStart).toBeUndefined();
  });

  it('ignores a declaration inside a nested declare section', () => {
    const sql = 'BEGIN DECLARE e_bad EXCEPTION; BEGIN NULL; END; END;';

    expect(findBlocks(sql).map(block => block.exceptionStart)).toEqual([undefined, undefined]);
  });

  it('records a section that has no WHEN clause', () => {
    const sql = 'BEGIN x := 1; EXCEPTION NULL; END;';

    expect(findBlocks(sql)[0].exceptionStart).toBe(14);
  });

  it('does not close a block on END IF, END LOOP or a CASE expression', () => {
    const sql = 'BEGIN IF a THEN LOOP NULL; END LOOP; END IF; x := CASE WHEN b THEN 1 ELSE 2 END; END;';
    const blocks = findBlocks(sql);

    expect(blocks).toHaveLength(1);
    expect(blocks[0].endStart).toBe(sql.lastIndexOf('END;'));
  });

  it('includes the label after END in the closing span', () => {
    const sql = 'BEGIN NULL; END my_proc;';

    expect(findBlocks(sql)[0].closeEnd).toBe(sql.length);
  });
});

describe('findMatchingParen', () => {
  it('skips nested parentheses', () => {
    expect(findMatchingParen('f(a, (b))', 1)).toBe(8);
  });

  it('returns -1 when the parenthesis is not closed', () => {
    expect(findMatchingParen('f(a', 1)).toBe(-1);
  });
});

describe('splitTopLevel', () => {
  it('splits only outside parentheses', () => {
    expect(splitTopLevel('a, f(b, c), d')).toEqual(['a', ' f(b, c)', ' d']);
  });
});

describe('splitStatements', () => {
  it('keeps the semicolon with each statement and drops a blank remainder', () => {
    expect(splitStatements('a; b;  ')).toEqual([
      { text: 'a;', start: 0, end: 2 },
      { text: ' b;', start: 2, end: 5 }
    ]);
  });

  it('keeps a trailing statement without a semicolon', () => {
    expect(splitStatements('a; b')).toEqual([
      { text: 'a;', start: 0, end: 2 },
      { text: ' b', start: 2, end: 4 }
    ]);
  });
});

describe('lineIndentOf', () => {
  it('returns the indentation of the line holding the offset', () => {
    expect(lineIndentOf('x\n    y', 6)).toBe('    ');
  });
});
