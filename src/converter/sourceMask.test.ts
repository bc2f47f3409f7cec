import { describe, it, expect } from 'vitest';
import { SourceMask, containsPlaceholder } from './sourceMask';

describe('SourceMask', () => {
  it('hides literals and comments behind placeholders', () => {
    const mask = new SourceMask();
    const masked = mask.mask("x := 'a;b'; -- trailing note");

    expect(masked).toBe('x := \u00000\u0000; \u00001\u0000');
    expect(mask.unmask(masked)).toBe("x := 'a;b'; -- trailing note");
  });

  it('treats doubled quotes as part of the literal', () => {
    const mask = new SourceMask();
    const masked = mask.mask("msg := 'it''s done';");

    expect(masked).toBe('msg := \u00000\u0000;');
  });

  it('keeps the newline after a line comment in the code', () => {
    const mask = new SourceMask();

    expect(mask.mask('-- header\nBEGIN')).toBe('\u00000\u0000\nBEGIN');
  });

  it('masks block comments and alternative quoting', () => {
    const mask = new SourceMask();
    const masked = mask.mask("/* EXCEPTION */ v := q'[it's]';");

    expect(masked).toBe('\u00000\u0000 v := \u00001\u0000;');
    expect(mask.unmask(masked)).toBe("/* EXCEPTION */ v := q'[it's]';");
  });

  it('restores protected fragments that wrap earlier placeholders', () => {
    const mask = new SourceMask();
    const literal = mask.mask("'%'");
    const wrapped = mask.protect(`/* RAISE NOTICE ${literal} */`);

    expect(mask.unmask(`x ${wrapped}`)).toBe("x /* RAISE NOTICE '%' */");
  });

  it('detects placeholders', () => {
    expect(containsPlaceholder('a \u00003\u0000 b')).toBe(true);
    expect(containsPlaceholder('plain text')).toBe(false);
  });
});
