import { describe, it, expect } from 'vitest';
import { blockingWarnings, splitUnits, transpile } from './transpiler';
import { Warning } from '../types/sql';

describe('splitUnits', () => {
  it('splits a script at slash lines', () => {
    expect(splitUnits('CREATE A;\n/\nCREATE B;\n/\n')).toEqual(['CREATE A;', 'CREATE B;']);
  });

  it('ignores a slash line inside a literal', () => {
    const sql = "SELECT '\n/\n' FROM dual;";

    expect(splitUnits(sql)).toEqual([sql]);
  });
});

describe('blockingWarnings', () => {
  const warnings: Warning[] = [
    { kind: 'partial-support', severity: 'info', message: 'a' },
    { kind: 'syntax-difference', severity: 'warning', message: 'b' },
    { kind: 'unsupported-statement', severity: 'error', message: 'c' }
  ];

  it('keeps warnings at or above the threshold', () => {
    expect(blockingWarnings(warnings, 'warning').map(w => w.message)).toEqual(['b', 'c']);
    expect(blockingWarnings(warnings, 'info')).toHaveLength(3);
  });

  it('blocks nothing for never', () => {
    expect(blockingWarnings(warnings, 'never')).toEqual([]);
  });
});

describe('transpile', () => {
  it('converts a script and fills in the metadata', () => {
    const result = transpile('CONTINUE WHEN MOD(v,2)=0;', 'oracle', 'mysql');

    expect(result.success).toBe(true);
    expect(result.sql).toBe('IF MOD(v,2)=0 THEN ITERATE; END IF;');
    expect(result.appliedRules).toEqual(['CONTINUE WHEN → IF ... THEN ITERATE']);
    expect(result.metadata).toEqual({
      source: 'oracle',
      target: 'mysql',
      units: 1,
      hoistedStatements: 0,
      formatted: false
    });
  });

  it('fails when a warning reaches the fail-on severity', () => {
    const result = transpile('CONTINUE WHEN MOD(v,2)=0;', 'oracle', 'mysql', { failOn: 'warning' });

    expect(result.success).toBe(false);
    expect(result.sql).toBe('IF MOD(v,2)=0 THEN ITERATE; END IF;');
    expect(result.errors).toEqual(["1 warning(s) at or above severity 'warning'"]);
  });

  it('separates Oracle units with slash lines', () => {
    const result = transpile('BEGIN NULL; END;\n/\nBEGIN NULL; END;\n/', 'oracle', 'oracle');

    expect(result.sql).toBe('BEGIN NULL; END;\n/\n\nBEGIN NULL; END;\n/');
    expect(result.metadata?.units).toBe(2);
  });

  it('scores input and output when asked', () => {
    const result = transpile('UPDATE t SET a = 1;', 'oracle', 'postgresql', { score: true });

    expect(result.metadata?.inputQuality).toEqual({ total: 1, valid: 1, score: 100 });
    expect(result.metadata?.outputQuality).toEqual({ total: 1, valid: 1, score: 100 });
  });
});
