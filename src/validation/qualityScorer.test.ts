import { describe, it, expect } from 'vitest';
import { extractDmlStatements, scoreQuality } from './qualityScorer';

describe('extractDmlStatements', () => {
  it('finds DML inside routine bodies and skips SELECT INTO', () => {
    const sql = [
      'BEGIN',
      '  UPDATE t SET a = 1;',
      '  SELECT a INTO v FROM t;',
      '  IF x THEN',
      '    DELETE FROM t WHERE id = 1;',
      '  END IF;',
      'END;'
    ].join('\n');

    expect(extractDmlStatements(sql)).toEqual(['UPDATE t SET a = 1', 'DELETE FROM t WHERE id = 1']);
  });

  it('restores literals', () => {
    expect(extractDmlStatements("INSERT INTO t (a) VALUES ('x;y');")).toEqual(["INSERT INTO t (a) VALUES ('x;y')"]);
  });
});

describe('scoreQuality', () => {
  it('scores every statement that parses', () => {
    expect(scoreQuality('SELECT id FROM t; UPDATE t SET a = 1;', 'mysql')).toEqual({ total: 2, valid: 2, score: 100 });
  });

  it('counts statements the grammar rejects', () => {
    expect(scoreQuality('SELECT id FROM t; DELETE FROM;', 'postgresql')).toEqual({ total: 2, valid: 1, score: 50 });
  });

  it('scores a script without DML as 100', () => {
    expect(scoreQuality('BEGIN NULL; END;', 'oracle')).toEqual({ total: 0, valid: 0, score: 100 });
  });
});
