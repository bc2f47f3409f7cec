import { describe, it, expect } from 'vitest';
import { ExceptionTransformer } from './exceptionTransformer';
import { DiagnosticsLedger } from '../ledger';
import { SourceMask } from '../sourceMask';
import { Dialect } from '../../types/sql';

function run(sql: string, source: Dialect, target: Dialect) {
  const ledger = new DiagnosticsLedger();
  const mask = new SourceMask();
  const transformer = new ExceptionTransformer(source, target, ledger, mask);
  const output = mask.unmask(transformer.transform(mask.mask(sql)));
  return { output, ledger, handlers: transformer.handlers };
}

const LOOKUP = [
  'BEGIN',
  '  SELECT salary INTO v_salary FROM employees WHERE id = p_id;',
  'EXCEPTION',
  '  WHEN NO_DATA_FOUND THEN',
  '    v_salary := 0;',
  '  WHEN OTHERS THEN',
  '    RAISE;',
  'END;'
].join('\n');

describe('ExceptionTransformer', () => {
  describe('Oracle to MySQL', () => {
    it('turns each WHEN clause into a handler declared at the top of the block', () => {
      const { output } = run(LOOKUP, 'oracle', 'mysql');

      expect(output).toBe(
        [
          'BEGIN',
          '  DECLARE CONTINUE HANDLER FOR NOT FOUND',
          '  BEGIN',
          '    SET v_salary = 0;',
          '  END;',
          '  DECLARE EXIT HANDLER FOR SQLEXCEPTION',
          '  BEGIN',
          '    RESIGNAL;',
          '  END;',
          '  SELECT salary INTO v_salary FROM employees WHERE id = p_id;',
          'END;'
        ].join('\n')
      );
    });

    it('records one handler per condition with its action', () => {
      const { handlers, ledger } = run(LOOKUP, 'oracle', 'mysql');

      expect(handlers).toEqual([
        { sourceConditionName: 'NO_DATA_FOUND', targetCondition: 'NOT FOUND', body: 'SET v_salary = 0;', action: 'continue' },
        { sourceConditionName: 'OTHERS', targetCondition: 'SQLEXCEPTION', body: 'RESIGNAL;', action: 'exit' }
      ]);
      expect(ledger.appliedRules).toEqual([
        'v_salary := → SET v_salary =',
        'WHEN NO_DATA_FOUND → DECLARE CONTINUE HANDLER FOR NOT FOUND',
        'RAISE; → RESIGNAL;',
        'WHEN OTHERS → DECLARE EXIT HANDLER FOR SQLEXCEPTION'
      ]);
    });

    it('notes that a specific handler continues instead of leaving the block', () => {
      const { ledger } = run(LOOKUP, 'oracle', 'mysql');

      expect(ledger.warnings).toEqual([
        {
          kind: 'partial-support',
          severity: 'info',
          message: 'Handler for NO_DATA_FOUND continues after the failing statement instead of leaving the block'
        }
      ]);
    });
  });

  describe('Oracle to PostgreSQL', () => {
    it('keeps the section and leaves matching condition names alone', () => {
      const { output, ledger, handlers } = run(LOOKUP, 'oracle', 'postgresql');

      expect(output).toBe(LOOKUP);
      expect(ledger.appliedRules).toEqual([]);
      expect(handlers.map(handler => handler.targetCondition)).toEqual(['NO_DATA_FOUND', 'OTHERS']);
    });

    it('renames conditions and catches user exceptions by SQLSTATE', () => {
      const sql = [
        'BEGIN',
        '  INSERT INTO t VALUES (1);',
        'EXCEPTION',
        '  WHEN DUP_VAL_ON_INDEX THEN',
        '    v_code := SQLCODE;',
        '  WHEN e_limit THEN',
        '    NULL;',
        'END;'
      ].join('\n');

      const { output, ledger } = run(sql, 'oracle', 'postgresql');

      expect(output).toBe(
        [
          'BEGIN',
          '  INSERT INTO t VALUES (1);',
          'EXCEPTION',
          '  WHEN UNIQUE_VIOLATION THEN',
          '    v_code := SQLSTATE;',
          "  WHEN SQLSTATE 'P0001' THEN",
          '    NULL;',
          'END;'
        ].join('\n')
      );
      expect(ledger.appliedRules).toEqual([
        'WHEN DUP_VAL_ON_INDEX → WHEN UNIQUE_VIOLATION',
        "WHEN e_limit → WHEN SQLSTATE 'P0001'"
      ]);
      expect(ledger.warnings.map(w => w.message)).toEqual([
        'SQLCODE → SQLSTATE; PostgreSQL reports a five-character state, not a number',
        'User-defined exception e_limit is caught as SQLSTATE P0001 together with every other raised exception'
      ]);
    });
  });

  describe('MySQL source', () => {
    it('flags handler declarations and leaves them as written', () => {
      const sql = 'DECLARE EXIT HANDLER FOR SQLEXCEPTION BEGIN ROLLBACK; END;';

      const { output, ledger } = run(sql, 'mysql', 'postgresql');

      expect(output).toBe(sql);
      expect(ledger.warnings).toEqual([
        {
          kind: 'manual-review-needed',
          severity: 'warning',
          message: 'EXIT HANDLER FOR SQLEXCEPTION left as written',
          suggestion: 'Move the handler into an EXCEPTION section of a BEGIN ... END block'
        }
      ]);
    });
  });

  it('keeps a section without WHEN clauses and asks for review', () => {
    const sql = ['BEGIN', '  x := 1;', 'EXCEPTION', '  NULL;', 'END;'].join('\n');
    const { output, ledger, handlers } = run(sql, 'oracle', 'mysql');

    expect(output).toBe(sql);
    expect(handlers).toEqual([]);
    expect(ledger.warnings).toEqual([
      {
        kind: 'manual-review-needed',
        severity: 'warning',
        message: 'Exception section could not be split into WHEN ... THEN handlers and was left in place',
        suggestion: 'Rewrite the handlers as DECLARE ... HANDLER statements at the top of the block'
      }
    ]);
  });

  it('leaves a block without an exception section unchanged', () => {
    const sql = ['BEGIN', '  NULL;', 'END;'].join('\n');

    const { output, handlers } = run(sql, 'oracle', 'mysql');

    expect(output).toBe(sql);
    expect(handlers).toEqual([]);
  });
});
