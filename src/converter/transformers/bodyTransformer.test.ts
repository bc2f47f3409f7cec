import { describe, it, expect } from 'vitest';
import { BodyTransformer, customSqlState } from './bodyTransformer';
import { DiagnosticsLedger } from '../ledger';
import { SourceMask } from '../sourceMask';
import { TargetDialect } from '../../types/sql';

function run(sql: string, target: TargetDialect) {
  const ledger = new DiagnosticsLedger();
  const mask = new SourceMask();
  const output = mask.unmask(new BodyTransformer({ target, ledger, mask }).transform(mask.mask(sql)));
  return { output, ledger };
}

const ROW_COUNT_ASSIGNMENT = [
  'BEGIN',
  '  UPDATE t SET a = 1;',
  '  v_count := SQL%ROWCOUNT;',
  'END;'
].join('\n');

describe('BodyTransformer', () => {
  describe('implicit cursor attributes', () => {
    it('captures an assigned row count with GET DIAGNOSTICS on PostgreSQL', () => {
      const { output, ledger } = run(ROW_COUNT_ASSIGNMENT, 'postgresql');

      expect(output).toBe(
        ['BEGIN', '  UPDATE t SET a = 1;', '  GET DIAGNOSTICS v_count = ROW_COUNT;', 'END;'].join('\n')
      );
      expect(ledger.appliedRules).toEqual(['SQL%ROWCOUNT assignment → GET DIAGNOSTICS ... = ROW_COUNT']);
    });

    it('reads ROW_COUNT() on MySQL', () => {
      const { output, ledger } = run(ROW_COUNT_ASSIGNMENT, 'mysql');

      expect(output).toBe(
        ['BEGIN', '  UPDATE t SET a = 1;', '  SET v_count = ROW_COUNT();', 'END;'].join('\n')
      );
      expect(ledger.appliedRules).toEqual(['SQL%ROWCOUNT → ROW_COUNT()', 'v_count := → SET v_count =']);
    });

    it('hoists a row count used inside an expression into a declared variable', () => {
      const sql = [
        'BEGIN',
        '  DELETE FROM t WHERE a = 1;',
        '  IF SQL%ROWCOUNT > 0 THEN',
        '    NULL;',
        '  END IF;',
        'END;'
      ].join('\n');

      const { output, ledger } = run(sql, 'postgresql');

      expect(output).toBe(
        [
          'DECLARE',
          '  v_sql_rowcount INTEGER;',
          'BEGIN',
          '  DELETE FROM t WHERE a = 1;',
          '  GET DIAGNOSTICS v_sql_rowcount = ROW_COUNT;',
          '  IF v_sql_rowcount > 0 THEN',
          '    NULL;',
          '  END IF;',
          'END;'
        ].join('\n')
      );
      expect(ledger.appliedRules).toEqual(['SQL%ROWCOUNT expression → GET DIAGNOSTICS v_sql_rowcount = ROW_COUNT']);
      expect(ledger.warnings.map(w => w.severity)).toEqual(['info']);
    });
  });

  describe('raising errors', () => {
    const sql = [
      'BEGIN',
      '  IF p_salary < 0 THEN',
      "    RAISE_APPLICATION_ERROR(-20001, 'Salary cannot be negative');",
      '  END IF;',
      'END;'
    ].join('\n');

    it('turns RAISE_APPLICATION_ERROR into SIGNAL on MySQL', () => {
      const { output, ledger } = run(sql, 'mysql');

      expect(output).toBe(
        [
          'BEGIN',
          '  IF p_salary < 0 THEN',
          "    SIGNAL SQLSTATE '45000' SET MESSAGE_TEXT = 'Salary cannot be negative';",
          '  END IF;',
          'END;'
        ].join('\n')
      );
      expect(ledger.appliedRules).toEqual(["RAISE_APPLICATION_ERROR(-20001) → SIGNAL SQLSTATE '45000'"]);
      expect(ledger.warnings).toEqual([
        { kind: 'partial-support', severity: 'info', message: 'Error code -20001 dropped; MySQL raises SQLSTATE 45000' }
      ]);
    });

    it('turns RAISE_APPLICATION_ERROR into RAISE EXCEPTION with a U0 state on PostgreSQL', () => {
      const { output } = run(sql, 'postgresql');

      expect(output).toContain("    RAISE EXCEPTION '%', 'Salary cannot be negative' USING ERRCODE = 'U0001';");
    });

    it('maps a predefined exception to its SQLSTATE', () => {
      const { output, ledger } = run('RAISE NO_DATA_FOUND;', 'postgresql');

      expect(output).toBe("RAISE EXCEPTION 'No data found' USING ERRCODE = 'P0002';");
      expect(ledger.appliedRules).toEqual(["RAISE NO_DATA_FOUND → SQLSTATE 'P0002'"]);
    });

    it('signals a user exception with its name as the message on MySQL', () => {
      const { output } = run('RAISE e_limit;', 'mysql');

      expect(output).toBe("SIGNAL SQLSTATE '45000' SET MESSAGE_TEXT = 'e_limit';");
    });
  });

  describe('customSqlState', () => {
    it('maps application error codes into class U0', () => {
      expect(customSqlState(-20001)).toBe('U0001');
      expect(customSqlState(-20999)).toBe('U0999');
    });

    it('falls back to P0001 outside the application range', () => {
      expect(customSqlState(-1)).toBe('P0001');
    });
  });

  describe('loop control', () => {
    it('turns CONTINUE WHEN into IF ... ITERATE on MySQL and warns about the missing label', () => {
      const sql = ['LOOP', '  CONTINUE WHEN MOD(v,2)=0;', '  v := v + 1;', 'END LOOP;'].join('\n');

      const { output, ledger } = run(sql, 'mysql');

      expect(output).toBe(
        ['LOOP', '  IF MOD(v,2)=0 THEN ITERATE; END IF;', '  SET v = v + 1;', 'END LOOP;'].join('\n')
      );
      expect(ledger.appliedRules).toEqual(['CONTINUE WHEN → IF ... THEN ITERATE', 'v := → SET v =']);
      expect(ledger.warnings.map(w => w.message)).toEqual(['MySQL ITERATE needs the label of the loop it leaves']);
    });

    it('keeps loop labels as MySQL labels', () => {
      const sql = ['<<scan>>', 'LOOP', '  EXIT scan WHEN v > 10;', 'END LOOP scan;'].join('\n');

      const { output, ledger } = run(sql, 'mysql');

      expect(output).toBe(['scan:', 'LOOP', '  IF v > 10 THEN LEAVE scan; END IF;', 'END LOOP scan;'].join('\n'));
      expect(ledger.appliedRules).toEqual(['<<scan>> → scan: (loop label)', 'EXIT WHEN → IF ... THEN LEAVE']);
      expect(ledger.warnings).toEqual([]);
    });

    it('keeps EXIT inside an IF on PostgreSQL', () => {
      const { output } = run('EXIT scan WHEN v > 10;', 'postgresql');

      expect(output).toBe('IF v > 10 THEN EXIT scan; END IF;');
    });
  });

  describe('loop forms', () => {
    it('turns WHILE ... LOOP into WHILE ... DO on MySQL', () => {
      const sql = ['WHILE i < 10 LOOP', '  i := i + 1;', 'END LOOP;'].join('\n');

      const { output, ledger } = run(sql, 'mysql');

      expect(output).toBe(['WHILE i < 10 DO', '  SET i = i + 1;', 'END WHILE;'].join('\n'));
      expect(ledger.appliedRules).toEqual(['WHILE ... LOOP → WHILE ... DO ... END WHILE', 'i := → SET i =']);
    });

    it('spells ELSIF as ELSEIF on MySQL', () => {
      const sql = ['IF a = 1 THEN', '  b := 1;', 'ELSIF a = 2 THEN', '  b := 2;', 'END IF;'].join('\n');

      const { output } = run(sql, 'mysql');

      expect(output).toBe(['IF a = 1 THEN', '  SET b = 1;', 'ELSEIF a = 2 THEN', '  SET b = 2;', 'END IF;'].join('\n'));
    });

    it('reports numeric FOR loops on MySQL', () => {
      const { ledger } = run(['FOR i IN 1..3 LOOP', '  NULL;', 'END LOOP;'].join('\n'), 'mysql');

      expect(ledger.warnings).toEqual([
        {
          kind: 'unsupported-statement',
          severity: 'error',
          message: 'FOR i IN ... LOOP is not supported by MySQL',
          suggestion: 'Rewrite it as a WHILE loop with a counter variable'
        }
      ]);
    });
  });

  describe('explicit cursor attributes', () => {
    it('tracks a FETCH loop with a done flag and a NOT FOUND handler on MySQL', () => {
      const sql = [
        'BEGIN',
        '  OPEN c;',
        '  LOOP',
        '    FETCH c INTO v;',
        '    EXIT WHEN c%NOTFOUND;',
        '  END LOOP;',
        '  CLOSE c;',
        'END;'
      ].join('\n');

      const { output, ledger } = run(sql, 'mysql');

      expect(output).toBe(
        [
          'BEGIN',
          '  DECLARE v_no_more_rows BOOLEAN DEFAULT FALSE;',
          '  DECLARE CONTINUE HANDLER FOR NOT FOUND SET v_no_more_rows = TRUE;',
          '  OPEN c;',
          '  LOOP',
          '    FETCH c INTO v;',
          '    IF v_no_more_rows THEN LEAVE; END IF;',
          '  END LOOP;',
          '  CLOSE c;',
          'END;'
        ].join('\n')
      );
      expect(ledger.appliedRules).toEqual(['EXIT WHEN → IF ... THEN LEAVE', 'c%NOTFOUND → v_no_more_rows']);
    });

    it('reads FOUND on PostgreSQL', () => {
      const { output } = run('EXIT WHEN c%NOTFOUND;', 'postgresql');

      expect(output).toBe('IF NOT FOUND THEN EXIT; END IF;');
    });
  });

  describe('pipelined functions and collections', () => {
    it('turns PIPE ROW into RETURN NEXT on PostgreSQL', () => {
      const sql = ['BEGIN', '  FOR rec IN c LOOP', '    PIPE ROW(rec);', '  END LOOP;', '  RETURN;', 'END;'].join('\n');

      const { output, ledger } = run(sql, 'postgresql');

      expect(output).toBe(
        ['BEGIN', '  FOR rec IN c LOOP', '    RETURN NEXT rec;', '  END LOOP;', '  RETURN;', 'END;'].join('\n')
      );
      expect(ledger.appliedRules).toEqual(['PIPE ROW → RETURN NEXT']);
    });

    it('turns a nested table type into an array with an ARRAY constructor', () => {
      const sql = [
        'DECLARE',
        '  TYPE id_list IS TABLE OF NUMBER;',
        '  v_ids id_list := id_list(1, 2);',
        'BEGIN',
        '  NULL;',
        'END;'
      ].join('\n');

      const { output, ledger } = run(sql, 'postgresql');

      expect(output).toBe(
        [
          'DECLARE',
          '  -- id_list: NUMERIC[]',
          '  v_ids NUMERIC[] := ARRAY[1, 2]::NUMERIC[];',
          'BEGIN',
          '  NULL;',
          'END;'
        ].join('\n')
      );
      expect(ledger.appliedRules).toEqual(['TYPE id_list IS TABLE OF → NUMERIC[]', 'collection constructor → ARRAY[...]']);
    });

    it('comments out autonomous transactions on MySQL', () => {
      const sql = ['  PRAGMA AUTONOMOUS_TRANSACTION;', 'BEGIN', '  NULL;', 'END;'].join('\n');

      const { output, ledger } = run(sql, 'mysql');

      expect(output).toBe(['  -- PRAGMA AUTONOMOUS_TRANSACTION;', 'BEGIN', '  NULL;', 'END;'].join('\n'));
      expect(ledger.hasSeverity('error')).toBe(true);
    });
  });

  describe('other statements', () => {
    it('moves RETURNING INTO out of the statement on MySQL', () => {
      const { output, ledger } = run('INSERT INTO t (a) VALUES (1) RETURNING id INTO v_id;', 'mysql');

      expect(output).toBe(['INSERT INTO t (a) VALUES (1);', '-- RETURNING id INTO v_id'].join('\n'));
      expect(ledger.warnings.map(w => w.kind)).toEqual(['unsupported-statement']);
    });

    it('turns PUT_LINE into RAISE NOTICE on PostgreSQL', () => {
      const { output } = run("DBMS_OUTPUT.PUT_LINE('Total: ' || v_total);", 'postgresql');

      expect(output).toBe("RAISE NOTICE '%', 'Total: ' || v_total;");
    });

    it('turns PUT_LINE into a SELECT with CONCAT on MySQL', () => {
      const { output } = run("DBMS_OUTPUT.PUT_LINE('Total: ' || v_total);", 'mysql');

      expect(output).toBe("SELECT CONCAT('Total: ', v_total) AS debug_output;");
    });
  });

  it('lists its rules in application order', () => {
    const transformer = new BodyTransformer({ target: 'mysql', ledger: new DiagnosticsLedger(), mask: new SourceMask() });

    expect(transformer.ruleNames[0]).toBe('implicit cursor attributes');
    expect(transformer.ruleNames[transformer.ruleNames.length - 1]).toBe('assignments');
    expect(transformer.ruleNames).toHaveLength(16);
  });
});
