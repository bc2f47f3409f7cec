import { describe, it, expect } from 'vitest';
import { PackageTransformer } from './packageTransformer';
import { DiagnosticsLedger } from '../ledger';
import { ORACLE_PATTERNS } from '../oraclePatterns';
import { firstMatch } from '../rewriteUtils';
import { SourceMask } from '../sourceMask';
import { TargetDialect } from '../../types/sql';

const SPEC = [
  'CREATE OR REPLACE PACKAGE hr_utils AS',
  '  c_max_salary CONSTANT NUMBER := 100000;',
  '  g_count NUMBER := 0;',
  '  e_invalid EXCEPTION;',
  '  PROCEDURE update_employee_salary(p_id NUMBER, p_amount NUMBER);',
  '  FUNCTION get_bonus(p_id NUMBER) RETURN NUMBER;',
  'END hr_utils;'
].join('\n');

const BODY = [
  'CREATE OR REPLACE PACKAGE BODY hr_utils AS',
  '  PROCEDURE log_change(p_id NUMBER) IS',
  '  BEGIN',
  '    INSERT INTO audit_log (emp_id) VALUES (p_id);',
  '  END log_change;',
  '',
  '  PROCEDURE update_employee_salary(p_id NUMBER, p_amount NUMBER) IS',
  '  BEGIN',
  '    IF p_amount > c_max_salary THEN',
  '      RAISE e_invalid;',
  '    END IF;',
  '    UPDATE employees SET salary = p_amount WHERE id = p_id;',
  '    log_change(p_id);',
  '  END update_employee_salary;',
  'END hr_utils;'
].join('\n');

// Routines are handed to the callback unconverted so the package rewrite can be checked alone
function run(sql: string, target: TargetDialect) {
  const ledger = new DiagnosticsLedger();
  const mask = new SourceMask();
  const routines: string[] = [];
  const transformer = new PackageTransformer(target, ledger, mask, routine => {
    routines.push(mask.unmask(routine));
    return routine;
  });
  const output = mask.unmask(transformer.transform(mask.mask(sql)));
  return { output, ledger, routines };
}

describe('PackageTransformer', () => {
  it('reads the members of a specification', () => {
    const mask = new SourceMask();
    const masked = mask.mask(SPEC);
    const header = firstMatch(masked, ORACLE_PATTERNS.PACKAGE_HEADER);
    if (!header) throw new Error('header not found');

    const info = new PackageTransformer('mysql', new DiagnosticsLedger(), mask, routine => routine).parse(masked, header);

    expect(info?.name).toBe('hr_utils');
    expect(info?.unit).toBe('specification');
    expect(info?.constants).toEqual([{ name: 'c_max_salary', type: 'NUMBER', value: '100000' }]);
    expect(info?.variables).toEqual([{ name: 'g_count', type: 'NUMBER', initialValue: '0' }]);
    expect(info?.exceptions).toEqual(['e_invalid']);
    expect(info?.routines).toEqual([
      { kind: 'procedure', name: 'update_employee_salary', header: 'PROCEDURE update_employee_salary(p_id NUMBER, p_amount NUMBER)' },
      { kind: 'function', name: 'get_bonus', header: 'FUNCTION get_bonus(p_id NUMBER) RETURN NUMBER' }
    ]);
  });

  it('emits a MySQL specification as prefixed functions and a variables table', () => {
    const { output, ledger } = run(SPEC, 'mysql');

    expect(output).toBe(
      [
        '-- Package hr_utils (specification)',
        '-- Members are standalone objects named hr_utils_<member>',
        '-- procedure hr_utils_update_employee_salary',
        '-- function hr_utils_get_bonus',
        '',
        'CREATE FUNCTION hr_utils_c_max_salary() RETURNS DECIMAL(38,10) DETERMINISTIC RETURN 100000;',
        '',
        'CREATE TABLE IF NOT EXISTS hr_utils_vars (',
        '  var_name VARCHAR(100) PRIMARY KEY,',
        '  var_value TEXT',
        ');',
        "INSERT IGNORE INTO hr_utils_vars (var_name, var_value) VALUES ('g_count', 0);",
        '-- Session variables such as @hr_utils_g_count are lighter when values need not outlive the connection'
      ].join('\n')
    );
    expect(ledger.appliedRules).toEqual([
      'package constant c_max_salary → function hr_utils_c_max_salary()',
      'package variable g_count → row in hr_utils_vars',
      'package hr_utils specification → 2 routine declarations listed'
    ]);
  });

  it('emits a PostgreSQL specification into a schema', () => {
    const { output } = run(SPEC, 'postgresql');

    expect(output).toContain('\n\nCREATE SCHEMA IF NOT EXISTS hr_utils;\n\n');
    expect(output).toContain(
      'CREATE OR REPLACE FUNCTION hr_utils.c_max_salary() RETURNS NUMERIC LANGUAGE sql IMMUTABLE AS $$ SELECT CAST(100000 AS NUMERIC) $$;'
    );
    expect(output).toContain(
      "INSERT INTO hr_utils.pkg_variables (var_name, var_value) VALUES ('g_count', CAST(0 AS TEXT)) ON CONFLICT (var_name) DO NOTHING;"
    );
  });

  it('hands each body routine over as a standalone routine that sees the specification members', () => {
    const { routines, ledger } = run(`${SPEC}\n\n${BODY}`, 'mysql');

    expect(routines).toEqual([
      [
        'CREATE OR REPLACE PROCEDURE hr_utils_log_change(p_id NUMBER) IS',
        '  BEGIN',
        '    INSERT INTO audit_log (emp_id) VALUES (p_id);',
        '  END log_change;'
      ].join('\n'),
      [
        'CREATE OR REPLACE PROCEDURE hr_utils_update_employee_salary(p_id NUMBER, p_amount NUMBER) IS',
        '  e_invalid EXCEPTION;',
        '  BEGIN',
        '    IF p_amount > hr_utils_c_max_salary() THEN',
        '      RAISE e_invalid;',
        '    END IF;',
        '    UPDATE employees SET salary = p_amount WHERE id = p_id;',
        '    CALL hr_utils_log_change(p_id);',
        '  END update_employee_salary;'
      ].join('\n')
    ]);
    expect(ledger.appliedRules.slice(-4)).toEqual([
      'package routine hr_utils.log_change → hr_utils_log_change',
      'call log_change → CALL hr_utils_log_change',
      'constant c_max_salary → hr_utils_c_max_salary()',
      'package routine hr_utils.update_employee_salary → hr_utils_update_employee_salary'
    ]);
  });

  it('qualifies sibling calls with the schema on PostgreSQL', () => {
    const { routines } = run(`${SPEC}\n\n${BODY}`, 'postgresql');

    expect(routines[1]).toContain('\n    IF p_amount > hr_utils.c_max_salary() THEN\n');
    expect(routines[1]).toContain('\n    PERFORM hr_utils.log_change(p_id);\n');
  });

  it('leaves a package it cannot split unchanged and reports it', () => {
    const sql = ['CREATE PACKAGE BODY broken AS', '  PROCEDURE p IS', '  BEGIN', '    NULL;'].join('\n');

    const { output, ledger, routines } = run(sql, 'postgresql');

    expect(output).toBe(sql);
    expect(routines).toEqual([]);
    expect(ledger.warnings).toEqual([
      {
        kind: 'manual-review-needed',
        severity: 'error',
        message: 'Package broken could not be split into its members and was left unchanged',
        suggestion: 'Check that every routine in the package ends with END and a semicolon'
      }
    ]);
  });
});
