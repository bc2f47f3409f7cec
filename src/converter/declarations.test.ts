import { describe, it, expect } from 'vitest';
import {
  Declaration,
  mySqlDeclareLayout,
  orderForMySql,
  parseDeclarationSection,
  parseMySqlDeclarations,
  parseParameters,
  renderDeclaration,
  renderParameters,
  statementEnd,
  stripPlaceholders
} from './declarations';
import { DiagnosticsLedger } from './ledger';
import { SourceMask } from './sourceMask';

describe('parseParameters', () => {
  it('reads Oracle modes after the name and defaults', () => {
    expect(parseParameters('p_id IN NUMBER, p_name OUT VARCHAR2, p_rate NUMBER DEFAULT 0', 'oracle')).toEqual([
      { name: 'p_id', mode: 'in', type: 'NUMBER' },
      { name: 'p_name', mode: 'out', type: 'VARCHAR2' },
      { name: 'p_rate', mode: 'in', type: 'NUMBER', defaultValue: '0' }
    ]);
  });

  it('reads MySQL modes before the name', () => {
    expect(parseParameters('IN p_id INT, OUT p_total DECIMAL(10,2)', 'mysql')).toEqual([
      { name: 'p_id', mode: 'in', type: 'INT' },
      { name: 'p_total', mode: 'out', type: 'DECIMAL(10,2)' }
    ]);
  });

  it('reads PostgreSQL modes after the name', () => {
    expect(parseParameters('p_id integer, p_total OUT numeric', 'postgresql')).toEqual([
      { name: 'p_id', mode: 'in', type: 'integer' },
      { name: 'p_total', mode: 'out', type: 'numeric' }
    ]);
  });
});

describe('renderParameters', () => {
  it('drops MySQL defaults with a warning', () => {
    const ledger = new DiagnosticsLedger();
    const rendered = renderParameters(
      [{ name: 'p_rate', mode: 'in', type: 'NUMBER', defaultValue: '0' }],
      'oracle',
      'mysql',
      'procedure',
      ledger
    );

    expect(rendered).toBe('IN p_rate DECIMAL(38,10)');
    expect(ledger.warnings.map(warning => warning.kind)).toEqual(['syntax-difference']);
  });

  it('flags output parameters of MySQL functions', () => {
    const ledger = new DiagnosticsLedger();
    renderParameters([{ name: 'p_out', mode: 'out', type: 'NUMBER' }], 'oracle', 'mysql', 'function', ledger);

    expect(ledger.warnings[0].severity).toBe('error');
  });
});

describe('parseDeclarationSection', () => {
  const section = [
    '',
    '  v_count NUMBER := 0;',
    '  c_max CONSTANT NUMBER := 10;',
    '  e_bad EXCEPTION;',
    '  CURSOR c_emp IS SELECT id FROM employees;',
    '  TYPE t_ids IS TABLE OF NUMBER;',
    ''
  ].join('\n');

  it('classifies each declaration', () => {
    const declarations = parseDeclarationSection(section, 'oracle');

    expect(declarations.map(declaration => [declaration.kind, declaration.name])).toEqual([
      ['variable', 'v_count'],
      ['constant', 'c_max'],
      ['exception', 'e_bad'],
      ['cursor', 'c_emp'],
      ['verbatim', '']
    ]);
  });

  it('keeps types, defaults and cursor queries', () => {
    const [variable, constant, , cursor, type] = parseDeclarationSection(section, 'oracle');

    expect(variable).toMatchObject({ type: 'NUMBER', defaultValue: '0', notNull: false });
    expect(constant).toMatchObject({ type: 'NUMBER', defaultValue: '10' });
    expect(cursor.query).toBe('SELECT id FROM employees');
    expect(type.text).toBe('TYPE t_ids IS TABLE OF NUMBER');
  });

  it('attaches leading comments to the declaration they precede', () => {
    const mask = new SourceMask();
    const [declaration] = parseDeclarationSection(mask.mask('\n  -- running total\n  v_sum NUMBER;'), 'oracle');

    expect(declaration.comments).toEqual(['\u00000\u0000']);
    expect(declaration.name).toBe('v_sum');
  });
});

describe('renderDeclaration', () => {
  const variable: Declaration = { kind: 'variable', name: 'v_count', type: 'NUMBER', defaultValue: '0', comments: [], text: '' };

  it('writes MySQL DECLARE statements', () => {
    const ledger = new DiagnosticsLedger();
    const mask = new SourceMask();

    expect(renderDeclaration(variable, 'oracle', 'mysql', ledger, mask)).toBe('DECLARE v_count DECIMAL(38,10) DEFAULT 0;');
  });

  it('writes PostgreSQL declarations with :=', () => {
    const ledger = new DiagnosticsLedger();
    const mask = new SourceMask();
    const constant: Declaration = { ...variable, kind: 'constant', name: 'c_max', defaultValue: '10' };

    expect(renderDeclaration(variable, 'oracle', 'postgresql', ledger, mask)).toBe('v_count NUMERIC := 0;');
    expect(renderDeclaration(constant, 'oracle', 'postgresql', ledger, mask)).toBe('c_max CONSTANT NUMERIC := 10;');
  });

  it('turns user exceptions into MySQL conditions', () => {
    const ledger = new DiagnosticsLedger();
    const mask = new SourceMask();
    const exception: Declaration = { kind: 'exception', name: 'e_bad', comments: [], text: 'e_bad EXCEPTION' };

    expect(renderDeclaration(exception, 'oracle', 'mysql', ledger, mask)).toBe(
      "DECLARE e_bad CONDITION FOR SQLSTATE '45000';"
    );
  });

  it('writes PostgreSQL cursors with FOR', () => {
    const ledger = new DiagnosticsLedger();
    const mask = new SourceMask();
    const cursor: Declaration = { kind: 'cursor', name: 'c_emp', query: 'SELECT id FROM employees', comments: [], text: '' };

    expect(renderDeclaration(cursor, 'oracle', 'postgresql', ledger, mask)).toBe('c_emp CURSOR FOR SELECT id FROM employees;');
  });
});

describe('orderForMySql', () => {
  it('puts variables before cursors and keeps source order otherwise', () => {
    const cursor: Declaration = { kind: 'cursor', name: 'c1', comments: [], text: '' };
    const first: Declaration = { kind: 'variable', name: 'a', comments: [], text: '' };
    const second: Declaration = { kind: 'variable', name: 'b', comments: [], text: '' };

    expect(orderForMySql([cursor, first, second]).map(declaration => declaration.name)).toEqual(['a', 'b', 'c1']);
  });
});

describe('mySqlDeclareLayout', () => {
  it('finds the DECLARE statements opening a block', () => {
    const sql = 'BEGIN\n  DECLARE a INT;\n  DECLARE c CURSOR FOR SELECT 1;\n  SET a = 1;\nEND;';

    expect(mySqlDeclareLayout(sql, 5)).toEqual({
      statements: [
        { start: 8, end: 22, cursor: false, handler: false },
        { start: 25, end: 55, cursor: true, handler: false }
      ],
      variableInsert: 25,
      end: 55
    });
  });
});

describe('parseMySqlDeclarations', () => {
  it('splits multi-name declarations and stops at handlers', () => {
    const sql = 'BEGIN\n  DECLARE a, b INT DEFAULT 0;\n  DECLARE CONTINUE HANDLER FOR NOT FOUND SET a = 1;\n  SET b = 2;\nEND;';
    const { declarations, end } = parseMySqlDeclarations(sql, 5);

    expect(declarations.map(declaration => [declaration.name, declaration.type, declaration.defaultValue])).toEqual([
      ['a', 'INT', '0'],
      ['b', 'INT', '0']
    ]);
    expect(end).toBe(sql.indexOf('DECLARE CONTINUE'));
  });
});

describe('statementEnd', () => {
  it('treats CASE ... END as part of the statement', () => {
    const sql = 'CURSOR c IS SELECT CASE WHEN a THEN 1 END FROM t; x NUMBER;';

    expect(statementEnd(sql, 0)).toBe(sql.indexOf(';') + 1);
  });
});

describe('stripPlaceholders', () => {
  it('removes placeholders and surrounding blanks', () => {
    expect(stripPlaceholders('\u00001\u0000 x ')).toBe('x');
  });
});
