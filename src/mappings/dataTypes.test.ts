import { describe, it, expect } from 'vitest';
import { arrayElementType, mapDataType } from './dataTypes';
import { DiagnosticsLedger } from '../converter/ledger';

describe('mapDataType', () => {
  it('keeps the length and drops the length semantics qualifier', () => {
    expect(mapDataType('VARCHAR2(100 BYTE)', 'oracle', 'postgresql')).toBe('VARCHAR(100)');
  });

  it('adds a default precision when the source gives none', () => {
    expect(mapDataType('NUMBER', 'oracle', 'mysql')).toBe('DECIMAL(38,10)');
  });

  it('keeps an explicit precision', () => {
    expect(mapDataType('NUMBER(10,2)', 'oracle', 'mysql')).toBe('DECIMAL(10,2)');
  });

  it('uses a target type that carries its own precision', () => {
    expect(mapDataType('DATE', 'oracle', 'postgresql')).toBe('TIMESTAMP(0)');
  });

  it('reports a precision the target type cannot take', () => {
    const ledger = new DiagnosticsLedger();

    expect(mapDataType('FLOAT(126)', 'oracle', 'mysql', ledger)).toBe('DOUBLE');
    expect(ledger.warnings).toEqual([
      {
        kind: 'partial-support',
        severity: 'info',
        message: 'FLOAT(126) → DOUBLE; precision (126) dropped',
        suggestion: 'Check that DOUBLE holds the values stored in FLOAT(126)'
      }
    ]);
  });

  it('reports nothing for a bare type without precision', () => {
    const ledger = new DiagnosticsLedger();

    expect(mapDataType('FLOAT', 'oracle', 'postgresql', ledger)).toBe('DOUBLE PRECISION');
    expect(ledger.warnings).toEqual([]);
  });

  it('is case-insensitive on the source type', () => {
    expect(mapDataType('clob', 'oracle', 'mysql')).toBe('LONGTEXT');
  });

  it('passes unknown types and anchored types through', () => {
    expect(mapDataType('SDO_GEOMETRY', 'oracle', 'postgresql')).toBe('SDO_GEOMETRY');
    expect(mapDataType('employees.salary%TYPE', 'oracle', 'mysql')).toBe('employees.salary%TYPE');
  });

  it('returns the input when source and target are equal', () => {
    expect(mapDataType('VARCHAR2(10)', 'oracle', 'oracle')).toBe('VARCHAR2(10)');
  });
});

describe('arrayElementType', () => {
  it('uses the table name of a row type anchor', () => {
    expect(arrayElementType('employees%ROWTYPE', 'oracle')).toBe('employees');
  });

  it('maps scalar element types', () => {
    expect(arrayElementType('NUMBER', 'oracle')).toBe('NUMERIC');
  });
});
