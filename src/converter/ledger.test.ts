import { describe, it, expect } from 'vitest';
import { DiagnosticsLedger } from './ledger';

describe('DiagnosticsLedger', () => {
  it('keeps warnings and rules in insertion order', () => {
    const ledger = new DiagnosticsLedger();
    ledger.rule('first');
    ledger.warn('partial-support', 'info', 'one');
    ledger.rule('second');
    ledger.warn('manual-review-needed', 'error', 'two', 'fix it');

    expect(ledger.appliedRules).toEqual(['first', 'second']);
    expect(ledger.warnings).toEqual([
      { kind: 'partial-support', severity: 'info', message: 'one' },
      { kind: 'manual-review-needed', severity: 'error', message: 'two', suggestion: 'fix it' }
    ]);
  });

  it('does not deduplicate repeated entries', () => {
    const ledger = new DiagnosticsLedger();
    ledger.rule('EXIT WHEN → IF ... END IF');
    ledger.rule('EXIT WHEN → IF ... END IF');

    expect(ledger.appliedRules).toHaveLength(2);
  });

  it('freezes recorded warnings', () => {
    const ledger = new DiagnosticsLedger();
    ledger.record({ kind: 'syntax-difference', severity: 'warning', message: 'frozen' });

    expect(Object.isFrozen(ledger.warnings[0])).toBe(true);
  });

  it('hands out copies so readers cannot change the ledger', () => {
    const ledger = new DiagnosticsLedger();
    ledger.rule('kept');

    expect(ledger.appliedRules).not.toBe(ledger.appliedRules);
    expect(ledger.appliedRules).toEqual(['kept']);
  });

  it('compares severities by rank', () => {
    const ledger = new DiagnosticsLedger();
    ledger.warn('partial-support', 'warning', 'w');

    expect(ledger.hasSeverity('info')).toBe(true);
    expect(ledger.hasSeverity('warning')).toBe(true);
    expect(ledger.hasSeverity('error')).toBe(false);
    expect(ledger.count('warning')).toBe(1);
    expect(ledger.count('error')).toBe(0);
  });

  it('collects hoisted statements separately', () => {
    const ledger = new DiagnosticsLedger();
    ledger.hoist('CREATE TYPE emp_rec AS (id INTEGER);');

    expect(ledger.hoistedStatements).toEqual(['CREATE TYPE emp_rec AS (id INTEGER);']);
    expect(ledger.appliedRules).toEqual([]);
  });
});
