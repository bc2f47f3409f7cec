import { AppliedRule, SEVERITY_RANK, Severity, Warning, WarningKind } from '../types/sql';

/**
 * Append-only record of what one conversion call did.
 *
 * Entries are never deduplicated: a rule firing on three statements leaves
 * three entries, so callers can count affected occurrences.
 */
export class DiagnosticsLedger {
  private readonly warningList: Warning[] = [];
  private readonly ruleList: AppliedRule[] = [];
  private readonly hoistedList: string[] = [];

  record(entry: Warning | AppliedRule): void {
    if (typeof entry === 'string') {
      this.ruleList.push(entry);
    } else {
      this.warningList.push(Object.freeze({ ...entry }));
    }
  }

  warn(kind: WarningKind, severity: Severity, message: string, suggestion?: string): void {
    const warning: Warning = suggestion === undefined
      ? { kind, severity, message }
      : { kind, severity, message, suggestion };
    this.record(warning);
  }

  rule(description: string): void {
    this.record(description);
  }

  // Statements that have to run before the routine they were extracted from
  hoist(statement: string): void {
    this.hoistedList.push(statement);
  }

  get warnings(): readonly Warning[] {
    return this.warningList.slice();
  }

  get appliedRules(): readonly AppliedRule[] {
    return this.ruleList.slice();
  }

  get hoistedStatements(): readonly string[] {
    return this.hoistedList.slice();
  }

  hasSeverity(minimum: Severity): boolean {
    return this.warningList.some(w => SEVERITY_RANK[w.severity] >= SEVERITY_RANK[minimum]);
  }

  count(severity: Severity): number {
    return this.warningList.filter(w => w.severity === severity).length;
  }
}
