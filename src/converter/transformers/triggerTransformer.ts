import { findBlocks, findMatchingParen, lineIndentOf } from '../blockScanner';
import { Declaration, orderForMySql, parseDeclarationSection, renderDeclaration } from '../declarations';
import { DiagnosticsLedger } from '../ledger';
import { ORACLE_PATTERNS } from '../oraclePatterns';
import { bodyIndent, commentOut, firstMatch, replaceMatches } from '../rewriteUtils';
import { SourceMask } from '../sourceMask';
import { BodyTransformer } from './bodyTransformer';
import { ExceptionTransformer } from './exceptionTransformer';
import { TargetDialect } from '../../types/sql';

const TIMINGS = ['BEFORE', 'AFTER', 'INSTEAD OF'] as const;
const EVENT_KINDS = ['INSERT', 'UPDATE', 'DELETE'] as const;
const ROWS = ['NEW', 'OLD'] as const;

export type TriggerTiming = (typeof TIMINGS)[number];
export type TriggerEventKind = (typeof EVENT_KINDS)[number];
type RowName = (typeof ROWS)[number];

export interface TriggerEvent {
  kind: TriggerEventKind;
  // UPDATE OF columns, empty for any column
  columns: string[];
}

export interface TriggerModel {
  name: string;
  orReplace: boolean;
  timing: TriggerTiming;
  events: TriggerEvent[];
  table: string;
  forEachRow: boolean;
  condition?: string;
  // Lower-cased correlation name → row it stands for, REFERENCING aliases included
  correlation: Map<string, RowName>;
  declarations: Declaration[];
  // Text between BEGIN and END of the trigger block, exception section included
  body: string;
  start: number;
  end: number;
}

/**
 * Rewrites an Oracle DML trigger. MySQL gets one `CREATE TRIGGER ... FOR
 * EACH ROW` per event; PostgreSQL gets a trigger function and a
 * `CREATE TRIGGER ... EXECUTE FUNCTION` that calls it. The body goes
 * through the same statement and exception rules as a routine body.
 */
export class TriggerTransformer {
  constructor(
    private readonly target: TargetDialect,
    private readonly ledger: DiagnosticsLedger,
    private readonly mask: SourceMask
  ) {}

  static matches(masked: string): boolean {
    return firstMatch(masked, ORACLE_PATTERNS.TRIGGER_HEADER) !== undefined;
  }

  transform(masked: string): string {
    const header = firstMatch(masked, ORACLE_PATTERNS.TRIGGER_HEADER);
    if (!header) {
      return masked;
    }

    if (ORACLE_PATTERNS.COMPOUND_TRIGGER.test(masked)) {
      this.ledger.warn(
        this.target === 'mysql' ? 'unsupported-statement' : 'manual-review-needed',
        this.target === 'mysql' ? 'error' : 'warning',
        `Trigger ${header[2]} is a compound trigger, which ${this.target === 'mysql' ? 'MySQL' : 'PostgreSQL'} does not have`,
        'Split it into one trigger per timing point and keep shared state in a table'
      );
      return masked;
    }

    const model = this.parse(masked);
    if (!model) {
      this.ledger.warn(
        'manual-review-needed',
        'warning',
        `Trigger ${header[2]} is not a DML trigger on a table or view and was left unchanged`,
        'Convert this trigger by hand'
      );
      return masked;
    }

    return this.target === 'mysql' ? this.emitMySql(masked, model) : this.emitPostgres(masked, model);
  }

  parse(masked: string): TriggerModel | undefined {
    const header = firstMatch(masked, ORACLE_PATTERNS.TRIGGER_HEADER);
    if (!header) {
      return undefined;
    }
    const start = header.index ?? 0;
    const headerEnd = start + header[0].length;

    const block = findBlocks(masked)
      .filter(candidate => candidate.depth === 0 && candidate.beginStart >= headerEnd)
      .sort((a, b) => a.beginStart - b.beginStart)[0];
    if (!block) {
      return undefined;
    }

    const clauses = masked.slice(headerEnd, block.beginStart);
    const declare = /\bDECLARE\b/i.exec(clauses);
    const definition = declare ? clauses.slice(0, declare.index) : clauses;

    const timingMatch = /^\s*(BEFORE|AFTER|INSTEAD\s+OF)\s+/i.exec(definition);
    const timing = TIMINGS.find(candidate => candidate === timingMatch?.[1].replace(/\s+/g, ' ').toUpperCase());
    if (!timingMatch || !timing) {
      return undefined;
    }

    const afterTiming = definition.slice(timingMatch[0].length);
    const target = ORACLE_PATTERNS.TRIGGER_TABLE.exec(afterTiming);
    const events = target ? parseEvents(target[1]) : undefined;
    if (!target || !events) {
      return undefined;
    }

    const rest = afterTiming.slice(target[0].length);
    return {
      name: header[2],
      orReplace: header[1] !== undefined,
      timing,
      events,
      table: target[2],
      forEachRow: /\bFOR\s+EACH\s+ROW\b/i.test(rest),
      condition: whenCondition(rest),
      correlation: correlationNames(rest),
      declarations: declare ? parseDeclarationSection(clauses.slice(declare.index + declare[0].length), 'oracle') : [],
      body: masked.slice(block.beginEnd, block.endStart),
      start,
      end: block.closeEnd
    };
  }

  // MySQL

  private emitMySql(masked: string, model: TriggerModel): string {
    const { name, table } = model;

    if (model.timing === 'INSTEAD OF') {
      this.ledger.warn(
        'unsupported-statement',
        'error',
        `Trigger ${name} is an INSTEAD OF trigger, which MySQL does not support`,
        `Write the base tables behind ${table} from a procedure and call it in place of the DML on the view`
      );
      return (
        masked.slice(0, model.start) +
        commentOut(this.mask, masked, model.start, model.end, `INSTEAD OF trigger ${name} has no MySQL equivalent`) +
        masked.slice(model.end)
      );
    }

    if (!model.forEachRow) {
      this.ledger.warn(
        'partial-support',
        'warning',
        `Trigger ${name} is a statement-level trigger; MySQL triggers fire once for every row`,
        'Check that the body gives the same result when it runs per row'
      );
    }
    for (const event of model.events.filter(candidate => candidate.columns.length > 0)) {
      this.ledger.warn(
        'partial-support',
        'warning',
        `MySQL triggers cannot name columns; ${name} fires on every UPDATE of ${table}, not only of ${event.columns.join(', ')}`,
        'Compare NEW and OLD values of those columns with <=> at the top of the body'
      );
    }

    let block = `BEGIN${model.body}END;`;
    if (model.condition !== undefined) {
      block = guardStatements(block, this.correlationInCondition(model.condition, model));
      this.ledger.rule(`WHEN condition of ${name} → IF ... END IF in the trigger body`);
    }
    block = this.correlationInBody(block, model);
    if (model.declarations.length > 0) {
      block = `BEGIN${this.declarations(orderForMySql(model.declarations), bodyIndent(model.body))}${block.slice('BEGIN'.length)}`;
      this.ledger.rule(`declaration section of ${name} → DECLARE statements after BEGIN`);
    }
    block = this.convertStatements(block);

    const names = model.events.length > 1 ? model.events.map(event => `${name}_${event.kind.toLowerCase()}`) : [name];
    if (names.length > 1) {
      this.ledger.warn(
        'partial-support',
        'info',
        `MySQL triggers take a single event; ${name} was split into ${names.join(', ')}`
      );
    }

    const triggers = model.events.map((event, index) => {
      const triggerName = names[index];
      const drop = model.orReplace ? `DROP TRIGGER IF EXISTS ${triggerName};\n` : '';
      if (model.orReplace) {
        this.ledger.rule(`OR REPLACE → DROP TRIGGER IF EXISTS ${triggerName}`);
      }
      const body = this.predicatesMySql(block, event.kind, name).replace(/END;\s*$/, 'END //\nDELIMITER ;');
      this.checkMissingRow(body, event.kind, triggerName);
      this.ledger.rule(`trigger ${triggerName} → MySQL CREATE TRIGGER ... FOR EACH ROW in DELIMITER // ... DELIMITER ;`);
      return `${drop}DELIMITER //\nCREATE TRIGGER ${triggerName}\n${model.timing} ${event.kind} ON ${table}\nFOR EACH ROW\n${body}`;
    });

    return masked.slice(0, model.start) + triggers.join('\n\n') + masked.slice(model.end);
  }

  // Each trigger has one event, so the predicates are constants
  private predicatesMySql(block: string, kind: TriggerEventKind, name: string): string {
    return replaceMatches(block, ORACLE_PATTERNS.TRIGGER_PREDICATE, match => {
      this.warnColumnPredicate(match, name);
      const value = predicateEvent(match[1]) === kind ? 'TRUE' : 'FALSE';
      this.ledger.rule(`${match[1].toUpperCase()} → ${value} in the ${kind} trigger`);
      return value;
    });
  }

  // MySQL refuses to create a trigger that names a row its event does not have
  private checkMissingRow(body: string, kind: TriggerEventKind, triggerName: string): void {
    const missing = kind === 'INSERT' ? 'OLD' : kind === 'DELETE' ? 'NEW' : undefined;
    if (missing === undefined || !new RegExp(`(?<![\\w$#.])${missing}\\s*\\.`, 'i').test(body)) {
      return;
    }
    this.ledger.warn(
      'manual-review-needed',
      'warning',
      `MySQL ${kind} trigger ${triggerName} refers to ${missing}, which only ${kind === 'INSERT' ? 'UPDATE and DELETE' : 'INSERT and UPDATE'} triggers have`,
      'Remove the statements that read the missing row from this trigger'
    );
  }

  // PostgreSQL

  private emitPostgres(masked: string, model: TriggerModel): string {
    const { name, table } = model;
    const fn = `${name}_fn`;
    const result = model.timing === 'AFTER' || !model.forEachRow ? 'NULL' : rowToReturn(model.events);

    let block = `BEGIN${model.body}END;`;
    let condition = model.condition !== undefined ? this.correlationInCondition(model.condition, model) : undefined;
    if (condition !== undefined && model.timing === 'INSTEAD OF') {
      block = guardStatements(block, condition);
      this.ledger.rule(`WHEN condition of ${name} → IF ... END IF in the trigger body`);
      condition = undefined;
    }
    block = this.correlationInBody(block, model);
    block = this.predicatesPostgres(block, name);
    if (model.declarations.length > 0) {
      block = `DECLARE${this.declarations(model.declarations, '  ')}\n${block}`;
    }
    block = this.convertStatements(block);
    block = replaceMatches(block, /\bRETURN\s*;/gi, () => {
      this.ledger.rule(`RETURN; → RETURN ${result}; in trigger function ${fn}`);
      return `RETURN ${result};`;
    });
    block = this.appendReturn(block, result, fn);

    const events = model.events
      .map(event => (event.columns.length > 0 ? `${event.kind} OF ${event.columns.join(', ')}` : event.kind))
      .join(' OR ');
    const when = condition !== undefined ? `\nWHEN (${condition})` : '';
    const drop = model.orReplace ? `DROP TRIGGER IF EXISTS ${name} ON ${table};\n` : '';
    if (model.orReplace) {
      this.ledger.rule(`OR REPLACE → DROP TRIGGER IF EXISTS ${name} ON ${table}`);
    }

    this.ledger.rule(`trigger ${name} → function ${fn}() RETURNS TRIGGER and CREATE TRIGGER ... EXECUTE FUNCTION ${fn}()`);
    const func = `CREATE OR REPLACE FUNCTION ${fn}()\nRETURNS TRIGGER\nAS $$\n${block}\n$$ LANGUAGE plpgsql;`;
    const trigger =
      `${drop}CREATE TRIGGER ${name}\n${model.timing} ${events} ON ${table}\n` +
      `FOR EACH ${model.forEachRow ? 'ROW' : 'STATEMENT'}${when}\nEXECUTE FUNCTION ${fn}();`;

    return `${masked.slice(0, model.start)}${func}\n\n${trigger}${masked.slice(model.end)}`;
  }

  private predicatesPostgres(block: string, name: string): string {
    return replaceMatches(block, ORACLE_PATTERNS.TRIGGER_PREDICATE, match => {
      this.warnColumnPredicate(match, name);
      const test = `TG_OP = '${predicateEvent(match[1])}'`;
      this.ledger.rule(`${match[1].toUpperCase()} → ${test}`);
      return this.mask.protect(test);
    });
  }

  // A trigger function must return; the row goes back last, before any handlers
  private appendReturn(block: string, result: string, fn: string): string {
    const span = findBlocks(block).find(candidate => candidate.depth === 0);
    if (!span) {
      return block;
    }

    if (span.exceptionStart !== undefined) {
      this.ledger.warn(
        'manual-review-needed',
        'warning',
        `Exception handlers of ${fn} fall off the end of a trigger function`,
        `End every handler that does not re-raise with RETURN ${result};`
      );
    }

    const stop = span.exceptionStart ?? span.endStart;
    const statements = block.slice(span.beginEnd, stop);
    this.ledger.rule(`trigger function ${fn} ends with RETURN ${result}`);
    return (
      `${block.slice(0, span.beginEnd)}${statements.trimEnd()}\n${bodyIndent(statements)}RETURN ${result};\n` +
      `${lineIndentOf(block, stop)}${block.slice(stop)}`
    );
  }

  // Shared

  private convertStatements(block: string): string {
    const context = { target: this.target, ledger: this.ledger, mask: this.mask };
    const body = new BodyTransformer(context).transform(block);
    return new ExceptionTransformer('oracle', this.target, this.ledger, this.mask).transform(body);
  }

  private correlationInBody(block: string, model: TriggerModel): string {
    let replaced = false;
    const result = replaceMatches(block, /:\s*([\w$#]+)\s*\./g, match => {
      const row = model.correlation.get(match[1].toLowerCase());
      if (row === undefined) {
        return match[0];
      }
      replaced = true;
      return `${row}.`;
    });
    if (replaced) {
      this.ledger.rule(':NEW / :OLD → NEW / OLD');
    }
    return result;
  }

  // WHEN conditions name the rows without the colon
  private correlationInCondition(condition: string, model: TriggerModel): string {
    return replaceMatches(condition, /(?<![\w$#.])([\w$#]+)\s*\.(?=\s*[\w$#])/g, match => {
      const row = model.correlation.get(match[1].toLowerCase());
      return row === undefined ? match[0] : `${row}.`;
    });
  }

  private warnColumnPredicate(match: RegExpMatchArray, name: string): void {
    if (match[2] !== undefined) {
      this.ledger.warn(
        'partial-support',
        'info',
        `${match[1].toUpperCase()}(column) in ${name} now tests only the event; the column check was dropped`,
        'Compare the NEW and OLD values of the column'
      );
    }
  }

  private declarations(declarations: Declaration[], indent: string): string {
    return declarations
      .map(declaration => {
        const comments = declaration.comments.map(comment => `\n${indent}${comment}`).join('');
        const rendered = renderDeclaration(declaration, 'oracle', this.target, this.ledger, this.mask);
        return `${comments}\n${indent}${rendered}`;
      })
      .join('');
  }
}

function parseEvents(text: string): TriggerEvent[] | undefined {
  const events: TriggerEvent[] = [];
  for (const part of text.trim().split(/\s+OR\s+/i)) {
    const match = /^(INSERT|UPDATE|DELETE)(?:\s+OF\s+([\s\S]+))?$/i.exec(part.trim());
    const kind = EVENT_KINDS.find(candidate => candidate === match?.[1].toUpperCase());
    if (!match || !kind) {
      return undefined;
    }
    events.push({ kind, columns: match[2] ? match[2].split(',').map(column => column.trim()) : [] });
  }
  return events;
}

function whenCondition(clauses: string): string | undefined {
  const when = /\bWHEN\s*\(/i.exec(clauses);
  if (!when) {
    return undefined;
  }
  const open = when.index + when[0].length - 1;
  const close = findMatchingParen(clauses, open);
  return close === -1 ? undefined : clauses.slice(open + 1, close).trim();
}

function correlationNames(clauses: string): Map<string, RowName> {
  const names = new Map<string, RowName>([
    ['new', 'NEW'],
    ['old', 'OLD']
  ]);
  const referencing = ORACLE_PATTERNS.CORRELATION.exec(clauses);
  if (referencing) {
    for (const pair of referencing[1].matchAll(/\b(NEW|OLD)\s+(?:AS\s+)?([\w$#]+)/gi)) {
      const row = ROWS.find(candidate => candidate === pair[1].toUpperCase());
      if (row) {
        names.set(pair[2].toLowerCase(), row);
      }
    }
  }
  return names;
}

function predicateEvent(predicate: string): TriggerEventKind {
  const word = predicate.toUpperCase();
  if (word === 'INSERTING') return 'INSERT';
  if (word === 'UPDATING') return 'UPDATE';
  return 'DELETE';
}

// NEW is null in a DELETE trigger, and returning null there cancels the row
function rowToReturn(events: TriggerEvent[]): string {
  const deletes = events.some(event => event.kind === 'DELETE');
  if (!deletes) return 'NEW';
  return events.length === 1 ? 'OLD' : 'COALESCE(NEW, OLD)';
}

// Wraps the statements of a BEGIN ... END block in IF, leaving the exception section outside
function guardStatements(block: string, condition: string): string {
  const span = findBlocks(block).find(candidate => candidate.depth === 0);
  if (!span) {
    return block;
  }
  const stop = span.exceptionStart ?? span.endStart;
  const statements = block.slice(span.beginEnd, stop);
  const indent = bodyIndent(statements);
  const nested = statements.trimEnd().replace(/\n([ \t]*\S)/g, '\n  $1');

  return (
    `${block.slice(0, span.beginEnd)}\n${indent}IF ${condition} THEN${nested}\n${indent}END IF;\n` +
    `${lineIndentOf(block, stop)}${block.slice(stop)}`
  );
}
