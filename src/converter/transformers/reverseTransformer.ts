import { findMatchingParen, lineIndentOf, splitStatements, splitTopLevel, tokenize } from '../blockScanner';
import { DiagnosticsLedger } from '../ledger';
import { RAISE_LEVELS } from '../oraclePatterns';
import { SourceMask } from '../sourceMask';
import { TextEdit, applyEdits, commentOut, isSimpleValue, replaceMatches } from '../rewriteUtils';
import { BodyTransformer } from './bodyTransformer';
import { predefinedConditions } from '../../mappings/exceptionConditions';
import { Dialect } from '../../types/sql';

export type ReverseSource = Exclude<Dialect, 'oracle'>;

type ProceduralTarget = Exclude<Dialect, 'mysql'>;

const SIGNAL = /\bSIGNAL\s+(?:SQLSTATE\s+(?:VALUE\s+)?(\u0000\d+\u0000)|([\w$#]+))(?:\s+SET\s+([^;]+?))?\s*;/gi;
const RESIGNAL = /\bRESIGNAL\s*;/gi;
const SET_ROW_COUNT = /\bSET\s+([\w$#.]+)\s*=\s*ROW_COUNT\s*\(\s*\)\s*;/gi;
const DEBUG_SELECT = /\bSELECT\s+([^;]+?)\s+AS\s+debug_output\s*;/gi;
const MYSQL_LABEL = /(?<![\w$#])([A-Za-z_][\w$#]*)\s*:(?!=)\s*(LOOP|WHILE|REPEAT|BEGIN)\b/gi;
const SET_STATEMENT = /(^|\b(?:BEGIN|THEN|ELSE|DO|LOOP|REPEAT)\b)((?:\s|\u0000\d+\u0000)*)SET\s+([\s\S]+?)\s*;$/i;

const POSTGRES_RAISE = /\bRAISE\s+(EXCEPTION|NOTICE|INFO|LOG|DEBUG|WARNING)\b\s*([^;]*?)\s*;/gi;
const POSTGRES_RAISE_CONDITION = /\bRAISE\s+([A-Za-z_][\w$#]*)\s*;/gi;
const GET_ROW_COUNT = /\bGET\s+DIAGNOSTICS\s+([\w$#.]+)\s*=\s*ROW_COUNT\s*;/gi;
const RETURN_NEXT = /\bRETURN\s+NEXT\s+([^;]+?)\s*;/gi;
const PERFORM = /\bPERFORM\s+/gi;
const POSTGRES_LABEL = /<<\s*([\w$#]+)\s*>>(\s*)(LOOP|WHILE|FOR|BEGIN|DECLARE)\b/gi;

interface RaiseParts {
  message?: string;
  state?: string;
}

/**
 * Body statements for the directions that start from MySQL or
 * PostgreSQL: assignment style, error signalling, debug output and loop
 * syntax. Other statements are left as written.
 */
export class ReverseTransformer {
  private readonly mysqlRules?: BodyTransformer;

  constructor(
    private readonly source: ReverseSource,
    private readonly target: Dialect,
    private readonly ledger: DiagnosticsLedger,
    private readonly mask: SourceMask
  ) {
    if (target === 'mysql') {
      this.mysqlRules = new BodyTransformer({ target: 'mysql', ledger, mask });
    }
  }

  transform(masked: string): string {
    if (this.source === this.target) {
      return masked;
    }
    if (this.source === 'mysql') {
      return this.target === 'mysql' ? masked : this.fromMySql(masked, this.target);
    }
    return this.mysqlRules ? this.postgresToMySql(masked, this.mysqlRules) : this.postgresToOracle(masked);
  }

  // MySQL → PostgreSQL / Oracle

  private fromMySql(masked: string, target: ProceduralTarget): string {
    let sql = replaceMatches(masked, SET_ROW_COUNT, match => {
      this.ledger.rule('ROW_COUNT() → row count of the last statement');
      return target === 'postgresql' ? `GET DIAGNOSTICS ${match[1]} = ROW_COUNT;` : `${match[1]} := SQL%ROWCOUNT;`;
    });

    sql = replaceMatches(sql, SIGNAL, match => this.signal(match, target));
    sql = replaceMatches(sql, RESIGNAL, () => {
      this.ledger.rule('RESIGNAL → RAISE');
      return 'RAISE;';
    });
    sql = replaceMatches(sql, DEBUG_SELECT, match => this.debugFromMySql(match[1], target));

    sql = this.mysqlLoops(sql);
    sql = replaceMatches(sql, /\bLEAVE\s+([\w$#]+)\s*;/gi, match => {
      this.ledger.rule('LEAVE → EXIT');
      return `EXIT ${match[1]};`;
    });
    sql = replaceMatches(sql, /\bITERATE\s+([\w$#]+)\s*;/gi, match => {
      this.ledger.rule('ITERATE → CONTINUE');
      return `CONTINUE ${match[1]};`;
    });
    sql = replaceMatches(sql, MYSQL_LABEL, match => {
      this.ledger.rule(`${match[1]}: → <<${match[1]}>>`);
      return `<<${match[1]}>> ${match[2]}`;
    });
    sql = replaceMatches(sql, /\bELSEIF\b/gi, () => {
      this.ledger.rule('ELSEIF → ELSIF');
      return 'ELSIF';
    });

    return this.setAssignments(sql);
  }

  private signal(match: RegExpMatchArray, target: ProceduralTarget): string {
    const [, stateLiteral, conditionName, assignments] = match;
    const state = stateLiteral !== undefined ? unquote(this.mask.unmask(stateLiteral)) : '45000';
    let message: string | undefined;

    for (const item of splitTopLevel(assignments ?? '')) {
      const pair = /^\s*(MESSAGE_TEXT|MYSQL_ERRNO)\s*=\s*([\s\S]+?)\s*$/i.exec(item);
      if (pair && pair[1].toUpperCase() === 'MESSAGE_TEXT') {
        message = pair[2];
      } else if (pair) {
        this.ledger.warn('partial-support', 'info', `MYSQL_ERRNO ${pair[2]} dropped`);
      }
    }
    message ??= this.mask.mask(`'${conditionName ?? `SQLSTATE ${state}`}'`);

    if (target === 'postgresql') {
      const errcode = state === '45000' ? 'P0001' : state;
      this.ledger.rule(`SIGNAL SQLSTATE '${state}' → RAISE EXCEPTION ... ERRCODE '${errcode}'`);
      return `${this.mask.mask("RAISE EXCEPTION '%'")}, ${message} USING ERRCODE = ${this.mask.mask(`'${errcode}'`)};`;
    }

    if (state !== '45000') {
      this.ledger.warn('partial-support', 'info', `SQLSTATE ${state} dropped; RAISE_APPLICATION_ERROR raises -20000`);
    }
    this.ledger.rule(`SIGNAL SQLSTATE '${state}' → RAISE_APPLICATION_ERROR(-20000)`);
    return `RAISE_APPLICATION_ERROR(-20000, ${message});`;
  }

  private debugFromMySql(expression: string, target: ProceduralTarget): string {
    let value = expression.trim();
    const concat = /^CONCAT\s*\(/i.exec(value);
    if (concat && findMatchingParen(value, concat[0].length - 1) === value.length - 1) {
      value = splitTopLevel(value.slice(concat[0].length, -1)).map(part => part.trim()).join(' || ');
    }

    if (target === 'postgresql') {
      this.ledger.rule('SELECT ... AS debug_output → RAISE NOTICE');
      return `RAISE NOTICE ${this.mask.mask("'%'")}, ${value};`;
    }
    this.ledger.rule('SELECT ... AS debug_output → DBMS_OUTPUT.PUT_LINE');
    return `DBMS_OUTPUT.PUT_LINE(${value});`;
  }

  // WHILE ... DO / END WHILE and REPEAT ... UNTIL / END REPEAT become LOOP forms
  private mysqlLoops(masked: string): string {
    let sql = replaceMatches(masked, /\bUNTIL\s+([\s\S]+?)\s+END\s+REPEAT\b/gi, (match, text) => {
      const indent = lineIndentOf(text, match.index ?? 0);
      this.ledger.rule('REPEAT ... UNTIL → LOOP ... EXIT WHEN');
      return `EXIT WHEN ${match[1]};\n${indent}END LOOP`;
    });
    sql = sql.replace(/(?<!\bEND\s+)\bREPEAT\b/gi, 'LOOP');

    const tokens = tokenize(sql);
    const edits: TextEdit[] = [];
    let pendingWhile = 0;

    tokens.forEach((token, index) => {
      const previous = tokens[index - 1];
      const afterEnd = previous !== undefined && previous.upper === 'END' && /^\s*$/.test(sql.slice(previous.end, token.start));

      if (token.upper === 'WHILE' && afterEnd) {
        edits.push({ start: token.start, end: token.end, text: 'LOOP' });
      } else if (token.upper === 'WHILE') {
        pendingWhile++;
      } else if (token.upper === 'DO' && pendingWhile > 0) {
        pendingWhile--;
        edits.push({ start: token.start, end: token.end, text: 'LOOP' });
        this.ledger.rule('WHILE ... DO → WHILE ... LOOP');
      }
    });

    return applyEdits(sql, edits);
  }

  private setAssignments(masked: string): string {
    const edits: TextEdit[] = [];

    for (const statement of splitStatements(masked)) {
      const match = SET_STATEMENT.exec(statement.text);
      if (!match) continue;

      const items = splitTopLevel(match[3]).map(item => /^\s*(@{0,2}[\w$#.]+)\s*=\s*([\s\S]+?)\s*$/.exec(item));
      const pairs = items.filter((item): item is RegExpExecArray => item !== null);
      if (pairs.length !== items.length) continue;

      if (pairs.some(pair => pair[1].startsWith('@'))) {
        this.ledger.warn(
          'unsupported-statement',
          'warning',
          `Session variable assignment SET ${pairs.map(pair => pair[1]).join(', ')} left as written`,
          'Use a local variable or a temporary table'
        );
        continue;
      }

      const setStart = statement.start + (match.index ?? 0) + match[1].length + match[2].length;
      const indent = lineIndentOf(masked, setStart);
      const assignments = pairs.map(pair => `${pair[1]} := ${pair[2]};`).join(`\n${indent}`);
      pairs.forEach(pair => this.ledger.rule(`SET ${pair[1]} = → ${pair[1]} :=`));
      edits.push({ start: setStart, end: statement.end, text: assignments });
    }

    return applyEdits(masked, edits);
  }

  // PostgreSQL → MySQL

  private postgresToMySql(masked: string, rules: BodyTransformer): string {
    let sql = replaceMatches(masked, GET_ROW_COUNT, match => {
      this.ledger.rule('GET DIAGNOSTICS ... = ROW_COUNT → ROW_COUNT()');
      return `${match[1]} := ROW_COUNT();`;
    });

    sql = replaceMatches(sql, POSTGRES_RAISE, match => this.raiseToMySql(match));
    sql = replaceMatches(sql, POSTGRES_RAISE_CONDITION, match => this.raiseConditionToMySql(match));

    sql = replaceMatches(sql, RETURN_NEXT, (match, text) => {
      const start = match.index ?? 0;
      this.ledger.warn(
        'unsupported-statement',
        'error',
        'RETURN NEXT is not supported by MySQL',
        'Insert the rows into a temporary table or return them from a procedure with SELECT'
      );
      return commentOut(this.mask, text, start, start + match[0].length);
    });

    sql = replaceMatches(sql, PERFORM, () => {
      this.ledger.rule('PERFORM → DO');
      return 'DO ';
    });

    sql = this.foundToRowCount(sql);
    sql = replaceMatches(sql, POSTGRES_LABEL, match => {
      this.ledger.rule(`<<${match[1]}>> → ${match[1]}:`);
      return `${match[1]}:${match[2] || ' '}${match[3]}`;
    });

    sql = rules.loopControl(sql);
    sql = rules.loopForms(sql);
    return rules.assignments(sql);
  }

  private raiseToMySql(match: RegExpMatchArray): string {
    const level = match[1].toUpperCase();
    const parts = this.raiseParts(match[2]);

    if (level !== 'EXCEPTION') {
      this.ledger.warn(
        'unsupported-function',
        'warning',
        `RAISE ${level} becomes a SELECT that returns an extra result set`,
        'Remove the debug output or write it to a log table'
      );
      return `SELECT ${parts.message ?? this.mask.mask("''")} AS debug_output;`;
    }

    const state = this.mySqlState(parts.state);
    const message = parts.message ?? this.mask.mask(`'SQLSTATE ${state}'`);
    if (!isSimpleValue(message)) {
      this.ledger.warn(
        'syntax-difference',
        'warning',
        'SIGNAL MESSAGE_TEXT takes a literal or a variable, not an expression',
        'SET the message into a variable before SIGNAL'
      );
    }
    this.ledger.rule(`RAISE EXCEPTION → SIGNAL SQLSTATE '${state}'`);
    return `SIGNAL SQLSTATE ${this.mask.mask(`'${state}'`)} SET MESSAGE_TEXT = ${message};`;
  }

  // ERRCODE may be a SQLSTATE or a condition name
  private mySqlState(errcode: string | undefined): string {
    if (errcode === undefined || errcode === 'P0001' || /^U0/i.test(errcode)) {
      return '45000';
    }
    if (/^[0-9A-Z]{5}$/.test(errcode)) {
      return errcode;
    }
    const condition = predefinedConditions.find(candidate => candidate.postgresCondition === errcode.toUpperCase());
    return condition ? condition.mysqlSqlState : '45000';
  }

  private raiseConditionToMySql(match: RegExpMatchArray): string {
    const name = match[1].toUpperCase();
    if (RAISE_LEVELS.includes(name)) {
      return match[0];
    }
    const condition = predefinedConditions.find(candidate => candidate.postgresCondition === name);
    const state = condition ? condition.mysqlSqlState : '45000';
    const message = condition ? condition.message : match[1];
    this.ledger.rule(`RAISE ${match[1]} → SIGNAL SQLSTATE '${state}'`);
    return this.mask.mask(`SIGNAL SQLSTATE '${state}' SET MESSAGE_TEXT = '${message}';`);
  }

  private foundToRowCount(masked: string): string {
    return replaceMatches(masked, /\b(NOT\s+)?FOUND\b/gi, match => {
      const value = match[1] !== undefined ? '(ROW_COUNT() = 0)' : '(ROW_COUNT() > 0)';
      this.ledger.warn(
        'partial-support',
        'info',
        `${match[0].toUpperCase()} → ${value}; ROW_COUNT() reflects DML only, not SELECT INTO or FETCH`
      );
      return value;
    });
  }

  // PostgreSQL → Oracle

  private postgresToOracle(masked: string): string {
    let sql = replaceMatches(masked, GET_ROW_COUNT, match => {
      this.ledger.rule('GET DIAGNOSTICS ... = ROW_COUNT → SQL%ROWCOUNT');
      return `${match[1]} := SQL%ROWCOUNT;`;
    });

    sql = replaceMatches(sql, POSTGRES_RAISE, match => {
      const level = match[1].toUpperCase();
      const parts = this.raiseParts(match[2]);
      const message = parts.message ?? this.mask.mask("''");

      if (level !== 'EXCEPTION') {
        this.ledger.rule(`RAISE ${level} → DBMS_OUTPUT.PUT_LINE`);
        return `DBMS_OUTPUT.PUT_LINE(${message});`;
      }

      const custom = parts.state !== undefined ? /^U0(\d{3})$/i.exec(parts.state) : null;
      const code = custom ? -20000 - Number(custom[1]) : -20000;
      if (parts.state !== undefined && !custom && parts.state !== 'P0001') {
        this.ledger.warn('partial-support', 'info', `ERRCODE ${parts.state} dropped; RAISE_APPLICATION_ERROR raises ${code}`);
      }
      this.ledger.rule(`RAISE EXCEPTION → RAISE_APPLICATION_ERROR(${code})`);
      return `RAISE_APPLICATION_ERROR(${code}, ${message});`;
    });

    sql = replaceMatches(sql, POSTGRES_RAISE_CONDITION, match => {
      const name = match[1].toUpperCase();
      const condition = predefinedConditions.find(candidate => candidate.postgresCondition === name);
      if (!condition || RAISE_LEVELS.includes(name)) {
        return match[0];
      }
      this.ledger.rule(`RAISE ${match[1]} → RAISE ${condition.name}`);
      return `RAISE ${condition.name};`;
    });

    sql = replaceMatches(sql, RETURN_NEXT, match => {
      this.ledger.rule('RETURN NEXT → PIPE ROW');
      this.ledger.warn(
        'manual-review-needed',
        'warning',
        'RETURN NEXT becomes PIPE ROW; the function has to be declared PIPELINED over a collection type',
        'Declare a TABLE OF type for the rows and add PIPELINED to the function'
      );
      return `PIPE ROW(${match[1]});`;
    });

    sql = replaceMatches(sql, PERFORM, () => {
      this.ledger.warn(
        'manual-review-needed',
        'warning',
        'PERFORM has no PL/SQL counterpart',
        'Call a procedure directly or SELECT ... INTO a variable'
      );
      return 'PERFORM ';
    });

    return replaceMatches(sql, /\b(NOT\s+)?FOUND\b/gi, match => {
      const value = match[1] !== undefined ? 'SQL%NOTFOUND' : 'SQL%FOUND';
      this.ledger.rule(`${match[0].toUpperCase()} → ${value}`);
      return value;
    });
  }

  /**
   * Reads `'format', arg, ... [USING ERRCODE = x, MESSAGE = m]`. Each `%`
   * in the format is replaced by the matching argument.
   */
  private raiseParts(text: string): RaiseParts {
    const using = /^([\s\S]*?)(?:\s*\bUSING\b\s+([\s\S]+))?$/i.exec(text.trim());
    const head = using ? using[1] : text;
    const parts: RaiseParts = {};

    for (const option of splitTopLevel(using?.[2] ?? '')) {
      const pair = /^\s*(\w+)\s*=\s*([\s\S]+?)\s*$/.exec(option);
      if (!pair) continue;
      const key = pair[1].toUpperCase();
      if (key === 'ERRCODE') parts.state = unquote(this.mask.unmask(pair[2]));
      if (key === 'MESSAGE') parts.message = pair[2];
    }

    const [format, ...args] = splitTopLevel(head).map(part => part.trim());
    if (format === undefined || format === '') {
      return parts;
    }

    const literal = this.mask.unmask(format);
    if (!/^'[\s\S]*'$/.test(literal)) {
      parts.message = format;
      return parts;
    }

    const pieces = literal.slice(1, -1).replace(/%%/g, '\u0002').split('%');
    if (pieces.length - 1 !== args.length) {
      this.ledger.warn(
        'manual-review-needed',
        'warning',
        'RAISE format placeholders do not match its arguments; the format is used as the message',
        'Build the message text by hand'
      );
      parts.message = format;
      return parts;
    }

    const values: string[] = [];
    pieces.forEach((piece, index) => {
      if (piece !== '') values.push(this.mask.mask(`'${piece.replace(/\u0002/g, '%')}'`));
      if (index < args.length) values.push(args[index]);
    });

    if (values.length === 0) {
      parts.message = this.mask.mask("''");
    } else if (values.length === 1) {
      parts.message = values[0];
    } else {
      parts.message = this.target === 'mysql' ? `CONCAT(${values.join(', ')})` : values.join(' || ');
    }
    return parts;
  }
}

function unquote(text: string): string {
  return text.trim().replace(/^'([\s\S]*)'$/, '$1');
}
