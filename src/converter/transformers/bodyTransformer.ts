import {
  BlockSpan,
  findBlocks,
  findMatchingParen,
  lineIndentOf,
  splitStatements,
  splitTopLevel,
  tokenize
} from '../blockScanner';
import { enclosingRoutineBlock, mySqlDeclareLayout } from '../declarations';
import { COLLECTION_METHODS, ORACLE_PATTERNS, RAISE_LEVELS, ROW_COUNT_STATEMENT } from '../oraclePatterns';
import {
  RewriteContext,
  TextEdit,
  applyEdits,
  bodyIndent,
  commentOut,
  escapeRegExp,
  isSimpleValue,
  replaceMatches
} from '../rewriteUtils';
import { arrayElementType, mapDataType } from '../../mappings/dataTypes';
import { findCondition, USER_DEFINED_MYSQL_STATE, USER_DEFINED_POSTGRES_STATE } from '../../mappings/exceptionConditions';
import { TargetDialect } from '../../types/sql';

type RuleFn = (sql: string) => string;

interface BodyRule {
  name: string;
  apply: Record<TargetDialect, RuleFn>;
}

const P = ORACLE_PATTERNS;

// SAVEPOINT and ROLLBACK TO are valid in both targets
const keep: RuleFn = sql => sql;

/**
 * Rewrites PL/SQL body statements that have no direct counterpart in the
 * target dialect. Works on masked text; every rule either rewrites, leaves
 * the text alone, or leaves it alone and records a warning.
 */
export class BodyTransformer {
  private readonly rules: BodyRule[];

  constructor(private readonly ctx: RewriteContext) {
    this.rules = [
      {
        name: 'implicit cursor attributes',
        apply: { mysql: sql => this.implicitCursorMySql(sql), postgresql: sql => this.implicitCursorPostgres(sql) }
      },
      {
        name: 'autonomous transactions',
        apply: { mysql: sql => this.autonomousTransaction(sql), postgresql: sql => this.autonomousTransaction(sql) }
      },
      {
        name: 'pipelined functions',
        apply: { mysql: sql => this.pipelinedMySql(sql), postgresql: sql => this.pipelinedPostgres(sql) }
      },
      {
        name: 'collection types',
        apply: { mysql: sql => this.collectionsMySql(sql), postgresql: sql => this.collectionsPostgres(sql) }
      },
      {
        name: 'cursor references',
        apply: { mysql: sql => this.refCursorMySql(sql), postgresql: sql => this.refCursorPostgres(sql) }
      },
      {
        name: 'RETURNING INTO',
        apply: { mysql: sql => this.returningInto(sql), postgresql: keep }
      },
      {
        name: 'labels and GOTO',
        apply: { mysql: sql => this.labelsMySql(sql), postgresql: sql => this.labelsPostgres(sql) }
      },
      {
        name: 'EXIT / CONTINUE WHEN',
        apply: { mysql: sql => this.loopControl(sql), postgresql: sql => this.loopControl(sql) }
      },
      {
        name: 'RAISE_APPLICATION_ERROR',
        apply: { mysql: sql => this.raiseApplicationError(sql), postgresql: sql => this.raiseApplicationError(sql) }
      },
      {
        name: 'RAISE exception name',
        apply: { mysql: sql => this.raiseNamed(sql), postgresql: sql => this.raiseNamed(sql) }
      },
      {
        name: 'savepoints',
        apply: { mysql: keep, postgresql: keep }
      },
      {
        name: 'DBMS_OUTPUT',
        apply: { mysql: sql => this.debugOutput(sql), postgresql: sql => this.debugOutput(sql) }
      },
      {
        name: 'PRAGMA EXCEPTION_INIT',
        apply: { mysql: sql => this.exceptionInit(sql), postgresql: sql => this.exceptionInit(sql) }
      },
      {
        name: 'explicit cursor attributes',
        apply: { mysql: sql => this.explicitCursorMySql(sql), postgresql: sql => this.explicitCursorPostgres(sql) }
      },
      {
        name: 'loop forms',
        apply: { mysql: sql => this.loopForms(sql), postgresql: keep }
      },
      {
        name: 'assignments',
        apply: { mysql: sql => this.assignments(sql), postgresql: keep }
      }
    ];
  }

  get ruleNames(): string[] {
    return this.rules.map(rule => rule.name);
  }

  transform(masked: string): string {
    return this.rules.reduce((sql, rule) => rule.apply[this.ctx.target](sql), masked);
  }

  // Statement rules that also apply inside exception handler bodies
  transformHandlerBody(masked: string): string {
    const handlerRules = ['RAISE_APPLICATION_ERROR', 'RAISE exception name', 'DBMS_OUTPUT', 'assignments'];
    return this.rules
      .filter(rule => handlerRules.includes(rule.name))
      .reduce((sql, rule) => rule.apply[this.ctx.target](sql), masked);
  }

  // Implicit cursor attributes

  private implicitCursorMySql(sql: string): string {
    let result = this.substitute(sql, P.IMPLICIT_ROWCOUNT, 'ROW_COUNT()', 'SQL%ROWCOUNT → ROW_COUNT()');
    result = this.substitute(result, P.IMPLICIT_FOUND, '(ROW_COUNT() > 0)', 'SQL%FOUND → ROW_COUNT() > 0');
    result = this.substitute(result, P.IMPLICIT_NOTFOUND, '(ROW_COUNT() = 0)', 'SQL%NOTFOUND → ROW_COUNT() = 0');
    return this.substitute(result, P.IMPLICIT_ISOPEN, 'FALSE', 'SQL%ISOPEN → FALSE');
  }

  private implicitCursorPostgres(sql: string): string {
    let result = replaceMatches(sql, P.ROWCOUNT_ASSIGNMENT, match => {
      this.ctx.ledger.rule('SQL%ROWCOUNT assignment → GET DIAGNOSTICS ... = ROW_COUNT');
      return `GET DIAGNOSTICS ${match[1]} = ROW_COUNT;`;
    });
    result = this.substitute(result, P.IMPLICIT_FOUND, 'FOUND', 'SQL%FOUND → FOUND');
    result = this.substitute(result, P.IMPLICIT_NOTFOUND, 'NOT FOUND', 'SQL%NOTFOUND → NOT FOUND');
    result = this.substitute(result, P.IMPLICIT_ISOPEN, 'FALSE', 'SQL%ISOPEN → FALSE');
    return this.hoistRowCount(result);
  }

  /**
   * SQL%ROWCOUNT used inside an expression: capture it with GET DIAGNOSTICS
   * right after the statement that set it, into a variable declared in the
   * enclosing block.
   */
  private hoistRowCount(sql: string): string {
    const references = [...sql.matchAll(P.IMPLICIT_ROWCOUNT)];
    if (references.length === 0) {
      return sql;
    }

    const blocks = findBlocks(sql);
    if (!blocks.some(block => block.depth === 0)) {
      return replaceMatches(sql, P.IMPLICIT_ROWCOUNT, () => {
        this.ctx.ledger.warn(
          'manual-review-needed',
          'warning',
          'SQL%ROWCOUNT used outside a block; replaced with a placeholder',
          'Capture the count with GET DIAGNOSTICS <variable> = ROW_COUNT after the DML statement'
        );
        return `${this.ctx.mask.protect('/* SQL%ROWCOUNT - use GET DIAGNOSTICS */')} 0`;
      });
    }

    const variable = uniqueName(sql, 'v_sql_rowcount');
    const statements = splitStatements(sql);
    const edits: TextEdit[] = [];
    const capturePoints = new Set<number>();
    const declaringBlocks = new Map<number, BlockSpan>();

    for (const reference of references) {
      const offset = reference.index ?? 0;
      edits.push({ start: offset, end: offset + reference[0].length, text: variable });

      const current = statements.findIndex(statement => statement.start <= offset && offset < statement.end);
      let previous = -1;
      for (let i = current - 1; i >= 0; i--) {
        if (ROW_COUNT_STATEMENT.test(statements[i].text)) {
          previous = i;
          break;
        }
      }

      const capture = `GET DIAGNOSTICS ${variable} = ROW_COUNT;`;
      if (previous >= 0) {
        const statement = statements[previous];
        if (!capturePoints.has(statement.end)) {
          capturePoints.add(statement.end);
          const keyword = ROW_COUNT_STATEMENT.exec(statement.text);
          const indent = lineIndentOf(sql, statement.start + (keyword ? keyword.index : leadingSpace(statement.text)));
          edits.push({ start: statement.end, end: statement.end, text: `\n${indent}${capture}` });
        }
      } else if (current >= 0) {
        const start = statements[current].start + leadingSpace(statements[current].text);
        if (!capturePoints.has(start)) {
          capturePoints.add(start);
          edits.push({ start, end: start, text: `${capture}\n${lineIndentOf(sql, start)}` });
        }
      }

      const block = enclosingRoutineBlock(blocks, offset);
      if (block) {
        declaringBlocks.set(block.beginStart, block);
      }

      this.ctx.ledger.warn(
        'partial-support',
        'info',
        `SQL%ROWCOUNT inside an expression is read from ${variable}, captured with GET DIAGNOSTICS`
      );
    }

    for (const block of declaringBlocks.values()) {
      edits.push(this.declareBefore(sql, block, `${variable} INTEGER;`));
    }

    this.ctx.ledger.rule(`SQL%ROWCOUNT expression → GET DIAGNOSTICS ${variable} = ROW_COUNT`);
    return applyEdits(sql, edits);
  }

  // Adds a PL/pgSQL declaration to the section in front of `block`
  private declareBefore(sql: string, block: BlockSpan, declaration: string): TextEdit {
    const dollar = sql.lastIndexOf('$$', block.beginStart);
    const region = sql.slice(dollar >= 0 ? dollar + 2 : 0, block.beginStart);
    const hasSection = dollar >= 0 ? /\bDECLARE\b/i.test(region) : /\b(?:DECLARE|IS|AS)\b/i.test(region);

    const lineStart = sql.lastIndexOf('\n', block.beginStart - 1) + 1;
    const indent = lineIndentOf(sql, block.beginStart);

    if (/^[ \t]*$/.test(sql.slice(lineStart, block.beginStart))) {
      const section = hasSection ? '' : `${indent}DECLARE\n`;
      return { start: lineStart, end: lineStart, text: `${section}${indent}  ${declaration}\n` };
    }
    const section = hasSection ? '' : 'DECLARE ';
    return { start: block.beginStart, end: block.beginStart, text: `${section}${declaration}\n${indent}` };
  }

  // Pragmas

  private autonomousTransaction(sql: string): string {
    return replaceMatches(sql, P.AUTONOMOUS_TRANSACTION, (match, text) => {
      const start = match.index ?? 0;
      if (this.ctx.target === 'mysql') {
        this.ctx.ledger.warn(
          'unsupported-statement',
          'error',
          'PRAGMA AUTONOMOUS_TRANSACTION is not supported by MySQL',
          'Perform the independent work on a separate connection from the application'
        );
      } else {
        this.ctx.ledger.warn(
          'unsupported-statement',
          'warning',
          'PRAGMA AUTONOMOUS_TRANSACTION is not supported by PostgreSQL',
          'Run the independent work over a separate connection with dblink or pg_background'
        );
      }
      return commentOut(this.ctx.mask, text, start, start + match[0].length);
    });
  }

  private exceptionInit(sql: string): string {
    return replaceMatches(sql, P.EXCEPTION_INIT, (match, text) => {
      const start = match.index ?? 0;
      const code = match[2].replace(/\s+/g, '');
      this.ctx.ledger.warn(
        'syntax-difference',
        'warning',
        `PRAGMA EXCEPTION_INIT binds ${match[1]} to error ${code}; ${this.ctx.target} conditions cannot be bound to Oracle error codes`,
        this.ctx.target === 'mysql'
          ? `Declare ${match[1]} with CONDITION FOR the matching MySQL error number`
          : `Handle the matching SQLSTATE for ${match[1]} in the EXCEPTION section`
      );
      return commentOut(this.ctx.mask, text, start, start + match[0].length);
    });
  }

  // Pipelined functions

  private pipelinedMySql(sql: string): string {
    const rows = replaceMatches(sql, P.PIPE_ROW, (match, text) => {
      const start = match.index ?? 0;
      this.ctx.ledger.warn(
        'unsupported-statement',
        'error',
        'PIPE ROW is not supported by MySQL',
        'Insert the rows into a temporary table or return them from a procedure with SELECT'
      );
      return commentOut(this.ctx.mask, text, start, start + match[0].length);
    });

    return replaceMatches(rows, P.PIPELINED, (match, text) => {
      const start = match.index ?? 0;
      this.ctx.ledger.warn(
        'unsupported-statement',
        'error',
        'Pipelined functions are not supported by MySQL',
        'Convert the function to a procedure that fills a temporary table or opens a cursor'
      );
      return commentOut(this.ctx.mask, text, start, start + match[0].length);
    });
  }

  private pipelinedPostgres(sql: string): string {
    const rows = replaceMatches(sql, P.PIPE_ROW, match => {
      this.ctx.ledger.rule('PIPE ROW → RETURN NEXT');
      return `RETURN NEXT ${match[1]};`;
    });

    return replaceMatches(rows, P.PIPELINED, () => {
      this.ctx.ledger.rule('PIPELINED → set-returning function');
      this.ctx.ledger.warn(
        'partial-support',
        'info',
        'Pipelined function becomes a set-returning function; rows reach the caller when the function returns'
      );
      return this.ctx.mask.protect('/* rows returned with RETURN NEXT */');
    });
  }

  // Collection types

  private collectionsMySql(sql: string): string {
    const unsupported = (kind: string) => (match: RegExpMatchArray, text: string): string => {
      const start = match.index ?? 0;
      this.ctx.ledger.warn(
        'unsupported-statement',
        'error',
        `${kind} type ${match[1]} is not supported by MySQL`,
        'Use a temporary table or a JSON value instead'
      );
      return commentOut(this.ctx.mask, text, start, start + match[0].length);
    };

    let result = replaceMatches(sql, P.TABLE_OF, unsupported('Collection'));
    result = replaceMatches(result, P.VARRAY, unsupported('VARRAY'));

    return this.replaceRecords(result, (name, _fields, start, end, text) => {
      this.ctx.ledger.warn(
        'unsupported-statement',
        'error',
        `Record type ${name} is not supported by MySQL`,
        'Declare one variable per field or use a temporary table'
      );
      return commentOut(this.ctx.mask, text, start, end);
    });
  }

  private collectionsPostgres(sql: string): string {
    const aliases = new Map<string, string>();

    let result = replaceMatches(sql, P.TABLE_OF, match => {
      const [, name, element, indexBy] = match;
      let type = `${arrayElementType(element, 'oracle')}[]`;

      if (indexBy !== undefined && /CHAR|STRING/i.test(indexBy)) {
        type = 'JSONB';
        this.ctx.ledger.warn(
          'partial-support',
          'warning',
          `Associative array ${name} indexed by ${indexBy.trim()} becomes JSONB`,
          'Read elements with ->> and write them with jsonb_set'
        );
      } else if (indexBy !== undefined) {
        this.ctx.ledger.warn(
          'partial-support',
          'info',
          `Associative array ${name} becomes an array; sparse indexes are not preserved`
        );
      }

      aliases.set(name.toLowerCase(), type);
      this.ctx.ledger.rule(`TYPE ${name} IS TABLE OF → ${type}`);
      return this.ctx.mask.protect(`-- ${name}: ${type}`);
    });

    result = replaceMatches(result, P.VARRAY, match => {
      const [, name, size, element] = match;
      const type = `${arrayElementType(element, 'oracle')}[]`;
      aliases.set(name.toLowerCase(), type);
      this.ctx.ledger.rule(`TYPE ${name} IS VARRAY(${size}) → ${type}`);
      this.ctx.ledger.warn('partial-support', 'info', `VARRAY ${name} becomes ${type}; the limit of ${size} elements is not enforced`);
      return this.ctx.mask.protect(`-- ${name}: ${type}, at most ${size} elements (not enforced)`);
    });

    result = this.replaceRecords(result, (name, fields) => {
      const columns = splitTopLevel(fields).map(field => this.compositeField(name, field.trim()));
      this.ctx.ledger.hoist(this.ctx.mask.unmask(`CREATE TYPE ${name} AS (\n  ${columns.join(',\n  ')}\n);`));
      this.ctx.ledger.rule(`TYPE ${name} IS RECORD → CREATE TYPE ${name} AS (...)`);
      this.ctx.ledger.warn(
        'partial-support',
        'info',
        `Record type ${name} becomes a schema-level composite type created before the routine`
      );
      return this.ctx.mask.protect(`-- ${name}: composite type created before the routine`);
    });

    result = this.substituteAliases(result, aliases);

    if (aliases.size > 0) {
      const methods = new RegExp(`\\b[\\w$#]+\\s*\\.\\s*(?:${COLLECTION_METHODS.join('|')})\\b`, 'i');
      if (methods.test(result)) {
        this.ctx.ledger.warn(
          'manual-review-needed',
          'warning',
          'Collection methods (COUNT, EXTEND, DELETE, FIRST, LAST, ...) have no array counterpart',
          'Use array_length, cardinality, array_append and array_remove'
        );
      }
    }

    return result;
  }

  private compositeField(typeName: string, field: string): string {
    const match = /^([\w$#]+)\s+([\s\S]+?)(?:\s+NOT\s+NULL)?(?:\s*(?::=|\bDEFAULT\b)[\s\S]*)?$/i.exec(field);
    if (!match) {
      return field;
    }
    if (/%(?:ROW)?TYPE\b/i.test(match[2])) {
      this.ctx.ledger.warn(
        'manual-review-needed',
        'warning',
        `Field ${match[1]} of ${typeName} is anchored with %TYPE, which CREATE TYPE does not accept`,
        'Replace the anchor with the column type'
      );
    }
    return `${match[1]} ${mapDataType(match[2], 'oracle', 'postgresql', this.ctx.ledger)}`;
  }

  /**
   * Finds `TYPE name IS RECORD (...)`; the field list may contain
   * parentheses, so it is matched by balance rather than by pattern.
   */
  private replaceRecords(
    sql: string,
    render: (name: string, fields: string, start: number, end: number, text: string) => string
  ): string {
    const edits: TextEdit[] = [];

    for (const match of sql.matchAll(P.RECORD_START)) {
      const start = match.index ?? 0;
      const open = start + match[0].length - 1;
      const close = findMatchingParen(sql, open);
      if (close === -1) continue;

      const tail = /^\s*;/.exec(sql.slice(close + 1));
      const end = close + 1 + (tail ? tail[0].length : 0);
      edits.push({ start, end, text: render(match[1], sql.slice(open + 1, close), start, end, sql) });
    }

    return applyEdits(sql, edits);
  }

  private substituteAliases(sql: string, aliases: Map<string, string>): string {
    let result = sql;

    for (const [name, type] of aliases) {
      const word = escapeRegExp(name);
      const constructor = new RegExp(`(?<![\\w$#.%])${word}\\s*\\(`, 'gi');

      result = replaceMatches(result, constructor, (match, text) => {
        const open = (match.index ?? 0) + match[0].length - 1;
        if (findMatchingParen(text, open) === -1) return match[0];
        return type === 'JSONB' ? '\u0001JSONB(' : `\u0001${type}(`;
      });
      result = this.rewriteConstructors(result, type);

      result = result.replace(new RegExp(`(?<![\\w$#.%])${word}(?![\\w$#])`, 'gi'), type);
    }

    return result;
  }

  // `\u0001type(a, b)` marks a constructor call found by substituteAliases
  private rewriteConstructors(sql: string, type: string): string {
    const marker = `\u0001${type}(`;
    let result = sql;
    let at = result.indexOf(marker);

    while (at !== -1) {
      const open = at + marker.length - 1;
      const close = findMatchingParen(result, open);
      const items = result.slice(open + 1, close).trim();
      const value = type === 'JSONB'
        ? this.ctx.mask.mask("'{}'::JSONB")
        : `ARRAY[${items}]::${type}`;
      result = result.slice(0, at) + value + result.slice(close + 1);
      this.ctx.ledger.rule(`collection constructor → ${type === 'JSONB' ? 'empty JSONB' : 'ARRAY[...]'}`);
      at = result.indexOf(marker);
    }

    return result;
  }

  // Cursor references

  private refCursorMySql(sql: string): string {
    const declarations = replaceMatches(sql, P.REF_CURSOR, (match, text) => {
      const start = match.index ?? 0;
      this.ctx.ledger.warn(
        'unsupported-statement',
        'warning',
        `REF CURSOR type ${match[1]} is not supported by MySQL`,
        'Return the rows from a procedure with SELECT instead of a cursor variable'
      );
      return commentOut(this.ctx.mask, text, start, start + match[0].length);
    });

    Array.from(declarations.matchAll(P.SYS_REFCURSOR)).forEach(() => {
      this.ctx.ledger.warn(
        'unsupported-statement',
        'warning',
        'SYS_REFCURSOR has no MySQL counterpart',
        'Return the rows from a procedure with SELECT instead of a cursor variable'
      );
    });
    return declarations;
  }

  private refCursorPostgres(sql: string): string {
    const aliases = new Map<string, string>();

    const declarations = replaceMatches(sql, P.REF_CURSOR, match => {
      const [, name, rowShape] = match;
      if (rowShape !== undefined) {
        this.ctx.ledger.warn(
          'partial-support',
          'info',
          `REF CURSOR ${name} RETURN ${rowShape.trim()}: PostgreSQL cursor references carry no row type`
        );
      }
      aliases.set(name.toLowerCase(), 'REFCURSOR');
      this.ctx.ledger.rule(`TYPE ${name} IS REF CURSOR → REFCURSOR`);
      return this.ctx.mask.protect(`-- ${name}: REFCURSOR`);
    });

    const system = this.substitute(declarations, P.SYS_REFCURSOR, 'REFCURSOR', 'SYS_REFCURSOR → REFCURSOR');
    return this.substituteAliases(system, aliases);
  }

  // RETURNING INTO

  private returningInto(sql: string): string {
    return replaceMatches(sql, P.RETURNING_INTO, (match, text) => {
      const start = match.index ?? 0;
      const end = start + match[0].length;
      const indent = lineIndentOf(text, start);
      const clause = `RETURNING ${match[1]} INTO ${match[2]}`.replace(/\s+/g, ' ');
      const following = /^[ \t]*[^\s]/.test(text.slice(end).split('\n')[0]) ? `\n${indent}` : '';

      this.ctx.ledger.warn(
        'unsupported-statement',
        'warning',
        'RETURNING ... INTO is not supported by MySQL',
        'Read generated keys with LAST_INSERT_ID() or re-read the row with SELECT ... INTO'
      );
      return `;\n${indent}${this.ctx.mask.protect(`-- ${clause}`)}${following}`;
    });
  }

  // Labels and GOTO

  private labelsMySql(sql: string): string {
    const loopLabel = /<<\s*([\w$#]+)\s*>>(\s*)(LOOP|WHILE|FOR|REPEAT)\b/gi;
    const loops = replaceMatches(sql, loopLabel, match => {
      this.ctx.ledger.rule(`<<${match[1]}>> → ${match[1]}: (loop label)`);
      return `${match[1]}:${match[2] === '' ? ' ' : match[2]}${match[3]}`;
    });

    const labels = replaceMatches(loops, P.LABEL, (match, text) => {
      const start = match.index ?? 0;
      this.ctx.ledger.warn(
        'unsupported-statement',
        'error',
        `Label ${match[1]} is a GOTO target, which MySQL does not support`,
        'Restructure the jump into loop or IF control flow'
      );
      return commentOut(this.ctx.mask, text, start, start + match[0].length);
    });

    return replaceMatches(labels, P.GOTO, (match, text) => {
      const start = match.index ?? 0;
      this.ctx.ledger.warn(
        'unsupported-statement',
        'error',
        `GOTO ${match[1]} is not supported by MySQL`,
        'Restructure the jump into loop or IF control flow with LEAVE and ITERATE'
      );
      return commentOut(this.ctx.mask, text, start, start + match[0].length);
    });
  }

  private labelsPostgres(sql: string): string {
    for (const match of sql.matchAll(P.GOTO)) {
      this.ctx.ledger.warn(
        'syntax-difference',
        'info',
        `GOTO ${match[1]} kept as written`,
        'Prefer structured loop and IF control flow over jumps'
      );
    }
    return sql;
  }

  // Loop control

  loopControl(sql: string): string {
    const mysql = this.ctx.target === 'mysql';
    const keyword = (source: string): string => {
      if (!mysql) return source.toUpperCase();
      return source.toUpperCase() === 'EXIT' ? 'LEAVE' : 'ITERATE';
    };

    const conditional = replaceMatches(sql, P.EXIT_WHEN, match => {
      const [, statement, label, condition] = match;
      const jump = keyword(statement);
      this.warnUnlabeled(jump, label);
      this.ctx.ledger.rule(`${statement.toUpperCase()} WHEN → IF ... THEN ${jump}`);
      return `IF ${condition} THEN ${jump}${label ? ` ${label}` : ''}; END IF;`;
    });

    if (!mysql) {
      return conditional;
    }

    return replaceMatches(conditional, P.PLAIN_EXIT, match => {
      const [, statement, label] = match;
      const jump = keyword(statement);
      this.warnUnlabeled(jump, label);
      this.ctx.ledger.rule(`${statement.toUpperCase()} → ${jump}`);
      return `${jump}${label ? ` ${label}` : ''};`;
    });
  }

  private warnUnlabeled(jump: string, label: string | undefined): void {
    if (this.ctx.target === 'mysql' && label === undefined) {
      this.ctx.ledger.warn(
        'syntax-difference',
        'warning',
        `MySQL ${jump} needs the label of the loop it leaves`,
        `Label the loop (name: LOOP) and write ${jump} name`
      );
    }
  }

  // Raising errors

  private raiseApplicationError(sql: string): string {
    return replaceMatches(sql, P.RAISE_APPLICATION_ERROR, match => {
      const code = Number(match[1].replace(/\s+/g, ''));
      const message = match[2].trim();

      if (this.ctx.target === 'mysql') {
        if (!isSimpleValue(message)) {
          this.ctx.ledger.warn(
            'syntax-difference',
            'warning',
            'SIGNAL MESSAGE_TEXT takes a literal or a variable, not an expression',
            'SET the message into a variable before SIGNAL'
          );
        }
        this.ctx.ledger.warn('partial-support', 'info', `Error code ${code} dropped; MySQL raises SQLSTATE 45000`);
        this.ctx.ledger.rule(`RAISE_APPLICATION_ERROR(${code}) → SIGNAL SQLSTATE '45000'`);
        return `${this.ctx.mask.mask("SIGNAL SQLSTATE '45000'")} SET MESSAGE_TEXT = ${message};`;
      }

      const state = customSqlState(code);
      this.ctx.ledger.rule(`RAISE_APPLICATION_ERROR(${code}) → RAISE EXCEPTION ... ERRCODE '${state}'`);
      return this.ctx.mask.mask(`RAISE EXCEPTION '%', ${message} USING ERRCODE = '${state}';`);
    });
  }

  private raiseNamed(sql: string): string {
    return replaceMatches(sql, P.RAISE_NAMED, (match, text) => {
      const name = match[1].replace(/\s+/g, '');
      if (RAISE_LEVELS.includes(name.toUpperCase())) {
        return match[0];
      }

      const condition = findCondition(name);
      const mysql = this.ctx.target === 'mysql';
      if (mysql && !condition && new RegExp(`\\bDECLARE\\s+${escapeRegExp(name)}\\s+CONDITION\\b`, 'i').test(text)) {
        this.ctx.ledger.rule(`RAISE ${name} → SIGNAL ${name}`);
        return `SIGNAL ${name} SET MESSAGE_TEXT = ${this.ctx.mask.mask(`'${name}'`)};`;
      }

      const state = condition
        ? mysql ? condition.mysqlSqlState : condition.postgresSqlState
        : mysql ? USER_DEFINED_MYSQL_STATE : USER_DEFINED_POSTGRES_STATE;
      const message = condition ? condition.message : name;

      this.ctx.ledger.rule(`RAISE ${name} → SQLSTATE '${state}'`);
      return this.ctx.mask.mask(
        mysql
          ? `SIGNAL SQLSTATE '${state}' SET MESSAGE_TEXT = '${message}';`
          : `RAISE EXCEPTION '${message}' USING ERRCODE = '${state}';`
      );
    });
  }

  // Debug output

  private debugOutput(sql: string): string {
    const lines = replaceMatches(sql, P.PUT_LINE, match => {
      const argument = match[1].trim() || this.ctx.mask.mask("''");

      if (this.ctx.target === 'mysql') {
        const parts = splitTopLevel(argument.replace(/\|\|/g, '\u0001'), '\u0001').map(part => part.trim());
        const value = parts.length > 1 ? `CONCAT(${parts.join(', ')})` : argument;
        this.ctx.ledger.warn(
          'unsupported-function',
          'warning',
          'DBMS_OUTPUT.PUT_LINE becomes a SELECT that returns an extra result set',
          'Remove the debug output or write it to a log table'
        );
        return `SELECT ${value} AS debug_output;`;
      }

      this.ctx.ledger.rule('DBMS_OUTPUT.PUT_LINE → RAISE NOTICE');
      return `RAISE NOTICE ${this.ctx.mask.mask("'%'")}, ${argument};`;
    });

    return replaceMatches(lines, P.DBMS_OUTPUT_OTHER, (match, text) => {
      const start = match.index ?? 0;
      this.ctx.ledger.warn('unsupported-function', 'info', 'DBMS_OUTPUT call without a counterpart commented out');
      return commentOut(this.ctx.mask, text, start, start + match[0].length);
    });
  }

  // Explicit cursor attributes

  private explicitCursorPostgres(sql: string): string {
    return replaceMatches(sql, P.EXPLICIT_CURSOR_ATTRIBUTE, match => {
      const [, cursor, attribute] = match;
      const upper = attribute.toUpperCase();
      if (cursor.toUpperCase() === 'SQL') {
        return match[0];
      }

      if (upper === 'FOUND' || upper === 'NOTFOUND') {
        const value = upper === 'FOUND' ? 'FOUND' : 'NOT FOUND';
        this.ctx.ledger.rule(`${cursor}%${upper} → ${value}`);
        return value;
      }

      this.warnCursorAttribute(cursor, upper);
      return match[0];
    });
  }

  /**
   * FETCH-loop attributes become a done flag set by a NOT FOUND handler,
   * the MySQL cursor loop idiom.
   */
  private explicitCursorMySql(sql: string): string {
    const references = [...sql.matchAll(P.EXPLICIT_CURSOR_ATTRIBUTE)].filter(
      match => match[1].toUpperCase() !== 'SQL'
    );
    if (references.length === 0) {
      return sql;
    }

    const flag = uniqueName(sql, 'v_no_more_rows');
    const edits: TextEdit[] = [];
    let flagged = false;

    for (const reference of references) {
      const [text, cursor, attribute] = reference;
      const upper = attribute.toUpperCase();
      const start = reference.index ?? 0;

      if (upper === 'FOUND' || upper === 'NOTFOUND') {
        const value = upper === 'FOUND' ? `NOT ${flag}` : flag;
        edits.push({ start, end: start + text.length, text: value });
        this.ctx.ledger.rule(`${cursor}%${upper} → ${value}`);
        flagged = true;
      } else {
        this.warnCursorAttribute(cursor, upper);
      }
    }

    if (flagged) {
      const first = references[0].index ?? 0;
      const block = enclosingRoutineBlock(findBlocks(sql), first);
      const declaration = `DECLARE ${flag} BOOLEAN DEFAULT FALSE;`;
      const handler = `DECLARE CONTINUE HANDLER FOR NOT FOUND SET ${flag} = TRUE;`;

      if (block) {
        const layout = mySqlDeclareLayout(sql, block.beginEnd);
        const indent = bodyIndent(sql.slice(block.beginEnd, block.endStart));
        const existingHandler = /\bHANDLER\s+FOR\s+NOT\s+FOUND\b/i.test(sql);

        if (layout.variableInsert === layout.end) {
          const text = existingHandler ? `\n${indent}${declaration}` : `\n${indent}${declaration}\n${indent}${handler}`;
          edits.push({ start: layout.end, end: layout.end, text });
        } else {
          edits.push({ start: layout.variableInsert, end: layout.variableInsert, text: `${declaration}\n${indent}` });
          if (!existingHandler) {
            edits.push({ start: layout.end, end: layout.end, text: `\n${indent}${handler}` });
          }
        }

        if (existingHandler || /\bWHEN\s+NO_DATA_FOUND\b/i.test(sql)) {
          this.ctx.ledger.warn(
            'manual-review-needed',
            'warning',
            'The block already handles NOT FOUND; MySQL allows one NOT FOUND handler per block',
            `Set ${flag} from the existing handler instead`
          );
        }
        this.ctx.ledger.warn(
          'partial-support',
          'info',
          `Cursor loop state is tracked in ${flag}; the NOT FOUND handler also fires for SELECT ... INTO without rows`
        );
      } else {
        this.ctx.ledger.warn(
          'manual-review-needed',
          'warning',
          `Cursor attributes read ${flag}, which has to be declared`,
          `Add ${declaration} and ${handler}`
        );
      }
    }

    return applyEdits(sql, edits);
  }

  private warnCursorAttribute(cursor: string, attribute: string): void {
    this.ctx.ledger.warn(
      'manual-review-needed',
      'warning',
      `${cursor}%${attribute} has no ${this.ctx.target} counterpart`,
      attribute === 'ROWCOUNT' ? 'Count fetched rows in a variable' : 'Track the cursor state in a variable'
    );
  }

  // Loop forms

  /**
   * `WHILE c LOOP ... END LOOP` becomes `WHILE c DO ... END WHILE` and
   * ELSIF becomes ELSEIF. FOR loops have no MySQL counterpart and are
   * reported.
   */
  loopForms(sql: string): string {
    const tokens = tokenize(sql);
    const stack: { kind: 'while' | 'for' | 'loop'; start: number; end: number }[] = [];
    const edits: TextEdit[] = [];
    let pending: 'while' | 'for' | undefined;

    tokens.forEach((token, index) => {
      const previous = tokens[index - 1];
      const afterEnd = previous !== undefined && previous.upper === 'END' && /^\s*$/.test(sql.slice(previous.end, token.start));

      if (token.upper === 'WHILE' && !afterEnd) {
        pending = 'while';
      } else if (token.upper === 'FOR' && !afterEnd && tokens[index + 2]?.upper === 'IN') {
        pending = 'for';
        const cursorLoop = tokens[index + 3] !== undefined && !/^\s*(?:REVERSE\b|\d|-)/i.test(sql.slice(tokens[index + 2].end));
        this.ctx.ledger.warn(
          'unsupported-statement',
          'error',
          `FOR ${tokens[index + 1].text} IN ... LOOP is not supported by MySQL`,
          cursorLoop
            ? 'Use OPEN, a FETCH loop and a NOT FOUND handler'
            : 'Rewrite it as a WHILE loop with a counter variable'
        );
      } else if (token.upper === 'LOOP' && !afterEnd) {
        stack.push({ kind: pending ?? 'loop', start: token.start, end: token.end });
        pending = undefined;
      } else if (token.upper === 'LOOP' && afterEnd) {
        const frame = stack.pop();
        if (frame && frame.kind === 'while') {
          edits.push({ start: frame.start, end: frame.end, text: 'DO' });
          edits.push({ start: token.start, end: token.end, text: 'WHILE' });
          this.ctx.ledger.rule('WHILE ... LOOP → WHILE ... DO ... END WHILE');
        }
      }
    });

    return replaceMatches(applyEdits(sql, edits), /\bELSIF\b/gi, () => {
      this.ctx.ledger.rule('ELSIF → ELSEIF');
      return 'ELSEIF';
    });
  }

  // Assignments

  assignments(sql: string): string {
    const assignment = /(^|[;\n]|\b(?:BEGIN|THEN|ELSE|LOOP|DO|REPEAT)\b)([ \t]*)([\w$#.]+)\s*:=\s*/gim;
    return replaceMatches(sql, assignment, match => {
      this.ctx.ledger.rule(`${match[3]} := → SET ${match[3]} =`);
      return `${match[1]}${match[2] || (match[1] === '' || match[1].endsWith('\n') ? '' : ' ')}SET ${match[3]} = `;
    });
  }

  private substitute(sql: string, pattern: RegExp, replacement: string, description: string): string {
    return replaceMatches(sql, pattern, () => {
      this.ctx.ledger.rule(description);
      return replacement;
    });
  }
}

// Oracle reserves -20000 .. -20999 for applications; those map to class U0
export function customSqlState(code: number): string {
  if (code <= -20000 && code >= -20999) {
    return `U0${String(-code - 20000).padStart(3, '0')}`;
  }
  return USER_DEFINED_POSTGRES_STATE;
}

function uniqueName(sql: string, base: string): string {
  let name = base;
  for (let suffix = 1; new RegExp(`\\b${name}\\b`, 'i').test(sql); suffix++) {
    name = `${base}_${suffix}`;
  }
  return name;
}

function leadingSpace(text: string): number {
  const match = /^(?:\s|\u0000\d+\u0000)*/.exec(text);
  return match ? match[0].length : 0;
}
