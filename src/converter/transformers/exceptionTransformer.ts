import { BlockSpan, findBlocks, lineIndentOf, tokenize } from '../blockScanner';
import { mySqlDeclareLayout, stripPlaceholders } from '../declarations';
import { DiagnosticsLedger } from '../ledger';
import { SourceMask } from '../sourceMask';
import { TextEdit, applyEdits, bodyIndent, commentOut, escapeRegExp, reindent } from '../rewriteUtils';
import { BodyTransformer } from './bodyTransformer';
import { ConditionMapping, findCondition, predefinedConditions } from '../../mappings/exceptionConditions';
import { Dialect, ExceptionHandler, HandlerAction } from '../../types/sql';

interface ConditionRef {
  text: string;
  // Offsets in the masked unit
  start: number;
  end: number;
}

interface HandlerClause {
  conditions: ConditionRef[];
  bodyStart: number;
  bodyEnd: number;
}

const CONDITION_NAME = /^[A-Za-z_][\w$#]*(?:\s*\.\s*[A-Za-z_][\w$#]*)?$/;
const SQLSTATE_CONDITION = /^SQLSTATE\s+\u0000\d+\u0000$/i;
const CLAUSE = /^WHEN\s+([\s\S]+?)\s+THEN\b/i;

/**
 * Converts block-level EXCEPTION sections. MySQL has no such section, so
 * each WHEN clause becomes a handler declaration at the top of its block;
 * PostgreSQL and Oracle keep the section and only the condition names change.
 */
export class ExceptionTransformer {
  private readonly parsed: ExceptionHandler[] = [];
  private readonly statements?: BodyTransformer;

  constructor(
    private readonly source: Dialect,
    private readonly target: Dialect,
    private readonly ledger: DiagnosticsLedger,
    private readonly mask: SourceMask
  ) {
    if (source === 'oracle' && target !== 'oracle') {
      this.statements = new BodyTransformer({ target, ledger, mask });
    }
  }

  // Handlers produced by the last transform, in emission order
  get handlers(): readonly ExceptionHandler[] {
    return this.parsed.slice();
  }

  transform(masked: string): string {
    if (this.source === 'mysql') {
      this.flagMySqlHandlers(masked);
      return masked;
    }

    let result = masked;
    let limit = Infinity;

    for (;;) {
      const block = findBlocks(result)
        .filter(candidate => candidate.exceptionStart !== undefined && candidate.beginStart < limit)
        .reduce<BlockSpan | undefined>(
          (last, candidate) => (last === undefined || candidate.beginStart > last.beginStart ? candidate : last),
          undefined
        );
      if (!block) {
        return result;
      }
      result = this.convertSection(result, block);
      limit = block.beginStart;
    }
  }

  private convertSection(masked: string, block: BlockSpan): string {
    const clauses = this.segment(masked, block);

    if (clauses === undefined) {
      return this.keepSection(masked, block);
    }
    if (this.target === 'mysql') {
      return this.toHandlers(masked, block, clauses);
    }
    return this.renameConditions(masked, clauses);
  }

  /**
   * Splits the section into WHEN clauses at the section's own depth.
   * Returns undefined when any part of it cannot be read as a clause.
   */
  private segment(masked: string, block: BlockSpan): HandlerClause[] | undefined {
    const sectionStart = block.exceptionEnd ?? block.beginEnd;
    const section = masked.slice(sectionStart, block.endStart);
    const tokens = tokenize(section);
    const starts: number[] = [];
    let depth = 0;
    let skip = -1;

    // EXIT [label] WHEN and CONTINUE [label] WHEN inside handler bodies
    const loopExit = (index: number): boolean =>
      [1, 2].some(distance => {
        const previous = tokens[index - distance];
        return previous !== undefined
          && (previous.upper === 'EXIT' || previous.upper === 'CONTINUE')
          && !section.slice(previous.end, tokens[index].start).includes(';');
      });

    tokens.forEach((token, index) => {
      if (index === skip) return;
      const next = tokens[index + 1];

      if (token.upper === 'BEGIN' || token.upper === 'CASE') {
        depth++;
      } else if (token.upper === 'END') {
        const follower = next !== undefined && /^\s*$/.test(section.slice(token.end, next.start)) ? next.upper : '';
        if (['IF', 'LOOP', 'WHILE', 'REPEAT', 'FOR'].includes(follower)) {
          skip = index + 1;
        } else {
          depth--;
          if (follower === 'CASE') skip = index + 1;
        }
      } else if (token.upper === 'WHEN' && depth === 0 && !loopExit(index)) {
        starts.push(token.start);
      }
    });

    if (starts.length === 0 || stripPlaceholders(section.slice(0, starts[0])).length > 0) {
      return undefined;
    }

    const clauses: HandlerClause[] = [];
    for (let i = 0; i < starts.length; i++) {
      const start = starts[i];
      const end = i + 1 < starts.length ? starts[i + 1] : section.length;
      const clause = CLAUSE.exec(section.slice(start, end));
      if (!clause) {
        return undefined;
      }

      const listStart = start + clause[0].indexOf(clause[1], 4);
      const conditions: ConditionRef[] = [];
      let offset = listStart;
      for (const part of clause[1].split(/(\s+OR\s+)/i)) {
        if (/^\s+OR\s+$/i.test(part)) {
          offset += part.length;
          continue;
        }
        if (!CONDITION_NAME.test(part) && !(this.source === 'postgresql' && SQLSTATE_CONDITION.test(part))) {
          return undefined;
        }
        conditions.push({ text: part.replace(/\s+/g, ' '), start: sectionStart + offset, end: sectionStart + offset + part.length });
        offset += part.length;
      }

      clauses.push({ conditions, bodyStart: sectionStart + start + clause[0].length, bodyEnd: sectionStart + end });
    }
    return clauses;
  }

  private keepSection(masked: string, block: BlockSpan): string {
    this.ledger.warn(
      'manual-review-needed',
      'warning',
      'Exception section could not be split into WHEN ... THEN handlers and was left in place',
      this.target === 'mysql'
        ? 'Rewrite the handlers as DECLARE ... HANDLER statements at the top of the block'
        : 'Check the handler conditions by hand'
    );

    const section = masked.slice(block.exceptionEnd ?? block.beginEnd, block.endStart);
    const catchAll = /\bWHEN\s+OTHERS\s+THEN\b/i.exec(section);
    if (!catchAll) {
      return masked;
    }
    const start = (block.exceptionEnd ?? block.beginEnd) + catchAll.index;
    const end = start + catchAll[0].length;
    return masked.slice(0, start) + commentOut(this.mask, masked, start, end) + masked.slice(end);
  }

  // MySQL

  private toHandlers(masked: string, block: BlockSpan, clauses: HandlerClause[]): string {
    const indent = bodyIndent(masked.slice(block.beginEnd, block.endStart));
    const seen = new Set<string>();
    const declarations: string[] = [];

    for (const clause of clauses) {
      const resolved = clause.conditions.map(condition => this.resolveForMySql(condition.text, masked));
      const targets = [...new Set(resolved)];
      const catchAll = clause.conditions.some(condition => condition.text.toUpperCase() === 'OTHERS');
      const action: HandlerAction = catchAll ? 'exit' : 'continue';

      for (const target of targets) {
        if (seen.has(target)) {
          this.ledger.warn(
            'manual-review-needed',
            'warning',
            `More than one handler for ${target} in the same block, which MySQL rejects`,
            'Merge the handlers into one'
          );
        }
        seen.add(target);
      }

      if (!catchAll) {
        this.ledger.warn(
          'partial-support',
          'info',
          `Handler for ${clause.conditions.map(condition => condition.text).join(' OR ')} continues after the failing statement instead of leaving the block`
        );
      }

      const converted = this.handlerBody(masked.slice(clause.bodyStart, clause.bodyEnd));
      const body = /^NULL\s*;$/i.test(converted.trim()) ? '' : converted.trim();
      const keyword = action === 'exit' ? 'EXIT' : 'CONTINUE';
      const statements = body ? `BEGIN\n${reindent(converted, `${indent}  `)}\n${indent}END;` : 'BEGIN END;';
      declarations.push(`DECLARE ${keyword} HANDLER FOR ${targets.join(', ')}\n${indent}${statements}`);

      clause.conditions.forEach((condition, index) => {
        this.parsed.push({ sourceConditionName: condition.text, targetCondition: resolved[index], body, action });
      });
      this.ledger.rule(`WHEN ${clause.conditions.map(condition => condition.text).join(' OR ')} → DECLARE ${keyword} HANDLER FOR ${targets.join(', ')}`);
    }

    const layout = mySqlDeclareLayout(masked, block.beginEnd);
    const sectionStart = trimBack(masked, block.exceptionStart ?? block.endStart);
    const edits: TextEdit[] = [
      { start: sectionStart, end: block.endStart, text: `\n${lineIndentOf(masked, block.endStart)}` },
      { start: layout.end, end: layout.end, text: declarations.map(declaration => `\n${indent}${declaration}`).join('') }
    ];
    return applyEdits(masked, edits);
  }

  private resolveForMySql(name: string, masked: string): string {
    if (SQLSTATE_CONDITION.test(name)) {
      this.ledger.warn('partial-support', 'info', `${name} kept; MySQL and PostgreSQL SQLSTATE values differ for some errors`);
      return name;
    }

    const condition = this.lookup(name);
    if (condition) {
      return condition.mysqlCondition;
    }

    if (new RegExp(`\\bDECLARE\\s+${escapeRegExp(name)}\\s+CONDITION\\b`, 'i').test(masked)) {
      return name;
    }

    this.ledger.warn(
      'manual-review-needed',
      'warning',
      `Exception ${name} is not declared in this routine; its handler catches every SQLEXCEPTION`,
      `Declare ${name} with DECLARE ${name} CONDITION FOR SQLSTATE '45000'`
    );
    return 'SQLEXCEPTION';
  }

  private handlerBody(text: string): string {
    let body = this.statements ? this.statements.transformHandlerBody(text) : text;

    body = body.replace(/\bRAISE\s*;/gi, () => {
      this.ledger.rule('RAISE; → RESIGNAL;');
      return 'RESIGNAL;';
    });

    if (/\b(?:SQLERRM|SQLCODE)\b/i.test(body)) {
      this.ledger.warn(
        'unsupported-function',
        'warning',
        'SQLERRM / SQLCODE are not available in MySQL handlers',
        'Read the error with GET DIAGNOSTICS CONDITION 1 <var> = MESSAGE_TEXT, <var> = MYSQL_ERRNO'
      );
    }
    return body;
  }

  // PostgreSQL and Oracle

  private renameConditions(masked: string, clauses: HandlerClause[]): string {
    const edits: TextEdit[] = [];

    for (const clause of clauses) {
      let body = masked.slice(clause.bodyStart, clause.bodyEnd);
      if (this.statements) {
        body = this.statements.transformHandlerBody(body);
      }
      body = this.errorCodeFunctions(body);
      edits.push({ start: clause.bodyStart, end: clause.bodyEnd, text: body });

      for (const condition of clause.conditions) {
        const target = this.resolveInPlace(condition.text);
        if (target !== condition.text) {
          edits.push({ start: condition.start, end: condition.end, text: target });
          this.ledger.rule(`WHEN ${condition.text} → WHEN ${this.mask.unmask(target)}`);
        }
        this.parsed.push({
          sourceConditionName: condition.text,
          targetCondition: target,
          body: body.trim(),
          action: 'exit'
        });
      }
    }

    return applyEdits(masked, edits);
  }

  private resolveInPlace(name: string): string {
    const upper = name.toUpperCase();

    if (this.target === 'oracle') {
      if (SQLSTATE_CONDITION.test(name)) {
        this.ledger.warn(
          'manual-review-needed',
          'warning',
          `${name} has no PL/SQL handler form`,
          'Declare an exception with PRAGMA EXCEPTION_INIT for the matching Oracle error'
        );
        return name;
      }
      const condition = this.lookup(name);
      return condition ? condition.name : name;
    }

    if (SQLSTATE_CONDITION.test(name) || upper === 'OTHERS') {
      return name;
    }
    const condition = this.lookup(name);
    if (condition) {
      return condition.postgresCondition;
    }

    this.ledger.warn(
      'partial-support',
      'info',
      `User-defined exception ${name} is caught as SQLSTATE P0001 together with every other raised exception`
    );
    return `SQLSTATE ${this.mask.mask("'P0001'")}`;
  }

  private errorCodeFunctions(body: string): string {
    if (this.target === 'postgresql') {
      return body.replace(/\bSQLCODE\b/gi, () => {
        this.ledger.warn('partial-support', 'info', 'SQLCODE → SQLSTATE; PostgreSQL reports a five-character state, not a number');
        return 'SQLSTATE';
      });
    }
    if (this.target === 'oracle') {
      return body.replace(/\bSQLSTATE\b/gi, () => {
        this.ledger.warn('partial-support', 'info', 'SQLSTATE → SQLCODE; Oracle reports a negative error number');
        return 'SQLCODE';
      });
    }
    return body;
  }

  private lookup(name: string): ConditionMapping | undefined {
    if (this.source === 'postgresql') {
      const upper = name.toUpperCase();
      return predefinedConditions.find(condition => condition.postgresCondition === upper);
    }
    return findCondition(name);
  }

  private flagMySqlHandlers(masked: string): void {
    for (const match of masked.matchAll(/\bDECLARE\s+(CONTINUE|EXIT|UNDO)\s+HANDLER\s+FOR\s+([^;]+?)\s+(?=BEGIN\b|SET\b|SELECT\b|INSERT\b|UPDATE\b|DELETE\b|CALL\b|COMMIT\b|ROLLBACK\b|SIGNAL\b|RESIGNAL\b)/gi)) {
      this.ledger.warn(
        'manual-review-needed',
        'warning',
        `${match[1].toUpperCase()} HANDLER FOR ${this.mask.unmask(match[2]).replace(/\s+/g, ' ')} left as written`,
        this.target === 'postgresql'
          ? 'Move the handler into an EXCEPTION section of a BEGIN ... END block'
          : 'Move the handler into the EXCEPTION section of the block'
      );
    }
  }
}

// Start of the whitespace run that ends at `offset`
function trimBack(text: string, offset: number): number {
  let start = offset;
  while (start > 0 && /\s/.test(text[start - 1])) {
    start--;
  }
  return start;
}
