import { DiagnosticsLedger } from '../ledger';
import { SourceMask } from '../sourceMask';
import { BlockSpan, findBlocks, findMatchingParen } from '../blockScanner';
import { ORACLE_PATTERNS } from '../oraclePatterns';
import {
  Declaration,
  orderForMySql,
  parseDeclarationSection,
  parseMySqlDeclarations,
  parseParameters,
  renderDeclaration,
  renderParameters
} from '../declarations';
import { bodyIndent, escapeRegExp, firstMatch } from '../rewriteUtils';
import { arrayElementType, mapDataType } from '../../mappings/dataTypes';
import { Dialect, RoutineSignature } from '../../types/sql';

export interface RoutineModel {
  source: Dialect;
  signature: RoutineSignature;
  orReplace: boolean;
  deterministic: boolean;
  pipelined: boolean;
  declarations: Declaration[];
  // Masked statements between the routine's BEGIN and END
  body: string;
  prefix: string;
  suffix: string;
}

// Statements that make a MySQL function MODIFIES SQL DATA rather than READS SQL DATA
const DATA_CHANGE = /\b(?:INSERT|DELETE|MERGE)\b|(?<!\bFOR\s+)\bUPDATE\b/i;

const NAME = '(?:[\\w$#]+|\\u0000\\d+\\u0000)(?:\\s*\\.\\s*(?:[\\w$#]+|\\u0000\\d+\\u0000))?';

const ORACLE_ATTRIBUTES = /^\s*(?:RETURN\s+([\s\S]+?)\s+)?((?:(?:DETERMINISTIC|PIPELINED|PARALLEL_ENABLE(?:\s*\([^)]*\))?|RESULT_CACHE(?:\s+RELIES_ON\s*\([^)]*\))?|AUTHID\s+(?:DEFINER|CURRENT_USER)|ACCESSIBLE\s+BY\s*\([^)]*\))\s+)*)(?:IS|AS)\b/i;

const MYSQL_HEADER = new RegExp(
  `\\bCREATE\\s+(?:DEFINER\\s*=\\s*\\S+\\s+)?(PROCEDURE|FUNCTION)\\s+(?:IF\\s+NOT\\s+EXISTS\\s+)?(${NAME})\\s*(?=\\()`,
  'gi'
);
const MYSQL_ATTRIBUTES = /^\s*(?:RETURNS\s+([\s\S]+?)\s+)?((?:(?:(?:NOT\s+)?DETERMINISTIC|CONTAINS\s+SQL|NO\s+SQL|READS\s+SQL\s+DATA|MODIFIES\s+SQL\s+DATA|SQL\s+SECURITY\s+\w+|COMMENT\s+\S+|LANGUAGE\s+SQL)\s+)*)(?=BEGIN\b)/i;

const POSTGRES_HEADER = new RegExp(
  `\\bCREATE\\s+(OR\\s+REPLACE\\s+)?(PROCEDURE|FUNCTION)\\s+(${NAME})\\s*(?=\\()`,
  'gi'
);
const POSTGRES_OPTION = '(?:LANGUAGE\\s+\\w+|IMMUTABLE|STABLE|VOLATILE|(?:NOT\\s+)?LEAKPROOF|STRICT|CALLED\\s+ON\\s+NULL\\s+INPUT|RETURNS\\s+NULL\\s+ON\\s+NULL\\s+INPUT|SECURITY\\s+(?:DEFINER|INVOKER)|PARALLEL\\s+\\w+|COST\\s+\\d+|ROWS\\s+\\d+)';
const POSTGRES_ATTRIBUTES = new RegExp(
  `^\\s*(?:RETURNS\\s+(SETOF\\s+)?([\\s\\S]+?)\\s+)?((?:${POSTGRES_OPTION}\\s+)*)AS\\s+(\\$\\w*\\$)`,
  'i'
);
const POSTGRES_TRAILER = new RegExp(`^\\s*((?:${POSTGRES_OPTION}\\s*)*);?`, 'i');

/**
 * Reads a routine unit into a dialect-neutral model and writes it back in
 * another dialect: header, parameter list, return clause and the envelope
 * around the body (declaration section, delimiters, closing END).
 */
export class SignatureTransformer {
  constructor(
    private readonly source: Dialect,
    private readonly target: Dialect,
    private readonly ledger: DiagnosticsLedger,
    private readonly mask: SourceMask,
    // Collection types declared outside the unit, name → element type
    private readonly knownCollections: ReadonlyMap<string, string> = new Map()
  ) {}

  transform(masked: string): string {
    const model = this.parse(masked);
    if (!model) {
      return masked;
    }
    return this.emit(model);
  }

  parse(masked: string): RoutineModel | undefined {
    switch (this.source) {
      case 'oracle':
        return this.parseOracle(masked);
      case 'mysql':
        return this.parseMySql(masked);
      case 'postgresql':
        return this.parsePostgres(masked);
    }
  }

  emit(model: RoutineModel): string {
    this.recordKindChange(model);

    if (model.signature.parameters.length > 0) {
      this.ledger.rule(
        `parameter list of ${model.signature.name} → ${this.target} (${model.signature.parameters.length} parameters)`
      );
    }

    switch (this.target) {
      case 'oracle':
        return this.emitOracle(model);
      case 'mysql':
        return this.emitMySql(model);
      case 'postgresql':
        return this.emitPostgres(model);
    }
  }

  // Parsing

  private parseOracle(masked: string): RoutineModel | undefined {
    const header = firstMatch(masked, ORACLE_PATTERNS.ROUTINE_HEADER);
    if (!header) {
      return undefined;
    }

    const headerStart = header.index ?? 0;
    let position = headerStart + header[0].length;
    let parameterList = '';
    if (masked[position] === '(') {
      const close = findMatchingParen(masked, position);
      if (close === -1) return undefined;
      parameterList = masked.slice(position + 1, close);
      position = close + 1;
    }

    const attributes = ORACLE_ATTRIBUTES.exec(masked.slice(position));
    if (!attributes) {
      return undefined;
    }
    const sectionStart = position + attributes[0].length;

    const block = this.routineBlock(masked, sectionStart);
    if (!block) {
      return undefined;
    }

    const kind = header[2].toUpperCase() === 'FUNCTION' ? 'function' : 'procedure';
    const signature: RoutineSignature = {
      name: header[3].replace(/\s+/g, ''),
      kind,
      parameters: parseParameters(parameterList, 'oracle')
    };
    if (attributes[1] !== undefined) {
      signature.returnType = attributes[1].trim();
    }

    return {
      source: 'oracle',
      signature,
      orReplace: header[1] !== undefined,
      deterministic: /\bDETERMINISTIC\b/i.test(attributes[2]),
      pipelined: /\bPIPELINED\b/i.test(attributes[2]),
      declarations: parseDeclarationSection(masked.slice(sectionStart, block.beginStart), 'oracle'),
      body: masked.slice(block.beginEnd, block.endStart),
      prefix: masked.slice(0, headerStart),
      suffix: masked.slice(block.closeEnd)
    };
  }

  private parseMySql(masked: string): RoutineModel | undefined {
    const header = firstMatch(masked, MYSQL_HEADER);
    if (!header) {
      return undefined;
    }

    const headerStart = header.index ?? 0;
    const open = headerStart + header[0].length;
    const close = findMatchingParen(masked, open);
    if (close === -1) return undefined;

    const attributes = MYSQL_ATTRIBUTES.exec(masked.slice(close + 1));
    if (!attributes) {
      return undefined;
    }
    const beginAt = close + 1 + attributes[0].length;
    const block = findBlocks(masked).find(candidate => candidate.beginStart === beginAt);
    if (!block) {
      return undefined;
    }

    const name = header[2].replace(/\s+/g, '');
    const signature: RoutineSignature = {
      name,
      kind: header[1].toUpperCase() === 'FUNCTION' ? 'function' : 'procedure',
      parameters: parseParameters(masked.slice(open + 1, close), 'mysql')
    };
    if (attributes[1] !== undefined) {
      signature.returnType = attributes[1].trim();
    }

    // A preceding DROP ... IF EXISTS is the MySQL spelling of OR REPLACE
    let prefix = masked.slice(0, headerStart);
    const drop = new RegExp(`DROP\\s+(?:PROCEDURE|FUNCTION)\\s+IF\\s+EXISTS\\s+${escapeRegExp(name)}\\s*;\\s*`, 'i');
    const orReplace = drop.test(prefix);
    prefix = prefix.replace(drop, '');

    const declarations = parseMySqlDeclarations(masked, block.beginEnd);
    return {
      source: 'mysql',
      signature,
      orReplace,
      deterministic: /(?<!NOT\s+)\bDETERMINISTIC\b/i.test(attributes[2]),
      pipelined: false,
      declarations: declarations.declarations,
      body: masked.slice(declarations.end, block.endStart),
      prefix,
      suffix: masked.slice(block.closeEnd)
    };
  }

  private parsePostgres(masked: string): RoutineModel | undefined {
    const header = firstMatch(masked, POSTGRES_HEADER);
    if (!header) {
      return undefined;
    }

    const headerStart = header.index ?? 0;
    const open = headerStart + header[0].length;
    const close = findMatchingParen(masked, open);
    if (close === -1) return undefined;

    const attributes = POSTGRES_ATTRIBUTES.exec(masked.slice(close + 1));
    if (!attributes) {
      return undefined;
    }
    const tag = attributes[4];
    const bodyStart = close + 1 + attributes[0].length;
    const bodyEnd = masked.indexOf(tag, bodyStart);
    if (bodyEnd === -1) {
      return undefined;
    }

    const trailer = POSTGRES_TRAILER.exec(masked.slice(bodyEnd + tag.length));
    const options = `${attributes[3]} ${trailer ? trailer[1] : ''}`;
    const language = /\bLANGUAGE\s+(\w+)/i.exec(options);
    if (language && language[1].toLowerCase() !== 'plpgsql') {
      return undefined;
    }

    const block = findBlocks(masked).find(
      candidate => candidate.depth === 0 && candidate.beginStart > bodyStart && candidate.endStart < bodyEnd
    );
    if (!block) {
      return undefined;
    }

    const parameters = parseParameters(masked.slice(open + 1, close), 'postgresql');
    const returnType = attributes[2]?.trim();
    const setOf = attributes[1] !== undefined;
    let kind: RoutineSignature['kind'] = header[2].toUpperCase() === 'FUNCTION' ? 'function' : 'procedure';
    if (kind === 'function' && (returnType === undefined || /^VOID$/i.test(returnType))) {
      kind = 'procedure';
    }

    const signature: RoutineSignature = { name: header[3].replace(/\s+/g, ''), kind, parameters };
    if (kind === 'function' && returnType !== undefined) {
      signature.returnType = setOf ? `SETOF ${returnType}` : returnType;
    }

    const declareSection = masked.slice(bodyStart, block.beginStart).replace(/^\s*(?:<<\s*[\w$#]+\s*>>\s*)?(?:DECLARE\b)?/i, '');
    const end = trailer ? bodyEnd + tag.length + trailer[0].length : bodyEnd + tag.length;

    return {
      source: 'postgresql',
      signature,
      orReplace: header[1] !== undefined,
      deterministic: /\bIMMUTABLE\b/i.test(options),
      pipelined: false,
      declarations: parseDeclarationSection(declareSection, 'postgresql'),
      body: masked.slice(block.beginEnd, block.endStart),
      prefix: masked.slice(0, headerStart),
      suffix: masked.slice(end)
    };
  }

  // Local subprograms close before the routine's own block does
  private routineBlock(masked: string, from: number): BlockSpan | undefined {
    return findBlocks(masked)
      .filter(block => block.depth === 0 && block.beginStart >= from)
      .reduce<BlockSpan | undefined>(
        (last, block) => (last === undefined || block.endStart > last.endStart ? block : last),
        undefined
      );
  }

  // Emission

  private emitOracle(model: RoutineModel): string {
    const { signature } = model;
    const kind = signature.kind === 'function' ? 'FUNCTION' : 'PROCEDURE';
    const parameters = this.parameters(model);
    const returns = this.returnClause(model, 'RETURN');
    const attributes = model.deterministic ? ' DETERMINISTIC' : '';
    const declarations = this.declarations(model.declarations, model, '  ');

    this.ledger.rule(`routine envelope of ${signature.name} → PL/SQL IS ... END ${signature.name}`);
    return `${model.prefix}CREATE OR REPLACE ${kind} ${signature.name}${parameters}${returns}${attributes}\nIS${declarations}\nBEGIN${model.body}END ${signature.name};${model.suffix}`;
  }

  private emitMySql(model: RoutineModel): string {
    const { signature } = model;
    const kind = signature.kind === 'function' ? 'FUNCTION' : 'PROCEDURE';
    const parameters = this.parameters(model) || '()';
    const returns = this.returnClause(model, 'RETURNS');
    const pipelined = model.pipelined ? ' PIPELINED' : '';
    const characteristics = signature.kind === 'function' ? this.mySqlCharacteristics(model) : '';
    const indent = bodyIndent(model.body);
    const declarations = this.declarations(orderForMySql(model.declarations), model, indent);

    const drop = model.orReplace ? `DROP ${kind} IF EXISTS ${signature.name};\n` : '';
    if (model.orReplace) {
      this.ledger.rule(`OR REPLACE → DROP ${kind} IF EXISTS ${signature.name}`);
    }
    if (model.declarations.length > 0) {
      this.ledger.rule(`declaration section of ${signature.name} → DECLARE statements after BEGIN`);
    }

    this.ledger.rule(`routine envelope of ${signature.name} → MySQL BEGIN ... END`);
    return `${model.prefix}${drop}CREATE ${kind} ${signature.name}${parameters}${returns}${pipelined}${characteristics}\nBEGIN${declarations}${model.body}END;${model.suffix}`;
  }

  // Binary logging refuses a function that declares none of these
  private mySqlCharacteristics(model: RoutineModel): string {
    const access = DATA_CHANGE.test(model.body) ? 'MODIFIES SQL DATA' : 'READS SQL DATA';
    return `${model.deterministic ? '\nDETERMINISTIC' : ''}\n${access}`;
  }

  private emitPostgres(model: RoutineModel): string {
    const { signature } = model;
    const parameters = this.parameters(model) || '()';
    const outputs = signature.parameters.some(parameter => parameter.mode !== 'in');
    const declarations = this.declarations(model.declarations, model, '  ');

    let returns: string;
    if (signature.kind === 'procedure') {
      returns = outputs ? '' : '\nRETURNS VOID';
    } else if (model.pipelined) {
      returns = `\nRETURNS SETOF ${this.setElement(model)} PIPELINED`;
    } else {
      returns = this.returnClause(model, 'RETURNS');
      if (outputs) {
        this.ledger.warn(
          'manual-review-needed',
          'warning',
          `Function ${signature.name} has OUT parameters and a return value; PostgreSQL folds OUT parameters into the result`,
          'Return a composite type or move the return value into an OUT parameter'
        );
      }
    }

    if (model.source === 'oracle' && signature.kind === 'procedure' && ORACLE_PATTERNS.TRANSACTION_CONTROL.test(model.body)) {
      this.ledger.warn(
        'partial-support',
        'warning',
        `Procedure ${signature.name} uses COMMIT or ROLLBACK, which PostgreSQL functions cannot execute`,
        'Create it as a PostgreSQL 11+ PROCEDURE and invoke it with CALL'
      );
    }

    const volatility = model.deterministic ? ' IMMUTABLE' : '';
    const declareSection = declarations ? `\nDECLARE${declarations}` : '';

    this.ledger.rule(`routine envelope of ${signature.name} → AS $$ ... $$ LANGUAGE plpgsql`);
    return `${model.prefix}CREATE OR REPLACE FUNCTION ${signature.name}${parameters}${returns}\nAS $$${declareSection}\nBEGIN${model.body}END;\n$$ LANGUAGE plpgsql${volatility};${model.suffix}`;
  }

  private recordKindChange(model: RoutineModel): void {
    const { signature } = model;
    if (this.target === 'postgresql' && signature.kind === 'procedure') {
      this.ledger.rule(`PROCEDURE ${signature.name} → FUNCTION ${signature.name} returning VOID`);
    }
    if (model.source === 'postgresql' && signature.kind === 'procedure' && this.target !== 'postgresql') {
      this.ledger.rule(`FUNCTION ${signature.name} without a result → PROCEDURE ${signature.name}`);
    }
  }

  private parameters(model: RoutineModel): string {
    const { signature } = model;
    if (signature.parameters.length === 0) {
      return '';
    }
    return `(${renderParameters(signature.parameters, model.source, this.target, signature.kind, this.ledger)})`;
  }

  private returnClause(model: RoutineModel, keyword: 'RETURN' | 'RETURNS'): string {
    const { returnType, kind, name } = model.signature;
    if (kind !== 'function' || returnType === undefined) {
      return '';
    }

    if (/^SETOF\b|^TABLE\s*\(/i.test(returnType)) {
      this.ledger.warn(
        'manual-review-needed',
        'warning',
        `Function ${name} returns a row set (${returnType}), which ${this.target} functions cannot return`,
        this.target === 'oracle' ? 'Declare a collection type and make the function PIPELINED' : 'Return the rows from a procedure with SELECT'
      );
      return `\n${keyword} ${returnType}`;
    }

    const mapped = mapDataType(returnType, model.source, this.target, this.ledger);
    const sourceKeyword = model.source === 'oracle' ? 'RETURN' : 'RETURNS';
    this.ledger.rule(`${sourceKeyword} ${returnType} → ${keyword} ${mapped}`);
    return `\n${keyword} ${mapped}`;
  }

  private declarations(declarations: Declaration[], model: RoutineModel, indent: string): string {
    return declarations
      .map(declaration => {
        const comments = declaration.comments.map(comment => `\n${indent}${comment}`).join('');
        const rendered = renderDeclaration(declaration, model.source, this.target, this.ledger, this.mask);
        return `${comments}\n${indent}${rendered}`;
      })
      .join('');
  }

  // Element type of a PIPELINED function's collection return type
  private setElement(model: RoutineModel): string {
    const typeName = (model.signature.returnType ?? '').trim();
    let element = this.knownCollections.get(typeName.toLowerCase());

    if (element === undefined) {
      const declared = model.declarations.find(
        declaration => declaration.kind === 'verbatim' && new RegExp(`^TYPE\\s+${escapeRegExp(typeName)}\\b`, 'i').test(declaration.text)
      );
      const table = declared ? firstMatch(`${declared.text};`, ORACLE_PATTERNS.TABLE_OF) : undefined;
      element = table ? table[2] : undefined;
    }

    if (element === undefined) {
      this.ledger.warn(
        'manual-review-needed',
        'warning',
        `Element type of ${typeName} is not declared in this unit; the function returns SETOF RECORD`,
        'Replace RECORD with the row type the function produces'
      );
      return 'RECORD';
    }

    this.ledger.rule(`RETURN ${typeName} PIPELINED → RETURNS SETOF ${element}`);
    return arrayElementType(element, model.source);
  }
}
