import { DiagnosticsLedger } from './ledger';
import { SourceMask } from './sourceMask';
import { BlockSpan, splitStatements, splitTopLevel, tokenize } from './blockScanner';
import { mapDataType } from '../mappings/dataTypes';
import { parseParameterMode, formatParameter } from '../mappings/parameterModes';
import { Dialect, RoutineKind, RoutineParameter } from '../types/sql';

export type DeclarationKind = 'variable' | 'constant' | 'cursor' | 'exception' | 'verbatim' | 'comment';

export interface Declaration {
  kind: DeclarationKind;
  name: string;
  type?: string;
  notNull?: boolean;
  defaultValue?: string;
  cursorParameters?: RoutineParameter[];
  query?: string;
  // Comment placeholders written just before the declaration
  comments: string[];
  // Masked source text without the trailing semicolon
  text: string;
}

const ANCHORED_TYPE = /%(?:ROW)?TYPE\b/i;
const COMPOUND_ENDINGS = ['IF', 'LOOP', 'WHILE', 'REPEAT', 'FOR'];

// Parameters

const ORACLE_PARAMETER = /^([\w$#]+|\u0000\d+\u0000)\s+(?:(IN\s+OUT|IN|OUT)\s+)?(?:NOCOPY\s+)?([\s\S]+?)(?:\s*(?::=|\bDEFAULT\b)\s*([\s\S]+))?$/i;
const MYSQL_PARAMETER = /^(?:(INOUT|IN|OUT)\s+)?([\w$#]+|\u0000\d+\u0000)\s+([\s\S]+)$/i;
const POSTGRES_PARAMETER = /^(?:(INOUT|IN|OUT|VARIADIC)\s+)?([\w$#]+|\u0000\d+\u0000)\s+(?:(INOUT|IN|OUT)\s+)?([\s\S]+?)(?:\s*(?:\bDEFAULT\b|=)\s*([\s\S]+))?$/i;

/**
 * Parses a masked parameter list (without the surrounding parentheses)
 * written in `source` syntax.
 */
export function parseParameters(list: string, source: Dialect): RoutineParameter[] {
  return splitTopLevel(list)
    .map(part => part.trim())
    .filter(part => part.length > 0)
    .map((part, index) => parseParameter(part, source, index));
}

function parseParameter(text: string, source: Dialect, index: number): RoutineParameter {
  const compact = text.replace(/\s+/g, ' ');

  if (source === 'oracle') {
    const match = ORACLE_PARAMETER.exec(compact);
    if (match) {
      const parameter: RoutineParameter = { name: match[1], mode: parseParameterMode(match[2]), type: match[3].trim() };
      if (match[4] !== undefined) parameter.defaultValue = match[4].trim();
      return parameter;
    }
  }

  if (source === 'mysql') {
    const match = MYSQL_PARAMETER.exec(compact);
    if (match) {
      return { name: match[2], mode: parseParameterMode(match[1]), type: match[3].trim() };
    }
  }

  if (source === 'postgresql') {
    const match = POSTGRES_PARAMETER.exec(compact);
    if (match) {
      const parameter: RoutineParameter = {
        name: match[2],
        mode: parseParameterMode(match[1] ?? match[3]),
        type: match[4].trim()
      };
      if (match[5] !== undefined) parameter.defaultValue = match[5].trim();
      return parameter;
    }
  }

  // Unnamed parameter: the whole text is the type
  return { name: `p${index + 1}`, mode: 'in', type: compact.trim() };
}

export function renderParameters(
  parameters: RoutineParameter[],
  source: Dialect,
  target: Dialect,
  kind: RoutineKind,
  ledger: DiagnosticsLedger
): string {
  return parameters
    .map(parameter => {
      const converted: RoutineParameter = { ...parameter, type: mapDataType(parameter.type, source, target, ledger) };

      if (target === 'mysql' && converted.defaultValue !== undefined) {
        ledger.warn(
          'syntax-difference',
          'warning',
          `Default value for parameter ${parameter.name} dropped; MySQL parameters cannot have defaults`,
          'Pass the value explicitly from every caller'
        );
        delete converted.defaultValue;
      }
      if (target === 'mysql' && kind === 'function' && parameter.mode !== 'in') {
        ledger.warn(
          'unsupported-statement',
          'error',
          `Parameter ${parameter.name} is ${parameter.mode.toUpperCase()}; MySQL functions accept input parameters only`,
          'Convert the routine to a procedure or return the value instead'
        );
      }
      if (target === 'mysql' && ANCHORED_TYPE.test(parameter.type)) {
        warnAnchoredType(parameter.name, ledger);
      }
      return formatParameter(converted, target, kind);
    })
    .join(', ');
}

function warnAnchoredType(name: string, ledger: DiagnosticsLedger): void {
  ledger.warn(
    'unsupported-statement',
    'error',
    `${name} uses an anchored %TYPE/%ROWTYPE declaration, which MySQL does not support`,
    'Replace the anchor with the concrete column type'
  );
}

// Declaration sections

const CURSOR_ORACLE = /^CURSOR\s+([\w$#]+)\s*(?:\(([\s\S]*?)\))?\s*(?:RETURN\s+[\s\S]+?\s+)?IS\s+([\s\S]+)$/i;
const CURSOR_POSTGRES = /^([\w$#]+)\s+(?:NO\s+)?(?:SCROLL\s+)?CURSOR\s*(?:\(([\s\S]*?)\))?\s*(?:FOR|IS)\s+([\s\S]+)$/i;
const EXCEPTION_DECLARATION = /^([\w$#]+)\s+EXCEPTION$/i;
const CONSTANT_DECLARATION = /^([\w$#]+)\s+CONSTANT\s+([\s\S]+?)(\s+NOT\s+NULL)?\s*(?::=|=|\bDEFAULT\b)\s*([\s\S]+)$/i;
const VARIABLE_DECLARATION = /^([\w$#]+)\s+([\s\S]+?)(\s+NOT\s+NULL)?(?:\s*(?::=|=|\bDEFAULT\b)\s*([\s\S]+))?$/i;
const VERBATIM_DECLARATION = /^(?:TYPE|SUBTYPE|PRAGMA|PROCEDURE|FUNCTION)\b|\bALIAS\s+FOR\b/i;

/**
 * Parses a masked Oracle `IS ... BEGIN` or PostgreSQL `DECLARE ... BEGIN`
 * section into declarations, in source order.
 */
export function parseDeclarationSection(section: string, source: Dialect): Declaration[] {
  return splitStatements(section)
    .map(statement => statement.text.trim())
    .filter(text => text.length > 0)
    .map(text => parseDeclaration(text, source));
}

function parseDeclaration(statement: string, source: Dialect): Declaration {
  if (!statement.endsWith(';') && stripPlaceholders(statement).length === 0) {
    return { kind: 'comment', name: '', comments: [], text: statement };
  }

  const lead = /^(?:\s|\u0000\d+\u0000)*/.exec(statement);
  const prefix = lead ? lead[0] : '';
  const comments = prefix.match(/\u0000\d+\u0000/g) ?? [];
  const text = statement.slice(prefix.length).replace(/;\s*$/, '').trim();
  const body = text;

  if (VERBATIM_DECLARATION.test(body)) {
    return { kind: 'verbatim', name: '', comments, text };
  }

  const cursor = (source === 'postgresql' ? CURSOR_POSTGRES : CURSOR_ORACLE).exec(body);
  if (cursor) {
    const declaration: Declaration = { kind: 'cursor', name: cursor[1], query: cursor[3].trim(), comments, text };
    if (cursor[2] !== undefined && cursor[2].trim()) {
      declaration.cursorParameters = parseParameters(cursor[2], source);
    }
    return declaration;
  }

  const exception = EXCEPTION_DECLARATION.exec(body);
  if (exception) {
    return { kind: 'exception', name: exception[1], comments, text };
  }

  const constant = CONSTANT_DECLARATION.exec(body);
  if (constant) {
    return {
      kind: 'constant',
      name: constant[1],
      type: constant[2].trim(),
      notNull: constant[3] !== undefined,
      defaultValue: constant[4].trim(),
      comments,
      text
    };
  }

  const variable = VARIABLE_DECLARATION.exec(body);
  if (variable) {
    const declaration: Declaration = {
      kind: 'variable',
      name: variable[1],
      type: variable[2].trim(),
      notNull: variable[3] !== undefined,
      comments,
      text
    };
    if (variable[4] !== undefined) declaration.defaultValue = variable[4].trim();
    return declaration;
  }

  return { kind: 'verbatim', name: '', comments, text };
}

/**
 * Reads the DECLARE statements at the top of a MySQL block body.
 * `DECLARE a, b INT` yields one declaration per name. Handler declarations
 * are not read: `end` stops at the first one.
 */
export function parseMySqlDeclarations(masked: string, from: number): { declarations: Declaration[]; end: number } {
  const declarations: Declaration[] = [];
  const layout = mySqlDeclareLayout(masked, from);
  let end = layout.end;

  for (const statement of layout.statements) {
    if (statement.handler) {
      end = statement.start;
      break;
    }
    const text = masked.slice(statement.start, statement.end).replace(/;\s*$/, '').trim();
    const body = text.replace(/^DECLARE\s+/i, '');

    const cursor = /^([\w$#]+)\s+CURSOR\s+FOR\s+([\s\S]+)$/i.exec(body);
    if (cursor) {
      declarations.push({ kind: 'cursor', name: cursor[1], query: cursor[2].trim(), comments: [], text });
      continue;
    }
    const condition = /^([\w$#]+)\s+CONDITION\s+FOR\b/i.exec(body);
    if (condition) {
      declarations.push({ kind: 'exception', name: condition[1], comments: [], text });
      continue;
    }

    const variable = /^((?:[\w$#]+\s*,\s*)*[\w$#]+)\s+([A-Za-z][\s\S]*?)(?:\s+DEFAULT\s+([\s\S]+))?$/i.exec(body);
    if (!variable) {
      declarations.push({ kind: 'verbatim', name: '', comments: [], text });
      continue;
    }
    for (const name of variable[1].split(',').map(part => part.trim()).filter(Boolean)) {
      const declaration: Declaration = { kind: 'variable', name, type: variable[2].trim(), comments: [], text };
      if (variable[3] !== undefined) declaration.defaultValue = variable[3].trim();
      declarations.push(declaration);
    }
  }

  return { declarations, end };
}

export function renderDeclaration(
  declaration: Declaration,
  source: Dialect,
  target: Dialect,
  ledger: DiagnosticsLedger,
  mask: SourceMask
): string {
  const type = declaration.type !== undefined ? mapDataType(declaration.type, source, target, ledger) : '';

  switch (declaration.kind) {
    case 'comment':
      return declaration.text;

    case 'verbatim':
      return `${declaration.text};`;

    case 'exception':
      if (target === 'mysql') {
        return `DECLARE ${declaration.name} CONDITION FOR SQLSTATE '45000';`;
      }
      if (target === 'oracle') {
        return `${declaration.name} EXCEPTION;`;
      }
      ledger.rule(`user exception ${declaration.name} → ERRCODE P0001`);
      return mask.mask(`-- ${declaration.name} EXCEPTION: raised and handled as SQLSTATE P0001`);

    case 'cursor':
      return renderCursor(declaration, source, target, ledger);

    case 'constant':
    case 'variable': {
      if (target === 'mysql') {
        if (declaration.type !== undefined && ANCHORED_TYPE.test(declaration.type)) {
          warnAnchoredType(declaration.name, ledger);
        }
        const defaultClause = declaration.defaultValue !== undefined ? ` DEFAULT ${declaration.defaultValue}` : '';
        return `DECLARE ${declaration.name} ${type}${defaultClause};`;
      }
      const constant = declaration.kind === 'constant' ? 'CONSTANT ' : '';
      const notNull = declaration.notNull ? ' NOT NULL' : '';
      const assignment = declaration.defaultValue !== undefined ? ` := ${declaration.defaultValue}` : '';
      return `${declaration.name} ${constant}${type}${notNull}${assignment};`;
    }
  }
}

function renderCursor(declaration: Declaration, source: Dialect, target: Dialect, ledger: DiagnosticsLedger): string {
  const query = declaration.query ?? '';
  const parameters = declaration.cursorParameters ?? [];

  if (target === 'mysql') {
    if (parameters.length > 0) {
      ledger.warn(
        'unsupported-statement',
        'error',
        `Cursor ${declaration.name} takes parameters, which MySQL cursors do not support`,
        'Reference local variables in the cursor query and set them before OPEN'
      );
    }
    return `DECLARE ${declaration.name} CURSOR FOR ${query};`;
  }

  const parameterList = parameters.length > 0
    ? ` (${parameters.map(p => `${p.name} ${mapDataType(p.type, source, target, ledger)}`).join(', ')})`
    : '';
  if (target === 'oracle') {
    return `CURSOR ${declaration.name}${parameterList} IS ${query};`;
  }
  return `${declaration.name} CURSOR${parameterList} FOR ${query};`;
}

// Orders MySQL declarations the way the server requires them
export function orderForMySql(declarations: Declaration[]): Declaration[] {
  const rank = (declaration: Declaration): number => {
    if (declaration.kind === 'verbatim' || declaration.kind === 'comment') return 0;
    if (declaration.kind === 'cursor') return 2;
    return 1;
  };
  return declarations
    .map((declaration, index) => ({ declaration, index }))
    .sort((a, b) => rank(a.declaration) - rank(b.declaration) || a.index - b.index)
    .map(entry => entry.declaration);
}

// MySQL DECLARE layout

export interface DeclareStatement {
  start: number;
  end: number;
  cursor: boolean;
  handler: boolean;
}

export interface DeclareLayout {
  statements: DeclareStatement[];
  // Where a new variable or condition may go (before any cursor or handler)
  variableInsert: number;
  // Just past the last DECLARE statement
  end: number;
}

/**
 * Scans the DECLARE statements that open a MySQL block. `from` is the
 * offset just past the block's BEGIN keyword in masked text.
 */
export function mySqlDeclareLayout(masked: string, from: number): DeclareLayout {
  const statements: DeclareStatement[] = [];
  let position = from;
  let variableInsert = -1;

  for (;;) {
    const lead = /^(?:\s|\u0000\d+\u0000)*/.exec(masked.slice(position));
    const start = position + (lead ? lead[0].length : 0);
    if (!/^DECLARE\b/i.test(masked.slice(start))) {
      break;
    }

    const end = statementEnd(masked, start);
    const text = masked.slice(start, end);
    const cursor = /^DECLARE\s+[\w$#]+\s+CURSOR\b/i.test(text);
    const handler = /^DECLARE\s+(?:CONTINUE|EXIT|UNDO)\s+HANDLER\b/i.test(text);
    if ((cursor || handler) && variableInsert === -1) {
      variableInsert = start;
    }
    statements.push({ start, end, cursor, handler });
    position = end;
  }

  const end = statements.length > 0 ? statements[statements.length - 1].end : from;
  return { statements, variableInsert: variableInsert === -1 ? end : variableInsert, end };
}

/**
 * Offset just past the semicolon ending the statement at `from`, treating
 * nested BEGIN ... END and CASE ... END as part of the statement.
 */
export function statementEnd(masked: string, from: number): number {
  let depth = 0;
  let parens = 0;
  const tokens = tokenize(masked.slice(from));
  let tokenIndex = 0;

  let skipToken = -1;

  for (let i = from; i < masked.length; i++) {
    while (tokenIndex < tokens.length && tokens[tokenIndex].start + from < i) {
      tokenIndex++;
    }
    const token = tokens[tokenIndex];
    if (token && token.start + from === i) {
      if (tokenIndex === skipToken) {
        // keyword closing a compound statement, already accounted for
      } else if (token.upper === 'BEGIN' || token.upper === 'CASE') {
        depth++;
      } else if (token.upper === 'END') {
        const next = tokens[tokenIndex + 1];
        const follower = next && /^\s*$/.test(masked.slice(from + token.end, from + next.start)) ? next.upper : '';
        if (COMPOUND_ENDINGS.includes(follower)) {
          skipToken = tokenIndex + 1;
        } else {
          depth--;
          if (follower === 'CASE') skipToken = tokenIndex + 1;
        }
      }
      i = token.end + from - 1;
      continue;
    }

    const char = masked[i];
    if (char === '(') parens++;
    if (char === ')') parens--;
    if (char === ';' && depth <= 0 && parens === 0) {
      return i + 1;
    }
  }
  return masked.length;
}

export function stripPlaceholders(text: string): string {
  return text.replace(/\u0000\d+\u0000/g, '').trim();
}

// Depth-0 block containing `offset`, or the first depth-0 block
export function enclosingRoutineBlock(blocks: BlockSpan[], offset: number): BlockSpan | undefined {
  const topLevel = blocks.filter(block => block.depth === 0);
  return topLevel.find(block => block.beginStart <= offset && offset < block.closeEnd) ?? topLevel[0];
}
