import { BlockSpan, findBlocks, findMatchingParen, splitTopLevel } from '../blockScanner';
import { parseDeclarationSection, statementEnd, stripPlaceholders } from '../declarations';
import { DiagnosticsLedger } from '../ledger';
import { ORACLE_PATTERNS } from '../oraclePatterns';
import { SourceMask } from '../sourceMask';
import { escapeRegExp, firstMatch, replaceMatches } from '../rewriteUtils';
import { arrayElementType, mapDataType } from '../../mappings/dataTypes';
import { PackageInfo, PackageRoutine, RoutineKind, TargetDialect } from '../../types/sql';

/**
 * Converts one masked Oracle routine unit (a full CREATE statement) into
 * the target dialect. Collection types declared by the package are passed
 * so pipelined functions can resolve their row type.
 */
export type RoutineConverter = (masked: string, knownCollections: ReadonlyMap<string, string>) => string;

interface ParsedPackage extends PackageInfo {
  orReplace: boolean;
  // Package-level items with no standalone counterpart (cursors, pragmas)
  leftovers: string[];
}

// Members visible to routine bodies, collected over specification and body
interface PackageScope {
  constants: PackageInfo['constants'];
  variables: PackageInfo['variables'];
  types: PackageInfo['types'];
  routines: PackageInfo['routines'];
  exceptions: string[];
  // Collection type name, bare and qualified, lowercased → element type
  collections: Map<string, string>;
}

const ROUTINE_START = /^(PROCEDURE|FUNCTION)\s+([\w$#]+)\s*/i;
const ROUTINE_TAIL = /^\s*(?:RETURN\s+([\w$#.%]+(?:\s*\([^)]*\))?)\s*)?((?:\b(?:DETERMINISTIC|PIPELINED|PARALLEL_ENABLE|RESULT_CACHE)\b\s*)*)(;|\b(?:IS|AS)\b)/i;
const LOCAL_SUBPROGRAM = /\b(?:PROCEDURE|FUNCTION)\s+[\w$#]+(?:\s*\([\s\S]*?\))?(?:\s+RETURN\s+[\w$#.%]+(?:\s*\([^)]*\))?)?\s+(?:IS|AS)\b/i;
const TYPE_NAME = /^(?:SUB)?TYPE\s+([\w$#]+)/i;

/**
 * Splits an Oracle package into standalone objects: constants become
 * zero-argument functions, variables rows of a key-value table and every
 * routine an independent routine named after the package. MySQL prefixes
 * names with the package; PostgreSQL places them in a schema of the same
 * name.
 */
export class PackageTransformer {
  constructor(
    private readonly target: TargetDialect,
    private readonly ledger: DiagnosticsLedger,
    private readonly mask: SourceMask,
    private readonly convertRoutine: RoutineConverter
  ) {}

  transform(masked: string): string {
    const headers = [...masked.matchAll(ORACLE_PATTERNS.PACKAGE_HEADER)];
    if (headers.length === 0) {
      return masked;
    }

    // A body sees the members its specification declared
    const scopes = new Map<string, PackageScope>();

    const units = headers.map((header, index) => {
      const start = header.index ?? 0;
      const end = index + 1 < headers.length ? headers[index + 1].index ?? masked.length : masked.length;
      const text = masked.slice(start, end);
      const parsed = this.parse(text, header);
      if (!parsed) {
        this.ledger.warn(
          'manual-review-needed',
          'error',
          `Package ${this.mask.unmask(header[4])} could not be split into its members and was left unchanged`,
          'Check that every routine in the package ends with END and a semicolon'
        );
        return text;
      }

      const key = parsed.name.toLowerCase();
      const scope = mergeScope(scopes.get(key), parsed);
      scopes.set(key, scope);
      return this.emit(parsed, scope);
    });

    return masked.slice(0, headers[0].index ?? 0) + units.join('\n\n');
  }

  parse(unit: string, header: RegExpMatchArray): ParsedPackage | undefined {
    const info: ParsedPackage = {
      name: this.mask.unmask(header[4]).replace(/"/g, ''),
      unit: header[2] !== undefined ? 'body' : 'specification',
      orReplace: header[1] !== undefined,
      constants: [],
      variables: [],
      types: [],
      routines: [],
      exceptions: [],
      leftovers: []
    };
    if (header[3] !== undefined) {
      info.schema = this.mask.unmask(header[3]).replace(/"/g, '');
    }

    const blocks = findBlocks(unit);
    let position = header[0].length;

    while (position < unit.length) {
      const lead = /^(?:\s|\u0000\d+\u0000)*/.exec(unit.slice(position));
      position += lead ? lead[0].length : 0;
      const rest = unit.slice(position);
      if (rest.length === 0) break;

      if (/^END\b/i.test(rest)) {
        return info;
      }

      if (/^BEGIN\b/i.test(rest)) {
        const block = blocks.find(candidate => candidate.beginStart === position);
        if (!block) return undefined;
        info.initialization = unit.slice(block.beginEnd, block.endStart);
        return info;
      }

      const routine = ROUTINE_START.exec(rest);
      if (routine) {
        const next = this.readRoutine(unit, position, routine, blocks);
        if (!next) return undefined;
        info.routines.push(next.routine);
        position = next.end;
        continue;
      }

      const end = statementEnd(unit, position);
      if (end <= position) return undefined;
      this.readDeclaration(unit.slice(position, end), info);
      position = end;
    }

    return info;
  }

  private readRoutine(
    unit: string,
    start: number,
    match: RegExpExecArray,
    blocks: BlockSpan[]
  ): { routine: PackageRoutine; end: number } | undefined {
    const kind: RoutineKind = match[1].toUpperCase() === 'FUNCTION' ? 'function' : 'procedure';
    let position = start + match[0].length;

    if (unit[position] === '(') {
      const close = findMatchingParen(unit, position);
      if (close === -1) return undefined;
      position = close + 1;
    }

    const tail = ROUTINE_TAIL.exec(unit.slice(position));
    if (!tail) return undefined;
    const terminator = position + tail[0].length;
    const header = unit.slice(start, terminator - tail[3].length).trim();
    const routine: PackageRoutine = { kind, name: match[2], header };

    if (tail[3] === ';') {
      return { routine, end: terminator };
    }

    const block = this.routineBlock(unit, terminator, blocks);
    if (!block) return undefined;
    routine.definition = unit.slice(start, block.closeEnd);
    return { routine, end: block.closeEnd };
  }

  // Local subprograms in the declaration section own the blocks before the routine's
  private routineBlock(unit: string, from: number, blocks: BlockSpan[]): BlockSpan | undefined {
    const candidates = blocks
      .filter(block => block.depth === 0 && block.beginStart >= from)
      .sort((a, b) => a.beginStart - b.beginStart);

    let position = from;
    for (const block of candidates) {
      if (block.beginStart < position) continue;
      if (LOCAL_SUBPROGRAM.test(unit.slice(position, block.beginStart))) {
        position = block.closeEnd;
        continue;
      }
      return block;
    }
    return undefined;
  }

  private readDeclaration(text: string, info: ParsedPackage): void {
    for (const declaration of parseDeclarationSection(text, 'oracle')) {
      switch (declaration.kind) {
        case 'comment':
          break;
        case 'constant':
          info.constants.push({ name: declaration.name, type: declaration.type ?? '', value: declaration.defaultValue ?? 'NULL' });
          break;
        case 'variable': {
          const variable = { name: declaration.name, type: declaration.type ?? '' };
          info.variables.push(
            declaration.defaultValue !== undefined ? { ...variable, initialValue: declaration.defaultValue } : variable
          );
          break;
        }
        case 'exception':
          info.exceptions.push(declaration.name);
          break;
        case 'cursor':
          info.leftovers.push(`${declaration.text};`);
          break;
        case 'verbatim': {
          const type = TYPE_NAME.exec(declaration.text);
          if (type) {
            info.types.push({ name: type[1], definition: `${declaration.text};` });
          } else {
            info.leftovers.push(`${declaration.text};`);
          }
          break;
        }
      }
    }
  }

  // Emission

  emit(info: ParsedPackage, scope: PackageScope = mergeScope(undefined, info)): string {
    const sections: string[] = [this.headerComment(info)];
    const schema = this.target === 'postgresql' ? this.schemaFor(info) : undefined;

    if (schema !== undefined) {
      sections.push(`CREATE SCHEMA IF NOT EXISTS ${schema};`);
      this.ledger.rule(`package ${info.name} → schema ${schema}`);
    }

    for (const type of info.types) {
      sections.push(this.emitType(info, type.name, type.definition, scope.collections));
    }
    for (const constant of info.constants) {
      sections.push(this.emitConstant(info, constant.name, constant.type, constant.value));
    }
    if (info.variables.length > 0) {
      sections.push(this.emitVariables(info));
    }
    for (const leftover of info.leftovers) {
      this.ledger.warn(
        'manual-review-needed',
        'warning',
        `Package-level declaration ${stripPlaceholders(this.mask.unmask(leftover)).split(/\s+/).slice(0, 2).join(' ')} has no standalone counterpart`,
        'Move it into the routines that use it'
      );
      sections.push(this.commented(`package-level declaration kept for review:\n${leftover}`));
    }

    if (info.unit === 'specification') {
      if (info.routines.length > 0) {
        this.ledger.rule(`package ${info.name} specification → ${info.routines.length} routine declarations listed`);
      }
    } else {
      for (const routine of info.routines) {
        if (routine.definition !== undefined) {
          sections.push(this.emitRoutine(info, scope, routine, routine.definition));
        }
      }
    }

    if (info.initialization !== undefined && stripPlaceholders(info.initialization) !== '') {
      this.ledger.warn(
        'manual-review-needed',
        'warning',
        `Initialization section of package ${info.name} has no counterpart and was kept as a comment`,
        'Run the statements once from the application or a setup script'
      );
      sections.push(this.commented(`initialization section of ${info.name}:\n${info.initialization.trim()}`));
    }

    return sections.join('\n\n');
  }

  private headerComment(info: ParsedPackage): string {
    const lines = [
      `Package ${info.schema ? `${info.schema}.` : ''}${info.name} (${info.unit})`,
      this.target === 'mysql'
        ? `Members are standalone objects named ${info.name}_<member>`
        : `Members are objects in schema ${this.schemaFor(info)}`
    ];
    for (const routine of info.routines) {
      lines.push(`${routine.kind} ${this.qualified(info, routine.name)}`);
    }
    return this.mask.protect(lines.map(line => `-- ${line}`).join('\n'));
  }

  private emitType(info: ParsedPackage, name: string, definition: string, collections: Map<string, string>): string {
    const qualified = this.qualified(info, name);
    const table = firstMatch(definition, ORACLE_PATTERNS.TABLE_OF);
    const varray = table ? undefined : firstMatch(definition, ORACLE_PATTERNS.VARRAY);
    const element = table ? table[2] : varray ? varray[3] : undefined;
    if (element !== undefined) {
      collections.set(name.toLowerCase(), element);
      collections.set(qualified.toLowerCase(), element);
    }

    if (this.target === 'mysql') {
      this.ledger.warn(
        'unsupported-statement',
        'error',
        `Package type ${name} is not supported by MySQL`,
        'Use a temporary table or a JSON value instead'
      );
      return this.commented(definition);
    }

    if (element !== undefined) {
      const indexBy = table ? table[3] : undefined;
      const arrayType = indexBy !== undefined && /CHAR|STRING/i.test(indexBy) ? 'JSONB' : `${arrayElementType(element, 'oracle')}[]`;
      this.ledger.rule(`package type ${name} → DOMAIN ${qualified}`);
      return `CREATE DOMAIN ${qualified} AS ${arrayType};`;
    }

    const record = firstMatch(definition, ORACLE_PATTERNS.RECORD_START);
    if (record) {
      const open = (record.index ?? 0) + record[0].length - 1;
      const close = findMatchingParen(definition, open);
      const fields = splitTopLevel(definition.slice(open + 1, close)).map(field => {
        const parts = /^\s*([\w$#]+)\s+([\s\S]+?)\s*$/.exec(field);
        return parts ? `${parts[1]} ${mapDataType(parts[2].replace(/\s*(?::=|\bDEFAULT\b)[\s\S]*$/i, ''), 'oracle', 'postgresql', this.ledger)}` : field.trim();
      });
      this.ledger.rule(`package record ${name} → CREATE TYPE ${qualified}`);
      return `CREATE TYPE ${qualified} AS (\n  ${fields.join(',\n  ')}\n);`;
    }

    if (firstMatch(definition, ORACLE_PATTERNS.REF_CURSOR)) {
      this.ledger.rule(`package type ${name} → DOMAIN ${qualified} over REFCURSOR`);
      return `CREATE DOMAIN ${qualified} AS REFCURSOR;`;
    }

    this.ledger.warn(
      'manual-review-needed',
      'warning',
      `Package type ${name} was not recognised and was kept as a comment`,
      'Create the matching PostgreSQL type by hand'
    );
    return this.commented(definition);
  }

  private emitConstant(info: ParsedPackage, name: string, type: string, value: string): string {
    const qualified = this.qualified(info, name);
    const mapped = mapDataType(type, 'oracle', this.target, this.ledger);
    this.ledger.rule(`package constant ${name} → function ${qualified}()`);

    if (this.target === 'mysql') {
      return `CREATE FUNCTION ${qualified}() RETURNS ${mapped} DETERMINISTIC RETURN ${value};`;
    }
    return `CREATE OR REPLACE FUNCTION ${qualified}() RETURNS ${mapped} LANGUAGE sql IMMUTABLE AS $$ SELECT CAST(${value} AS ${mapped}) $$;`;
  }

  private emitVariables(info: ParsedPackage): string {
    const table = this.target === 'mysql' ? `${info.name}_vars` : `${this.schemaFor(info)}.pkg_variables`;
    const statements = [
      `CREATE TABLE IF NOT EXISTS ${table} (\n  var_name VARCHAR(100) PRIMARY KEY,\n  var_value TEXT\n);`
    ];

    for (const variable of info.variables) {
      const value = variable.initialValue ?? 'NULL';
      const name = this.mask.mask(`'${variable.name}'`);
      statements.push(
        this.target === 'mysql'
          ? `INSERT IGNORE INTO ${table} (var_name, var_value) VALUES (${name}, ${value});`
          : `INSERT INTO ${table} (var_name, var_value) VALUES (${name}, CAST(${value} AS TEXT)) ON CONFLICT (var_name) DO NOTHING;`
      );
      this.ledger.rule(`package variable ${variable.name} → row in ${table}`);
    }

    if (this.target === 'mysql') {
      const example = `@${info.name}_${info.variables[0].name}`;
      statements.push(
        this.mask.protect(`-- Session variables such as ${example} are lighter when values need not outlive the connection`)
      );
      return statements.join('\n');
    }

    const schema = this.schemaFor(info);
    statements.push(
      `CREATE OR REPLACE FUNCTION ${schema}.get_var(p_name VARCHAR) RETURNS TEXT\nLANGUAGE sql STABLE AS $$\n  SELECT var_value FROM ${table} WHERE var_name = p_name\n$$;`,
      `CREATE OR REPLACE FUNCTION ${schema}.set_var(p_name VARCHAR, p_value TEXT) RETURNS VOID\nLANGUAGE sql AS $$\n  INSERT INTO ${table} (var_name, var_value) VALUES (p_name, p_value)\n  ON CONFLICT (var_name) DO UPDATE SET var_value = EXCLUDED.var_value\n$$;`
    );
    this.ledger.rule(`package variables of ${info.name} → ${schema}.get_var / ${schema}.set_var`);
    return statements.join('\n');
  }

  private emitRoutine(info: ParsedPackage, scope: PackageScope, routine: PackageRoutine, definition: string): string {
    const qualified = this.qualified(info, routine.name);
    const nameMatch = ROUTINE_START.exec(definition);
    const headerEnd = nameMatch ? nameMatch[0].length : 0;
    let rest = this.rewriteReferences(info, scope, routine, definition.slice(headerEnd));

    const references = scope.exceptions.filter(name => new RegExp(`(?<![\\w$#])${escapeRegExp(name)}(?![\\w$#])`, 'i').test(rest));
    if (references.length > 0) {
      rest = this.declareExceptions(rest, references);
    }

    const kind = routine.kind === 'function' ? 'FUNCTION' : 'PROCEDURE';
    const replace = info.orReplace ? 'OR REPLACE ' : '';
    this.ledger.rule(`package routine ${info.name}.${routine.name} → ${qualified}`);
    return this.convertRoutine(`CREATE ${replace}${kind} ${qualified}${rest.startsWith('(') ? '' : ' '}${rest}`, scope.collections);
  }

  // Package exceptions become local declarations of each routine raising or handling them
  private declareExceptions(rest: string, names: string[]): string {
    const open = rest.startsWith('(') ? findMatchingParen(rest, 0) + 1 : 0;
    const tail = ROUTINE_TAIL.exec(rest.slice(open));
    if (!tail || tail[3] === ';') {
      return rest;
    }
    const at = open + tail[0].length;
    const declarations = names.map(name => `\n  ${name} EXCEPTION;`).join('');
    return rest.slice(0, at) + declarations + rest.slice(at);
  }

  private rewriteReferences(info: ParsedPackage, scope: PackageScope, routine: PackageRoutine, text: string): string {
    const prefix = `(?:${escapeRegExp(info.name)}\\s*\\.\\s*)?`;
    let result = text;

    for (const sibling of uniqueRoutines(scope.routines)) {
      const qualified = this.qualified(info, sibling.name);
      const name = escapeRegExp(sibling.name);

      if (sibling.kind === 'procedure') {
        const call = new RegExp(`(^|[;\\n]|\\b(?:BEGIN|THEN|ELSE|LOOP)\\b)(\\s*)${prefix}${name}\\s*(\\(|;)`, 'gi');
        result = replaceMatches(result, call, match => {
          const keyword = this.target === 'mysql' ? 'CALL' : 'PERFORM';
          const args = match[3] === ';' ? '();' : '(';
          this.ledger.rule(`call ${sibling.name} → ${keyword} ${qualified}`);
          return `${match[1]}${match[2]}${keyword} ${qualified}${args}`;
        });
        continue;
      }

      const reference = new RegExp(`(?<![\\w$#.])(?<!\\bEND\\s+)${prefix}${name}(?![\\w$#])(\\s*\\()?`, 'gi');
      result = replaceMatches(result, reference, match => {
        this.ledger.rule(`call ${sibling.name} → ${qualified}`);
        return match[1] !== undefined ? `${qualified}${match[1]}` : `${qualified}()`;
      });
    }

    for (const constant of scope.constants) {
      const qualified = this.qualified(info, constant.name);
      const reference = new RegExp(`(?<![\\w$#.])${prefix}${escapeRegExp(constant.name)}(?![\\w$#(])`, 'gi');
      result = replaceMatches(result, reference, () => {
        this.ledger.rule(`constant ${constant.name} → ${qualified}()`);
        return `${qualified}()`;
      });
    }

    if (this.target === 'postgresql') {
      for (const type of scope.types) {
        const reference = new RegExp(`(?<![\\w$#.])${prefix}${escapeRegExp(type.name)}(?![\\w$#])`, 'gi');
        result = result.replace(reference, this.qualified(info, type.name));
      }
    } else if (scope.types.some(type => new RegExp(`(?<![\\w$#.])${escapeRegExp(type.name)}(?![\\w$#])`, 'i').test(result))) {
      this.ledger.warn(
        'unsupported-statement',
        'error',
        `Routine ${routine.name} uses package types, which MySQL does not support`,
        'Replace the collection with a temporary table'
      );
    }

    for (const variable of scope.variables) {
      if (new RegExp(`(?<![\\w$#.])${prefix}${escapeRegExp(variable.name)}(?![\\w$#])`, 'i').test(result)) {
        this.ledger.warn(
          'manual-review-needed',
          'warning',
          `Routine ${routine.name} uses package variable ${variable.name}`,
          this.target === 'mysql'
            ? `Read and write it through ${info.name}_vars or the session variable @${info.name}_${variable.name}`
            : `Read it with ${this.schemaFor(info)}.get_var('${variable.name}') and write it with ${this.schemaFor(info)}.set_var`
        );
      }
    }

    return result;
  }

  private qualified(info: ParsedPackage, member: string): string {
    return this.target === 'mysql' ? `${info.name}_${member}` : `${this.schemaFor(info)}.${member}`;
  }

  private schemaFor(info: ParsedPackage): string {
    return info.name;
  }

  private commented(text: string): string {
    return this.mask.protect(this.mask.unmask(text).split('\n').map(line => `-- ${line}`).join('\n'));
  }
}

function mergeScope(previous: PackageScope | undefined, info: ParsedPackage): PackageScope {
  return {
    constants: [...(previous?.constants ?? []), ...info.constants],
    variables: [...(previous?.variables ?? []), ...info.variables],
    types: [...(previous?.types ?? []), ...info.types],
    routines: [...(previous?.routines ?? []), ...info.routines],
    exceptions: [...(previous?.exceptions ?? []), ...info.exceptions],
    collections: new Map(previous?.collections ?? [])
  };
}

// A routine declared in the specification and defined in the body appears once
function uniqueRoutines(routines: PackageRoutine[]): PackageRoutine[] {
  const seen = new Set<string>();
  return routines.filter(routine => {
    const key = routine.name.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
