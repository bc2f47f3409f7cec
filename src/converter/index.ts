import { findBlocks } from './blockScanner';
import { DiagnosticsLedger } from './ledger';
import { ORACLE_PATTERNS } from './oraclePatterns';
import { escapeRegExp, firstMatch } from './rewriteUtils';
import { SourceMask } from './sourceMask';
import { BodyTransformer } from './transformers/bodyTransformer';
import { ExceptionTransformer } from './transformers/exceptionTransformer';
import { PackageTransformer } from './transformers/packageTransformer';
import { ReverseSource, ReverseTransformer } from './transformers/reverseTransformer';
import { SignatureTransformer } from './transformers/signatureTransformer';
import { TriggerTransformer } from './transformers/triggerTransformer';
import { Dialect, TargetDialect } from '../types/sql';

/**
 * Converts one unit between a fixed pair of dialects, recording every
 * change in the ledger.
 */
export type ConversionStrategy = (text: string, ledger: DiagnosticsLedger) => string;

const identity: ConversionStrategy = text => text;

const STRATEGIES: Record<Dialect, Record<Dialect, ConversionStrategy>> = {
  oracle: {
    oracle: identity,
    mysql: (text, ledger) => lowerOracle(text, 'mysql', ledger),
    postgresql: (text, ledger) => lowerOracle(text, 'postgresql', ledger)
  },
  mysql: {
    oracle: (text, ledger) => convertRoutineFrom(text, 'mysql', 'oracle', ledger),
    mysql: identity,
    postgresql: (text, ledger) => convertRoutineFrom(text, 'mysql', 'postgresql', ledger)
  },
  postgresql: {
    oracle: (text, ledger) => convertRoutineFrom(text, 'postgresql', 'oracle', ledger),
    mysql: (text, ledger) => convertRoutineFrom(text, 'postgresql', 'mysql', ledger),
    postgresql: identity
  }
};

/**
 * Converts one unit (a routine, a trigger, a package specification or
 * body, or an anonymous block) from `source` to `target`. Never throws: a failure
 * leaves the unit unchanged and records an error in the ledger.
 */
export function convert(text: string, source: Dialect, target: Dialect, ledger: DiagnosticsLedger): string {
  try {
    return STRATEGIES[source][target](text, ledger);
  } catch (error) {
    ledger.warn(
      'manual-review-needed',
      'error',
      `Conversion from ${source} to ${target} failed and the unit was left unchanged: ${error instanceof Error ? error.message : String(error)}`,
      'Convert this unit by hand'
    );
    return text;
  }
}

export function convertSignature(text: string, source: Dialect, target: Dialect, ledger: DiagnosticsLedger): string {
  if (source === target) {
    return text;
  }
  return masked(text, (sql, mask) => new SignatureTransformer(source, target, ledger, mask).transform(sql));
}

export function convertBody(text: string, source: Dialect, target: Dialect, ledger: DiagnosticsLedger): string {
  if (source === target) {
    return text;
  }
  if (source === 'oracle') {
    if (target === 'oracle') return text;
    return masked(text, (sql, mask) => new BodyTransformer({ target, ledger, mask }).transform(sql));
  }
  return masked(text, (sql, mask) => new ReverseTransformer(source, target, ledger, mask).transform(sql));
}

export function convertExceptions(text: string, source: Dialect, target: Dialect, ledger: DiagnosticsLedger): string {
  if (source === target) {
    return text;
  }
  return masked(text, (sql, mask) => new ExceptionTransformer(source, target, ledger, mask).transform(sql));
}

// Splits Oracle packages into standalone objects; other units pass through
export function decompose(text: string, source: Dialect, target: Dialect, ledger: DiagnosticsLedger): string {
  if (source !== 'oracle' || target === 'oracle') {
    return text;
  }
  return masked(text, (sql, mask) =>
    new PackageTransformer(target, ledger, mask, (routine, collections) =>
      lowerRoutine(routine, target, ledger, mask, collections)
    ).transform(sql)
  );
}

function masked(text: string, run: (sql: string, mask: SourceMask) => string): string {
  const mask = new SourceMask();
  return mask.unmask(run(mask.mask(text), mask));
}

// Oracle → MySQL / PostgreSQL

function lowerOracle(text: string, target: TargetDialect, ledger: DiagnosticsLedger): string {
  return masked(text, (sql, mask) => {
    if (firstMatch(sql, ORACLE_PATTERNS.PACKAGE_HEADER)) {
      return new PackageTransformer(target, ledger, mask, (routine, collections) =>
        lowerRoutine(routine, target, ledger, mask, collections)
      ).transform(sql);
    }
    if (TriggerTransformer.matches(sql)) {
      return withHoisted(ledger, mask, () => new TriggerTransformer(target, ledger, mask).transform(sql));
    }
    return lowerRoutine(sql, target, ledger, mask, new Map());
  });
}

function lowerRoutine(
  sql: string,
  target: TargetDialect,
  ledger: DiagnosticsLedger,
  mask: SourceMask,
  knownCollections: ReadonlyMap<string, string>
): string {
  return withHoisted(ledger, mask, () => {
    let result = new SignatureTransformer('oracle', target, ledger, mask, knownCollections).transform(sql);
    result = new BodyTransformer({ target, ledger, mask }).transform(result);
    result = new ExceptionTransformer('oracle', target, ledger, mask).transform(result);
    return target === 'mysql' ? wrapInDelimiters(result, ledger) : result;
  });
}

// Puts the statements `lower` hoisted out of the unit in front of it
function withHoisted(ledger: DiagnosticsLedger, mask: SourceMask, lower: () => string): string {
  const hoistedBefore = ledger.hoistedStatements.length;
  const result = lower();

  const hoisted = ledger.hoistedStatements.slice(hoistedBefore);
  if (hoisted.length === 0) {
    return result;
  }
  return `${hoisted.map(statement => mask.mask(statement)).join('\n\n')}\n\n${result.replace(/^\s*\n/, '')}`;
}

// MySQL / PostgreSQL → any other dialect

function convertRoutineFrom(text: string, source: ReverseSource, target: Dialect, ledger: DiagnosticsLedger): string {
  return masked(text, (sql, mask) => {
    let result = source === 'mysql' ? stripDelimiters(sql) : sql;
    result = new SignatureTransformer(source, target, ledger, mask).transform(result);
    result = new ReverseTransformer(source, target, ledger, mask).transform(result);
    result = new ExceptionTransformer(source, target, ledger, mask).transform(result);
    return target === 'mysql' ? wrapInDelimiters(result, ledger) : result;
  });
}

const ROUTINE_CREATE = /\bCREATE\s+(?:DEFINER\s*=\s*\S+\s+)?(?:PROCEDURE|FUNCTION)\b/i;

/**
 * Client scripts need a statement delimiter other than `;` around a routine
 * whose body contains semicolons.
 */
function wrapInDelimiters(masked: string, ledger: DiagnosticsLedger): string {
  const header = ROUTINE_CREATE.exec(masked);
  if (!header) {
    return masked;
  }

  const block = findBlocks(masked)
    .filter(candidate => candidate.depth === 0 && candidate.beginStart > header.index)
    .sort((a, b) => a.beginStart - b.beginStart)[0];
  if (!block) {
    return masked;
  }

  ledger.rule('routine wrapped in DELIMITER // ... DELIMITER ;');
  return (
    `${masked.slice(0, header.index)}DELIMITER //\n` +
    `${masked.slice(header.index, block.endStart)}END //\nDELIMITER ;` +
    masked.slice(block.closeEnd)
  );
}

// `DELIMITER x` lines go, and `END x` becomes `END;`
function stripDelimiters(masked: string): string {
  const delimiters = [...masked.matchAll(/^[ \t]*DELIMITER[ \t]+(\S+)[ \t]*$/gim)]
    .map(match => match[1])
    .filter(delimiter => delimiter !== ';');

  let result = masked.replace(/^[ \t]*DELIMITER[ \t]+\S+[ \t]*(?:\r?\n|$)/gim, '');
  for (const delimiter of new Set(delimiters)) {
    result = result.replace(new RegExp(`(\\bEND\\b(?:[ \\t]+[\\w$#]+)?)[ \\t]*${escapeRegExp(delimiter)}`, 'gi'), '$1;');
  }
  return result;
}
