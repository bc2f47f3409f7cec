import { format } from 'sql-formatter';
import { convert } from '../converter';
import { DiagnosticsLedger } from '../converter/ledger';
import { SourceMask } from '../converter/sourceMask';
import { Logger } from '../utils/logger';
import { scoreQuality } from '../validation/qualityScorer';
import {
  ConversionOptions,
  ConversionResult,
  Dialect,
  FailOn,
  SEVERITY_RANK,
  Warning
} from '../types/sql';

const FORMATTER_LANGUAGES = {
  oracle: 'plsql',
  mysql: 'mysql',
  postgresql: 'postgresql'
} as const satisfies Record<Dialect, string>;

// A line holding only `/` ends a unit in SQL*Plus scripts
const UNIT_SEPARATOR = /^[ \t]*\/[ \t]*$/m;

/**
 * Splits a script into units at `/` lines; separators inside literals or
 * comments are ignored.
 */
export function splitUnits(sql: string): string[] {
  const mask = new SourceMask();
  return mask
    .mask(sql)
    .split(UNIT_SEPARATOR)
    .map(unit => mask.unmask(unit).trim())
    .filter(unit => unit.length > 0);
}

// Warnings at or above `failOn`, none for 'never'
export function blockingWarnings(warnings: readonly Warning[], failOn: FailOn): Warning[] {
  if (failOn === 'never') {
    return [];
  }
  return warnings.filter(warning => SEVERITY_RANK[warning.severity] >= SEVERITY_RANK[failOn]);
}

export function formatSql(sql: string, dialect: Dialect, logger: Logger): string {
  try {
    return format(sql, {
      language: FORMATTER_LANGUAGES[dialect],
      keywordCase: 'upper',
      indentStyle: 'standard',
      linesBetweenQueries: 2
    });
  } catch (error) {
    logger.warn(`SQL formatter failed, output left unformatted: ${error instanceof Error ? error.message : String(error)}`);
    return sql;
  }
}

/**
 * Converts a script of one or more units and collects the ledger, with
 * optional formatting and grammar scoring of input and output.
 */
export function transpile(
  sql: string,
  source: Dialect,
  target: Dialect,
  options: ConversionOptions = {},
  logger: Logger = new Logger('warn')
): ConversionResult {
  const settings: Required<ConversionOptions> = {
    format: false,
    score: false,
    failOn: 'never',
    ...options
  };
  const ledger = new DiagnosticsLedger();

  try {
    const units = splitUnits(sql);
    logger.debug(`Converting ${units.length} unit(s) from ${source} to ${target}`);

    const converted = units.map(unit => convert(unit, source, target, ledger));
    let output = converted.join(target === 'oracle' ? '\n/\n\n' : '\n\n');
    if (target === 'oracle' && converted.length > 0) {
      output += '\n/';
    }
    if (settings.format) {
      output = formatSql(output, target, logger);
    }

    const result: ConversionResult = {
      success: true,
      sql: output,
      warnings: [...ledger.warnings],
      appliedRules: [...ledger.appliedRules],
      metadata: {
        source,
        target,
        units: units.length,
        hoistedStatements: ledger.hoistedStatements.length,
        formatted: settings.format
      }
    };

    if (settings.score && result.metadata) {
      result.metadata.inputQuality = scoreQuality(sql, source);
      result.metadata.outputQuality = scoreQuality(output, target);
    }

    const blocking = blockingWarnings(result.warnings, settings.failOn);
    if (blocking.length > 0) {
      result.success = false;
      result.errors = [`${blocking.length} warning(s) at or above severity '${settings.failOn}'`];
    }

    return result;
  } catch (error) {
    return {
      success: false,
      errors: [error instanceof Error ? error.message : String(error)],
      warnings: [...ledger.warnings],
      appliedRules: [...ledger.appliedRules]
    };
  }
}
