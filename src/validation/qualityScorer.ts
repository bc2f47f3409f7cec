import { Parser } from 'node-sql-parser';
import { splitStatements } from '../converter/blockScanner';
import { SourceMask } from '../converter/sourceMask';
import { Dialect, QualityScore } from '../types/sql';

// node-sql-parser ships no Oracle grammar; its default grammar stands in
const GRAMMARS: Record<Dialect, string | undefined> = {
  oracle: undefined,
  mysql: 'MySQL',
  postgresql: 'PostgresQL'
};

// A DML statement at the start of a chunk or after the keyword opening a routine body or branch
const DML = /(?:^|\b(?:BEGIN|THEN|ELSE|LOOP|DO)(?:\s|\u0000\d+\u0000)+)((?:SELECT|INSERT|UPDATE|DELETE|WITH)\b[\s\S]*)$/i;

// `SELECT ... INTO variable` is procedural, not a query the grammar knows
const SELECT_INTO = /^SELECT\b[\s\S]*?\bINTO\s+[\w$#.]+(?:\s*,\s*[\w$#.]+)*\s+FROM\b/i;

const parser = new Parser();

/**
 * Standalone DML statements found anywhere in a script, routine bodies
 * included, with literals and comments restored.
 */
export function extractDmlStatements(sql: string): string[] {
  const mask = new SourceMask();
  const statements: string[] = [];
  for (const statement of splitStatements(mask.mask(sql))) {
    const text = statement.text.replace(/^(?:\s|\u0000\d+\u0000)+/, '').replace(/;\s*$/, '');
    const dml = DML.exec(text);
    if (dml && !SELECT_INTO.test(dml[1])) {
      statements.push(mask.unmask(dml[1].trim()));
    }
  }
  return statements;
}

/**
 * Re-parses every DML statement under the dialect's grammar. A script
 * without DML scores 100.
 */
export function scoreQuality(sql: string, dialect: Dialect): QualityScore {
  const statements = extractDmlStatements(sql);
  const grammar = GRAMMARS[dialect];

  const valid = statements.filter(statement => {
    try {
      parser.astify(statement, grammar === undefined ? undefined : { database: grammar });
      return true;
    } catch {
      return false;
    }
  }).length;

  const total = statements.length;
  return {
    total,
    valid,
    score: total === 0 ? 100 : Math.round((valid / total) * 100)
  };
}
