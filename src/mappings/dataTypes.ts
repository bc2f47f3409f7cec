import { z } from 'zod';
import dataTypeTable from './dataTypes.json';
import { DiagnosticsLedger } from '../converter/ledger';
import { Dialect } from '../types/sql';

const SQLMappingSchema = z.object({
  from: z.string(),
  to: z.string(),
  // Appended when the source type carries no length/precision
  defaultSuffix: z.string().optional(),
  // false when the target type takes no length/precision
  keepSuffix: z.boolean().optional()
});

export type SQLMapping = z.infer<typeof SQLMappingSchema>;

const DataTypeTableSchema = z.record(z.string(), z.record(z.string(), z.array(SQLMappingSchema)));

export const dataTypeMappings = DataTypeTableSchema.parse(dataTypeTable);

const lookup = new Map<string, SQLMapping>();
for (const [source, targets] of Object.entries(dataTypeMappings)) {
  for (const [target, mappings] of Object.entries(targets)) {
    for (const mapping of mappings) {
      lookup.set(`${source}:${target}:${mapping.from}`, mapping);
    }
  }
}

const ANCHORED_TYPE = /%(?:ROW)?TYPE\b/i;
const SUFFIX = /\(([^()]*)\)/;

/**
 * Maps a scalar type written in `source` syntax to the closest `target` type.
 * Unknown types come back unchanged. A precision the target type cannot take
 * is dropped and reported to `ledger`.
 */
export function mapDataType(typeText: string, source: Dialect, target: Dialect, ledger?: DiagnosticsLedger): string {
  if (source === target || ANCHORED_TYPE.test(typeText)) {
    return typeText;
  }

  const trimmed = typeText.trim();
  const suffix = SUFFIX.exec(trimmed);
  const base = (suffix
    ? `${trimmed.slice(0, suffix.index)} ${trimmed.slice(suffix.index + suffix[0].length)}`
    : trimmed
  ).replace(/\s+/g, ' ').trim().toUpperCase();

  const mapping = lookup.get(`${source}:${target}:${base}`);
  if (!mapping) {
    return typeText;
  }

  if (mapping.to.includes('(') || mapping.keepSuffix === false) {
    if (suffix && ledger) {
      ledger.warn(
        'partial-support',
        'info',
        `${trimmed} → ${mapping.to}; precision (${suffix[1].trim()}) dropped`,
        `Check that ${mapping.to} holds the values stored in ${trimmed}`
      );
    }
    return mapping.to;
  }
  if (suffix) {
    const precision = target === 'oracle' ? suffix[1] : suffix[1].replace(/\s+(?:CHAR|BYTE)\s*$/i, '');
    return `${mapping.to}(${precision})`;
  }
  return mapping.to + (mapping.defaultSuffix ?? '');
}

/**
 * PostgreSQL element type for a collection whose elements are `element`.
 * A `%ROWTYPE` anchor names the table, whose row type PostgreSQL creates
 * implicitly.
 */
export function arrayElementType(element: string, source: Dialect): string {
  const rowType = /^([\w$#.]+)\s*%\s*ROWTYPE$/i.exec(element.trim());
  if (rowType) {
    return rowType[1];
  }
  return mapDataType(element.trim(), source, 'postgresql');
}
