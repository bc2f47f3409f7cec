export { convert, convertBody, convertExceptions, convertSignature, decompose } from './converter';
export type { ConversionStrategy } from './converter';
export { DiagnosticsLedger } from './converter/ledger';
export { mapDataType } from './mappings/dataTypes';
export { formatParameter } from './mappings/parameterModes';
export { predefinedConditions, findCondition } from './mappings/exceptionConditions';
export { transpile, splitUnits, formatSql, blockingWarnings } from './lib/transpiler';
export { scoreQuality, extractDmlStatements } from './validation/qualityScorer';
export { Logger } from './utils/logger';
export * from './types/sql';
