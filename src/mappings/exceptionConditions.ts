export interface ConditionMapping {
  // Predefined PL/SQL exception name
  name: string;
  message: string;
  mysqlCondition: string;
  mysqlSqlState: string;
  postgresCondition: string;
  postgresSqlState: string;
}

// Handler conditions: numeric MySQL codes are server error numbers
export const predefinedConditions: ConditionMapping[] = [
  { name: 'OTHERS', message: 'Unhandled error', mysqlCondition: 'SQLEXCEPTION', mysqlSqlState: '45000', postgresCondition: 'OTHERS', postgresSqlState: 'P0001' },
  { name: 'NO_DATA_FOUND', message: 'No data found', mysqlCondition: 'NOT FOUND', mysqlSqlState: '02000', postgresCondition: 'NO_DATA_FOUND', postgresSqlState: 'P0002' },
  { name: 'TOO_MANY_ROWS', message: 'Query returned more than one row', mysqlCondition: '1172', mysqlSqlState: '21000', postgresCondition: 'TOO_MANY_ROWS', postgresSqlState: 'P0003' },
  { name: 'DUP_VAL_ON_INDEX', message: 'Duplicate value on unique index', mysqlCondition: '1062', mysqlSqlState: '23000', postgresCondition: 'UNIQUE_VIOLATION', postgresSqlState: '23505' },
  { name: 'ZERO_DIVIDE', message: 'Division by zero', mysqlCondition: '1365', mysqlSqlState: '22012', postgresCondition: 'DIVISION_BY_ZERO', postgresSqlState: '22012' },
  { name: 'INVALID_NUMBER', message: 'Invalid number', mysqlCondition: '1366', mysqlSqlState: 'HY000', postgresCondition: 'INVALID_TEXT_REPRESENTATION', postgresSqlState: '22P02' },
  { name: 'VALUE_ERROR', message: 'Numeric or value error', mysqlCondition: 'SQLEXCEPTION', mysqlSqlState: '22000', postgresCondition: 'DATA_EXCEPTION', postgresSqlState: '22000' },
  { name: 'INVALID_CURSOR', message: 'Invalid cursor', mysqlCondition: 'SQLEXCEPTION', mysqlSqlState: '24000', postgresCondition: 'INVALID_CURSOR_STATE', postgresSqlState: '24000' },
  { name: 'CURSOR_ALREADY_OPEN', message: 'Cursor already open', mysqlCondition: '1325', mysqlSqlState: '24000', postgresCondition: 'DUPLICATE_CURSOR', postgresSqlState: '42P03' },
  { name: 'CASE_NOT_FOUND', message: 'Case not found', mysqlCondition: '1339', mysqlSqlState: '20000', postgresCondition: 'CASE_NOT_FOUND', postgresSqlState: '20000' },
  { name: 'TIMEOUT_ON_RESOURCE', message: 'Timeout waiting for resource', mysqlCondition: '1205', mysqlSqlState: 'HY000', postgresCondition: 'LOCK_NOT_AVAILABLE', postgresSqlState: '55P03' },
  { name: 'LOGIN_DENIED', message: 'Login denied', mysqlCondition: '1045', mysqlSqlState: '28000', postgresCondition: 'INVALID_AUTHORIZATION_SPECIFICATION', postgresSqlState: '28000' },
  { name: 'STORAGE_ERROR', message: 'Out of memory', mysqlCondition: 'SQLEXCEPTION', mysqlSqlState: 'HY000', postgresCondition: 'OUT_OF_MEMORY', postgresSqlState: '53200' },
  { name: 'PROGRAM_ERROR', message: 'Internal error', mysqlCondition: 'SQLEXCEPTION', mysqlSqlState: 'HY000', postgresCondition: 'INTERNAL_ERROR', postgresSqlState: 'XX000' },
  { name: 'ACCESS_INTO_NULL', message: 'Reference to uninitialized composite', mysqlCondition: 'SQLEXCEPTION', mysqlSqlState: '22004', postgresCondition: 'NULL_VALUE_NOT_ALLOWED', postgresSqlState: '22004' },
  { name: 'COLLECTION_IS_NULL', message: 'Reference to uninitialized collection', mysqlCondition: 'SQLEXCEPTION', mysqlSqlState: '22004', postgresCondition: 'NULL_VALUE_NOT_ALLOWED', postgresSqlState: '22004' }
];

const byName = new Map(predefinedConditions.map(condition => [condition.name, condition]));

export function findCondition(name: string): ConditionMapping | undefined {
  return byName.get(name.toUpperCase());
}

// SQLSTATE used for user-defined exceptions on both targets
export const USER_DEFINED_MYSQL_STATE = '45000';
export const USER_DEFINED_POSTGRES_STATE = 'P0001';
