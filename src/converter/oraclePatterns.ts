// All patterns run over masked text, so literals and comments are opaque
const NAME = '(?:[\\w$#]+|\\u0000\\d+\\u0000)';
const QUALIFIED_NAME = `${NAME}(?:\\s*\\.\\s*${NAME})?`;

export const ORACLE_PATTERNS = {
  // Units
  ROUTINE_HEADER: new RegExp(
    `\\bCREATE\\s+(OR\\s+REPLACE\\s+)?(?:(?:NON)?EDITIONABLE\\s+)?(PROCEDURE|FUNCTION)\\s+(${QUALIFIED_NAME})\\s*`,
    'gi'
  ),
  PACKAGE_HEADER: new RegExp(
    `\\bCREATE\\s+(OR\\s+REPLACE\\s+)?(?:(?:NON)?EDITIONABLE\\s+)?PACKAGE\\s+(BODY\\s+)?(?:(${NAME})\\s*\\.\\s*)?(${NAME})\\s*(?:AUTHID\\s+\\w+\\s+)?(?:IS|AS)\\b`,
    'gi'
  ),
  TRIGGER_HEADER: new RegExp(
    `\\bCREATE\\s+(OR\\s+REPLACE\\s+)?(?:(?:NON)?EDITIONABLE\\s+)?TRIGGER\\s+(${QUALIFIED_NAME})\\s*`,
    'gi'
  ),
  TRIGGER_TABLE: new RegExp(`^([\\s\\S]+?)\\s+ON\\s+(${QUALIFIED_NAME})`, 'i'),
  COMPOUND_TRIGGER: /\bCOMPOUND\s+TRIGGER\b/i,
  CORRELATION: /\bREFERENCING\s+([\s\S]*?)(?=\bFOR\s+EACH\b|\bWHEN\b|\bFOLLOWS\b|\bPRECEDES\b|\bENABLE\b|\bDISABLE\b|$)/i,
  TRIGGER_PREDICATE: /\b(INSERTING|UPDATING|DELETING)\b(\s*\(\s*\u0000\d+\u0000\s*\))?/gi,

  // Cursor attributes
  ROWCOUNT_ASSIGNMENT: /([\w$#.]+)\s*:=\s*SQL\s*%\s*ROWCOUNT\s*;/gi,
  IMPLICIT_ROWCOUNT: /\bSQL\s*%\s*ROWCOUNT\b/gi,
  IMPLICIT_FOUND: /\bSQL\s*%\s*FOUND\b/gi,
  IMPLICIT_NOTFOUND: /\bSQL\s*%\s*NOTFOUND\b/gi,
  IMPLICIT_ISOPEN: /\bSQL\s*%\s*ISOPEN\b/gi,
  EXPLICIT_CURSOR_ATTRIBUTE: /\b([\w$#]+)\s*%\s*(FOUND|NOTFOUND|ISOPEN|ROWCOUNT)\b/gi,

  // Pragmas
  AUTONOMOUS_TRANSACTION: /\bPRAGMA\s+AUTONOMOUS_TRANSACTION\s*;/gi,
  EXCEPTION_INIT: /\bPRAGMA\s+EXCEPTION_INIT\s*\(\s*([\w$#]+)\s*,\s*(-?\s*\d+)\s*\)\s*;/gi,

  // Pipelined functions
  PIPELINED: /\bPIPELINED\b/gi,
  PIPE_ROW: /\bPIPE\s+ROW\s*\(\s*([\s\S]+?)\s*\)\s*;/gi,

  // Type declarations
  TABLE_OF: /\bTYPE\s+([\w$#]+)\s+IS\s+TABLE\s+OF\s+([\s\S]+?)(?:\s+NOT\s+NULL)?(?:\s+INDEX\s+BY\s+([\s\S]+?))?\s*;/gi,
  VARRAY: /\bTYPE\s+([\w$#]+)\s+IS\s+(?:VARRAY|VARYING\s+ARRAY)\s*\(\s*(\d+)\s*\)\s+OF\s+([\s\S]+?)(?:\s+NOT\s+NULL)?\s*;/gi,
  RECORD_START: /\bTYPE\s+([\w$#]+)\s+IS\s+RECORD\s*\(/gi,
  REF_CURSOR: /\bTYPE\s+([\w$#]+)\s+IS\s+REF\s+CURSOR(?:\s+RETURN\s+([^;]+?))?\s*;/gi,
  SYS_REFCURSOR: /\bSYS_REFCURSOR\b/gi,

  // DML
  RETURNING_INTO: /\s+RETURNING\s+([^;]+?)\s+INTO\s+([^;]+?)\s*;/gi,

  // Control flow
  GOTO: /\bGOTO\s+([\w$#]+)\s*;/gi,
  LABEL: /<<\s*([\w$#]+)\s*>>/gi,
  EXIT_WHEN: /\b(EXIT|CONTINUE)(?:\s+([\w$#]+))?\s+WHEN\s+([^;]+?)\s*;/gi,
  PLAIN_EXIT: /\b(EXIT|CONTINUE)(?:\s+([\w$#]+))?\s*;/gi,

  // Errors
  RAISE_APPLICATION_ERROR: /\bRAISE_APPLICATION_ERROR\s*\(\s*(-?\s*\d+)\s*,\s*([\s\S]+?)\s*(?:,\s*(TRUE|FALSE)\s*)?\)\s*;/gi,
  RAISE_NAMED: /\bRAISE\s+([\w$#]+(?:\s*\.\s*[\w$#]+)?)\s*;/gi,

  // Transactions
  SAVEPOINT: /\b(?:SAVEPOINT|ROLLBACK\s+TO(?:\s+SAVEPOINT)?)\s+[\w$#]+\s*;/gi,
  TRANSACTION_CONTROL: /\b(?:COMMIT|ROLLBACK)\b(?!\s+TO\b)/i,

  // Debug output
  PUT_LINE: /\bDBMS_OUTPUT\s*\.\s*PUT_LINE\s*\(\s*([\s\S]*?)\s*\)\s*;/gi,
  DBMS_OUTPUT_OTHER: /\bDBMS_OUTPUT\s*\.\s*(?:PUT|NEW_LINE|ENABLE|DISABLE|GET_LINES?)\b[^;]*;/gi
};

// Words RAISE_NAMED must not treat as exception names
export const RAISE_LEVELS = ['EXCEPTION', 'NOTICE', 'INFO', 'LOG', 'DEBUG', 'WARNING'];

// Collection methods that have no direct array counterpart
export const COLLECTION_METHODS = ['COUNT', 'EXTEND', 'DELETE', 'FIRST', 'LAST', 'EXISTS', 'NEXT', 'PRIOR', 'TRIM', 'LIMIT'];

// Statements after which SQL%ROWCOUNT is meaningful
export const ROW_COUNT_STATEMENT = /\b(?:INSERT|UPDATE|DELETE|MERGE|FETCH|EXECUTE\s+IMMEDIATE)\b|\bSELECT\b[\s\S]*\bINTO\b/i;
