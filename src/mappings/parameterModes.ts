import { Dialect, ParameterMode, RoutineKind, RoutineParameter } from '../types/sql';

const MODE_KEYWORDS: Record<Dialect, Record<ParameterMode, string>> = {
  oracle: { in: 'IN', out: 'OUT', inout: 'IN OUT' },
  mysql: { in: 'IN', out: 'OUT', inout: 'INOUT' },
  postgresql: { in: '', out: 'OUT', inout: 'INOUT' }
};

export function parseParameterMode(keyword: string | undefined): ParameterMode {
  const normalized = (keyword ?? '').replace(/\s+/g, ' ').trim().toUpperCase();
  if (normalized === 'OUT') return 'out';
  if (normalized === 'IN OUT' || normalized === 'INOUT') return 'inout';
  return 'in';
}

export function modeKeyword(mode: ParameterMode, target: Dialect): string {
  return MODE_KEYWORDS[target][mode];
}

/**
 * Renders one parameter in the target grammar. MySQL puts the mode first,
 * Oracle and PostgreSQL after the name; PostgreSQL leaves input
 * parameters bare. The type is expected to be mapped already.
 */
export function formatParameter(param: RoutineParameter, target: Dialect, kind: RoutineKind): string {
  const keyword = modeKeyword(param.mode, target);
  const defaultClause = param.defaultValue !== undefined ? ` DEFAULT ${param.defaultValue}` : '';

  switch (target) {
    case 'mysql':
      // Function parameters are always input parameters
      return kind === 'function'
        ? `${param.name} ${param.type}`
        : `${keyword} ${param.name} ${param.type}`;
    case 'postgresql':
      return keyword
        ? `${param.name} ${keyword} ${param.type}${defaultClause}`
        : `${param.name} ${param.type}${defaultClause}`;
    case 'oracle':
      return `${param.name} ${keyword} ${param.type}${defaultClause}`;
  }
}
