import { describe, it, expect } from 'vitest';
import { findCondition, predefinedConditions } from './exceptionConditions';

describe('predefinedConditions', () => {
  it('covers every predefined exception once', () => {
    const names = predefinedConditions.map(condition => condition.name);

    expect(names).toHaveLength(16);
    expect(new Set(names).size).toBe(16);
  });

  it('finds conditions regardless of case', () => {
    expect(findCondition('no_data_found')?.mysqlCondition).toBe('NOT FOUND');
    expect(findCondition('DUP_VAL_ON_INDEX')?.postgresCondition).toBe('UNIQUE_VIOLATION');
    expect(findCondition('my_error')).toBeUndefined();
  });
});
