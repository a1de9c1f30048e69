import { describe, it, expect } from 'vitest';
import { parseCompareOptions } from '../../src/comparison/options.js';
import { InvalidOptions } from '../../src/core/errors.js';

describe('parseCompareOptions', () => {
  it('normalizes CLI strings into a request', () => {
    expect(
      parseCompareOptions({
        table1: 'orders',
        table2: 'orders_v2',
        pkCols: 'region, id',
        ignoreCols: 'updated_at,,etl_batch',
        scalarCasts: 'amt=FLOAT64',
        limit: '20',
        strictColumns: true
      })
    ).toEqual({
      table1: 'orders',
      table2: 'orders_v2',
      primaryKey: ['region', 'id'],
      ignoreColumns: ['updated_at', 'etl_batch'],
      casts: 'amt=FLOAT64',
      limit: 20,
      emptyComparison: 'error'
    });
  });

  it('applies defaults', () => {
    expect(parseCompareOptions({ table1: 'a', table2: 'b' })).toEqual({
      table1: 'a',
      table2: 'b',
      primaryKey: ['id'],
      ignoreColumns: [],
      casts: undefined,
      limit: undefined,
      emptyComparison: 'presence-only'
    });
  });

  it('reads the literal null as an unbounded limit', () => {
    expect(parseCompareOptions({ table1: 'a', table2: 'b', limit: 'NULL' }).limit).toBeUndefined();
    expect(parseCompareOptions({ table1: 'a', table2: 'b', limit: 3 }).limit).toBe(3);
  });

  it('rejects limits beyond the safe integer range', () => {
    expect(parseCompareOptions({ table1: 'a', table2: 'b', limit: '9007199254740991' }).limit).toBe(
      Number.MAX_SAFE_INTEGER
    );
    expect(() => parseCompareOptions({ table1: 'a', table2: 'b', limit: '1000000000000000000000' })).toThrow(
      "Invalid options: limit: limit must be at most 9007199254740991, got '1000000000000000000000'"
    );
  });

  it('accepts column arrays', () => {
    const request = parseCompareOptions({ table1: 'a', table2: 'b', pkCols: ['k1', 'k2'], ignoreCols: ['x'] });
    expect(request.primaryKey).toEqual(['k1', 'k2']);
    expect(request.ignoreColumns).toEqual(['x']);
  });

  it('lists every violation', () => {
    try {
      parseCompareOptions({ table1: '', table2: 'b', limit: '-1' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidOptions);
      expect(error instanceof InvalidOptions && error.issues).toEqual([
        'table1: table1 is required',
        `limit: limit must be a non-negative integer or "null", got '-1'`
      ]);
    }
  });
});
