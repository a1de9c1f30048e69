import { describe, it, expect } from 'vitest';
import {
  CastRegistry,
  normalizeCastType,
  parseCastSpec,
  withCasts
} from '../../src/comparison/cast-registry.js';
import { ColumnSetPlanner } from '../../src/comparison/column-set-planner.js';
import {
  CastColumnNotComparable,
  InvalidCastSpec,
  UnknownCastType
} from '../../src/core/errors.js';
import { schemaOf } from './fixtures.js';

const plan = new ColumnSetPlanner().plan(
  schemaOf('orders', 'id', 'amt', 'note', 'only_here'),
  schemaOf('orders_v2', 'id', 'amt', 'note'),
  ['id'],
  ['note']
);

describe('parseCastSpec', () => {
  it('reads col=TYPE pairs with whitespace around them', () => {
    expect(parseCastSpec(' amt = float64 , created_at=TIMESTAMP,')).toEqual([
      ['amt', 'float64'],
      ['created_at', 'TIMESTAMP']
    ]);
  });

  it('returns nothing for an absent or empty spec', () => {
    expect(parseCastSpec(undefined)).toEqual([]);
    expect(parseCastSpec('')).toEqual([]);
  });

  it('rejects items without a column or a type', () => {
    expect(() => parseCastSpec('amt=FLOAT64,created_at')).toThrow("Invalid cast 'created_at', expected col=TYPE");
    expect(() => parseCastSpec('=STRING')).toThrow(InvalidCastSpec);
    expect(() => parseCastSpec('amt=')).toThrow(InvalidCastSpec);
  });
});

describe('normalizeCastType', () => {
  it('is case-insensitive and maps synonyms', () => {
    expect(normalizeCastType('float64')).toBe('FLOAT64');
    expect(normalizeCastType('Text')).toBe('STRING');
    expect(normalizeCastType('integer')).toBe('INT64');
    expect(normalizeCastType('decimal')).toBe('NUMERIC');
    expect(normalizeCastType('boolean')).toBe('BOOL');
    expect(normalizeCastType('GEOGRAPHY')).toBeUndefined();
  });
});

describe('CastRegistry', () => {
  const registry = new CastRegistry();

  it('resolves casts for comparison columns, last entry winning', () => {
    const casts = registry.resolve('amt=STRING,amt=double', plan);
    expect([...casts]).toEqual([['amt', 'FLOAT64']]);
  });

  it('accepts a column-to-type record', () => {
    expect([...registry.resolve({ amt: 'numeric' }, plan)]).toEqual([['amt', 'NUMERIC']]);
  });

  it('rejects unsupported types', () => {
    expect(() => registry.resolve('amt=GEOGRAPHY', plan)).toThrow(UnknownCastType);
    expect(() => registry.resolve('amt=GEOGRAPHY', plan)).toThrow(
      "Unsupported cast type 'GEOGRAPHY' for column 'amt'. Supported types: " +
        'STRING, FLOAT64, BOOL, DATE, TIMESTAMP, INT64, BYTES, NUMERIC, BIGNUMERIC, JSON, TIME'
    );
  });

  it('says why a column cannot be cast', () => {
    const reasonOf = (spec: string) => {
      try {
        registry.resolve(spec, plan);
      } catch (error) {
        return error instanceof CastColumnNotComparable ? error.reason : undefined;
      }
      return undefined;
    };
    expect(reasonOf('id=STRING')).toBe('primary-key');
    expect(reasonOf('note=STRING')).toBe('ignored');
    expect(reasonOf('only_here=STRING')).toBe('not-in-both-tables');
  });

  it('attaches casts to a frozen copy of the plan', () => {
    const casts = registry.resolve('amt=FLOAT64', plan);
    const castPlan = withCasts(plan, casts);
    expect(castPlan.casts.get('amt')).toBe('FLOAT64');
    expect(plan.casts.size).toBe(0);
    expect(Object.isFrozen(castPlan)).toBe(true);
  });
});
