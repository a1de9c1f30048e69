import { SCALAR_CAST_TYPES, isScalarCastType, type ScalarCastType } from '../core/sql/sql.js';
import { CastColumnNotComparable, InvalidCastSpec, UnknownCastType } from '../core/errors.js';
import type { CastSpec, ComparisonPlan } from './types.js';

/** Common SQL spellings accepted for the neutral cast types */
const CAST_TYPE_SYNONYMS: Readonly<Record<string, ScalarCastType>> = {
  TEXT: 'STRING',
  VARCHAR: 'STRING',
  DOUBLE: 'FLOAT64',
  FLOAT: 'FLOAT64',
  BOOLEAN: 'BOOL',
  INT: 'INT64',
  INTEGER: 'INT64',
  BIGINT: 'INT64',
  SMALLINT: 'INT64',
  TINYINT: 'INT64',
  DECIMAL: 'NUMERIC'
};

/** Casts as written by the user, before validation */
export type RawCastSpec = string | Readonly<Record<string, string>>;

/**
 * Normalizes a type name (case-insensitive, synonyms allowed).
 * @returns The neutral type, or undefined when the name is not supported
 */
export const normalizeCastType = (raw: string): ScalarCastType | undefined => {
  const upper = raw.trim().toUpperCase();
  if (isScalarCastType(upper)) return upper;
  return CAST_TYPE_SYNONYMS[upper];
};

/**
 * Splits `col=TYPE,col2=TYPE2` into pairs. Later entries for the same
 * column win.
 * @throws InvalidCastSpec for an entry without `=`, column or type
 */
export const parseCastSpec = (raw: string | undefined): Array<[string, string]> => {
  if (!raw) return [];
  return raw
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0)
    .map((item): [string, string] => {
      const separator = item.indexOf('=');
      const column = separator === -1 ? '' : item.slice(0, separator).trim();
      const type = separator === -1 ? '' : item.slice(separator + 1).trim();
      if (!column || !type) {
        throw new InvalidCastSpec(item);
      }
      return [column, type];
    });
};

/**
 * Validates cast requests against the closed type enumeration and the
 * comparison columns of a plan.
 */
export class CastRegistry {
  /**
   * @param raw - `col=TYPE,...` text or a column-to-type record
   * @param plan - Plan whose comparison columns may be cast
   * @throws UnknownCastType when a type is outside the supported set
   * @throws CastColumnNotComparable when a column is a key, ignored or not in both tables
   */
  resolve(raw: RawCastSpec | undefined, plan: ComparisonPlan): CastSpec {
    const entries = typeof raw === 'string' || raw === undefined
      ? parseCastSpec(raw)
      : Object.entries(raw);

    const comparable = new Set(plan.compareColumns);
    const casts = new Map<string, ScalarCastType>();

    for (const [column, typeName] of entries) {
      const castType = normalizeCastType(typeName);
      if (!castType) {
        throw new UnknownCastType(column, typeName, SCALAR_CAST_TYPES);
      }
      if (!comparable.has(column)) {
        throw new CastColumnNotComparable(
          column,
          plan.primaryKey.includes(column)
            ? 'primary-key'
            : plan.ignored.has(column)
              ? 'ignored'
              : 'not-in-both-tables'
        );
      }
      casts.set(column, castType);
    }

    return casts;
  }
}

/**
 * Returns a copy of the plan carrying the resolved casts.
 */
export const withCasts = (plan: ComparisonPlan, casts: CastSpec): ComparisonPlan =>
  Object.freeze({ ...plan, casts });
