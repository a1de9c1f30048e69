/**
 * SQL operators used in query conditions
 */
export const SQL_OPERATORS = {
  /** Equality operator */
  EQUALS: '=',
  /** NULL-safe inequality: NULL is not distinct from NULL */
  IS_DISTINCT_FROM: 'IS DISTINCT FROM',
  /** IS NULL null check operator */
  IS_NULL: 'IS NULL',
  /** Logical AND operator */
  AND: 'AND',
  /** Logical OR operator */
  OR: 'OR'
} as const;

/**
 * Comparison operators usable in a binary expression
 */
export type ComparisonOperator =
  | typeof SQL_OPERATORS.EQUALS
  | typeof SQL_OPERATORS.IS_DISTINCT_FROM;

/**
 * Null-check operators
 */
export type NullCheckOperator = typeof SQL_OPERATORS.IS_NULL;

/**
 * Logical connectives
 */
export type LogicalOperator =
  | typeof SQL_OPERATORS.AND
  | typeof SQL_OPERATORS.OR;

/**
 * Types of SQL joins supported
 */
export const JOIN_KINDS = {
  /** FULL OUTER JOIN type */
  FULL_OUTER: 'FULL OUTER'
} as const;

/**
 * Type representing any supported join kind
 */
export type JoinKind = (typeof JOIN_KINDS)[keyof typeof JOIN_KINDS];

/**
 * Ordering directions for result sorting
 */
export const ORDER_DIRECTIONS = {
  /** Ascending order */
  ASC: 'ASC'
} as const;

/**
 * Type representing any supported order direction
 */
export type OrderDirection = (typeof ORDER_DIRECTIONS)[keyof typeof ORDER_DIRECTIONS];

/**
 * Supported database dialects
 */
export const SUPPORTED_DIALECTS = {
  /** DuckDB (embedded, file or in-memory) */
  DUCKDB: 'duckdb',
  /** Google BigQuery (GoogleSQL) */
  BIGQUERY: 'bigquery',
  /** PostgreSQL and wire-compatible engines */
  POSTGRES: 'postgres'
} as const;

/**
 * Type representing any supported database dialect
 */
export type DialectName = (typeof SUPPORTED_DIALECTS)[keyof typeof SUPPORTED_DIALECTS];

/**
 * Engine-neutral scalar types a compared column may be cast to.
 * Names follow GoogleSQL; each dialect maps them to its own spelling.
 */
export const SCALAR_CAST_TYPES = [
  'STRING',
  'FLOAT64',
  'BOOL',
  'DATE',
  'TIMESTAMP',
  'INT64',
  'BYTES',
  'NUMERIC',
  'BIGNUMERIC',
  'JSON',
  'TIME'
] as const;

export type ScalarCastType = (typeof SCALAR_CAST_TYPES)[number];

export const isScalarCastType = (value: string): value is ScalarCastType =>
  SCALAR_CAST_TYPES.some(type => type === value);
