import type { ScalarCastType } from '../../sql/sql.js';
import { SqlDialectBase } from '../base/sql-dialect.js';

const DUCKDB_CAST_TYPES: Record<ScalarCastType, string> = {
  STRING: 'VARCHAR',
  FLOAT64: 'DOUBLE',
  BOOL: 'BOOLEAN',
  DATE: 'DATE',
  TIMESTAMP: 'TIMESTAMP',
  INT64: 'BIGINT',
  BYTES: 'BLOB',
  NUMERIC: 'DECIMAL(38, 9)',
  // DuckDB decimals stop at 38 digits; keep more scale than NUMERIC
  BIGNUMERIC: 'DECIMAL(38, 18)',
  JSON: 'JSON',
  TIME: 'TIME'
};

/**
 * DuckDB dialect implementation
 */
export class DuckDbDialect extends SqlDialectBase {
  readonly name = 'duckdb';

  /**
   * Creates a new DuckDbDialect instance
   */
  public constructor() {
    super();
  }

  /**
   * Quotes an identifier using double-quote syntax
   * @param id - Identifier to quote
   * @returns Quoted identifier
   */
  quoteIdentifier(id: string): string {
    return `"${id.replace(/"/g, '""')}"`;
  }

  castTypeName(type: ScalarCastType): string {
    return DUCKDB_CAST_TYPES[type];
  }
}
