import type { ScalarCastType } from '../../sql/sql.js';
import { SqlDialectBase } from '../base/sql-dialect.js';

const POSTGRES_CAST_TYPES: Record<ScalarCastType, string> = {
  STRING: 'TEXT',
  FLOAT64: 'DOUBLE PRECISION',
  BOOL: 'BOOLEAN',
  DATE: 'DATE',
  TIMESTAMP: 'TIMESTAMP',
  INT64: 'BIGINT',
  BYTES: 'BYTEA',
  NUMERIC: 'NUMERIC',
  BIGNUMERIC: 'NUMERIC',
  // json has no equality operator; jsonb compares by value
  JSON: 'JSONB',
  TIME: 'TIME'
};

/**
 * PostgreSQL dialect implementation
 */
export class PostgresDialect extends SqlDialectBase {
  readonly name = 'postgres';

  /**
   * Creates a new PostgresDialect instance
   */
  public constructor() {
    super();
  }

  /**
   * Quotes an identifier using PostgreSQL double-quote syntax
   * @param id - Identifier to quote
   * @returns Quoted identifier
   */
  quoteIdentifier(id: string): string {
    return `"${id.replace(/"/g, '""')}"`;
  }

  castTypeName(type: ScalarCastType): string {
    return POSTGRES_CAST_TYPES[type];
  }

  formatPlaceholder(index: number): string {
    return `$${index}`;
  }
}
