export type TableDiffErrorCode =
  | 'INVALID_TABLE_REFERENCE'
  | 'SCHEMA_NOT_FOUND'
  | 'MISSING_PRIMARY_KEY'
  | 'EMPTY_COMPARISON_SET'
  | 'INVALID_CAST_SPEC'
  | 'UNKNOWN_CAST_TYPE'
  | 'CAST_COLUMN_NOT_COMPARABLE'
  | 'QUERY_EXECUTION_FAILURE'
  | 'INVALID_OPTIONS'
  | 'UNSUPPORTED_DIALECT';

/**
 * Base class of every error raised while planning or running a comparison.
 * Planning errors are raised before any query reaches the engine.
 */
export class TableDiffError extends Error {
  readonly code: TableDiffErrorCode;

  constructor(code: TableDiffErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidTableReference extends TableDiffError {
  constructor(readonly reference: string, reason: string) {
    super('INVALID_TABLE_REFERENCE', `Invalid table reference '${reference}': ${reason}`);
  }
}

export class SchemaNotFound extends TableDiffError {
  constructor(readonly table: string, options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super('SCHEMA_NOT_FOUND', `Table '${table}' could not be resolved${detail}`, options);
  }
}

export class MissingPrimaryKey extends TableDiffError {
  constructor(readonly column: string | undefined, readonly tables: readonly string[]) {
    super(
      'MISSING_PRIMARY_KEY',
      column === undefined
        ? 'At least one primary key column is required'
        : `Primary key column '${column}' not found in ${tables.map(t => `'${t}'`).join(' and ')}`
    );
  }
}

export class EmptyComparisonSet extends TableDiffError {
  constructor() {
    super(
      'EMPTY_COMPARISON_SET',
      'No columns left to compare: every common column is part of the primary key or ignored'
    );
  }
}

export class InvalidCastSpec extends TableDiffError {
  constructor(readonly item: string) {
    super('INVALID_CAST_SPEC', `Invalid cast '${item}', expected col=TYPE`);
  }
}

export class UnknownCastType extends TableDiffError {
  constructor(readonly column: string, readonly castType: string, supported: readonly string[]) {
    super(
      'UNKNOWN_CAST_TYPE',
      `Unsupported cast type '${castType}' for column '${column}'. Supported types: ${supported.join(', ')}`
    );
  }
}

export type NonComparableReason = 'primary-key' | 'ignored' | 'not-in-both-tables';

export class CastColumnNotComparable extends TableDiffError {
  constructor(readonly column: string, readonly reason: NonComparableReason) {
    const why =
      reason === 'primary-key'
        ? 'it is a primary key column'
        : reason === 'ignored'
          ? 'it is ignored'
          : 'it does not exist in both tables';
    super('CAST_COLUMN_NOT_COMPARABLE', `Cannot cast column '${column}': ${why}`);
  }
}

export class QueryExecutionFailure extends TableDiffError {
  constructor(readonly sql: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('QUERY_EXECUTION_FAILURE', `Comparison query failed: ${detail}`, { cause });
  }
}

export class InvalidOptions extends TableDiffError {
  constructor(readonly issues: readonly string[]) {
    super('INVALID_OPTIONS', `Invalid options: ${issues.join('; ')}`);
  }
}

export class UnsupportedDialect extends TableDiffError {
  constructor(readonly dialect: string, supported: readonly string[]) {
    super('UNSUPPORTED_DIALECT', `Unsupported dialect '${dialect}'. Supported dialects: ${supported.join(', ')}`);
  }
}
