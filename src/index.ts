/**
 * sql-table-diff core exports.
 * Schema reconciliation, comparison query building and diff formatting.
 */
export * from './core/sql/sql.js';
export * from './core/errors.js';
export * from './core/ast/expression.js';
export * from './core/ast/query.js';
export * from './core/dialect/abstract.js';
export * from './core/dialect/base/sql-dialect.js';
export * from './core/dialect/base/pagination-strategy.js';
export * from './core/dialect/duckdb/index.js';
export * from './core/dialect/bigquery/index.js';
export * from './core/dialect/postgres/index.js';
export * from './core/dialect/dialect-factory.js';

// execution abstraction + helpers
export * from './core/execution/db-executor.js';
export * from './core/execution/executors/duckdb-executor.js';
export * from './core/execution/executors/bigquery-executor.js';
export * from './core/execution/executors/postgres-executor.js';
export * from './core/execution/query-logger.js';

export * from './core/introspect/types.js';
export * from './core/introspect/registry.js';
export { duckdbIntrospector } from './core/introspect/duckdb.js';
export { bigqueryIntrospector } from './core/introspect/bigquery.js';
export { postgresIntrospector } from './core/introspect/postgres.js';

export * from './comparison/types.js';
export * from './comparison/logger.js';
export * from './comparison/table-ref.js';
export * from './comparison/schema-resolver.js';
export * from './comparison/column-set-planner.js';
export * from './comparison/cast-registry.js';
export * from './comparison/comparison-query-builder.js';
export * from './comparison/json-value.js';
export * from './comparison/diff-formatter.js';
export * from './comparison/options.js';
export * from './comparison/compare-tables.js';
