import { describe, it, expect } from 'vitest';
import { BigQueryDialect } from '../../src/core/dialect/bigquery/index.js';
import { DuckDbDialect } from '../../src/core/dialect/duckdb/index.js';
import { PostgresDialect } from '../../src/core/dialect/postgres/index.js';
import type { Dialect } from '../../src/core/dialect/abstract.js';
import {
  createExecutorFromQueryRunner,
  type ResultRow,
  type SqlParameter
} from '../../src/core/execution/db-executor.js';
import { createSchemaLookup } from '../../src/core/introspect/registry.js';
import type { TableRef } from '../../src/core/introspect/types.js';

const refOf = (...parts: string[]): TableRef => ({ raw: parts.join('.'), parts });

const recordingContext = (dialect: Dialect, rows: ResultRow[]) => {
  const calls: { sql: string; params?: readonly SqlParameter[] }[] = [];
  const executor = createExecutorFromQueryRunner({
    async query(sql, params) {
      calls.push({ sql, params });
      return rows;
    }
  });
  return { calls, lookup: createSchemaLookup({ dialect, executor }) };
};

const columnRows = [
  { column_name: 'id', data_type: 'INTEGER' },
  { column_name: 'amt', data_type: 'VARCHAR' }
];

describe('schema introspection', () => {
  it('describes DuckDB tables in the current schema', async () => {
    const { calls, lookup } = recordingContext(new DuckDbDialect(), columnRows);

    expect(await lookup(refOf('orders'))).toEqual([
      { name: 'id', type: 'INTEGER' },
      { name: 'amt', type: 'VARCHAR' }
    ]);
    expect(calls).toEqual([
      {
        sql:
          'SELECT column_name, data_type FROM information_schema.columns WHERE table_name = ? ' +
          'AND table_schema = current_schema() AND table_catalog = current_database() ORDER BY ordinal_position',
        params: ['orders']
      }
    ]);
  });

  it('binds schema and catalog with Postgres placeholders', async () => {
    const { calls, lookup } = recordingContext(new PostgresDialect(), columnRows);
    await lookup(refOf('warehouse', 'sales', 'orders'));
    expect(calls[0]).toEqual({
      sql:
        'SELECT column_name, data_type FROM information_schema.columns WHERE table_name = $1 ' +
        'AND table_schema = $2 AND table_catalog = $3 ORDER BY ordinal_position',
      params: ['orders', 'sales', 'warehouse']
    });
  });

  it('reads the dataset INFORMATION_SCHEMA on BigQuery', async () => {
    const { calls, lookup } = recordingContext(new BigQueryDialect(), columnRows);
    await lookup(refOf('test-project', 'sales', 'orders'));
    expect(calls[0]).toEqual({
      sql:
        'SELECT column_name, data_type FROM `test-project.sales`.INFORMATION_SCHEMA.COLUMNS ' +
        'WHERE table_name = ? ORDER BY ordinal_position',
      params: ['orders']
    });
  });

  it('returns an empty list for unknown tables', async () => {
    const { lookup } = recordingContext(new DuckDbDialect(), []);
    expect(await lookup(refOf('missing'))).toEqual([]);
  });

  it('rejects rows of another shape', async () => {
    const { lookup } = recordingContext(new DuckDbDialect(), [{ name: 'id' }]);
    await expect(lookup(refOf('orders'))).rejects.toThrow();
  });
});
