import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { BigQuery } from '@google-cloud/bigquery';
import { DuckDBInstance, type DuckDBConnection } from '@duckdb/node-api';
import type { BigQueryClientLike } from '../core/execution/executors/bigquery-executor.js';
import type { DuckDbClientLike } from '../core/execution/executors/duckdb-executor.js';
import type { ResultRow, SqlParameter } from '../core/execution/db-executor.js';

export const DEMO_TABLES = ['demo_table_A', 'demo_table_B'] as const;

const DEMO_SQL_URL = new URL('../../sql/demo-tables.sql', import.meta.url);

/**
 * Opens a DuckDB database and adapts its connection to DuckDbClientLike.
 * Values come back in their JSON form (BIGINT and timestamps as text).
 * `close` releases the connection and then the database.
 */
export const openDuckDbClient = async (
  path: string
): Promise<DuckDbClientLike & { connection: DuckDBConnection; close(): Promise<void> }> => {
  const instance = await DuckDBInstance.create(path);
  const connection = await instance.connect();
  return {
    connection,
    async all(sql: string, params?: readonly SqlParameter[]): Promise<ResultRow[]> {
      const reader = await connection.runAndReadAll(sql, params ? [...params] : undefined);
      return reader.getRowObjectsJson();
    },
    async close(): Promise<void> {
      connection.closeSync();
      instance.closeSync();
    }
  };
};

/**
 * Splits a SQL script into statements. Scripts must not put `;` inside literals.
 */
export const splitStatements = (script: string): string[] =>
  script
    .split(';')
    .map(statement => statement.trim())
    .filter(statement => statement.length > 0);

/**
 * Creates (or replaces) the two demo tables in a DuckDB database.
 */
export const seedDemoTables = async (connection: DuckDBConnection): Promise<void> => {
  const script = await readFile(fileURLToPath(DEMO_SQL_URL), 'utf8');
  for (const statement of splitStatements(script)) {
    await connection.run(statement);
  }
};

export const isDemoComparison = (table1: string, table2: string): boolean =>
  table1 === DEMO_TABLES[0] && table2 === DEMO_TABLES[1];

/**
 * Adapts `@google-cloud/bigquery` to BigQueryClientLike. Credentials come
 * from the library's default chain.
 */
export const createBigQueryClient = (projectId?: string): BigQueryClientLike => {
  const bigquery = new BigQuery(projectId ? { projectId } : {});
  const toQuery = (sql: string, params?: SqlParameter[]) => ({
    query: sql,
    params: params && params.length ? params : undefined,
    useLegacySql: false
  });
  return {
    async query(sql, params) {
      const [rows] = await bigquery.query(toQuery(sql, params));
      return rows;
    },
    createQueryStream(sql, params) {
      return bigquery.createQueryStream(toQuery(sql, params));
    }
  };
};
