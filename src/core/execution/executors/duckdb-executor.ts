// src/core/execution/executors/duckdb-executor.ts
import {
  DbExecutor,
  ResultRow,
  SqlParameter,
  createExecutorFromQueryRunner
} from '../db-executor.js';

export interface DuckDbClientLike {
  all(sql: string, params?: readonly SqlParameter[]): Promise<ResultRow[]>;
  stream?(sql: string, params?: readonly SqlParameter[]): AsyncIterable<ResultRow>;
  close?(): Promise<void>;
}

/**
 * Creates a database executor for DuckDB.
 * @param client A DuckDB connection adapter.
 * @returns A DbExecutor implementation for DuckDB.
 */
export function createDuckDbExecutor(
  client: DuckDbClientLike
): DbExecutor {
  return createExecutorFromQueryRunner({
    query: (sql, params) => client.all(sql, params),
    stream: client.stream?.bind(client),
    close: client.close?.bind(client)
  });
}
