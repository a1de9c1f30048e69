// src/core/execution/executors/bigquery-executor.ts
import {
  DbExecutor,
  ResultRow,
  SqlParameter,
  createExecutorFromQueryRunner
} from '../db-executor.js';

/**
 * Shape of the BigQuery calls the executor needs; see `createBigQueryClient`
 * in the CLI for the adapter over `@google-cloud/bigquery`.
 */
export interface BigQueryClientLike {
  query(sql: string, params?: SqlParameter[]): Promise<ResultRow[]>;
  createQueryStream?(sql: string, params?: SqlParameter[]): AsyncIterable<ResultRow>;
}

/**
 * Creates a database executor for BigQuery.
 * Query results are paged by the client, so streaming is preferred when offered.
 */
export function createBigQueryExecutor(
  client: BigQueryClientLike
): DbExecutor {
  const createQueryStream = client.createQueryStream?.bind(client);
  return createExecutorFromQueryRunner({
    query: (sql, params) => client.query(sql, params ? [...params] : undefined),
    stream: createQueryStream
      ? (sql, params) => createQueryStream(sql, params ? [...params] : undefined)
      : undefined
  });
}
