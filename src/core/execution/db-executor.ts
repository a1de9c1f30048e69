// src/core/execution/db-executor.ts

/** Values bound to positional placeholders */
export type SqlParameter = string | number | boolean | null;

/** One result row, keyed by the selected expression's alias */
export type ResultRow = Record<string, unknown>;

export interface DbExecutor {
  /** Runs a query and materializes every row (used for small lookups). */
  executeSql(sql: string, params?: readonly SqlParameter[]): Promise<ResultRow[]>;
  /** Runs a query and yields rows as the client delivers them. */
  streamSql(sql: string, params?: readonly SqlParameter[]): AsyncIterable<ResultRow>;
  dispose(): Promise<void>;
}

/**
 * Minimal contract that most SQL clients can implement.
 */
export interface SimpleQueryRunner {
  query(sql: string, params?: readonly SqlParameter[]): Promise<ResultRow[]>;
  stream?(sql: string, params?: readonly SqlParameter[]): AsyncIterable<ResultRow>;
  close?(): Promise<void>;
}

/** The query starts on the first read, so an unread stream never runs it. */
async function* yieldRows(load: () => Promise<ResultRow[]>): AsyncGenerator<ResultRow> {
  for (const row of await load()) {
    yield row;
  }
}

/**
 * Generic factory: turn any SimpleQueryRunner into a DbExecutor.
 * Clients without a native stream fall back to iterating the materialized result.
 */
export function createExecutorFromQueryRunner(
  runner: SimpleQueryRunner
): DbExecutor {
  return {
    executeSql(sql, params) {
      return runner.query(sql, params);
    },
    streamSql(sql, params) {
      if (runner.stream) {
        return runner.stream(sql, params);
      }
      return yieldRows(() => runner.query(sql, params));
    },
    async dispose() {
      await runner.close?.();
    }
  };
}
