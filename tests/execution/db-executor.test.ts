import { describe, it, expect } from 'vitest';
import { createExecutorFromQueryRunner, type ResultRow } from '../../src/core/execution/db-executor.js';
import { createQueryLoggingExecutor, type QueryLogEntry } from '../../src/core/execution/query-logger.js';

const collect = async (rows: AsyncIterable<ResultRow>): Promise<ResultRow[]> => {
  const out: ResultRow[] = [];
  for await (const row of rows) out.push(row);
  return out;
};

describe('createExecutorFromQueryRunner', () => {
  it('streams materialized rows when the runner has no stream', async () => {
    const executor = createExecutorFromQueryRunner({
      async query(sql, params) {
        return [{ sql, params }];
      }
    });
    expect(await collect(executor.streamSql('SELECT 1', [1]))).toEqual([{ sql: 'SELECT 1', params: [1] }]);
  });

  it('starts the query only when the stream is read', async () => {
    const calls: string[] = [];
    const executor = createExecutorFromQueryRunner({
      async query(sql) {
        calls.push(sql);
        throw new Error('relation "missing" does not exist');
      }
    });

    const rows = executor.streamSql('SELECT * FROM missing');
    expect(calls).toEqual([]);
    await expect(collect(rows)).rejects.toThrow('relation "missing" does not exist');
    expect(calls).toEqual(['SELECT * FROM missing']);
  });

  it('prefers the native stream', async () => {
    const executor = createExecutorFromQueryRunner({
      async query() {
        throw new Error('query should not be used for streaming');
      },
      async *stream() {
        yield { n: 1 };
        yield { n: 2 };
      }
    });
    expect(await collect(executor.streamSql('SELECT n'))).toEqual([{ n: 1 }, { n: 2 }]);
  });

  it('closes the runner on dispose', async () => {
    let closed = false;
    const executor = createExecutorFromQueryRunner({
      async query() {
        return [];
      },
      async close() {
        closed = true;
      }
    });
    await executor.dispose();
    expect(closed).toBe(true);
  });
});

describe('createQueryLoggingExecutor', () => {
  it('logs SQL before running or streaming it', async () => {
    const entries: QueryLogEntry[] = [];
    const base = createExecutorFromQueryRunner({
      async query() {
        return [{ ok: true }];
      }
    });
    const executor = createQueryLoggingExecutor(base, entry => entries.push(entry));

    await executor.executeSql('SELECT column_name FROM information_schema.columns WHERE table_name = ?', ['orders']);
    await collect(executor.streamSql('SELECT 1'));

    expect(entries).toEqual([
      { sql: 'SELECT column_name FROM information_schema.columns WHERE table_name = ?', params: ['orders'] },
      { sql: 'SELECT 1', params: undefined }
    ]);
  });

  it('returns the executor untouched without a logger', () => {
    const base = createExecutorFromQueryRunner({ query: async () => [] });
    expect(createQueryLoggingExecutor(base)).toBe(base);
  });
});
