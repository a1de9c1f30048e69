import { afterEach, describe, it, expect } from 'vitest';
import {
  isDemoComparison,
  openDuckDbClient,
  seedDemoTables,
  splitStatements
} from '../../src/cli/clients.js';
import {
  compareTables,
  createComparisonEngine,
  type ComparisonEngine
} from '../../src/comparison/compare-tables.js';
import { parseCompareOptions } from '../../src/comparison/options.js';
import type { DiffRecord } from '../../src/comparison/types.js';
import { DuckDbDialect } from '../../src/core/dialect/duckdb/index.js';
import type { DbExecutor } from '../../src/core/execution/db-executor.js';
import { createDuckDbExecutor } from '../../src/core/execution/executors/duckdb-executor.js';

describe('demo helpers', () => {
  it('recognizes the demo table pair only in order', () => {
    expect(isDemoComparison('demo_table_A', 'demo_table_B')).toBe(true);
    expect(isDemoComparison('demo_table_B', 'demo_table_A')).toBe(false);
  });

  it('splits a script into statements', () => {
    expect(splitStatements('CREATE TABLE a (id INT);\n\nINSERT INTO a VALUES (1);\n')).toEqual([
      'CREATE TABLE a (id INT)',
      'INSERT INTO a VALUES (1)'
    ]);
  });
});

describe('DuckDB demo comparison', () => {
  let executor: DbExecutor | undefined;

  const openDemoEngine = async (): Promise<ComparisonEngine> => {
    const client = await openDuckDbClient(':memory:');
    executor = createDuckDbExecutor(client);
    await seedDemoTables(client.connection);
    return createComparisonEngine(new DuckDbDialect(), executor);
  };

  afterEach(async () => {
    await executor?.dispose();
    executor = undefined;
  });

  it('diffs the seeded demo tables', async () => {
    const engine = await openDemoEngine();

    const records: DiffRecord[] = [];
    const request = parseCompareOptions({ table1: 'demo_table_A', table2: 'demo_table_B', pkCols: 'id' });
    for await (const record of compareTables(engine, request)) {
      records.push(record);
    }

    expect(records.map(record => [record.key.id, record.status])).toEqual([
      [2, 'value_differences'],
      [3, 'present_in_table1_only'],
      [4, 'present_in_table2_only'],
      [5, 'value_differences']
    ]);
    expect(records[0].diffs.value).toEqual([200, 250]);
    expect(Object.keys(records[0].diffs)).toEqual(['value', 'last_seen']);
    expect(records[3].diffs.name).toEqual(['Eve_Old', 'Eve_New']);
    expect(records[1].diffs.name).toEqual(['Charlie', null]);
  });

  it('limits and ignores columns', async () => {
    const engine = await openDemoEngine();

    const request = parseCompareOptions({
      table1: 'demo_table_A',
      table2: 'demo_table_B',
      ignoreCols: 'last_seen',
      limit: '1'
    });
    const records: DiffRecord[] = [];
    for await (const record of compareTables(engine, request)) {
      records.push(record);
    }
    expect(records).toEqual([{ key: { id: 2 }, status: 'value_differences', diffs: { value: [200, 250] } }]);
  });

  it('closes the database on dispose', async () => {
    const client = await openDuckDbClient(':memory:');
    const closing = createDuckDbExecutor(client);
    expect(await closing.executeSql('SELECT 1 AS one')).toEqual([{ one: 1 }]);
    expect(client.close).toBeTypeOf('function');
    await expect(closing.dispose()).resolves.toBeUndefined();
  });
});
