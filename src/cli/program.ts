/**
 * sql-table-diff command: compares two tables on DuckDB or BigQuery and
 * prints one JSON line per differing row on stdout. Diagnostics go to stderr.
 *
 *   sql-table-diff duckdb demo_table_A demo_table_B --pk-cols id --limit 20
 *   sql-table-diff bigquery proj.ds.orders proj.ds.orders_v2 --scalar-casts amt=FLOAT64
 */

import { Argument, Command } from 'commander';
import chalk from 'chalk';
import { DialectFactory } from '../core/dialect/dialect-factory.js';
import { createBigQueryExecutor } from '../core/execution/executors/bigquery-executor.js';
import { createDuckDbExecutor } from '../core/execution/executors/duckdb-executor.js';
import { createQueryLoggingExecutor, type QueryLogger } from '../core/execution/query-logger.js';
import type { DbExecutor } from '../core/execution/db-executor.js';
import { compareTables, createComparisonEngine, type ComparisonEngine } from '../comparison/compare-tables.js';
import { serializeDiffRecord } from '../comparison/diff-formatter.js';
import type { ComparisonLogger } from '../comparison/logger.js';
import { parseCompareOptions, type CompareRequest } from '../comparison/options.js';
import { createBigQueryClient, isDemoComparison, openDuckDbClient, seedDemoTables } from './clients.js';

type DbType = 'duckdb' | 'bigquery';

interface CliOptions {
  pkCols?: string;
  limit?: string;
  ignoreCols?: string;
  scalarCasts?: string;
  database?: string;
  project?: string;
  strictColumns?: boolean;
  verbose?: boolean;
}

const createStderrLogger = (verbose: boolean): ComparisonLogger => ({
  warn: message => console.error(chalk.yellow(`Warning: ${message}`)),
  debug: message => {
    if (verbose) console.error(chalk.dim(message));
  }
});

const openEngine = async (
  dbType: DbType,
  request: CompareRequest,
  options: CliOptions,
  logger: ComparisonLogger,
  queryLogger: QueryLogger | undefined
): Promise<{ engine: ComparisonEngine; executor: DbExecutor }> => {
  if (dbType === 'duckdb') {
    const database = options.database ?? process.env.DUCKDB_DATABASE ?? ':memory:';
    const client = await openDuckDbClient(database);
    if (isDemoComparison(request.table1, request.table2)) {
      logger.warn(`Creating demo_table_A and demo_table_B in ${database}`);
      try {
        await seedDemoTables(client.connection);
      } catch (error) {
        await client.close();
        throw error;
      }
    }
    const executor = createQueryLoggingExecutor(createDuckDbExecutor(client), queryLogger);
    return { engine: createComparisonEngine(DialectFactory.create(dbType), executor), executor };
  }

  const project = options.project ?? process.env.GOOGLE_CLOUD_PROJECT;
  const executor = createQueryLoggingExecutor(
    createBigQueryExecutor(createBigQueryClient(project)),
    queryLogger
  );
  return {
    engine: createComparisonEngine(DialectFactory.create(dbType, { defaultProject: project }), executor),
    executor
  };
};

/**
 * Builds the command; index.ts runs it against process.argv.
 */
export const createProgram = (): Command =>
  new Command()
    .name('sql-table-diff')
    .description('Compare two tables from DuckDB or BigQuery')
    .version('0.1.0')
    .addArgument(new Argument('<db_type>', 'Type of the database to connect to').choices(['duckdb', 'bigquery']))
    .argument('<TABLE1>', 'First table (DuckDB: [schema.]table, BigQuery: [project.]dataset.table)')
    .argument('<TABLE2>', 'Second table, same format as TABLE1')
    .option('--pk-cols <cols>', 'Comma-separated primary key columns (default: id)')
    .option('--limit <n>', 'Maximum number of diffs to print, or "null" for all')
    .option('--ignore-cols <cols>', 'Comma-separated columns to leave out of the comparison')
    .option(
      '--scalar-casts <casts>',
      'Casts applied before comparing, as col=TYPE,... ' +
        '(STRING, FLOAT64, BOOL, DATE, TIMESTAMP, INT64, BYTES, NUMERIC, BIGNUMERIC, JSON, TIME)'
    )
    .option('--database <path>', 'DuckDB database file (default: $DUCKDB_DATABASE or :memory:)')
    .option('--project <id>', 'BigQuery default project (default: $GOOGLE_CLOUD_PROJECT)')
    .option('--strict-columns', 'Fail instead of comparing row presence only when no column is left to compare')
    .option('--verbose', 'Log generated SQL to stderr')
    .action(async (dbType: DbType, table1: string, table2: string, options: CliOptions) => {
      const verbose = options.verbose ?? false;
      const logger = createStderrLogger(verbose);
      const queryLogger: QueryLogger | undefined = verbose
        ? entry => console.error(chalk.dim(entry.sql))
        : undefined;

      let executor: DbExecutor | undefined;
      try {
        const request = parseCompareOptions({
          table1,
          table2,
          pkCols: options.pkCols,
          ignoreCols: options.ignoreCols,
          scalarCasts: options.scalarCasts,
          limit: options.limit,
          strictColumns: options.strictColumns ?? false
        });
        const opened = await openEngine(dbType, request, options, logger, queryLogger);
        executor = opened.executor;

        for await (const record of compareTables(opened.engine, request, logger)) {
          process.stdout.write(`${JSON.stringify(serializeDiffRecord(record))}\n`);
        }
      } catch (error) {
        console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
      } finally {
        await executor?.dispose();
      }
    });
