import type { Dialect } from '../core/dialect/abstract.js';
import type { DbExecutor, ResultRow } from '../core/execution/db-executor.js';
import type { SchemaLookup } from '../core/introspect/types.js';
import { createSchemaLookup } from '../core/introspect/registry.js';
import { QueryExecutionFailure } from '../core/errors.js';
import { CastRegistry, withCasts } from './cast-registry.js';
import { ColumnSetPlanner } from './column-set-planner.js';
import { ComparisonQueryBuilder, type ComparisonQuery } from './comparison-query-builder.js';
import { formatDiffs } from './diff-formatter.js';
import { noopLogger, type ComparisonLogger } from './logger.js';
import type { CompareRequest } from './options.js';
import { SchemaResolver } from './schema-resolver.js';
import { parseTableRef, qualifyTableRef } from './table-ref.js';
import type { ComparisonPlan, DiffRecord, TableRef } from './types.js';

/**
 * Capabilities of one target engine.
 */
export interface ComparisonEngine {
  dialect: Dialect;
  executor: DbExecutor;
  lookupSchema: SchemaLookup;
}

/**
 * Bundles a dialect and executor with the introspector registered for the dialect.
 */
export const createComparisonEngine = (dialect: Dialect, executor: DbExecutor): ComparisonEngine => ({
  dialect,
  executor,
  lookupSchema: createSchemaLookup({ dialect, executor })
});

export interface PreparedComparison {
  table1: TableRef;
  table2: TableRef;
  plan: ComparisonPlan;
  query: ComparisonQuery;
}

/**
 * Runs every planning step without touching the data: references are
 * qualified, schemas fetched, columns planned, casts validated and the
 * reconciliation query built.
 */
export const prepareComparison = async (
  engine: ComparisonEngine,
  request: CompareRequest,
  logger: ComparisonLogger = noopLogger
): Promise<PreparedComparison> => {
  const table1 = qualifyTableRef(parseTableRef(request.table1), engine.dialect);
  const table2 = qualifyTableRef(parseTableRef(request.table2), engine.dialect);

  const [schema1, schema2] = await new SchemaResolver(engine.lookupSchema).resolveBoth(table1, table2);

  const planner = new ColumnSetPlanner({ emptyComparison: request.emptyComparison, logger });
  const basePlan = planner.plan(schema1, schema2, request.primaryKey, request.ignoreColumns);
  const plan = withCasts(basePlan, new CastRegistry().resolve(request.casts, basePlan));

  const query = new ComparisonQueryBuilder(engine.dialect).build(table1, table2, plan, {
    limit: request.limit
  });

  return { table1, table2, plan, query };
};

async function* guardExecution(
  rows: AsyncIterable<ResultRow>,
  sql: string
): AsyncGenerator<ResultRow> {
  try {
    yield* rows;
  } catch (error) {
    throw new QueryExecutionFailure(sql, error);
  }
}

/**
 * Compares two tables and yields their differences lazily, ordered by
 * primary key. Planning errors surface before the query reaches the engine;
 * engine errors surface as QueryExecutionFailure. A zero limit plans the
 * comparison but sends nothing.
 */
export async function* compareTables(
  engine: ComparisonEngine,
  request: CompareRequest,
  logger: ComparisonLogger = noopLogger
): AsyncGenerator<DiffRecord> {
  const { query } = await prepareComparison(engine, request, logger);
  if (request.limit === 0) return;

  let rows: AsyncIterable<ResultRow>;
  try {
    rows = engine.executor.streamSql(query.sql);
  } catch (error) {
    throw new QueryExecutionFailure(query.sql, error);
  }

  yield* formatDiffs(guardExecution(rows, query.sql), query.columns, {
    limit: request.limit,
    logger
  });
}
