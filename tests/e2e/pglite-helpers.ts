import { PGlite } from '@electric-sql/pglite';

import { PostgresDialect } from '../../src/core/dialect/postgres/index.js';
import { createPostgresExecutor, type PostgresClientLike } from '../../src/core/execution/executors/postgres-executor.js';
import { createComparisonEngine, type ComparisonEngine } from '../../src/comparison/compare-tables.js';
import type { DiffRecord } from '../../src/comparison/types.js';

const createPgliteClient = (db: PGlite): PostgresClientLike => ({
  async query(sql, params) {
    return await db.query(sql, params);
  }
});

export const createPgliteExecutor = (db: PGlite) =>
  createPostgresExecutor(createPgliteClient(db));

/**
 * Postgres dialect, PGlite-backed executor and information_schema lookup.
 */
export const createPgliteEngine = (db: PGlite): ComparisonEngine =>
  createComparisonEngine(new PostgresDialect(), createPgliteExecutor(db));

export const startPglite = async (script: string): Promise<PGlite> => {
  const db = new PGlite();
  await db.exec(script);
  return db;
};

export const collect = async (source: AsyncIterable<DiffRecord>): Promise<DiffRecord[]> => {
  const records: DiffRecord[] = [];
  for await (const record of source) {
    records.push(record);
  }
  return records;
};
