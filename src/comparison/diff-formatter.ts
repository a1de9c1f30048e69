import type { ResultRow } from '../core/execution/db-executor.js';
import type { ResultColumnMap } from './comparison-query-builder.js';
import { toJsonValue } from './json-value.js';
import { noopLogger, type ComparisonLogger } from './logger.js';
import type { DiffRecord, DiffStatus, JsonValue, ValuePair } from './types.js';

export interface FormatOptions {
  /** Stop after this many records; undefined means unbounded */
  limit?: number;
  logger?: ComparisonLogger;
}

/** Presence markers and difference flags: NULL and FALSE both mean unset. */
const isSet = (row: ResultRow, alias: string): boolean => {
  const marker = row[alias];
  return marker !== null && marker !== undefined && marker !== false;
};

/**
 * Turns one result row into a diff record. For rows present on both sides,
 * a column is reported when the engine flagged it as distinct; values are
 * never compared again after normalization.
 * @returns undefined when both sides are present and no column is flagged
 */
export const toDiffRecord = (row: ResultRow, columns: ResultColumnMap): DiffRecord | undefined => {
  const key: Record<string, JsonValue> = {};
  for (const { column, alias } of columns.primaryKey) {
    key[column] = toJsonValue(row[alias]);
  }

  const inTable1 = isSet(row, columns.table1Present);
  const inTable2 = isSet(row, columns.table2Present);
  const diffs: Record<string, ValuePair> = {};
  let status: DiffStatus;

  if (inTable1 && !inTable2) {
    status = 'present_in_table1_only';
    for (const { column, table1Alias } of columns.compared) {
      diffs[column] = [toJsonValue(row[table1Alias]), null];
    }
  } else if (inTable2 && !inTable1) {
    status = 'present_in_table2_only';
    for (const { column, table2Alias } of columns.compared) {
      diffs[column] = [null, toJsonValue(row[table2Alias])];
    }
  } else {
    status = 'value_differences';
    for (const { column, table1Alias, table2Alias, differsAlias } of columns.compared) {
      if (isSet(row, differsAlias)) {
        diffs[column] = [toJsonValue(row[table1Alias]), toJsonValue(row[table2Alias])];
      }
    }
    if (Object.keys(diffs).length === 0) {
      return undefined;
    }
  }

  return { key, status, diffs };
};

/**
 * Lazily converts reconciliation rows into diff records, in row order.
 *
 * Rows present on both sides without any flagged column are skipped and
 * counted; the count is reported when the stream ends.
 */
export async function* formatDiffs(
  rows: AsyncIterable<ResultRow>,
  columns: ResultColumnMap,
  options: FormatOptions = {}
): AsyncGenerator<DiffRecord> {
  const { limit, logger = noopLogger } = options;
  if (limit !== undefined && limit <= 0) return;

  let emitted = 0;
  let skipped = 0;
  try {
    for await (const row of rows) {
      const record = toDiffRecord(row, columns);
      if (!record) {
        skipped += 1;
        continue;
      }
      yield record;
      emitted += 1;
      if (limit !== undefined && emitted >= limit) break;
    }
  } finally {
    if (skipped > 0) {
      logger.warn(
        `${skipped} row(s) matched the difference predicate but had no column flagged as different`
      );
    }
  }
}

/**
 * Shapes a record as one NDJSON object: key columns at the top level and
 * the differing columns with the status under `diffs`.
 */
export const serializeDiffRecord = (record: DiffRecord): Record<string, JsonValue> => {
  const diffs: Record<string, JsonValue> = {};
  for (const [column, [value1, value2]] of Object.entries(record.diffs)) {
    diffs[column] = [value1, value2];
  }
  diffs._status = record.status;
  return { ...record.key, diffs };
};
