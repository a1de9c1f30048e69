import type { ScalarCastType } from '../core/sql/sql.js';
import type { ColumnDefinition, TableRef } from '../core/introspect/types.js';

export type { TableRef };

/**
 * Ordered columns of one table, fetched once and read-only afterwards.
 */
export interface ColumnSchema {
  readonly table: TableRef;
  readonly columns: readonly ColumnDefinition[];
}

/** Column name to the neutral type it is cast to before comparison */
export type CastSpec = ReadonlyMap<string, ScalarCastType>;

/**
 * What happens when every common column is a key or ignored.
 * - `presence-only`: compare row presence on the primary key only
 * - `error`: refuse with EmptyComparisonSet
 */
export type EmptyComparisonPolicy = 'presence-only' | 'error';

export interface ComparisonPlan {
  readonly table1: TableRef;
  readonly table2: TableRef;
  /** Ordered primary key columns, at least one */
  readonly primaryKey: readonly string[];
  readonly ignored: ReadonlySet<string>;
  /** Columns compared by value, in table1 declaration order */
  readonly compareColumns: readonly string[];
  readonly casts: CastSpec;
  /** True when compareColumns is empty and only row presence is checked */
  readonly presenceOnly: boolean;
  /** Columns skipped because the other table lacks them */
  readonly onlyInTable1: readonly string[];
  readonly onlyInTable2: readonly string[];
}

export const DIFF_STATUSES = [
  'value_differences',
  'present_in_table1_only',
  'present_in_table2_only'
] as const;

export type DiffStatus = (typeof DIFF_STATUSES)[number];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Value of a column in table1 and in table2 */
export type ValuePair = readonly [JsonValue, JsonValue];

export interface DiffRecord {
  /** Primary key values, in primary key order */
  readonly key: Readonly<Record<string, JsonValue>>;
  readonly status: DiffStatus;
  readonly diffs: Readonly<Record<string, ValuePair>>;
}
