import { EmptyComparisonSet, MissingPrimaryKey } from '../core/errors.js';
import { noopLogger, type ComparisonLogger } from './logger.js';
import type { ColumnSchema, ComparisonPlan, EmptyComparisonPolicy } from './types.js';

export const DEFAULT_PRIMARY_KEY: readonly string[] = ['id'];

/**
 * Splits a comma-separated column list, dropping blanks and repeats.
 */
export const parseColumnList = (spec: string | undefined): string[] => {
  if (!spec) return [];
  const seen = new Set<string>();
  for (const item of spec.split(',')) {
    const name = item.trim();
    if (name) seen.add(name);
  }
  return [...seen];
};

/**
 * Parses the primary key specification; `id` when none is given.
 */
export const parsePrimaryKey = (spec?: string): string[] => {
  const columns = parseColumnList(spec);
  return columns.length ? columns : [...DEFAULT_PRIMARY_KEY];
};

export interface PlanOptions {
  emptyComparison?: EmptyComparisonPolicy;
  logger?: ComparisonLogger;
}

/**
 * Derives which columns identify rows and which are compared by value.
 */
export class ColumnSetPlanner {
  private readonly emptyComparison: EmptyComparisonPolicy;
  private readonly logger: ComparisonLogger;

  constructor(options: PlanOptions = {}) {
    this.emptyComparison = options.emptyComparison ?? 'presence-only';
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Builds the comparison plan of two schemas.
   * Casts are left empty; CastRegistry fills them in.
   * @throws MissingPrimaryKey when a key column is absent from either table
   * @throws EmptyComparisonSet when nothing is left to compare and the policy is `error`
   */
  plan(
    schema1: ColumnSchema,
    schema2: ColumnSchema,
    primaryKey: readonly string[],
    ignoreColumns: readonly string[] = []
  ): ComparisonPlan {
    if (primaryKey.length === 0) {
      throw new MissingPrimaryKey(undefined, []);
    }

    const names1 = schema1.columns.map(column => column.name);
    const names2 = schema2.columns.map(column => column.name);
    const set1 = new Set(names1);
    const set2 = new Set(names2);

    for (const pk of primaryKey) {
      const lacking: string[] = [];
      if (!set1.has(pk)) lacking.push(schema1.table.raw);
      if (!set2.has(pk)) lacking.push(schema2.table.raw);
      if (lacking.length) {
        throw new MissingPrimaryKey(pk, lacking);
      }
    }

    const keySet = new Set(primaryKey);
    const ignored = new Set(ignoreColumns);
    const compareColumns = names1.filter(
      name => set2.has(name) && !keySet.has(name) && !ignored.has(name)
    );
    const onlyInTable1 = names1.filter(name => !set2.has(name));
    const onlyInTable2 = names2.filter(name => !set1.has(name));

    if (onlyInTable1.length || onlyInTable2.length) {
      this.logger.debug(
        `Columns not present in both tables are not compared: ` +
        `${[...onlyInTable1, ...onlyInTable2].join(', ')}`
      );
    }

    const presenceOnly = compareColumns.length === 0;
    if (presenceOnly) {
      if (this.emptyComparison === 'error') {
        throw new EmptyComparisonSet();
      }
      this.logger.warn(
        ignored.size
          ? 'No columns to compare (all common non-key columns are ignored). Only row presence is checked.'
          : 'No columns to compare (all common columns are primary keys). Only row presence is checked.'
      );
    }

    return Object.freeze({
      table1: schema1.table,
      table2: schema2.table,
      primaryKey: Object.freeze([...primaryKey]),
      ignored,
      compareColumns: Object.freeze(compareColumns),
      casts: new Map(),
      presenceOnly,
      onlyInTable1: Object.freeze(onlyInTable1),
      onlyInTable2: Object.freeze(onlyInTable2)
    });
  }
}
