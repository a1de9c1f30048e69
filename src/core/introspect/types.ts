import type { IntrospectContext } from './context.js';

export type { IntrospectContext };

/**
 * A table as named by the user: one to three dot-separated segments.
 */
export interface TableRef {
  readonly raw: string;
  readonly parts: readonly string[];
}

/**
 * One column of a table, as declared by the engine.
 */
export interface ColumnDefinition {
  name: string;
  /** Engine-specific type name, informational only */
  type: string;
}

/**
 * Strategy interface implemented per dialect to list the columns of one table.
 */
export interface SchemaIntrospector {
  /**
   * Lists the columns of a table in declaration order.
   * @param ctx - Dialect and executor of the target engine
   * @param path - Qualified table path, already completed by the dialect
   * @returns The columns; an empty list when the table does not exist
   */
  describeTable(ctx: IntrospectContext, path: readonly string[]): Promise<ColumnDefinition[]>;
}

/**
 * Schema-lookup capability consumed by the comparison core.
 * Resolves to undefined (or an empty list) when the table is unknown.
 */
export type SchemaLookup = (ref: TableRef) => Promise<ColumnDefinition[] | undefined>;
