import { SchemaNotFound } from '../core/errors.js';
import type { ColumnDefinition, SchemaLookup } from '../core/introspect/types.js';
import type { ColumnSchema, TableRef } from './types.js';

/**
 * Resolves table references to their column schemas through an injected lookup.
 */
export class SchemaResolver {
  constructor(private readonly lookup: SchemaLookup) {}

  /**
   * Fetches the ordered columns of a table.
   * @throws SchemaNotFound when the lookup fails or knows no columns for the table
   */
  async resolve(table: TableRef): Promise<ColumnSchema> {
    let columns: ColumnDefinition[] | undefined;
    try {
      columns = await this.lookup(table);
    } catch (error) {
      throw new SchemaNotFound(table.raw, { cause: error });
    }
    if (!columns || columns.length === 0) {
      throw new SchemaNotFound(table.raw);
    }
    return Object.freeze({
      table,
      columns: Object.freeze(columns.map(column => Object.freeze({ ...column })))
    });
  }

  /**
   * Fetches both schemas of a comparison; both lookups run before planning starts.
   */
  async resolveBoth(table1: TableRef, table2: TableRef): Promise<[ColumnSchema, ColumnSchema]> {
    return Promise.all([this.resolve(table1), this.resolve(table2)]);
  }
}
