import type { SchemaIntrospector } from './types.js';
import { describeFromInformationSchema } from './utils.js';

/** DuckDB exposes the ANSI information_schema views. */
export const duckdbIntrospector: SchemaIntrospector = {
  describeTable: describeFromInformationSchema
};
