import type { ColumnDefinition } from '../../src/core/introspect/types.js';
import { parseTableRef } from '../../src/comparison/table-ref.js';
import type { ColumnSchema } from '../../src/comparison/types.js';

export const schemaOf = (table: string, ...names: string[]): ColumnSchema => ({
  table: parseTableRef(table),
  columns: names.map((name): ColumnDefinition => ({ name, type: 'VARCHAR' }))
});

export const recordingLogger = () => {
  const warnings: string[] = [];
  const debug: string[] = [];
  return {
    warnings,
    debug,
    logger: {
      warn: (message: string) => warnings.push(message),
      debug: (message: string) => debug.push(message)
    }
  };
};
