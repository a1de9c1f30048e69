import { UnsupportedDialect } from '../errors.js';
import type { Dialect } from './abstract.js';
import { BigQueryDialect } from './bigquery/index.js';
import { DuckDbDialect } from './duckdb/index.js';
import { PostgresDialect } from './postgres/index.js';

/**
 * Construction-time settings a dialect may need. Dialects ignore what they
 * do not use.
 */
export interface DialectOptions {
  /** Project that completes `dataset.table` references (BigQuery) */
  defaultProject?: string;
}

export type DialectBuilder = (options: DialectOptions) => Dialect;

/**
 * Goes from a dialect name ("duckdb") to a configured Dialect instance.
 */
export class DialectFactory {
  private static readonly builders = new Map<string, DialectBuilder>();

  private static ensureDefaults(): void {
    if (this.builders.size > 0) return;
    this.builders.set('duckdb', () => new DuckDbDialect());
    this.builders.set('bigquery', options => new BigQueryDialect({ defaultProject: options.defaultProject }));
    this.builders.set('postgres', () => new PostgresDialect());
  }

  /** Registers (or overrides) the builder of a dialect name. */
  static register(name: string, builder: DialectBuilder): void {
    this.ensureDefaults();
    this.builders.set(name, builder);
  }

  /** Names accepted by create, built-ins first. */
  static names(): string[] {
    this.ensureDefaults();
    return [...this.builders.keys()];
  }

  /**
   * @throws UnsupportedDialect when no builder is registered under the name
   */
  static create(name: string, options: DialectOptions = {}): Dialect {
    this.ensureDefaults();
    const builder = this.builders.get(name);
    if (!builder) {
      throw new UnsupportedDialect(name, this.names());
    }
    return builder(options);
  }

  /** Drops registrations; built-ins come back on next use. */
  static reset(): void {
    this.builders.clear();
  }
}
