/**
 * Sink for the few non-fatal events the comparison reports.
 * Hosts decide where they go; the CLI writes them to stderr.
 */
export interface ComparisonLogger {
  warn(message: string): void;
  debug(message: string): void;
}

export const noopLogger: ComparisonLogger = {
  warn: () => {},
  debug: () => {}
};
