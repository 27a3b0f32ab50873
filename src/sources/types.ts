export type Row = Record<string, unknown>;

/**
 * A read-only tabular data source. `query` is fully rendered SQL text
 * (see `renderQuery`); implementations must reject with
 * `SourceUnavailableError` on connectivity, timeout or auth failures.
 */
export interface QuerySource {
  readonly name: string;
  fetch(query: string): Promise<Row[]>;
  close(): Promise<void>;
}
