export type Row = string[];

export interface Table {
  headers: string[];
  rows: Row[];
}

/** Required header name → zero-based column position. */
export type ColumnIndex = Map<string, number>;

/**
 * Header-aware access to the tabular store. Implementations never remove or
 * reorder existing headers in `ensureHeaders`; `writeRows` replaces the whole
 * body and sizes the table to exactly the given headers and rows.
 */
export interface TabularStore {
  readTable(name: string): Promise<Table | undefined>;
  ensureHeaders(name: string, required: readonly string[]): Promise<ColumnIndex>;
  writeRows(name: string, table: Table): Promise<void>;
}

export function padRow(row: readonly string[], width: number): Row {
  const result = row.slice(0, width);
  while (result.length < width) result.push('');
  return result;
}
