import { findColumn, normalizeHeader, resolveColumns } from '../store/headers.js';
import { padRow, type Row, type Table } from '../store/types.js';

/**
 * In-memory view of one table for the length of a run. Rows are addressed by
 * the values of the key headers; the key → position index is rebuilt from
 * scratch after every mutation instead of being patched.
 */
export class KeyedTable {
  readonly name: string;
  private headerList: string[];
  private rowList: Row[];
  private readonly keyHeaders: readonly string[];
  private keyPositions: number[] = [];
  private readonly index = new Map<string, number>();

  constructor(name: string, table: Table, keyHeaders: readonly string[]) {
    this.name = name;
    this.keyHeaders = keyHeaders;
    this.headerList = [...table.headers];
    this.rowList = table.rows.map((row) => padRow(row, table.headers.length));
    for (const header of keyHeaders) {
      if (findColumn(this.headerList, header) === undefined) this.addColumn(header);
    }
    this.rebuildIndex();
  }

  static composeKey(values: readonly string[]): string {
    return JSON.stringify(values.map((value) => value.trim()));
  }

  get headers(): readonly string[] {
    return this.headerList;
  }

  get rows(): readonly Row[] {
    return this.rowList;
  }

  get width(): number {
    return this.headerList.length;
  }

  keyOf(row: readonly string[]): string | undefined {
    const values = this.keyPositions.map((position) => (row[position] ?? '').trim());
    if (values.every((value) => !value)) return undefined;
    return KeyedTable.composeKey(values);
  }

  rebuildIndex(): void {
    const resolved = resolveColumns(this.headerList, this.keyHeaders);
    this.keyPositions = this.keyHeaders.map((header) => resolved.get(header) ?? -1);
    this.index.clear();
    this.rowList.forEach((row, position) => {
      const key = this.keyOf(row);
      if (key !== undefined && !this.index.has(key)) this.index.set(key, position);
    });
  }

  get(keyValues: readonly string[]): Row | undefined {
    const position = this.index.get(KeyedTable.composeKey(keyValues));
    return position === undefined ? undefined : this.rowList[position];
  }

  column(header: string): number | undefined {
    return findColumn(this.headerList, header);
  }

  /** Appends `header` unless a column with exactly that (normalized) name exists. */
  addColumn(header: string): number {
    const wanted = normalizeHeader(header);
    const existing = this.headerList.findIndex((candidate) => normalizeHeader(candidate) === wanted);
    if (existing >= 0) return existing;
    this.headerList.push(header);
    for (const row of this.rowList) row.push('');
    return this.headerList.length - 1;
  }

  cell(row: readonly string[] | undefined, header: string): string {
    const position = this.column(header);
    if (!row || position === undefined) return '';
    return row[position] ?? '';
  }

  rowsWhere(header: string, values: Iterable<string>): Row[] {
    const position = this.column(header);
    if (position === undefined) return [];
    const wanted = new Set([...values].map((value) => value.trim()));
    return this.rowList.filter((row) => wanted.has((row[position] ?? '').trim()));
  }

  /** Replaces the row with the same key in place, or appends it. */
  upsert(row: Row): void {
    const key = this.keyOf(row);
    const position = key === undefined ? undefined : this.index.get(key);
    const padded = padRow(row, this.width);
    if (position === undefined) {
      this.rowList.push(padded);
    } else {
      this.rowList[position] = padded;
    }
    this.rebuildIndex();
  }

  /** Deletes every row the predicate matches; returns how many went. */
  removeWhere(predicate: (row: Row) => boolean): number {
    const before = this.rowList.length;
    this.rowList = this.rowList.filter((row) => !predicate(row));
    this.rebuildIndex();
    return before - this.rowList.length;
  }

  /**
   * Deletes every row whose `header` cell is one of `values`, then inserts
   * `fresh` where the first deleted row was (or at the end when none was).
   */
  replaceScope(header: string, values: Iterable<string>, fresh: readonly Row[]): { removed: number; inserted: number } {
    const position = this.column(header);
    const wanted = new Set([...values].map((value) => value.trim()).filter(Boolean));
    let insertAt: number | undefined;
    let removed = 0;

    if (position !== undefined && wanted.size) {
      const kept: Row[] = [];
      this.rowList.forEach((row, rowPosition) => {
        if (wanted.has((row[position] ?? '').trim())) {
          insertAt ??= rowPosition;
          removed++;
        } else {
          kept.push(row);
        }
      });
      this.rowList = kept;
    }
    this.rebuildIndex();

    const padded = fresh.map((row) => padRow(row, this.width));
    this.rowList.splice(insertAt ?? this.rowList.length, 0, ...padded);
    this.rebuildIndex();
    return { removed, inserted: padded.length };
  }

  /** Drops every column the predicate rejects; returns the dropped headers. */
  pruneColumns(keep: (header: string, position: number) => boolean): string[] {
    const kept: number[] = [];
    const dropped: string[] = [];
    this.headerList.forEach((header, position) => {
      if (keep(header, position)) kept.push(position);
      else dropped.push(header);
    });
    if (!dropped.length) return dropped;

    this.headerList = kept.map((position) => this.headerList[position] ?? '');
    this.rowList = this.rowList.map((row) => kept.map((position) => row[position] ?? ''));
    this.rebuildIndex();
    return dropped;
  }

  toTable(): Table {
    return {
      headers: [...this.headerList],
      rows: this.rowList.map((row) => padRow(row, this.width))
    };
  }
}

/**
 * Builds a row of `width` cells. Positions in `owned` take the computed value
 * (or stay empty); every other position keeps what `previous` had.
 */
export function mergeRow(
  width: number,
  previous: readonly string[] | undefined,
  values: ReadonlyMap<number, string>,
  owned: ReadonlySet<number>
): Row {
  const row = padRow(previous ?? [], width);
  for (const position of owned) {
    if (position < width) row[position] = values.get(position) ?? '';
  }
  return row;
}
