import { ensureHeaderList } from './headers.js';
import { padRow, type ColumnIndex, type Table, type TabularStore } from './types.js';

function cloneTable(table: Table): Table {
  return {
    headers: [...table.headers],
    rows: table.rows.map((row) => padRow(row, table.headers.length))
  };
}

/**
 * In-process tabular store. Backs `--dry-run` (seeded from a snapshot of the
 * real store) and the test suite.
 */
export class MemoryTableStore implements TabularStore {
  private readonly tables = new Map<string, Table>();
  readonly writes: string[] = [];

  constructor(seed: Record<string, Table> = {}) {
    for (const [name, table] of Object.entries(seed)) {
      this.tables.set(name, cloneTable(table));
    }
  }

  static async snapshot(source: TabularStore, names: readonly string[]): Promise<MemoryTableStore> {
    const store = new MemoryTableStore();
    for (const name of names) {
      const table = await source.readTable(name);
      if (table) store.tables.set(name, cloneTable(table));
    }
    return store;
  }

  async readTable(name: string): Promise<Table | undefined> {
    const table = this.tables.get(name);
    return table ? cloneTable(table) : undefined;
  }

  async ensureHeaders(name: string, required: readonly string[]): Promise<ColumnIndex> {
    const table = this.tables.get(name) ?? { headers: [], rows: [] };
    const { headers, index, added } = ensureHeaderList(table.headers, required);
    if (added.length || !this.tables.has(name)) {
      this.tables.set(name, cloneTable({ headers, rows: table.rows }));
    }
    return index;
  }

  async writeRows(name: string, table: Table): Promise<void> {
    this.tables.set(name, cloneTable(table));
    this.writes.push(name);
  }

  tableNames(): string[] {
    return [...this.tables.keys()];
  }
}
