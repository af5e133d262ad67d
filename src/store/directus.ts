import {
  collectionExists,
  createMany,
  createTableCollection,
  createTextField,
  deleteMany,
  dropField,
  readByQuery,
  readFields,
  setFieldSort,
  type FieldRecord
} from '../utils/directus.js';
import { log } from '../utils/log.js';
import { ensureHeaderList } from './headers.js';
import { padRow, type ColumnIndex, type Table, type TabularStore } from './types.js';

const PAGE_LIMIT = 200;
const WRITE_CHUNK_SIZE = 100;
const MAX_KEY_LENGTH = 60;

interface Column {
  header: string;
  field: string;
  sort?: number;
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size <= 0) throw new Error('chunk size must be greater than zero');
  const result: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    result.push(items.slice(i, i + size));
  }
  return result;
}

export function fieldKeyFor(header: string, taken: ReadonlySet<string>): string {
  let base = header
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, MAX_KEY_LENGTH);
  if (!base) base = 'column';
  if (/^\d/.test(base)) base = `c_${base}`;
  if (base === 'id') base = 'id_column';

  let candidate = base;
  for (let suffix = 2; taken.has(candidate); suffix++) {
    candidate = `${base}_${suffix}`;
  }
  return candidate;
}

function toColumns(fields: FieldRecord[]): Column[] {
  return fields
    .map((field, position) => ({ field, position }))
    .filter(({ field }) => !field.hidden && !field.primaryKey)
    .sort((a, b) => {
      const left = a.field.sort ?? Number.MAX_SAFE_INTEGER;
      const right = b.field.sort ?? Number.MAX_SAFE_INTEGER;
      return left !== right ? left - right : a.position - b.position;
    })
    .map(({ field }) => ({
      header: field.note?.trim() || field.field,
      field: field.field,
      sort: field.sort
    }));
}

function cellValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * Tabular store over Directus: one collection per table, one string field per
 * column. The column header lives in the field note (field keys are slugs),
 * and `meta.sort` carries the column order operators see in the admin app.
 */
export class DirectusTableStore implements TabularStore {
  private readonly known = new Set<string>();

  async readTable(name: string): Promise<Table | undefined> {
    if (!(await this.exists(name))) return undefined;
    const columns = await this.columns(name);
    const rows: string[][] = [];
    let offset = 0;
    while (true) {
      const batch = await readByQuery(name, { fields: ['*'], sort: ['id'], limit: PAGE_LIMIT, offset });
      if (!batch.length) break;
      for (const item of batch) {
        rows.push(columns.map((column) => cellValue(item[column.field])));
      }
      if (batch.length < PAGE_LIMIT) break;
      offset += PAGE_LIMIT;
    }
    return { headers: columns.map((column) => column.header), rows };
  }

  async ensureHeaders(name: string, required: readonly string[]): Promise<ColumnIndex> {
    await this.ensureCollection(name);
    const columns = await this.columns(name);
    const { index, added } = ensureHeaderList(
      columns.map((column) => column.header),
      required
    );
    if (added.length) {
      const taken = new Set(columns.map((column) => column.field));
      let sort = columns.reduce((max, column) => Math.max(max, column.sort ?? 0), columns.length);
      for (const header of added) {
        const field = fieldKeyFor(header, taken);
        taken.add(field);
        sort += 1;
        await createTextField(name, field, header, sort);
      }
      log.info('Added table headers', { table: name, headers: added });
    }
    return index;
  }

  async writeRows(name: string, table: Table): Promise<void> {
    await this.ensureCollection(name);
    const current = await this.columns(name);
    const byHeader = new Map(current.map((column) => [column.header, column]));
    const wanted = new Set(table.headers);

    for (const column of current) {
      if (!wanted.has(column.header)) {
        await dropField(name, column.field);
      }
    }

    const taken = new Set(current.filter((column) => wanted.has(column.header)).map((column) => column.field));
    const fields: string[] = [];
    for (const [position, header] of table.headers.entries()) {
      const sort = position + 1;
      const existing = byHeader.get(header);
      if (existing) {
        if (existing.sort !== sort) await setFieldSort(name, existing.field, sort);
        fields.push(existing.field);
        continue;
      }
      const field = fieldKeyFor(header, taken);
      taken.add(field);
      await createTextField(name, field, header, sort);
      fields.push(field);
    }

    const ids: string[] = [];
    let offset = 0;
    while (true) {
      const batch = await readByQuery(name, { fields: ['id'], sort: ['id'], limit: PAGE_LIMIT, offset });
      if (!batch.length) break;
      for (const item of batch) {
        if (item.id !== undefined && item.id !== null) ids.push(String(item.id));
      }
      if (batch.length < PAGE_LIMIT) break;
      offset += PAGE_LIMIT;
    }
    for (const keys of chunk(ids, WRITE_CHUNK_SIZE)) {
      await deleteMany(name, keys);
    }

    const items = table.rows.map((row) => {
      const cells = padRow(row, fields.length);
      const item: Record<string, unknown> = {};
      fields.forEach((field, position) => {
        item[field] = cells[position] === '' ? null : cells[position];
      });
      return item;
    });
    for (const batch of chunk(items, WRITE_CHUNK_SIZE)) {
      await createMany(name, batch);
    }

    log.info('Table written', { table: name, columns: fields.length, rows: items.length, replaced: ids.length });
  }

  private async exists(name: string): Promise<boolean> {
    if (this.known.has(name)) return true;
    const found = await collectionExists(name);
    if (found) this.known.add(name);
    return found;
  }

  private async ensureCollection(name: string): Promise<void> {
    if (await this.exists(name)) return;
    await createTableCollection(name, `Table ${name} managed by guild-roster-sync`);
    this.known.add(name);
    log.info('Created table collection', { table: name });
  }

  private async columns(name: string): Promise<Column[]> {
    return toColumns(await readFields(name));
  }
}
