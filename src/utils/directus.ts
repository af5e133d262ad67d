import {
  createCollection,
  createDirectus,
  createField,
  createItem,
  createItems,
  deleteField,
  deleteItems,
  readCollection,
  readFieldsByCollection,
  readItems,
  rest,
  staticToken,
  updateField,
  updateItem
} from '@directus/sdk';
import { ConfigError } from './errors.js';
import { isRecord } from '../lib/fields.js';

type AnyRecord = Record<string, unknown>;

function buildClient(url: string, token: string) {
  return createDirectus(url).with(staticToken(token)).with(rest());
}

type DirectusClient = ReturnType<typeof buildClient>;

let client: DirectusClient | undefined;

export function directus(): DirectusClient {
  if (client) return client;
  const directusUrl = process.env.DIRECTUS_URL;
  const directusToken = process.env.DIRECTUS_TOKEN;
  if (!directusUrl || !directusToken) {
    throw new ConfigError('DIRECTUS_URL and DIRECTUS_TOKEN must be configured in environment variables.');
  }
  client = buildClient(directusUrl, directusToken);
  return client;
}

interface DirectusContext {
  action: string;
  collection: string;
}

export class DirectusRequestError extends Error {
  readonly status?: number;
  readonly collection: string;
  readonly action: string;

  constructor(message: string, context: DirectusContext, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DirectusRequestError';
    this.status = status;
    this.collection = context.collection;
    this.action = context.action;
  }
}

function statusOf(error: unknown): number | undefined {
  if (!isRecord(error)) return undefined;
  const response = error.response;
  if (typeof Response !== 'undefined' && response instanceof Response) return response.status;
  return undefined;
}

function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (isRecord(error) && Array.isArray(error.errors)) {
    const messages = error.errors
      .map((entry) => (isRecord(entry) && typeof entry.message === 'string' ? entry.message : undefined))
      .filter((entry): entry is string => Boolean(entry));
    if (messages.length) return messages.join('; ');
  }
  return String(error);
}

async function request<T>(context: DirectusContext, run: () => Promise<T>): Promise<T> {
  let result: T;
  try {
    result = await run();
  } catch (error) {
    const status = statusOf(error);
    throw new DirectusRequestError(
      `Directus ${context.action} for ${context.collection} failed${status ? ` with status ${status}` : ''}: ${messageOf(error)}`,
      context,
      status,
      { cause: error }
    );
  }
  if (typeof Response !== 'undefined' && result instanceof Response) {
    throw new DirectusRequestError(
      `Directus ${context.action} for ${context.collection} failed with status ${result.status} ${result.statusText}`,
      context,
      result.status
    );
  }
  return result;
}

export interface ItemQuery {
  fields?: string[];
  filter?: AnyRecord;
  sort?: string[];
  limit?: number;
  offset?: number;
}

export async function readByQuery(collection: string, query: ItemQuery): Promise<AnyRecord[]> {
  const result: unknown = await request({ action: 'readByQuery', collection }, () =>
    directus().request(readItems(collection, query))
  );
  if (Array.isArray(result)) return result.filter(isRecord);
  if (result === null || result === undefined) return [];
  if (isRecord(result) && 'data' in result) {
    const { data } = result;
    if (Array.isArray(data)) return data.filter(isRecord);
    if (isRecord(data)) return [data];
    return [];
  }
  throw new Error(`Directus query for collection ${collection} returned an unexpected response shape.`);
}

export async function createMany(collection: string, items: AnyRecord[]): Promise<void> {
  if (!items.length) return;
  await request({ action: 'createMany', collection }, () => directus().request(createItems(collection, items)));
}

export async function createOne(collection: string, item: AnyRecord): Promise<AnyRecord> {
  const result: unknown = await request({ action: 'createOne', collection }, () =>
    directus().request(createItem(collection, item))
  );
  return isRecord(result) ? result : {};
}

export async function updateOne(collection: string, key: string | number, item: AnyRecord): Promise<void> {
  await request({ action: 'updateOne', collection }, () => directus().request(updateItem(collection, key, item)));
}

export async function deleteMany(collection: string, keys: string[]): Promise<void> {
  if (!keys.length) return;
  await request({ action: 'deleteMany', collection }, () => directus().request(deleteItems(collection, keys)));
}

export async function collectionExists(collection: string): Promise<boolean> {
  try {
    await request({ action: 'readCollection', collection }, () => directus().request(readCollection(collection)));
    return true;
  } catch (error) {
    // Directus answers 403 for collections that do not exist.
    if (error instanceof DirectusRequestError && (error.status === 403 || error.status === 404)) {
      return false;
    }
    throw error;
  }
}

// Directus adds an auto-increment `id` primary key to collections created without fields.
export async function createTableCollection(collection: string, note: string): Promise<void> {
  await request({ action: 'createCollection', collection }, () =>
    directus().request(createCollection({ collection, meta: { note }, schema: {} }))
  );
}

export interface FieldRecord {
  field: string;
  hidden: boolean;
  primaryKey: boolean;
  note?: string;
  sort?: number;
}

export async function readFields(collection: string): Promise<FieldRecord[]> {
  const result: unknown = await request({ action: 'readFields', collection }, () =>
    directus().request(readFieldsByCollection(collection))
  );
  if (!Array.isArray(result)) return [];
  const fields: FieldRecord[] = [];
  for (const entry of result) {
    if (!isRecord(entry) || typeof entry.field !== 'string') continue;
    const meta = isRecord(entry.meta) ? entry.meta : {};
    const schema = isRecord(entry.schema) ? entry.schema : {};
    fields.push({
      field: entry.field,
      hidden: meta.hidden === true || meta.system === true,
      primaryKey: schema.is_primary_key === true,
      note: typeof meta.note === 'string' ? meta.note : undefined,
      sort: typeof meta.sort === 'number' ? meta.sort : undefined
    });
  }
  return fields;
}

export async function createTextField(collection: string, field: string, note: string, sort: number): Promise<void> {
  await request({ action: 'createField', collection }, () =>
    directus().request(
      createField(collection, {
        field,
        type: 'string',
        meta: { note, sort, interface: 'input' },
        schema: { is_nullable: true }
      })
    )
  );
}

export async function setFieldSort(collection: string, field: string, sort: number): Promise<void> {
  await request({ action: 'updateField', collection }, () =>
    directus().request(updateField(collection, field, { meta: { sort } }))
  );
}

export async function dropField(collection: string, field: string): Promise<void> {
  await request({ action: 'deleteField', collection }, () => directus().request(deleteField(collection, field)));
}
