import { GameDataError, describeError } from '../utils/errors.js';
import { isRecord, type UnknownRecord } from '../lib/fields.js';
import { log } from '../utils/log.js';
import { DEFAULT_RETRY_POLICY, sleep, withRetry, type RetryPolicy, type Sleep } from '../utils/retry.js';

export type GuildPayload = UnknownRecord;
export type PlayerPayload = UnknownRecord;
export type MetadataPayload = UnknownRecord;

/**
 * Game data service as seen by the sync engine. Every call retries on its own
 * and rejects with a `RetryExhaustedError` once its budget is spent.
 */
export interface GameDataClient {
  fetchMetadata(): Promise<MetadataPayload>;
  fetchGuild(guildId: string): Promise<GuildPayload>;
  fetchPlayer(playerId: string): Promise<PlayerPayload>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface ComlinkClientOptions {
  baseUrl: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
  retry?: RetryPolicy;
  fetch?: FetchLike;
  sleep?: Sleep;
}

const DEFAULT_TIMEOUT_MS = 30_000;

export function joinUrl(base: string, path: string): string {
  const trimmed = base.trim().replace(/\/+$/, '');
  if (!/^https?:\/\//i.test(trimmed)) {
    throw new Error(`Invalid Comlink base URL ${JSON.stringify(base)} (expected http:// or https://)`);
  }
  return `${trimmed}${path.startsWith('/') ? path : `/${path}`}`;
}

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export class ComlinkClient implements GameDataClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly fetchImpl: FetchLike;
  private readonly wait: Sleep;

  constructor(options: ComlinkClientOptions) {
    joinUrl(options.baseUrl, '/');
    this.baseUrl = options.baseUrl;
    this.headers = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
      ...options.headers
    };
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.wait = options.sleep ?? sleep;
  }

  async fetchMetadata(): Promise<MetadataPayload> {
    return this.post('/metadata', { payload: {}, enums: false });
  }

  async fetchGuild(guildId: string): Promise<GuildPayload> {
    const id = guildId.trim();
    if (!id) throw new Error('fetchGuild requires a guild id');
    return this.post('/guild', {
      payload: { guildId: id, includeRecentGuildActivityInfo: true },
      enums: false
    });
  }

  async fetchPlayer(playerId: string): Promise<PlayerPayload> {
    const id = playerId.trim();
    if (!id) throw new Error('fetchPlayer requires a player id');
    return this.post('/player', { payload: { playerId: id }, enums: false });
  }

  private async post(path: string, body: UnknownRecord): Promise<UnknownRecord> {
    const url = joinUrl(this.baseUrl, path);
    log.debug('Comlink request', { path, body });
    return withRetry(`POST ${path}`, () => this.postOnce(url, path, body), this.retry, this.wait);
  }

  private async postOnce(url: string, path: string, body: UnknownRecord): Promise<UnknownRecord> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      throw new GameDataError(
        `POST ${path} did not complete: ${describeError(error)}`,
        { endpoint: path, retryable: true },
        { cause: error }
      );
    }

    if (!response.ok) {
      throw new GameDataError(
        `POST ${path} failed with status ${response.status} ${response.statusText}`,
        { endpoint: path, status: response.status, retryable: isRetryableStatus(response.status) }
      );
    }

    const text = await response.text();
    if (!text.trim()) return {};

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new GameDataError(
        `POST ${path} returned a body that is not JSON`,
        { endpoint: path, status: response.status, retryable: false },
        { cause: error }
      );
    }
    if (!isRecord(parsed)) {
      throw new GameDataError(
        `POST ${path} returned ${Array.isArray(parsed) ? 'an array' : typeof parsed} instead of an object`,
        { endpoint: path, status: response.status, retryable: false }
      );
    }
    return parsed;
  }
}
