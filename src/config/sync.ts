import { ConfigError } from '../utils/errors.js';
import { log } from '../utils/log.js';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from '../utils/retry.js';

export interface SyncTables {
  guilds: string;
  players: string;
  units: string;
  skills: string;
}

export interface CatalogTables {
  units: string[];
  ships: string[];
  skills: string[];
}

export interface ComlinkSettings {
  baseUrl: string;
  headers: Record<string, string>;
  timeoutMs: number;
  retry: RetryPolicy;
}

export interface SyncConfig {
  comlink: ComlinkSettings;
  tables: SyncTables;
  catalogs: CatalogTables;
  exclusions: string[];
  guildIds: string[];
  skipSyncedToday: boolean;
  timeZone: string;
  runCollection?: string;
}

export type SyncConfigOverrides = Partial<Omit<SyncConfig, 'comlink'>> & {
  comlink?: Partial<ComlinkSettings>;
};

const DEFAULT_TIME_ZONE = 'Europe/Madrid';
const DEFAULT_TIMEOUT_MS = 30_000;

function parseList(name: string, raw: string | undefined, fallback: string[] = []): string[] {
  if (raw === undefined || !raw.trim()) return fallback;

  const candidates: string[] = [];
  const trimmed = raw.trim();

  if (trimmed.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (Array.isArray(parsed)) {
        for (const entry of parsed) {
          if (typeof entry === 'string') {
            candidates.push(entry);
          } else if (entry !== null && entry !== undefined) {
            log.warn(`Ignoring non-string ${name} entry from JSON payload`, { entry });
          }
        }
      }
    } catch (error) {
      log.warn(`Failed to parse ${name} as JSON array, falling back to CSV parsing`, {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  if (!candidates.length) {
    candidates.push(...trimmed.replace(/^\[|\]$/g, '').split(','));
  }

  const result: string[] = [];
  for (const token of candidates) {
    const value = token.trim().replace(/^["']|["']$/g, '').trim();
    if (value && !result.includes(value)) result.push(value);
  }
  return result;
}

function parseBoolean(name: string, raw: string | undefined, defaultValue: boolean): boolean {
  if (!raw) return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  log.warn('Unable to parse boolean env flag, falling back to default', { name, value: raw });
  return defaultValue;
}

function parsePositive(name: string, raw: string | undefined, defaultValue: number): number {
  if (!raw || !raw.trim()) return defaultValue;
  const parsed = Number(raw.trim());
  if (Number.isFinite(parsed) && parsed > 0) return parsed;
  log.warn('Unable to parse numeric env value, falling back to default', { name, value: raw });
  return defaultValue;
}

function parseHeaders(raw: string | undefined): Record<string, string> {
  if (!raw || !raw.trim()) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(
      `COMLINK_HEADERS_JSON is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError('COMLINK_HEADERS_JSON must be a JSON object');
  }
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (value === null || value === undefined) continue;
    headers[key] = String(value);
  }
  return headers;
}

function parseBaseUrl(raw: string | undefined): string {
  const value = raw?.trim();
  if (!value) {
    throw new ConfigError('COMLINK_BASE_URL is required');
  }
  if (!/^https?:\/\//i.test(value)) {
    throw new ConfigError(`COMLINK_BASE_URL must start with http:// or https:// (got ${JSON.stringify(value)})`);
  }
  return value.replace(/\/+$/, '');
}

function parseTimeZone(raw: string | undefined): string {
  const value = raw?.trim() || DEFAULT_TIME_ZONE;
  try {
    new Intl.DateTimeFormat('en-CA', { timeZone: value });
    return value;
  } catch {
    throw new ConfigError(`TIMEZONE ${JSON.stringify(value)} is not a known IANA time zone`);
  }
}

export function loadSyncConfig(
  overrides: SyncConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): SyncConfig {
  const comlink: ComlinkSettings = {
    baseUrl: overrides.comlink?.baseUrl ?? parseBaseUrl(env.COMLINK_BASE_URL ?? env.COMLINK_BASE),
    headers: overrides.comlink?.headers ?? parseHeaders(env.COMLINK_HEADERS_JSON),
    timeoutMs: overrides.comlink?.timeoutMs ?? parsePositive('HTTP_TIMEOUT_MS', env.HTTP_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    retry: overrides.comlink?.retry ?? {
      attempts: Math.floor(parsePositive('HTTP_RETRIES', env.HTTP_RETRIES, DEFAULT_RETRY_POLICY.attempts)),
      baseDelayMs: parsePositive('HTTP_BACKOFF_MS', env.HTTP_BACKOFF_MS, DEFAULT_RETRY_POLICY.baseDelayMs),
      factor: parsePositive('HTTP_BACKOFF_FACTOR', env.HTTP_BACKOFF_FACTOR, DEFAULT_RETRY_POLICY.factor)
    }
  };

  const tables: SyncTables = overrides.tables ?? {
    guilds: env.SHEET_GUILDS?.trim() || 'Guild',
    players: env.SHEET_PLAYERS?.trim() || 'Players',
    units: env.SHEET_PLAYER_UNITS?.trim() || 'Player_Units',
    skills: env.SHEET_PLAYER_SKILLS?.trim() || 'Player_Skills'
  };

  const catalogs: CatalogTables = overrides.catalogs ?? {
    units: parseList('SHEET_UNIT_CATALOGS', env.SHEET_UNIT_CATALOGS, ['Characters', 'Ships']),
    ships: parseList('SHEET_SHIP_CATALOGS', env.SHEET_SHIP_CATALOGS, ['Ships']),
    skills: parseList('SHEET_SKILL_CATALOGS', env.SHEET_SKILL_CATALOGS, ['CharactersZetas', 'CharactersOmicrons'])
  };

  return {
    comlink,
    tables,
    catalogs,
    exclusions:
      overrides.exclusions ??
      parseList('EXCLUDE_BASEID_CONTAINS', env.EXCLUDE_BASEID_CONTAINS).map((token) => token.toUpperCase()),
    guildIds: overrides.guildIds ?? parseList('SYNC_GUILD_IDS', env.SYNC_GUILD_IDS),
    skipSyncedToday:
      overrides.skipSyncedToday ?? parseBoolean('SKIP_SYNCED_TODAY', env.SKIP_SYNCED_TODAY, false),
    timeZone: overrides.timeZone ?? parseTimeZone(env.TIMEZONE),
    runCollection: overrides.runCollection ?? (env.SYNC_RUN_COLLECTION?.trim() || undefined)
  };
}
