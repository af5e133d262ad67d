import { describe, expect, it } from 'vitest';
import { ConfigError } from '../utils/errors.js';
import { loadSyncConfig } from './sync.js';

describe('loadSyncConfig', () => {
  it('applies defaults around the required base URL', () => {
    const config = loadSyncConfig({}, { COMLINK_BASE_URL: 'http://localhost:3200/' });

    expect(config).toEqual({
      comlink: {
        baseUrl: 'http://localhost:3200',
        headers: {},
        timeoutMs: 30000,
        retry: { attempts: 5, baseDelayMs: 1000, factor: 2 }
      },
      tables: { guilds: 'Guild', players: 'Players', units: 'Player_Units', skills: 'Player_Skills' },
      catalogs: {
        units: ['Characters', 'Ships'],
        ships: ['Ships'],
        skills: ['CharactersZetas', 'CharactersOmicrons']
      },
      exclusions: [],
      guildIds: [],
      skipSyncedToday: false,
      timeZone: 'Europe/Madrid',
      runCollection: undefined
    });
  });

  it('reads lists, flags and numbers from the environment', () => {
    const config = loadSyncConfig(
      {},
      {
        COMLINK_BASE: 'https://comlink.example.test',
        COMLINK_HEADERS_JSON: '{"x-api-key":"test-secret","x-retries":2}',
        EXCLUDE_BASEID_CONTAINS: '["_glevent", "EPIXXX"]',
        SYNC_GUILD_IDS: 'g1, g2,g1',
        HTTP_RETRIES: '3',
        HTTP_BACKOFF_MS: '250',
        SKIP_SYNCED_TODAY: 'yes',
        SHEET_PLAYERS: 'Roster',
        SYNC_RUN_COLLECTION: 'sync_runs'
      }
    );

    expect(config.comlink.baseUrl).toBe('https://comlink.example.test');
    expect(config.comlink.headers).toEqual({ 'x-api-key': 'test-secret', 'x-retries': '2' });
    expect(config.comlink.retry).toEqual({ attempts: 3, baseDelayMs: 250, factor: 2 });
    expect(config.exclusions).toEqual(['_GLEVENT', 'EPIXXX']);
    expect(config.guildIds).toEqual(['g1', 'g2']);
    expect(config.skipSyncedToday).toBe(true);
    expect(config.tables.players).toBe('Roster');
    expect(config.runCollection).toBe('sync_runs');
  });

  it('falls back on unparseable values', () => {
    const config = loadSyncConfig(
      {},
      {
        COMLINK_BASE_URL: 'http://localhost:3200',
        EXCLUDE_BASEID_CONTAINS: '[broken',
        SKIP_SYNCED_TODAY: 'maybe',
        HTTP_TIMEOUT_MS: 'soon'
      }
    );

    expect(config.exclusions).toEqual(['BROKEN']);
    expect(config.skipSyncedToday).toBe(false);
    expect(config.comlink.timeoutMs).toBe(30000);
  });

  it('rejects a missing or non-http base URL', () => {
    expect(() => loadSyncConfig({}, {})).toThrow(ConfigError);
    expect(() => loadSyncConfig({}, { COMLINK_BASE_URL: 'ftp://example.test' })).toThrow(ConfigError);
  });

  it('rejects an unknown time zone and malformed headers', () => {
    const base = { COMLINK_BASE_URL: 'http://localhost:3200' };
    expect(() => loadSyncConfig({}, { ...base, TIMEZONE: 'Mars/Olympus_Mons' })).toThrow(ConfigError);
    expect(() => loadSyncConfig({}, { ...base, COMLINK_HEADERS_JSON: '["a"]' })).toThrow(ConfigError);
  });

  it('prefers explicit overrides', () => {
    const config = loadSyncConfig({ guildIds: ['g9'], comlink: { baseUrl: 'http://override.test' } }, {});

    expect(config.guildIds).toEqual(['g9']);
    expect(config.comlink.baseUrl).toBe('http://override.test');
  });
});
