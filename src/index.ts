#!/usr/bin/env node
import 'dotenv/config';
import { loadCatalog } from './catalog.js';
import { ComlinkClient } from './comlink/client.js';
import { loadSyncConfig } from './config/sync.js';
import { DirectusTableStore } from './store/directus.js';
import { MemoryTableStore } from './store/memory.js';
import type { TabularStore } from './store/types.js';
import { runGuildSync } from './sync/orchestrator.js';
import { getListArg, getStringArg, parseCliArgs, resolveBooleanFlag } from './utils/cliArgs.js';
import { log } from './utils/log.js';
import { SyncRun } from './utils/syncRun.js';

process.on('uncaughtException', (error) => {
  log.error('Uncaught exception', error);
  process.exit(1);
});

async function main() {
  const rawArgs = parseCliArgs(process.argv.slice(2));

  const cliGuilds = getListArg(rawArgs, 'guild');
  const timeZone = getStringArg(rawArgs, 'timezone');
  const config = loadSyncConfig({
    ...(cliGuilds?.length ? { guildIds: cliGuilds } : {}),
    ...(timeZone ? { timeZone } : {})
  });
  const skipSyncedToday = resolveBooleanFlag(rawArgs['skip-synced-today'], undefined, config.skipSyncedToday);
  const dryRun = resolveBooleanFlag(rawArgs['dry-run'], process.env.DRY_RUN, false);

  const client = new ComlinkClient({
    baseUrl: config.comlink.baseUrl,
    headers: config.comlink.headers,
    timeoutMs: config.comlink.timeoutMs,
    retry: config.comlink.retry
  });

  const directusStore = new DirectusTableStore();
  let store: TabularStore = directusStore;
  if (dryRun) {
    const names = [
      ...Object.values(config.tables),
      ...config.catalogs.units,
      ...config.catalogs.ships,
      ...config.catalogs.skills
    ];
    store = await MemoryTableStore.snapshot(directusStore, names);
    log.info('Dry run: writes stay in memory', { tables: names });
  }

  log.info('Guild sync started', {
    guilds: config.guildIds.length ? config.guildIds : 'all',
    skipSyncedToday,
    dryRun
  });

  const catalog = await loadCatalog(store, {
    unitTables: config.catalogs.units,
    shipTables: config.catalogs.ships,
    skillTables: config.catalogs.skills,
    exclusions: config.exclusions
  });

  const syncRun = new SyncRun(dryRun ? undefined : config.runCollection);
  let succeeded = false;

  try {
    await syncRun.start({ guild_filter: config.guildIds, skip_synced_today: skipSyncedToday });
    const report = await runGuildSync(
      { store, client, catalog, config },
      { guildIds: config.guildIds, skipSyncedToday }
    );
    await syncRun.finishSuccess(report);
    succeeded = true;

    for (const outcome of report.guilds) {
      log.info('Guild outcome', { ...outcome });
    }
    if (report.processed === 0 && report.failed > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    if (!succeeded) {
      await syncRun.finishFail(error);
    }
    throw error;
  }
}

main().catch((error) => {
  log.error('Guild sync failed', error);
  process.exitCode = 1;
});
