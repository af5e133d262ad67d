import type { GameDataClient } from '../comlink/client.js';
import type { SyncConfig } from '../config/sync.js';
import { resolveString } from '../lib/fields.js';
import type { Row, TabularStore, Table } from '../store/types.js';
import type { Catalog, GuildMemberSnapshot, GuildSnapshot, PlayerSnapshot } from '../types/index.js';
import { SyncAbortedError, describeError } from '../utils/errors.js';
import { log } from '../utils/log.js';
import { loadSnapshotValidator, type SnapshotValidator } from '../validate.js';
import { calendarDay, formatTimestamp, gacLeagueLabel, relicLabel, roleLabel, unitCell } from './derive.js';
import {
  SkillTierAccumulator,
  growMatrix,
  headerBaseId,
  planMatrixColumns,
  pruneEmptyColumns,
  type MatrixColumn
} from './matrix.js';
import { normalizeGuild, normalizePlayer } from './payload.js';
import { KeyedTable, mergeRow } from './table.js';

export const GUILD_HEADERS = [
  'Guild Id',
  'Guild Name',
  'Members',
  'Guild GP',
  'Last Raid Id',
  'Last Raid Score',
  'Last Update'
] as const;

export const PLAYER_HEADERS = [
  'Player Id',
  'Player Name',
  'Ally code',
  'Guild Name',
  'Role',
  'Level',
  'GP',
  'GAC League'
] as const;

export const UNIT_KEY_HEADERS = ['Guild Name', 'Player Name'] as const;
export const SKILL_KEY_HEADERS = ['Player Guild', 'Player Name'] as const;

export type GuildState =
  | 'PENDING'
  | 'FETCHING'
  | 'FETCH_FAILED'
  | 'FETCHED'
  | 'MEMBER_RESOLUTION'
  | 'AGGREGATING'
  | 'UPSERTING'
  | 'DONE'
  | 'SKIPPED'
  | 'FAILED';

export interface MemberCounts {
  written: number;
  skipped: number;
  carried: number;
  removed: number;
}

export interface GuildOutcome {
  guildId: string;
  name: string;
  state: GuildState;
  members: MemberCounts;
  error?: string;
}

export interface SyncReport {
  startedAt: string;
  finishedAt: string;
  gameDataVersion?: string;
  processed: number;
  failed: number;
  skipped: number;
  rows: { players: number; units: number; skills: number };
  guilds: GuildOutcome[];
}

export interface SyncDeps {
  store: TabularStore;
  client: GameDataClient;
  catalog: Catalog;
  config: Pick<SyncConfig, 'tables' | 'timeZone'>;
  now?: () => Date;
  validator?: SnapshotValidator;
}

export interface SyncOptions {
  /** Restricts the run to these guild ids, in this order. */
  guildIds?: readonly string[];
  skipSyncedToday?: boolean;
}

const VERSION_PATHS = [['latestGamedataVersion'], ['payload', 'latestGamedataVersion'], ['data', 'latestGamedataVersion']];

interface ResolvedMember {
  member: GuildMemberSnapshot;
  player: PlayerSnapshot;
}

interface RunContext {
  client: GameDataClient;
  catalog: Catalog;
  validator: SnapshotValidator;
  timeZone: string;
  now: () => Date;
  skipSyncedToday: boolean;
  guilds: KeyedTable;
  players: KeyedTable;
  units: KeyedTable;
  skills: KeyedTable;
  unitColumns: Map<string, number>;
  skillColumns: Map<string, number>;
  tiers: SkillTierAccumulator;
  rows: SyncReport['rows'];
}

function emptyCounts(): MemberCounts {
  return { written: 0, skipped: 0, carried: 0, removed: 0 };
}

function transition(outcome: GuildOutcome, state: GuildState): void {
  log.debug('Guild state', { guildId: outcome.guildId, from: outcome.state, to: state });
  outcome.state = state;
}

function positionsOf(table: KeyedTable, headers: readonly string[]): Map<string, number> {
  const result = new Map<string, number>();
  for (const header of headers) {
    const position = table.column(header);
    if (position !== undefined) result.set(header, position);
  }
  return result;
}

function valuesAt(positions: Map<string, number>, values: Record<string, string>): Map<number, string> {
  const result = new Map<number, string>();
  for (const [header, value] of Object.entries(values)) {
    const position = positions.get(header);
    if (position !== undefined) result.set(position, value);
  }
  return result;
}

function wholeNumber(value: number | undefined): string {
  return value === undefined ? '' : String(Math.trunc(value));
}

async function prepareTable(store: TabularStore, name: string, required: readonly string[]): Promise<Table> {
  await store.ensureHeaders(name, required);
  return (await store.readTable(name)) ?? { headers: [...required], rows: [] };
}

function growTable(table: KeyedTable, columns: readonly MatrixColumn[], reserved: readonly string[]): Map<string, number> {
  const grown = growMatrix(table.headers, columns, reserved);
  for (const header of grown.added) table.addColumn(header);
  if (grown.added.length) {
    log.info('Matrix columns added', { table: table.name, added: grown.added.length });
  }
  return grown.columnByKey;
}

function selectGuildIds(guilds: KeyedTable, filter: readonly string[] | undefined): { ids: string[]; unknown: string[] } {
  const idColumn = guilds.column('Guild Id');
  const known: string[] = [];
  for (const row of guilds.rows) {
    const id = idColumn === undefined ? '' : (row[idColumn] ?? '').trim();
    if (id && !known.includes(id)) known.push(id);
  }
  if (!filter || !filter.length) return { ids: known, unknown: [] };

  const ids: string[] = [];
  const unknown: string[] = [];
  for (const raw of filter) {
    const id = raw.trim();
    if (!id || ids.includes(id) || unknown.includes(id)) continue;
    if (known.includes(id)) ids.push(id);
    else unknown.push(id);
  }
  return { ids, unknown };
}

function playerRow(ctx: RunContext, snapshot: GuildSnapshot, resolved: ResolvedMember, name: string): Row {
  const { member, player } = resolved;
  const positions = positionsOf(ctx.players, PLAYER_HEADERS);
  const values = valuesAt(positions, {
    'Player Id': player.playerId,
    'Player Name': name,
    'Ally code': member.allyCode ?? player.allyCode ?? '',
    'Guild Name': snapshot.name,
    Role: roleLabel(member.memberLevel),
    Level: wholeNumber(player.level),
    GP: wholeNumber(member.galacticPower ?? player.galacticPower),
    'GAC League': gacLeagueLabel(player.league)
  });
  const previous = ctx.players.get([player.playerId]);
  return mergeRow(ctx.players.width, previous, values, new Set(positions.values()));
}

function previousMatrixRow(table: KeyedTable, scope: readonly string[], name: string): Row | undefined {
  for (const guildName of scope) {
    const row = table.get([guildName, name]);
    if (row) return row;
  }
  return undefined;
}

function unitRow(ctx: RunContext, snapshot: GuildSnapshot, scope: readonly string[], player: PlayerSnapshot, name: string): Row {
  const keys = positionsOf(ctx.units, UNIT_KEY_HEADERS);
  const values = valuesAt(keys, { 'Guild Name': snapshot.name, 'Player Name': name });
  const owned = new Set(keys.values());

  for (const [baseId, position] of ctx.unitColumns) {
    const entry = ctx.catalog.units.get(baseId);
    values.set(position, unitCell(player.units.has(baseId), entry?.isShip ?? false, player.units.get(baseId)));
    owned.add(position);
  }

  ctx.units.headers.forEach((header, position) => {
    if (owned.has(position)) return;
    const baseId = headerBaseId(header);
    if (baseId && player.units.has(baseId)) {
      values.set(position, relicLabel(player.units.get(baseId)));
      owned.add(position);
    }
  });

  return mergeRow(ctx.units.width, previousMatrixRow(ctx.units, scope, name), values, owned);
}

function skillRow(ctx: RunContext, snapshot: GuildSnapshot, scope: readonly string[], player: PlayerSnapshot, name: string): Row {
  for (const observation of player.skills) {
    if (ctx.catalog.skills.has(observation.skillId)) {
      ctx.tiers.observe(snapshot.name, name, observation.skillId, observation.tier);
    }
  }

  const keys = positionsOf(ctx.skills, SKILL_KEY_HEADERS);
  const values = valuesAt(keys, { 'Player Guild': snapshot.name, 'Player Name': name });
  const owned = new Set(keys.values());
  for (const [skillId, position] of ctx.skillColumns) {
    const tier = ctx.tiers.get(snapshot.name, name, skillId);
    values.set(position, tier === undefined ? '' : String(tier));
    owned.add(position);
  }
  return mergeRow(ctx.skills.width, previousMatrixRow(ctx.skills, scope, name), values, owned);
}

/** Previous row moved under the guild's current name, otherwise untouched. */
function carriedRow(table: KeyedTable, row: Row | undefined, guildHeader: string, guildName: string): Row | undefined {
  if (!row) return undefined;
  const copy = [...row];
  const position = table.column(guildHeader);
  if (position !== undefined) copy[position] = guildName;
  return copy;
}

/**
 * Removes the Players row of each fresh player still filed under another
 * guild, along with that guild's matrix rows for the player.
 */
function releaseMovedPlayers(ctx: RunContext, scope: readonly string[], playerKeys: ReadonlySet<string | undefined>): number {
  const moved = new Set(
    ctx.players.rows.filter(
      (row) =>
        playerKeys.has(ctx.players.keyOf(row)) && !scope.includes(ctx.players.cell(row, 'Guild Name').trim())
    )
  );
  if (!moved.size) return 0;

  const left = new Set(
    [...moved].map((row) =>
      KeyedTable.composeKey([ctx.players.cell(row, 'Guild Name'), ctx.players.cell(row, 'Player Name')])
    )
  );
  ctx.players.removeWhere((row) => moved.has(row));
  ctx.units.removeWhere((row) => left.has(ctx.units.keyOf(row) ?? ''));
  ctx.skills.removeWhere((row) => left.has(ctx.skills.keyOf(row) ?? ''));
  return moved.size;
}

async function resolveMembers(
  ctx: RunContext,
  outcome: GuildOutcome,
  snapshot: GuildSnapshot
): Promise<{ resolved: ResolvedMember[]; failed: GuildMemberSnapshot[] }> {
  const resolved: ResolvedMember[] = [];
  const failed: GuildMemberSnapshot[] = [];

  for (const member of snapshot.members) {
    const playerId = member.playerId;
    if (!playerId) {
      log.warn('Member without player id skipped', { guildId: outcome.guildId, name: member.name });
      outcome.members.skipped++;
      continue;
    }
    try {
      const payload = await ctx.client.fetchPlayer(playerId);
      const player = normalizePlayer(payload, playerId);
      ctx.validator.player(player);
      resolved.push({ member, player });
    } catch (error) {
      log.warn('Member skipped', { guildId: outcome.guildId, playerId, error: describeError(error) });
      outcome.members.skipped++;
      failed.push(member);
    }
  }
  return { resolved, failed };
}

async function syncGuild(ctx: RunContext, outcome: GuildOutcome): Promise<void> {
  const guildId = outcome.guildId;
  const previousGuild = ctx.guilds.get([guildId]);
  const previousName = ctx.guilds.cell(previousGuild, 'Guild Name').trim();
  outcome.name = previousName;

  if (ctx.skipSyncedToday) {
    const lastUpdate = ctx.guilds.cell(previousGuild, 'Last Update').trim();
    if (lastUpdate && lastUpdate.slice(0, 10) === calendarDay(ctx.now(), ctx.timeZone)) {
      log.info('Guild already synced today', { guildId, lastUpdate });
      transition(outcome, 'SKIPPED');
      return;
    }
  }

  transition(outcome, 'FETCHING');
  let payload: unknown;
  try {
    payload = await ctx.client.fetchGuild(guildId);
  } catch (error) {
    outcome.error = describeError(error);
    transition(outcome, 'FETCH_FAILED');
    log.error('Guild fetch failed', { guildId, error: outcome.error });
    return;
  }

  transition(outcome, 'FETCHED');
  const snapshot = normalizeGuild(payload);
  ctx.validator.guild(snapshot);
  outcome.name = snapshot.name;
  const scope = [...new Set([snapshot.name, previousName].filter(Boolean))];

  transition(outcome, 'MEMBER_RESOLUTION');
  const { resolved, failed } = await resolveMembers(ctx, outcome, snapshot);

  transition(outcome, 'AGGREGATING');
  const freshPlayers: Row[] = [];
  const freshUnits: Row[] = [];
  const freshSkills: Row[] = [];

  for (const entry of resolved) {
    const previous = ctx.players.get([entry.player.playerId]);
    const name =
      entry.member.name ??
      entry.player.name ??
      (ctx.players.cell(previous, 'Player Name').trim() ||
        entry.member.allyCode ||
        entry.player.allyCode ||
        entry.player.playerId);
    freshPlayers.push(playerRow(ctx, snapshot, entry, name));
    freshUnits.push(unitRow(ctx, snapshot, scope, entry.player, name));
    freshSkills.push(skillRow(ctx, snapshot, scope, entry.player, name));
    outcome.members.written++;
  }

  for (const member of failed) {
    const previous = ctx.players.get([member.playerId ?? '']);
    if (!previous || !scope.includes(ctx.players.cell(previous, 'Guild Name').trim())) continue;
    const name = member.name ?? ctx.players.cell(previous, 'Player Name').trim();
    const rows = [
      carriedRow(ctx.players, previous, 'Guild Name', snapshot.name),
      carriedRow(ctx.units, previousMatrixRow(ctx.units, scope, name), 'Guild Name', snapshot.name),
      carriedRow(ctx.skills, previousMatrixRow(ctx.skills, scope, name), 'Player Guild', snapshot.name)
    ];
    const [player, unit, skill] = rows;
    if (player) freshPlayers.push(player);
    if (unit) freshUnits.push(unit);
    if (skill) freshSkills.push(skill);
    outcome.members.carried++;
  }

  transition(outcome, 'UPSERTING');
  const guildPositions = positionsOf(ctx.guilds, GUILD_HEADERS);
  const guildValues = valuesAt(guildPositions, {
    'Guild Id': guildId,
    'Guild Name': snapshot.name,
    Members: wholeNumber(snapshot.memberCount),
    'Guild GP': String(snapshot.galacticPower),
    'Last Raid Id': snapshot.lastRaidId,
    'Last Raid Score': snapshot.lastRaidScore,
    'Last Update': formatTimestamp(ctx.now(), ctx.timeZone)
  });
  ctx.guilds.upsert(mergeRow(ctx.guilds.width, previousGuild, guildValues, new Set(guildPositions.values())));

  const keptIds = new Set(freshPlayers.map((row) => ctx.players.keyOf(row)));
  outcome.members.removed = ctx.players
    .rowsWhere('Guild Name', scope)
    .filter((row) => !keptIds.has(ctx.players.keyOf(row))).length;
  const moved = releaseMovedPlayers(ctx, scope, keptIds);
  if (moved) log.info('Players moved from another guild', { guildId, moved });
  ctx.players.replaceScope('Guild Name', scope, freshPlayers);
  ctx.units.replaceScope('Guild Name', scope, freshUnits);
  ctx.skills.replaceScope('Player Guild', scope, freshSkills);
  ctx.rows.players += freshPlayers.length;
  ctx.rows.units += freshUnits.length;
  ctx.rows.skills += freshSkills.length;

  transition(outcome, 'DONE');
  log.info('Guild synced', { guildId, name: snapshot.name, ...outcome.members });
}

async function preflight(client: GameDataClient): Promise<string | undefined> {
  try {
    const metadata = await client.fetchMetadata();
    return resolveString(metadata, VERSION_PATHS);
  } catch (error) {
    throw new SyncAbortedError(`Game data service unreachable: ${describeError(error)}`, { cause: error });
  }
}

/**
 * Synchronizes every selected guild into the four output tables. Tables are
 * read once up front and written once at the end; per-guild and per-member
 * failures are recorded in the report and never abort the run.
 */
export async function runGuildSync(deps: SyncDeps, options: SyncOptions = {}): Promise<SyncReport> {
  const now = deps.now ?? (() => new Date());
  const startedAt = now().toISOString();
  const { store, config } = deps;
  const { tables } = config;

  const gameDataVersion = await preflight(deps.client);
  log.info('Sync started', { gameDataVersion, guildFilter: options.guildIds ?? [] });

  const existingGuilds = await store.readTable(tables.guilds);
  if (!existingGuilds || existingGuilds.headers.every((header) => header.trim() === '')) {
    throw new SyncAbortedError(`Table ${tables.guilds} is missing or has no header row`);
  }
  const guildTable = new KeyedTable(tables.guilds, existingGuilds, ['Guild Id']);
  if (!guildTable.rows.some((row) => guildTable.keyOf(row) !== undefined)) {
    throw new SyncAbortedError(`Table ${tables.guilds} has no usable Guild Id column`);
  }

  const ctx: RunContext = {
    client: deps.client,
    catalog: deps.catalog,
    validator: deps.validator ?? (await loadSnapshotValidator()),
    timeZone: config.timeZone,
    now,
    skipSyncedToday: options.skipSyncedToday ?? false,
    guilds: new KeyedTable(tables.guilds, await prepareTable(store, tables.guilds, GUILD_HEADERS), ['Guild Id']),
    players: new KeyedTable(tables.players, await prepareTable(store, tables.players, PLAYER_HEADERS), ['Player Id']),
    units: new KeyedTable(tables.units, await prepareTable(store, tables.units, UNIT_KEY_HEADERS), UNIT_KEY_HEADERS),
    skills: new KeyedTable(tables.skills, await prepareTable(store, tables.skills, SKILL_KEY_HEADERS), SKILL_KEY_HEADERS),
    unitColumns: new Map(),
    skillColumns: new Map(),
    tiers: new SkillTierAccumulator(),
    rows: { players: 0, units: 0, skills: 0 }
  };

  const unitPlan = planMatrixColumns(
    [...deps.catalog.units.values()].map((entry) => ({ key: entry.baseId, name: entry.name })),
    UNIT_KEY_HEADERS
  );
  const skillPlan = planMatrixColumns(
    [...deps.catalog.skills.values()].map((entry) => ({ key: entry.skillId, name: entry.displayName })),
    SKILL_KEY_HEADERS
  );
  ctx.unitColumns = growTable(ctx.units, unitPlan, UNIT_KEY_HEADERS);
  ctx.skillColumns = growTable(ctx.skills, skillPlan, SKILL_KEY_HEADERS);

  const selection = selectGuildIds(ctx.guilds, options.guildIds);
  const outcomes: GuildOutcome[] = [];
  for (const guildId of selection.unknown) {
    log.warn('Guild id not found in guild table, skipping', { guildId, table: tables.guilds });
    outcomes.push({ guildId, name: '', state: 'SKIPPED', members: emptyCounts(), error: 'unknown guild id' });
  }

  for (const guildId of selection.ids) {
    const outcome: GuildOutcome = { guildId, name: '', state: 'PENDING', members: emptyCounts() };
    outcomes.push(outcome);
    try {
      await syncGuild(ctx, outcome);
    } catch (error) {
      outcome.error = describeError(error);
      transition(outcome, 'FAILED');
      log.error('Guild sync failed', { guildId, error: outcome.error });
    }
  }

  const processed = outcomes.filter((outcome) => outcome.state === 'DONE').length;
  if (processed > 0) {
    const pruned = pruneEmptyColumns(ctx.skills, ctx.skillColumns.values());
    if (pruned.length) log.info('Unused skill columns pruned', { table: tables.skills, pruned: pruned.length });
    for (const table of [ctx.guilds, ctx.players, ctx.units, ctx.skills]) {
      await store.writeRows(table.name, table.toTable());
    }
  } else {
    log.warn('No guild completed, tables left unchanged');
  }

  const report: SyncReport = {
    startedAt,
    finishedAt: now().toISOString(),
    gameDataVersion,
    processed,
    failed: outcomes.filter((outcome) => outcome.state === 'FAILED' || outcome.state === 'FETCH_FAILED').length,
    skipped: outcomes.filter((outcome) => outcome.state === 'SKIPPED').length,
    rows: ctx.rows,
    guilds: outcomes
  };
  log.info('Sync finished', {
    processed: report.processed,
    failed: report.failed,
    skipped: report.skipped,
    ...report.rows
  });
  return report;
}
