import {
  isRecord,
  resolveArray,
  resolveField,
  resolveNumber,
  resolveRecord,
  resolveString,
  toNumber,
  type FieldPath
} from '../lib/fields.js';
import type {
  GuildMemberSnapshot,
  GuildSnapshot,
  PlayerSnapshot,
  SkillObservation
} from '../types/index.js';

// Accessor paths, highest priority first. Provider versions disagree on
// envelopes (`payload`, `guild`) and on several field names.
const GUILD_ROOT: readonly FieldPath[] = [['guild'], ['payload', 'guild'], ['data', 'guild'], []];
const PLAYER_ROOT: readonly FieldPath[] = [['payload'], ['data'], []];

const GUILD_FIELDS = {
  name: [['profile', 'name'], ['guildName'], ['name']],
  memberCount: [['profile', 'memberCount'], ['memberCount']],
  galacticPower: [['profile', 'guildGalacticPower'], ['profile', 'galacticPower'], ['galacticPower']],
  members: [['member'], ['members']],
  raidSummary: [['lastRaidPointsSummary'], ['profile', 'lastRaidPointsSummary']]
} satisfies Record<string, readonly FieldPath[]>;

const MEMBER_FIELDS = {
  playerId: [['playerId'], ['playerID'], ['id']],
  name: [['playerName'], ['name']],
  allyCode: [['allyCode'], ['allycode'], ['ally']],
  memberLevel: [['memberLevel'], ['role']],
  galacticPower: [['galacticPower'], ['gp']]
} satisfies Record<string, readonly FieldPath[]>;

const PLAYER_FIELDS = {
  playerId: [['playerId'], ['playerID'], ['id']],
  name: [['name'], ['playerName']],
  allyCode: [['allyCode'], ['allycode']],
  level: [['level']],
  galacticPower: [['galacticPower'], ['statistics', 'galacticPower']],
  roster: [['rosterUnit'], ['roster']],
  rankStatus: [['playerRating', 'playerRankStatus'], ['playerRankStatus']]
} satisfies Record<string, readonly FieldPath[]>;

const RANK_FIELDS = {
  leagueId: [['leagueId'], ['league'], ['leagueName']],
  divisionId: [['divisionId'], ['division'], ['divisionNumber']]
} satisfies Record<string, readonly FieldPath[]>;

const UNIT_FIELDS = {
  definitionId: [['definitionId']],
  baseId: [['defId'], ['baseId'], ['id']],
  relicTier: [['relic', 'currentTier'], ['currentRelicTier'], ['relicTier'], ['relic', 'tier']],
  skills: [['skill'], ['skills']]
} satisfies Record<string, readonly FieldPath[]>;

const SKILL_FIELDS = {
  id: [['id'], ['skillId']],
  tier: [['tier'], ['currentTier']]
} satisfies Record<string, readonly FieldPath[]>;

function rootOf(source: unknown, paths: readonly FieldPath[]): unknown {
  return resolveRecord(source, paths) ?? source;
}

function asciiJson(value: unknown): string {
  return (JSON.stringify(value) ?? 'null').replace(
    /[\u0080-\uffff]/g,
    (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`
  );
}

/** JSON with `", "` and `": "` separators and non-ASCII escaped, the form stored raid ids use. */
export function spacedJson(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(spacedJson).join(', ')}]`;
  if (isRecord(value)) {
    const entries = Object.entries(value).filter(([, item]) => item !== undefined);
    return `{${entries.map(([key, item]) => `${asciiJson(key)}: ${spacedJson(item)}`).join(', ')}}`;
  }
  return asciiJson(value);
}

export function serializeRaidIdentifier(identifier: unknown): string {
  if (identifier === undefined || identifier === null) return '';
  return spacedJson(identifier);
}

export function raidScore(points: unknown): string {
  const numeric = toNumber(points);
  if (numeric !== undefined) return String(Math.trunc(numeric));
  return typeof points === 'string' ? points.trim() : '';
}

export function normalizeMember(raw: unknown): GuildMemberSnapshot {
  const level = resolveField(raw, MEMBER_FIELDS.memberLevel);
  return {
    playerId: resolveString(raw, MEMBER_FIELDS.playerId),
    name: resolveString(raw, MEMBER_FIELDS.name),
    allyCode: resolveString(raw, MEMBER_FIELDS.allyCode),
    memberLevel: typeof level === 'number' || typeof level === 'string' ? level : undefined,
    galacticPower: resolveNumber(raw, MEMBER_FIELDS.galacticPower)
  };
}

export function normalizeGuild(payload: unknown): GuildSnapshot {
  const guild = rootOf(payload, GUILD_ROOT);
  const members = resolveArray(guild, GUILD_FIELDS.members).map(normalizeMember);

  let lastRaidId = '';
  let lastRaidScore = '';
  const summaries = resolveArray(guild, GUILD_FIELDS.raidSummary);
  const latest = summaries[0];
  if (isRecord(latest)) {
    lastRaidId = serializeRaidIdentifier(latest.identifier ?? {});
    lastRaidScore = raidScore(latest.totalPoints);
  }

  return {
    name: resolveString(guild, GUILD_FIELDS.name) ?? '',
    memberCount: resolveNumber(guild, GUILD_FIELDS.memberCount) ?? members.length,
    galacticPower: Math.trunc(resolveNumber(guild, GUILD_FIELDS.galacticPower) ?? 0),
    lastRaidId,
    lastRaidScore,
    members
  };
}

/** `"BASEID:SEVEN_STAR"` → `"BASEID"`, upper-cased. */
export function baseIdOf(unit: unknown): string | undefined {
  const definitionId = resolveString(unit, UNIT_FIELDS.definitionId);
  const raw = definitionId ? definitionId.split(':', 1)[0] : resolveString(unit, UNIT_FIELDS.baseId);
  const key = raw?.trim().toUpperCase();
  return key || undefined;
}

function collectSkills(unit: unknown, into: SkillObservation[]) {
  for (const skill of resolveArray(unit, UNIT_FIELDS.skills)) {
    const skillId = resolveString(skill, SKILL_FIELDS.id);
    const tier = resolveNumber(skill, SKILL_FIELDS.tier);
    if (skillId && tier !== undefined) {
      into.push({ skillId, tier });
    }
  }
}

export function normalizePlayer(payload: unknown, fallbackPlayerId: string): PlayerSnapshot {
  const player = rootOf(payload, PLAYER_ROOT);
  const units = new Map<string, number | undefined>();
  const skills: SkillObservation[] = [];

  for (const unit of resolveArray(player, PLAYER_FIELDS.roster)) {
    const baseId = baseIdOf(unit);
    if (!baseId) continue;
    const tier = resolveNumber(unit, UNIT_FIELDS.relicTier);
    const previous = units.get(baseId);
    units.set(baseId, previous === undefined ? tier : Math.max(previous, tier ?? previous));
    collectSkills(unit, skills);
  }

  const rank = resolveRecord(player, PLAYER_FIELDS.rankStatus);
  return {
    playerId: resolveString(player, PLAYER_FIELDS.playerId) ?? fallbackPlayerId,
    name: resolveString(player, PLAYER_FIELDS.name),
    allyCode: resolveString(player, PLAYER_FIELDS.allyCode),
    level: resolveNumber(player, PLAYER_FIELDS.level),
    galacticPower: resolveNumber(player, PLAYER_FIELDS.galacticPower),
    league: {
      leagueId: rank ? resolveString(rank, RANK_FIELDS.leagueId) : undefined,
      divisionId: rank ? resolveNumber(rank, RANK_FIELDS.divisionId) : undefined
    },
    units,
    skills
  };
}
