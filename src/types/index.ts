export interface UnitCatalogEntry {
  baseId: string;
  name: string;
  alignment: string;
  isShip: boolean;
}

export interface SkillCatalogEntry {
  skillId: string;
  displayName: string;
  baseId?: string;
}

/** Reference data for one run, built once and passed to the orchestrator. */
export interface Catalog {
  readonly units: ReadonlyMap<string, UnitCatalogEntry>;
  readonly skills: ReadonlyMap<string, SkillCatalogEntry>;
}

export interface GuildMemberSnapshot {
  playerId?: string;
  name?: string;
  allyCode?: string;
  memberLevel?: string | number;
  galacticPower?: number;
}

export interface GuildSnapshot {
  name: string;
  memberCount: number;
  galacticPower: number;
  lastRaidId: string;
  lastRaidScore: string;
  members: GuildMemberSnapshot[];
}

export interface LeagueStatus {
  leagueId?: string;
  divisionId?: number;
}

export interface SkillObservation {
  skillId: string;
  tier: number;
}

export interface PlayerSnapshot {
  playerId: string;
  name?: string;
  allyCode?: string;
  level?: number;
  galacticPower?: number;
  league: LeagueStatus;
  /** Upper-cased base id → relic tier (undefined when the unit carries none). */
  units: Map<string, number | undefined>;
  skills: SkillObservation[];
}
