import { normalizeHeader, resolveColumns } from './store/headers.js';
import type { Table, TabularStore } from './store/types.js';
import type { Catalog, SkillCatalogEntry, UnitCatalogEntry } from './types/index.js';
import { describeError } from './utils/errors.js';
import { log } from './utils/log.js';

export interface CatalogSources {
  unitTables: readonly string[];
  /** Unit tables whose every row is a ship. */
  shipTables: readonly string[];
  skillTables: readonly string[];
  /** Id substrings (matched case-insensitively) whose entries are dropped. */
  exclusions: readonly string[];
}

const UNIT_COLUMNS = ['base_id', 'Name', 'Alignment', 'is_ship', 'Combat Type'] as const;
const SKILL_COLUMNS = ['skillId', 'skillName', 'base_id'] as const;
const SHIP_COMBAT_TYPE = '2';

export function isExcluded(key: string, exclusions: readonly string[]): boolean {
  const upper = key.toUpperCase();
  return exclusions.some((token) => token && upper.includes(token.toUpperCase()));
}

function cell(row: readonly string[], position: number | undefined): string {
  if (position === undefined) return '';
  return (row[position] ?? '').trim();
}

function parseFlag(value: string): boolean {
  return ['1', 'true', 'yes', 'y', 'x'].includes(value.trim().toLowerCase());
}

async function readSource(store: TabularStore, name: string): Promise<Table | undefined> {
  try {
    const table = await store.readTable(name);
    if (!table) {
      log.warn('Catalog table not found', { table: name });
    }
    return table;
  } catch (error) {
    log.warn('Catalog table could not be read', { table: name, error: describeError(error) });
    return undefined;
  }
}

export function collectUnits(
  table: Table,
  source: string,
  options: { isShipTable: boolean; exclusions: readonly string[] },
  into: Map<string, UnitCatalogEntry>
): number {
  const columns = resolveColumns(table.headers, UNIT_COLUMNS);
  const keyColumn = columns.get('base_id');
  if (keyColumn === undefined) {
    log.warn('Unit catalog table has no base_id column', { table: source, headers: table.headers });
    return 0;
  }

  let added = 0;
  for (const row of table.rows) {
    const baseId = cell(row, keyColumn).toUpperCase();
    if (!baseId || into.has(baseId) || isExcluded(baseId, options.exclusions)) continue;
    const isShip =
      options.isShipTable ||
      parseFlag(cell(row, columns.get('is_ship'))) ||
      cell(row, columns.get('Combat Type')) === SHIP_COMBAT_TYPE;
    into.set(baseId, {
      baseId,
      name: cell(row, columns.get('Name')) || baseId,
      alignment: cell(row, columns.get('Alignment')),
      isShip
    });
    added++;
  }
  return added;
}

export function skillDisplayName(
  skillId: string,
  skillName: string,
  unit: UnitCatalogEntry | undefined
): string {
  if (skillName.includes('|')) return skillName;
  if (skillName && unit) return `${unit.name}|${skillName}`;
  return skillName || skillId;
}

export function collectSkills(
  table: Table,
  source: string,
  units: ReadonlyMap<string, UnitCatalogEntry>,
  exclusions: readonly string[],
  into: Map<string, SkillCatalogEntry>
): number {
  const columns = resolveColumns(table.headers, SKILL_COLUMNS);
  const keyColumn = columns.get('skillId');
  if (keyColumn === undefined) {
    log.warn('Skill catalog table has no skillId column', { table: source, headers: table.headers });
    return 0;
  }

  let added = 0;
  for (const row of table.rows) {
    const skillId = cell(row, keyColumn);
    if (!skillId || into.has(skillId) || isExcluded(skillId, exclusions)) continue;
    const baseId = cell(row, columns.get('base_id')).toUpperCase() || undefined;
    if (baseId && isExcluded(baseId, exclusions)) continue;
    const unit = baseId ? units.get(baseId) : undefined;
    into.set(skillId, {
      skillId,
      displayName: skillDisplayName(skillId, cell(row, columns.get('skillName')), unit),
      baseId
    });
    added++;
  }
  return added;
}

/**
 * Builds the unit and skill lookups from the catalog tables. Loading is best
 * effort: a missing or malformed source contributes nothing and the run goes on
 * with whatever the other sources provide.
 */
export async function loadCatalog(store: TabularStore, sources: CatalogSources): Promise<Catalog> {
  const units = new Map<string, UnitCatalogEntry>();
  const skills = new Map<string, SkillCatalogEntry>();
  const shipTables = new Set(sources.shipTables.map(normalizeHeader));

  for (const name of sources.unitTables) {
    const table = await readSource(store, name);
    if (!table) continue;
    const added = collectUnits(
      table,
      name,
      { isShipTable: shipTables.has(normalizeHeader(name)), exclusions: sources.exclusions },
      units
    );
    log.debug('Unit catalog loaded', { table: name, added });
  }

  for (const name of sources.skillTables) {
    const table = await readSource(store, name);
    if (!table) continue;
    const added = collectSkills(table, name, units, sources.exclusions, skills);
    log.debug('Skill catalog loaded', { table: name, added });
  }

  log.info('Catalog ready', { units: units.size, skills: skills.size });
  return { units, skills };
}
