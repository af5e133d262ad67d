import { normalizeHeader } from '../store/headers.js';
import type { KeyedTable } from './table.js';

export interface MatrixEntry {
  key: string;
  name: string;
}

export interface MatrixColumn extends MatrixEntry {
  header: string;
}

export function suffixedHeader(name: string, key: string): string {
  return `${name} (${key})`;
}

/**
 * One column per catalog entry, in key order. A display name already taken
 * (by a reserved header or an earlier entry) gets its key appended.
 */
export function planMatrixColumns(
  entries: Iterable<MatrixEntry>,
  reservedHeaders: readonly string[]
): MatrixColumn[] {
  const byKey = new Map<string, MatrixEntry>();
  for (const entry of entries) {
    if (!byKey.has(entry.key)) byKey.set(entry.key, entry);
  }

  const taken = new Set(reservedHeaders.map(normalizeHeader));
  const columns: MatrixColumn[] = [];
  const keys = [...byKey.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  for (const key of keys) {
    const entry = byKey.get(key);
    if (!entry) continue;
    const name = entry.name.trim() || key;
    const header = taken.has(normalizeHeader(name)) ? suffixedHeader(name, key) : name;
    taken.add(normalizeHeader(header));
    columns.push({ key, name, header });
  }
  return columns;
}

/**
 * Maps every planned column onto the header list: an existing header is
 * matched by the planned name, then the suffixed form, then the raw key.
 * Unmatched columns are appended. Existing headers are never dropped or moved.
 */
export function growMatrix(
  headers: readonly string[],
  columns: readonly MatrixColumn[],
  reservedHeaders: readonly string[] = []
): { headers: string[]; columnByKey: Map<string, number>; added: string[] } {
  const next = [...headers];
  const normalized = next.map(normalizeHeader);
  const reserved = new Set(reservedHeaders.map(normalizeHeader));
  const claimed = new Set<number>();
  normalized.forEach((header, position) => {
    if (reserved.has(header)) claimed.add(position);
  });

  const columnByKey = new Map<string, number>();
  const added: string[] = [];
  for (const column of columns) {
    const candidates = [column.header, suffixedHeader(column.name, column.key), column.key].map(normalizeHeader);
    let position = -1;
    for (const candidate of candidates) {
      position = normalized.findIndex((header, i) => header === candidate && !claimed.has(i));
      if (position >= 0) break;
    }
    if (position < 0) {
      position = next.length;
      next.push(column.header);
      normalized.push(normalizeHeader(column.header));
      added.push(column.header);
    }
    claimed.add(position);
    columnByKey.set(column.key, position);
  }
  return { headers: next, columnByKey, added };
}

const RAW_KEY = /^[A-Z0-9_]+$/;
const SUFFIXED_KEY = /\(([A-Z0-9_]+)\)\s*$/;

/** Base id a header names outside the catalog: a bare id or a `(BASEID)` suffix. */
export function headerBaseId(header: string): string | undefined {
  const trimmed = header.trim();
  if (RAW_KEY.test(trimmed)) return trimmed;
  return SUFFIXED_KEY.exec(trimmed)?.[1];
}

/**
 * Drops the `candidates` columns that hold no value in any row; returns the
 * dropped headers. Every other column stays where it is.
 */
export function pruneEmptyColumns(table: KeyedTable, candidates: Iterable<number>): string[] {
  const prunable = new Set(candidates);
  return table.pruneColumns(
    (_header, position) => !prunable.has(position) || table.rows.some((row) => (row[position] ?? '').trim() !== '')
  );
}

/** Highest skill tier seen per (guild, player, skill) during one run. */
export class SkillTierAccumulator {
  private readonly tiers = new Map<string, Map<string, number>>();

  private static memberKey(guild: string, player: string): string {
    return JSON.stringify([guild.trim(), player.trim()]);
  }

  observe(guild: string, player: string, skillId: string, tier: number | undefined): void {
    if (tier === undefined || !Number.isFinite(tier)) return;
    const key = SkillTierAccumulator.memberKey(guild, player);
    const skills = this.tiers.get(key) ?? new Map<string, number>();
    const current = skills.get(skillId);
    if (current === undefined || tier > current) skills.set(skillId, tier);
    this.tiers.set(key, skills);
  }

  get(guild: string, player: string, skillId: string): number | undefined {
    return this.tiers.get(SkillTierAccumulator.memberKey(guild, player))?.get(skillId);
  }

  tiersFor(guild: string, player: string): ReadonlyMap<string, number> {
    return this.tiers.get(SkillTierAccumulator.memberKey(guild, player)) ?? new Map();
  }
}
