import type { ColumnIndex } from './types.js';

// Groups of headers that name the same column; the first entry is canonical.
const SYNONYM_GROUPS: readonly (readonly string[])[] = [
  ['Guild Id', 'GuildId', 'Guild ID'],
  ['Guild Name', 'Player Guild', 'Guild'],
  ['Members', 'Number of members', 'Member Count'],
  ['Guild GP', 'GP'],
  ['Last Raid Score', 'Last Raid Points'],
  ['Last Update', 'Last Sync', 'Updated'],
  ['Player Id', 'PlayerId'],
  ['Player Name', 'Player', 'Name'],
  ['Ally code', 'Allycode', 'Ally'],
  ['Role', 'Rol'],
  ['GP', 'Galactic Power', 'Player GP'],
  ['GAC League', 'League', 'GAC'],
  ['base_id', 'baseid', 'unit id', 'unit_base_id'],
  ['skillId', 'skill id', 'skillid'],
  ['skillName', 'skill name', 'Name']
];

export function normalizeHeader(value: string): string {
  return value.trim().toLowerCase().replace(/[\s_-]+/g, ' ');
}

const synonymIndex = new Map<string, Set<string>>();
for (const group of SYNONYM_GROUPS) {
  const normalized = group.map(normalizeHeader);
  for (const member of normalized) {
    const bucket = synonymIndex.get(member) ?? new Set<string>();
    for (const other of normalized) {
      if (other !== member) bucket.add(other);
    }
    synonymIndex.set(member, bucket);
  }
}

export function synonymsOf(header: string): ReadonlySet<string> {
  return synonymIndex.get(normalizeHeader(header)) ?? new Set();
}

/**
 * Maps each required header to an existing column. Exact (normalized) matches
 * are claimed first so a synonym never steals a column another required header
 * names literally; unresolved headers are absent from the result.
 */
export function resolveColumns(headers: readonly string[], required: readonly string[]): ColumnIndex {
  const normalized = headers.map(normalizeHeader);
  const claimed = new Set<number>();
  const result: ColumnIndex = new Map();

  for (const name of required) {
    const position = normalized.findIndex((h, i) => h === normalizeHeader(name) && !claimed.has(i));
    if (position >= 0) {
      result.set(name, position);
      claimed.add(position);
    }
  }

  for (const name of required) {
    if (result.has(name)) continue;
    const synonyms = synonymsOf(name);
    const position = normalized.findIndex((h, i) => synonyms.has(h) && !claimed.has(i));
    if (position >= 0) {
      result.set(name, position);
      claimed.add(position);
    }
  }

  return result;
}

export function findColumn(headers: readonly string[], name: string): number | undefined {
  return resolveColumns(headers, [name]).get(name);
}

/** Appends the required headers that do not resolve; existing ones stay put. */
export function ensureHeaderList(
  headers: readonly string[],
  required: readonly string[]
): { headers: string[]; index: ColumnIndex; added: string[] } {
  const next = [...headers];
  const index = resolveColumns(next, required);
  const added: string[] = [];
  for (const name of required) {
    if (index.has(name)) continue;
    index.set(name, next.length);
    next.push(name);
    added.push(name);
  }
  return { headers: next, index, added };
}
