/**
 * Field resolution over loosely shaped provider payloads.
 *
 * A `FieldPath` walks nested objects key by key; an empty path designates the
 * source itself. `resolveField` tries paths in priority order and returns the
 * first value that is present, so every known payload variant is declared as
 * data next to the code that reads it.
 */
export type FieldPath = readonly string[];

export type UnknownRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPresent(value: unknown): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === 'string' && !value.trim()) return false;
  return true;
}

export function readPath(source: unknown, path: FieldPath): unknown {
  let current: unknown = source;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

export function resolveField(source: unknown, paths: readonly FieldPath[]): unknown {
  for (const path of paths) {
    const value = readPath(source, path);
    if (isPresent(value)) return value;
  }
  return undefined;
}

export function resolveString(source: unknown, paths: readonly FieldPath[]): string | undefined {
  for (const path of paths) {
    const value = readPath(source, path);
    if (typeof value === 'string' && value.trim()) return value.trim();
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  }
  return undefined;
}

export function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!trimmed) return undefined;
    const parsed = Number(trimmed);
    if (Number.isFinite(parsed)) return parsed;
  }
  return undefined;
}

export function resolveNumber(source: unknown, paths: readonly FieldPath[]): number | undefined {
  for (const path of paths) {
    const parsed = toNumber(readPath(source, path));
    if (parsed !== undefined) return parsed;
  }
  return undefined;
}

export function resolveArray(source: unknown, paths: readonly FieldPath[]): unknown[] {
  for (const path of paths) {
    const value = readPath(source, path);
    if (Array.isArray(value)) return value;
  }
  return [];
}

export function resolveRecord(source: unknown, paths: readonly FieldPath[]): UnknownRecord | undefined {
  for (const path of paths) {
    const value = readPath(source, path);
    if (isRecord(value)) return value;
  }
  return undefined;
}
