import { toNumber } from '../lib/fields.js';
import type { LeagueStatus } from '../types/index.js';

export const SHIP_LABEL = 'Nave';

const ROLE_BY_MEMBER_LEVEL: Record<number, string> = {
  2: 'Member',
  3: 'Officer',
  4: 'Leader'
};

const DIVISION_BY_CODE: Record<number, number> = {
  25: 1,
  20: 2,
  15: 3,
  10: 4,
  5: 5
};

const RELIC_LABELS: Record<number, string> = {
  11: 'R9',
  10: 'R8',
  9: 'R7',
  8: 'R6',
  7: 'R5',
  6: 'R4',
  5: 'R3',
  4: 'R2',
  3: 'R1',
  2: 'R0',
  1: 'G12',
  0: '<G12'
};

const DEFAULT_MEMBER_LEVEL = 2;

/**
 * Numeric member levels map through the role table; an explicit role name is
 * title-cased when known. A missing, blank or zero level counts as a plain
 * member. Anything else comes back as the raw value.
 */
export function roleLabel(memberLevel: string | number | undefined): string {
  const text = memberLevel === undefined ? '' : String(memberLevel).trim();
  const numeric = text ? toNumber(text) : DEFAULT_MEMBER_LEVEL;
  if (numeric !== undefined) {
    return ROLE_BY_MEMBER_LEVEL[numeric || DEFAULT_MEMBER_LEVEL] ?? String(numeric);
  }
  const known = Object.values(ROLE_BY_MEMBER_LEVEL).find((role) => role.toLowerCase() === text.toLowerCase());
  return known ?? text;
}

export function divisionNumber(divisionId: number | undefined): number | undefined {
  if (divisionId === undefined) return undefined;
  return DIVISION_BY_CODE[divisionId];
}

export function gacLeagueLabel(status: LeagueStatus): string {
  const league = status.leagueId?.trim().toUpperCase();
  if (!league) return '';
  const division = divisionNumber(status.divisionId);
  return division === undefined ? league : `${league} ${division}`;
}

export function relicLabel(tier: number | undefined): string {
  if (tier === undefined) return '';
  return RELIC_LABELS[tier] ?? String(tier);
}

/** Matrix cell for one unit: empty when not owned, `Nave` for any ship. */
export function unitCell(owned: boolean, isShip: boolean, tier: number | undefined): string {
  if (!owned) return '';
  if (isShip) return SHIP_LABEL;
  return relicLabel(tier);
}

export function formatTimestamp(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23'
  }).formatToParts(date);
  const pick = (type: Intl.DateTimeFormatPartTypes) => parts.find((part) => part.type === type)?.value ?? '00';
  return `${pick('year')}-${pick('month')}-${pick('day')} ${pick('hour')}:${pick('minute')}:${pick('second')}`;
}

export function calendarDay(date: Date, timeZone: string): string {
  return formatTimestamp(date, timeZone).slice(0, 10);
}
