import { describe, expect, it } from 'vitest';
import { readPath, resolveArray, resolveField, resolveNumber, resolveRecord, resolveString } from './fields.js';

describe('field resolution', () => {
  const payload = {
    payload: { guild: { profile: { name: 'Rebel Scum', guildGalacticPower: '512000000' } } },
    member: [{ playerId: 'p1' }],
    blank: '   '
  };

  it('walks nested paths and treats the empty path as the source', () => {
    expect(readPath(payload, ['payload', 'guild', 'profile', 'name'])).toBe('Rebel Scum');
    expect(readPath(payload, [])).toBe(payload);
    expect(readPath(payload, ['member', '0'])).toBeUndefined();
  });

  it('returns the first present value in priority order', () => {
    expect(resolveField(payload, [['blank'], ['missing'], ['payload', 'guild', 'profile', 'name']])).toBe('Rebel Scum');
    expect(resolveField(payload, [['missing']])).toBeUndefined();
  });

  it('narrows strings, numbers, arrays and records', () => {
    expect(resolveString(payload, [['blank'], ['payload', 'guild', 'profile', 'name']])).toBe('Rebel Scum');
    expect(resolveNumber(payload, [['payload', 'guild', 'profile', 'guildGalacticPower']])).toBe(512000000);
    expect(resolveArray(payload, [['members'], ['member']])).toEqual([{ playerId: 'p1' }]);
    expect(resolveArray(payload, [['members']])).toEqual([]);
    expect(resolveRecord(payload, [['guild'], ['payload', 'guild']])).toEqual(payload.payload.guild);
  });

  it('renders numeric ids as strings', () => {
    expect(resolveString({ id: 42 }, [['playerId'], ['id']])).toBe('42');
  });
});
