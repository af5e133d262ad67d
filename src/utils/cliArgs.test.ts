import { describe, expect, it } from 'vitest';
import { getListArg, getStringArg, parseCliArgs, resolveBooleanFlag } from './cliArgs.js';

describe('parseCliArgs', () => {
  it('collects repeated flags, inline values and bare switches', () => {
    const args = parseCliArgs(['stray', '--guild', 'g1', '--guild=g2,g3', '--dry-run', '--timezone', 'UTC']);

    expect(args).toEqual({ guild: ['g1', 'g2,g3'], 'dry-run': true, timezone: 'UTC' });
    expect(getListArg(args, 'guild')).toEqual(['g1', 'g2', 'g3']);
    expect(getListArg(args, 'dry-run')).toBeUndefined();
    expect(getStringArg(args, 'guild')).toBe('g2,g3');
  });
});

describe('resolveBooleanFlag', () => {
  it('prefers the command line, then the environment, then the fallback', () => {
    expect(resolveBooleanFlag(true, 'false', false)).toBe(true);
    expect(resolveBooleanFlag(['yes', 'no'], undefined, true)).toBe(false);
    expect(resolveBooleanFlag(undefined, 'on', false)).toBe(true);
    expect(resolveBooleanFlag('maybe', 'maybe', true)).toBe(true);
  });
});
