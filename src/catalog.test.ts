import { describe, expect, it } from 'vitest';
import { isExcluded, loadCatalog, skillDisplayName } from './catalog.js';
import { MemoryTableStore } from './store/memory.js';
import type { Table, TabularStore } from './store/types.js';

const sources = {
  unitTables: ['Characters', 'Ships'],
  shipTables: ['Ships'],
  skillTables: ['CharactersZetas', 'CharactersOmicrons'],
  exclusions: ['_GLEVENT']
};

function seededStore(): MemoryTableStore {
  return new MemoryTableStore({
    Characters: {
      headers: ['base_id', 'Name', 'Alignment'],
      rows: [
        ['vader', 'Darth Vader', 'Dark Side'],
        ['LUKESKYWALKER', 'Luke Skywalker', 'Light Side'],
        ['', 'No Id', 'Neutral'],
        ['VADER', 'Duplicate Vader', 'Dark Side'],
        ['SITHPALPATINE_GLEVENT', 'Event Palpatine', 'Dark Side']
      ]
    },
    Ships: {
      headers: ['Base ID', 'Name', 'Alignment'],
      rows: [['CAPITALEXECUTOR', 'Executor', 'Dark Side']]
    },
    CharactersZetas: {
      headers: ['base_id', 'skillId', 'skillName'],
      rows: [
        ['VADER', 'uniqueskill_VADER01', 'Inspiring Through Fear'],
        ['UNKNOWNUNIT', 'leaderskill_UNKNOWN', 'Mystery'],
        ['LUKESKYWALKER', '', 'Missing id']
      ]
    },
    CharactersOmicrons: {
      headers: ['base_id', 'skill id', 'skill name', 'omicronMode'],
      rows: [
        ['VADER', 'uniqueskill_VADER01', 'Ignored duplicate', '7'],
        ['LUKESKYWALKER', 'specialskill_LUKE02', 'Luke Skywalker|Use the Force', '8']
      ]
    }
  });
}

describe('loadCatalog', () => {
  it('maps base ids to friendly names and ship flags', async () => {
    const catalog = await loadCatalog(seededStore(), sources);

    expect([...catalog.units.keys()]).toEqual(['VADER', 'LUKESKYWALKER', 'CAPITALEXECUTOR']);
    expect(catalog.units.get('VADER')).toEqual({
      baseId: 'VADER',
      name: 'Darth Vader',
      alignment: 'Dark Side',
      isShip: false
    });
    expect(catalog.units.get('CAPITALEXECUTOR')?.isShip).toBe(true);
  });

  it('builds skill display names and keeps the first occurrence', async () => {
    const catalog = await loadCatalog(seededStore(), sources);

    expect([...catalog.skills.values()].map((entry) => [entry.skillId, entry.displayName])).toEqual([
      ['uniqueskill_VADER01', 'Darth Vader|Inspiring Through Fear'],
      ['leaderskill_UNKNOWN', 'Mystery'],
      ['specialskill_LUKE02', 'Luke Skywalker|Use the Force']
    ]);
  });

  it('lets a malformed source contribute nothing', async () => {
    const store = new MemoryTableStore({
      Characters: { headers: ['id', 'Name'], rows: [['VADER', 'Darth Vader']] },
      Ships: { headers: ['base_id', 'Name', 'Combat Type'], rows: [['HOUNDSTOOTH', "Hound's Tooth", '2']] }
    });

    const catalog = await loadCatalog(store, { ...sources, shipTables: [] });

    expect([...catalog.units.keys()]).toEqual(['HOUNDSTOOTH']);
    expect(catalog.units.get('HOUNDSTOOTH')?.isShip).toBe(true);
    expect(catalog.skills.size).toBe(0);
  });

  it('survives a store that fails to read a source', async () => {
    const failing: TabularStore = {
      readTable: async (name: string): Promise<Table | undefined> => {
        if (name === 'Characters') throw new Error('timeout');
        return undefined;
      },
      ensureHeaders: async () => new Map(),
      writeRows: async () => {}
    };

    const catalog = await loadCatalog(failing, sources);

    expect(catalog.units.size).toBe(0);
  });
});

describe('isExcluded', () => {
  it('matches substrings regardless of case', () => {
    expect(isExcluded('sithpalpatine_glevent', ['_GLEVENT'])).toBe(true);
    expect(isExcluded('VADER', ['_GLEVENT', ''])).toBe(false);
  });
});

describe('skillDisplayName', () => {
  it('prefers an explicit character prefix, then the unit name, then the bare name', () => {
    const unit = { baseId: 'VADER', name: 'Darth Vader', alignment: '', isShip: false };
    expect(skillDisplayName('s1', 'Vader|Merciless', unit)).toBe('Vader|Merciless');
    expect(skillDisplayName('s1', 'Merciless', unit)).toBe('Darth Vader|Merciless');
    expect(skillDisplayName('s1', 'Merciless', undefined)).toBe('Merciless');
    expect(skillDisplayName('s1', '', unit)).toBe('s1');
  });
});
